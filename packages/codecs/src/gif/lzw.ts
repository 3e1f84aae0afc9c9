/**
 * LZW compression/decompression for GIF
 *
 * GIF uses a variant of LZW with variable-width codes starting at minCodeSize+1 bits.
 * Both directions take and produce image data framed in sub-blocks.
 *
 * Width rule: a code is written with the smallest width whose power of two holds the
 * dictionary size after the insertion the decoder performs when it reads that code.
 * The decoder inserts one step behind the encoder, so both sides derive the same
 * width at every code.
 */

import {
	CapacityError,
	ConsistencyError,
	type Diagnostics,
	InputFormatError,
	silentDiagnostics,
} from '@gifraw/core'
import { createBitReader, createBitWriter, finishBitWriter, readCode, writeCode } from './bitstream'
import { codeWidthFor, LzwDictionary, MAX_MIN_CODE_SIZE, MIN_CODE_SIZE } from './dictionary'

export interface LzwDecodeOptions {
	diagnostics?: Diagnostics
}

export interface LzwEncodeOptions {
	/** Freeze the dictionary once full instead of emitting a clear code */
	noDictReset?: boolean
	diagnostics?: Diagnostics
}

function isValidCodeSize(minCodeSize: number): boolean {
	return Number.isInteger(minCodeSize) && minCodeSize >= MIN_CODE_SIZE && minCodeSize <= MAX_MIN_CODE_SIZE
}

/**
 * Decompress framed LZW data into exactly `pixelCount` palette indices
 */
export function lzwDecode(
	data: Uint8Array,
	minCodeSize: number,
	pixelCount: number,
	options: LzwDecodeOptions = {}
): Uint8Array {
	if (!isValidCodeSize(minCodeSize)) {
		throw new InputFormatError('INVALID_CODE_SIZE', `Invalid LZW minimum code size: ${minCodeSize}`)
	}

	const diagnostics = options.diagnostics ?? silentDiagnostics
	const dictionary = new LzwDictionary(minCodeSize)
	const { clearCode, endCode } = dictionary
	const reader = createBitReader(data)
	const output = new Uint8Array(pixelCount)

	let outPos = 0
	let width = minCodeSize + 1
	let prevCode = -1
	let codeCount = 0
	let bitCount = 0
	let clearCount = 0

	while (true) {
		const code = readCode(reader, width)
		codeCount++
		bitCount += width
		diagnostics.code?.(code, width)

		if (code === endCode) break

		if (code === clearCode) {
			dictionary.reset()
			prevCode = -1
			clearCount++
		} else {
			const size = dictionary.size

			// code === size is the entry being defined by this very code (prev + prev[0])
			if (code > size || (code === size && (prevCode === -1 || dictionary.isFull))) {
				throw new InputFormatError('INVALID_CODE', `Invalid LZW code: ${code} (dictionary size ${size})`)
			}

			if (prevCode !== -1 && !dictionary.isFull) {
				const firstSymbol =
					code === size ? dictionary.firstSymbolOf(prevCode) : dictionary.firstSymbolOf(code)
				dictionary.add(prevCode, firstSymbol)
			}

			const length = dictionary.lengthOf(code)
			if (outPos + length > pixelCount) {
				throw new ConsistencyError(
					'PIXEL_COUNT_MISMATCH',
					`LZW data holds more than the expected ${pixelCount} pixels`
				)
			}
			dictionary.copyTo(code, output, outPos)
			outPos += length
			prevCode = code
		}

		width = codeWidthFor(dictionary.size + 1, minCodeSize)
	}

	if (outPos !== pixelCount) {
		throw new ConsistencyError(
			'PIXEL_COUNT_MISMATCH',
			`LZW data holds ${outPos} pixels, expected ${pixelCount}`
		)
	}

	diagnostics.stats?.({
		direction: 'decode',
		codes: codeCount,
		bits: bitCount,
		pixels: outPos,
		clearCodes: clearCount,
	})

	return output
}

/**
 * Compress palette indices into framed LZW data
 */
export function lzwEncode(
	indices: Uint8Array,
	minCodeSize: number,
	options: LzwEncodeOptions = {}
): Uint8Array {
	if (!isValidCodeSize(minCodeSize)) {
		throw new CapacityError('INVALID_CODE_SIZE', `Invalid LZW minimum code size: ${minCodeSize}`)
	}

	const paletteSize = 1 << minCodeSize
	for (let i = 0; i < indices.length; i++) {
		if (indices[i]! >= paletteSize) {
			throw new CapacityError(
				'INDEX_OUT_OF_RANGE',
				`Index ${indices[i]} at pixel ${i} does not fit minimum code size ${minCodeSize}`
			)
		}
	}

	const diagnostics = options.diagnostics ?? silentDiagnostics
	const dictionary = new LzwDictionary(minCodeSize)
	const { clearCode, endCode } = dictionary
	const writer = createBitWriter()

	let codeCount = 0
	let bitCount = 0
	let clearCount = 0

	const emit = (code: number, width: number) => {
		writeCode(writer, code, width)
		codeCount++
		bitCount += width
		diagnostics.code?.(code, width)
	}

	emit(clearCode, minCodeSize + 1)
	clearCount++

	let pos = 0
	while (pos < indices.length) {
		// Longest match starting at pos
		let code = indices[pos]!
		let next = pos + 1
		while (next < indices.length) {
			const child = dictionary.find(code, indices[next]!)
			if (child === undefined) break
			code = child
			next++
		}

		emit(code, codeWidthFor(dictionary.size, minCodeSize))
		pos = next

		if (pos < indices.length) {
			if (!dictionary.isFull) {
				dictionary.add(code, indices[pos]!)
			} else if (!options.noDictReset) {
				emit(clearCode, codeWidthFor(dictionary.size + 1, minCodeSize))
				dictionary.reset()
				clearCount++
			}
		}
	}

	// The decoder reads the end code sized for one more pending entry
	emit(endCode, codeWidthFor(dictionary.size + 1, minCodeSize))

	diagnostics.stats?.({
		direction: 'encode',
		codes: codeCount,
		bits: bitCount,
		pixels: indices.length,
		clearCodes: clearCount,
	})

	return finishBitWriter(writer)
}
