/**
 * Bit-level packing for GIF image data
 *
 * Codes are packed least-significant bit first and framed into sub-blocks of at most
 * 255 payload bytes, each preceded by its length, terminated by a zero-length block.
 * Reader and writer cursors are plain values so they can be driven directly.
 */

import { InputFormatError } from '@gifraw/core'

export const MAX_SUBBLOCK_SIZE = 255

/**
 * Write cursor
 */
export interface BitWriter {
	/** Framed output: completed sub-blocks with their length bytes */
	readonly output: number[]
	/** Payload of the sub-block being filled */
	readonly block: number[]
	bitBuffer: number
	bitCount: number
}

/**
 * Read cursor over framed sub-blocks
 */
export interface BitReader {
	readonly data: Uint8Array
	/** Next byte in data */
	pos: number
	/** Payload bytes left in the current sub-block */
	blockRemaining: number
	bitBuffer: number
	bitCount: number
}

export function createBitWriter(): BitWriter {
	return { output: [], block: [], bitBuffer: 0, bitCount: 0 }
}

function flushBlock(writer: BitWriter): void {
	if (writer.block.length === 0) return
	writer.output.push(writer.block.length)
	for (const byte of writer.block) {
		writer.output.push(byte)
	}
	writer.block.length = 0
}

function pushByte(writer: BitWriter, byte: number): void {
	writer.block.push(byte)
	if (writer.block.length === MAX_SUBBLOCK_SIZE) {
		flushBlock(writer)
	}
}

/**
 * Append the low `width` bits of `code`
 */
export function writeCode(writer: BitWriter, code: number, width: number): void {
	writer.bitBuffer |= (code & ((1 << width) - 1)) << writer.bitCount
	writer.bitCount += width
	while (writer.bitCount >= 8) {
		pushByte(writer, writer.bitBuffer & 0xff)
		writer.bitBuffer >>>= 8
		writer.bitCount -= 8
	}
}

/**
 * Flush the partial byte and the open sub-block, then append the terminator
 */
export function finishBitWriter(writer: BitWriter): Uint8Array {
	if (writer.bitCount > 0) {
		pushByte(writer, writer.bitBuffer & 0xff)
		writer.bitBuffer = 0
		writer.bitCount = 0
	}
	flushBlock(writer)
	writer.output.push(0)
	return new Uint8Array(writer.output)
}

export function createBitReader(data: Uint8Array, offset = 0): BitReader {
	return { data, pos: offset, blockRemaining: 0, bitBuffer: 0, bitCount: 0 }
}

function nextByte(reader: BitReader): number {
	if (reader.blockRemaining === 0) {
		if (reader.pos >= reader.data.length) {
			throw new InputFormatError('UNEXPECTED_END', 'Unexpected end of LZW data')
		}
		const size = reader.data[reader.pos++]!
		if (size === 0) {
			// Terminator: stays put so later reads fail the same way
			reader.pos--
			throw new InputFormatError('UNEXPECTED_END', 'LZW data ended before end code')
		}
		if (reader.pos + size > reader.data.length) {
			throw new InputFormatError(
				'SUBBLOCK_OVERRUN',
				`Sub-block of ${size} bytes at offset ${reader.pos - 1} overruns the data`
			)
		}
		reader.blockRemaining = size
	}
	reader.blockRemaining--
	return reader.data[reader.pos++]!
}

/**
 * Read the next `width` bits, crossing sub-block boundaries as needed
 */
export function readCode(reader: BitReader, width: number): number {
	while (reader.bitCount < width) {
		reader.bitBuffer |= nextByte(reader) << reader.bitCount
		reader.bitCount += 8
	}
	const code = reader.bitBuffer & ((1 << width) - 1)
	reader.bitBuffer >>>= width
	reader.bitCount -= width
	return code
}

/**
 * Position just past the terminator of the sub-block chain starting at `offset`
 */
export function measureSubBlocks(data: Uint8Array, offset: number): number {
	let pos = offset
	while (true) {
		if (pos >= data.length) {
			throw new InputFormatError('UNEXPECTED_END', 'Missing sub-block terminator')
		}
		const size = data[pos++]!
		if (size === 0) return pos
		if (pos + size > data.length) {
			throw new InputFormatError(
				'SUBBLOCK_OVERRUN',
				`Sub-block of ${size} bytes at offset ${pos - 1} overruns the data`
			)
		}
		pos += size
	}
}

/**
 * Concatenate the payloads of the sub-block chain starting at `offset`
 */
export function readSubBlocks(data: Uint8Array, offset: number): { data: Uint8Array; end: number } {
	const end = measureSubBlocks(data, offset)
	const payload = new Uint8Array(end - offset)
	let length = 0
	let pos = offset
	while (true) {
		const size = data[pos++]!
		if (size === 0) break
		payload.set(data.subarray(pos, pos + size), length)
		length += size
		pos += size
	}
	return { data: payload.slice(0, length), end }
}
