import {
	CapacityError,
	ConsistencyError,
	type Diagnostics,
	type EncodeOptions,
	type IndexedImage,
	type RgbImage,
} from '@gifraw/core'
import { MIN_CODE_SIZE } from './dictionary'
import { lzwEncode } from './lzw'
import { buildPalette, MAX_PALETTE_COLORS, paletteBitDepth } from './palette'
import { GIF87A, IMAGE_SEPARATOR, type ImageDataEncodeInput, MAX_DIMENSION, TRAILER } from './types'

export interface GifEncodeOptions {
	noDictReset?: boolean
	diagnostics?: Diagnostics
}

function checkDimensions(width: number, height: number): void {
	if (!Number.isInteger(width) || width < 1 || width > MAX_DIMENSION) {
		throw new CapacityError('INVALID_WIDTH', `Width must be 1-${MAX_DIMENSION}, got ${width}`)
	}
	if (!Number.isInteger(height) || height < 1 || height > MAX_DIMENSION) {
		throw new CapacityError('INVALID_HEIGHT', `Height must be 1-${MAX_DIMENSION}, got ${height}`)
	}
}

/**
 * Encode an RGB raster to GIF
 * The palette holds exactly the distinct colors of the image
 */
export function encodeGif(image: RgbImage, options: EncodeOptions = {}): Uint8Array {
	checkDimensions(image.width, image.height)
	return encodeGifIndexed(buildPalette(image), options)
}

/**
 * Encode palette indices and their color table to GIF87a
 */
export function encodeGifIndexed(image: IndexedImage, options: GifEncodeOptions = {}): Uint8Array {
	const { width, height, indices, palette } = image
	checkDimensions(width, height)

	const colorCount = Math.floor(palette.length / 3)
	if (colorCount < 1 || colorCount > MAX_PALETTE_COLORS || palette.length % 3 !== 0) {
		throw new CapacityError(
			'INVALID_PALETTE',
			`Palette must hold 1-${MAX_PALETTE_COLORS} RGB colors, got ${palette.length} bytes`
		)
	}

	const paletteBits = paletteBitDepth(colorCount)
	const output: number[] = []

	// Header
	for (const c of GIF87A) {
		output.push(c.charCodeAt(0))
	}

	// Logical Screen Descriptor
	output.push(width & 0xff, (width >> 8) & 0xff)
	output.push(height & 0xff, (height >> 8) & 0xff)
	output.push(0x80 | (paletteBits - 1)) // Global Color Table Flag, table size
	output.push(0) // Background Color Index
	output.push(0) // Pixel Aspect Ratio

	// Global Color Table, padded to a power of two
	for (let i = 0; i < (1 << paletteBits) * 3; i++) {
		output.push(palette[i] ?? 0)
	}

	// Image Descriptor
	output.push(IMAGE_SEPARATOR)
	output.push(0, 0) // Left position
	output.push(0, 0) // Top position
	output.push(width & 0xff, (width >> 8) & 0xff)
	output.push(height & 0xff, (height >> 8) & 0xff)
	output.push(0) // Packed: no local color table, not interlaced

	// Image Data
	const minCodeSize = Math.max(paletteBits, MIN_CODE_SIZE)
	output.push(minCodeSize)
	const data = encodeImageData(
		{ indices, width, height, minCodeSize, noDictReset: options.noDictReset },
		options
	)
	for (const byte of data) {
		output.push(byte)
	}

	// Trailer
	output.push(TRAILER)

	return new Uint8Array(output)
}

/**
 * Compress one image's palette indices into framed LZW data
 */
export function encodeImageData(
	input: ImageDataEncodeInput,
	options: { diagnostics?: Diagnostics } = {}
): Uint8Array {
	const { indices, width, height, minCodeSize } = input
	checkDimensions(width, height)

	if (indices.length !== width * height) {
		throw new ConsistencyError(
			'BUFFER_SIZE_MISMATCH',
			`Expected ${width * height} indices for ${width}x${height}, got ${indices.length}`
		)
	}

	return lzwEncode(indices, minCodeSize, {
		noDictReset: input.noDictReset,
		diagnostics: options.diagnostics,
	})
}
