import {
	type DecodeOptions,
	type Diagnostics,
	type IndexedImage,
	InputFormatError,
	type RgbImage,
} from '@gifraw/core'
import { deinterlace } from './interlace'
import { lzwDecode } from './lzw'
import { applyPalette } from './palette'
import { inspectGif } from './inspect'
import type {
	GifImage,
	GraphicControlExtension,
	ImageDataInput,
	ImageDescriptor,
	LogicalScreenDescriptor,
} from './types'

export interface GifDecodeOptions {
	diagnostics?: Diagnostics
}

/**
 * Decode GIF to an RGB raster
 * Only the first image is decoded; later images and extensions are ignored
 */
export function decodeGif(data: Uint8Array, options: DecodeOptions = {}): RgbImage {
	return applyPalette(decodeGifIndexed(data, options))
}

/**
 * Decode the first image of a GIF to palette indices and its color table
 */
export function decodeGifIndexed(data: Uint8Array, options: GifDecodeOptions = {}): IndexedImage {
	const gif = parseGif(data, options)
	const { width, height, interlaced } = gif.imageDescriptor

	if (width === 0 || height === 0) {
		throw new InputFormatError('INVALID_IMAGE', `Image has no pixels (${width}x${height})`)
	}

	const palette = gif.localColorTable ?? gif.globalColorTable
	if (!palette) {
		throw new InputFormatError('NO_PALETTE', 'Image has neither a local nor a global color table')
	}

	const indices = decodeImageData(
		{ minCodeSize: gif.minCodeSize, data: gif.imageData, width, height, interlaced },
		options
	)

	return { width, height, indices, palette }
}

/**
 * Parse the GIF container up to the end of the first image
 */
export function parseGif(data: Uint8Array, options: GifDecodeOptions = {}): GifImage {
	const blocks = inspectGif(data, { untilFirstImage: true, diagnostics: options.diagnostics })

	let version = ''
	let globalColorTable: Uint8Array | null = null
	let localColorTable: Uint8Array | null = null
	let graphicControl: GraphicControlExtension | null = null
	let screen: LogicalScreenDescriptor | null = null
	let descriptor: ImageDescriptor | null = null
	let imageData: { minCodeSize: number; data: Uint8Array } | null = null

	for (const block of blocks) {
		switch (block.type) {
			case 'header':
				version = block.version
				break
			case 'screenDescriptor':
				screen = block.descriptor
				break
			case 'globalColorTable':
				globalColorTable = block.table
				break
			case 'graphicControl':
				graphicControl = block.extension
				break
			case 'imageDescriptor':
				descriptor = block.descriptor
				break
			case 'localColorTable':
				localColorTable = block.table
				break
			case 'imageData':
				imageData = block
				break
		}
	}

	if (!screen || !descriptor || !imageData) {
		throw new InputFormatError('NO_IMAGE', 'GIF file contains no image')
	}

	return {
		version,
		screenDescriptor: screen,
		globalColorTable,
		imageDescriptor: descriptor,
		localColorTable,
		graphicControl,
		minCodeSize: imageData.minCodeSize,
		imageData: imageData.data,
	}
}

/**
 * Decompress one image's LZW data into top-to-bottom palette indices
 */
export function decodeImageData(input: ImageDataInput, options: GifDecodeOptions = {}): Uint8Array {
	const { width, height } = input

	if (width <= 0 || height <= 0) {
		throw new InputFormatError('INVALID_IMAGE', `Image has no pixels (${width}x${height})`)
	}

	const indices = lzwDecode(input.data, input.minCodeSize, width * height, options)
	return input.interlaced ? deinterlace(indices, width, height) : indices
}
