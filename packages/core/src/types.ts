import type { Diagnostics } from './diagnostics'

/**
 * Raw image data in RGB format
 * Each pixel is 3 bytes: R, G, B (0-255)
 */
export interface RgbImage {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGB, length = width * height * 3
}

/**
 * Palette-indexed image
 */
export interface IndexedImage {
	readonly width: number
	readonly height: number
	readonly indices: Uint8Array // length = width * height, row-major
	readonly palette: Uint8Array // RGB triplets
}

/**
 * Supported formats
 */
export type Format = 'gif' | 'raw'

/**
 * Decode options
 */
export interface DecodeOptions {
	/** Image width in pixels, needed by formats without a header */
	width?: number
	diagnostics?: Diagnostics
}

/**
 * Encode options
 */
export interface EncodeOptions {
	/** Keep the LZW dictionary frozen once full instead of emitting a clear code */
	noDictReset?: boolean
	diagnostics?: Diagnostics
}

/**
 * Codec interface for encoding/decoding
 */
export interface Codec<T> {
	readonly format: Format
	decode(data: Uint8Array, options?: DecodeOptions): T
	encode(input: T, options?: EncodeOptions): Uint8Array
}

/**
 * Image codec
 */
export type ImageCodec = Codec<RgbImage>
