import type { DecodeOptions, EncodeOptions, ImageCodec, RgbImage } from '@gifraw/core'
import { decodeGif } from './decoder'
import { encodeGif } from './encoder'

/**
 * GIF codec implementation
 */
export const GifCodec: ImageCodec = {
	format: 'gif',

	decode(data: Uint8Array, options?: DecodeOptions): RgbImage {
		return decodeGif(data, options)
	},

	encode(image: RgbImage, options?: EncodeOptions): Uint8Array {
		return encodeGif(image, options)
	},
}
