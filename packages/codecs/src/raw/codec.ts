/**
 * Raw RGB codec implementation
 */

import { CapacityError, type DecodeOptions, type ImageCodec, type RgbImage } from '@gifraw/core'
import { decodeRaw } from './decoder'
import { encodeRaw } from './encoder'

export const RawCodec: ImageCodec = {
	format: 'raw',

	decode(data: Uint8Array, options?: DecodeOptions): RgbImage {
		const width = options?.width
		if (width === undefined) {
			throw new CapacityError('INVALID_WIDTH', 'Raw RGB data needs a width')
		}
		return decodeRaw(data, width)
	},

	encode(image: RgbImage): Uint8Array {
		return encodeRaw(image)
	},
}
