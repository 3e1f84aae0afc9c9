/**
 * Raw RGB encoder
 */

import { ConsistencyError, type RgbImage } from '@gifraw/core'
import { RAW_BYTES_PER_PIXEL } from './types'

/**
 * Encode image to raw RGB bytes
 */
export function encodeRaw(image: RgbImage): Uint8Array {
	const { width, height, data } = image
	const expected = width * height * RAW_BYTES_PER_PIXEL

	if (data.length !== expected) {
		throw new ConsistencyError(
			'BUFFER_SIZE_MISMATCH',
			`Expected ${expected} bytes of RGB data, got ${data.length}`
		)
	}

	return data.slice()
}
