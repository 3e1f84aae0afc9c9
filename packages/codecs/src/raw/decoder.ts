/**
 * Raw RGB decoder
 */

import { CapacityError, InputFormatError, type RgbImage } from '@gifraw/core'
import { RAW_BYTES_PER_PIXEL, RAW_MAX_DIMENSION } from './types'

/**
 * Decode raw RGB bytes given the image width
 */
export function decodeRaw(data: Uint8Array, width: number): RgbImage {
	if (!Number.isInteger(width) || width < 1 || width > RAW_MAX_DIMENSION) {
		throw new CapacityError('INVALID_WIDTH', `Width must be 1-${RAW_MAX_DIMENSION}, got ${width}`)
	}

	if (data.length === 0) {
		throw new InputFormatError('INVALID_FILE_SIZE', 'Raw RGB data is empty')
	}

	const rowSize = width * RAW_BYTES_PER_PIXEL
	if (data.length % rowSize !== 0) {
		throw new InputFormatError(
			'INVALID_FILE_SIZE',
			`File size ${data.length} is not a multiple of ${rowSize} (width ${width} * ${RAW_BYTES_PER_PIXEL})`
		)
	}

	const height = data.length / rowSize
	if (height > RAW_MAX_DIMENSION) {
		throw new CapacityError('INVALID_HEIGHT', `Height ${height} exceeds ${RAW_MAX_DIMENSION}`)
	}

	return { width, height, data: data.slice() }
}
