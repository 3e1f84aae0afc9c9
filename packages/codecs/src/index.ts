/**
 * GIF and raw RGB codecs
 */

import type { Format, ImageCodec } from '@gifraw/core'
import { GifCodec } from './gif'
import { RawCodec } from './raw'

export * from './gif'
export * from './raw'

const CODECS: Record<Format, ImageCodec> = {
	gif: GifCodec,
	raw: RawCodec,
}

/**
 * Codec for a format
 */
export function getCodec(format: Format): ImageCodec {
	return CODECS[format]
}
