import { describe, expect, test } from 'vitest'
import { GifCodec, getCodec, RawCodec } from './index'

describe('codecs', () => {
	test('getCodec returns the codec for each format', () => {
		expect(getCodec('gif')).toBe(GifCodec)
		expect(getCodec('raw')).toBe(RawCodec)
	})

	test('raw data converts to GIF and back', () => {
		const raw = new Uint8Array([255, 0, 0, 0, 255, 0, 0, 0, 255, 255, 255, 255])
		const image = getCodec('raw').decode(raw, { width: 2 })
		const gif = getCodec('gif').encode(image)
		expect(getCodec('raw').encode(getCodec('gif').decode(gif))).toEqual(raw)
	})
})
