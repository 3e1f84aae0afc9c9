import { describe, expect, test } from 'vitest'
import { CapacityError, ConsistencyError, InputFormatError } from '@gifraw/core'
import { RawCodec } from './codec'
import { decodeRaw } from './decoder'
import { encodeRaw } from './encoder'

describe('Raw RGB', () => {
	describe('decodeRaw', () => {
		test('derives the height from the file size', () => {
			const data = new Uint8Array(2 * 3 * 3).fill(7)
			const image = decodeRaw(data, 2)

			expect(image.width).toBe(2)
			expect(image.height).toBe(3)
			expect(image.data).toEqual(data)
		})

		test('copies the input', () => {
			const data = new Uint8Array([1, 2, 3])
			const image = decodeRaw(data, 1)
			data[0] = 99
			expect(image.data[0]).toBe(1)
		})

		test('rejects an empty file', () => {
			expect(() => decodeRaw(new Uint8Array(0), 1)).toThrow(InputFormatError)
		})

		test('rejects a size that is not a whole number of rows', () => {
			expect(() => decodeRaw(new Uint8Array(7), 1)).toThrow('not a multiple of 3')
			expect(() => decodeRaw(new Uint8Array(9), 2)).toThrow(InputFormatError)
		})

		test('rejects widths outside 1..65535', () => {
			expect(() => decodeRaw(new Uint8Array(3), 0)).toThrow(CapacityError)
			expect(() => decodeRaw(new Uint8Array(3), 65536)).toThrow(CapacityError)
			expect(() => decodeRaw(new Uint8Array(3), 1.5)).toThrow(CapacityError)
		})

		test('rejects a height above 65535', () => {
			expect(() => decodeRaw(new Uint8Array(65536 * 3), 1)).toThrow(CapacityError)
		})
	})

	describe('encodeRaw', () => {
		test('returns the RGB bytes', () => {
			const data = new Uint8Array([1, 2, 3, 4, 5, 6])
			expect(encodeRaw({ width: 2, height: 1, data })).toEqual(data)
		})

		test('rejects a buffer of the wrong size', () => {
			expect(() => encodeRaw({ width: 2, height: 1, data: new Uint8Array(5) })).toThrow(ConsistencyError)
		})
	})

	describe('RawCodec', () => {
		test('needs a width to decode', () => {
			expect(() => RawCodec.decode(new Uint8Array(3))).toThrow('needs a width')
		})

		test('decodes with the given width', () => {
			const image = RawCodec.decode(new Uint8Array(12), { width: 2 })
			expect(image.height).toBe(2)
			expect(RawCodec.encode(image)).toEqual(new Uint8Array(12))
		})
	})
})
