import { describe, expect, test } from 'vitest'
import { isCodecError } from '@gifraw/core'
import {
	createBitReader,
	createBitWriter,
	finishBitWriter,
	measureSubBlocks,
	readCode,
	readSubBlocks,
	writeCode,
} from './bitstream'

function thrownCode(fn: () => unknown): string | undefined {
	try {
		fn()
	} catch (err) {
		return isCodecError(err) ? err.code : undefined
	}
	return undefined
}

describe('BitWriter', () => {
	test('packs codes least significant bit first', () => {
		const writer = createBitWriter()
		writeCode(writer, 4, 3)
		writeCode(writer, 0, 3)
		writeCode(writer, 6, 3)
		writeCode(writer, 7, 3)
		writeCode(writer, 8, 4)
		writeCode(writer, 5, 4)

		expect(Array.from(finishBitWriter(writer))).toEqual([3, 0x84, 0x8f, 0x05, 0])
	})

	test('splits payload into 255-byte sub-blocks', () => {
		const writer = createBitWriter()
		for (let i = 0; i < 300; i++) {
			writeCode(writer, 0xab, 8)
		}
		const framed = finishBitWriter(writer)

		expect(framed.length).toBe(303)
		expect(framed[0]).toBe(255)
		expect(framed[256]).toBe(45)
		expect(framed[302]).toBe(0)
	})

	test('empty stream is just the terminator', () => {
		expect(Array.from(finishBitWriter(createBitWriter()))).toEqual([0])
	})
})

describe('BitReader', () => {
	test('reads codes across sub-block boundaries', () => {
		const writer = createBitWriter()
		for (let i = 0; i < 300; i++) {
			writeCode(writer, i & 0x1ff, 9)
		}
		const reader = createBitReader(finishBitWriter(writer))

		for (let i = 0; i < 300; i++) {
			expect(readCode(reader, 9)).toBe(i & 0x1ff)
		}
	})

	test('starts at the given offset', () => {
		const reader = createBitReader(new Uint8Array([9, 9, 1, 0x2a, 0]), 2)
		expect(readCode(reader, 8)).toBe(0x2a)
	})

	test('terminator before the next code is an unexpected end', () => {
		const reader = createBitReader(new Uint8Array([1, 0xff, 0]))
		expect(readCode(reader, 8)).toBe(0xff)
		expect(thrownCode(() => readCode(reader, 8))).toBe('UNEXPECTED_END')
		// Stays on the terminator
		expect(thrownCode(() => readCode(reader, 8))).toBe('UNEXPECTED_END')
	})

	test('running off the data is an unexpected end', () => {
		const reader = createBitReader(new Uint8Array(0))
		expect(thrownCode(() => readCode(reader, 3))).toBe('UNEXPECTED_END')
	})

	test('sub-block longer than the data overruns', () => {
		const reader = createBitReader(new Uint8Array([5, 1, 2]))
		expect(thrownCode(() => readCode(reader, 8))).toBe('SUBBLOCK_OVERRUN')
	})
})

describe('sub-block chains', () => {
	test('measureSubBlocks returns the position after the terminator', () => {
		expect(measureSubBlocks(new Uint8Array([2, 1, 2, 0, 9]), 0)).toBe(4)
		expect(measureSubBlocks(new Uint8Array([7, 0]), 1)).toBe(2)
	})

	test('measureSubBlocks rejects a missing terminator', () => {
		expect(thrownCode(() => measureSubBlocks(new Uint8Array([2, 1, 2]), 0))).toBe('UNEXPECTED_END')
	})

	test('measureSubBlocks rejects an overrunning block', () => {
		expect(thrownCode(() => measureSubBlocks(new Uint8Array([4, 1, 2]), 0))).toBe('SUBBLOCK_OVERRUN')
	})

	test('readSubBlocks concatenates payloads', () => {
		const { data, end } = readSubBlocks(new Uint8Array([2, 1, 2, 1, 3, 0, 0x3b]), 0)
		expect(Array.from(data)).toEqual([1, 2, 3])
		expect(end).toBe(6)
	})
})
