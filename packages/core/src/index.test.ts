import { describe, expect, test } from 'vitest'
import {
	CapacityError,
	CodecError,
	ConsistencyError,
	createConsoleDiagnostics,
	detectFormat,
	formatCode,
	InputFormatError,
	isCodecError,
	type RgbImage,
} from './index'

describe('core', () => {
	test('types export correctly', () => {
		const img: RgbImage = { width: 1, height: 1, data: new Uint8Array(3) }
		expect(img.width).toBe(1)
	})
})

describe('errors', () => {
	test('subclasses keep name and code', () => {
		const err = new InputFormatError('UNEXPECTED_END', 'unexpected end of LZW data')
		expect(err).toBeInstanceOf(CodecError)
		expect(err).toBeInstanceOf(Error)
		expect(err.name).toBe('InputFormatError')
		expect(err.code).toBe('UNEXPECTED_END')
		expect(err.message).toBe('unexpected end of LZW data')
	})

	test('isCodecError distinguishes codec failures', () => {
		expect(isCodecError(new CapacityError('TOO_MANY_COLORS', 'too many colors'))).toBe(true)
		expect(isCodecError(new ConsistencyError('PIXEL_COUNT_MISMATCH', 'x'))).toBe(true)
		expect(isCodecError(new Error('plain'))).toBe(false)
	})
})

describe('format', () => {
	test('detects GIF signature', () => {
		expect(detectFormat(new Uint8Array([0x47, 0x49, 0x46, 0x38, 0x39, 0x61]))).toBe('gif')
	})

	test('returns null for unknown data', () => {
		expect(detectFormat(new Uint8Array([1, 2, 3, 4]))).toBeNull()
		expect(detectFormat(new Uint8Array([0x47]))).toBeNull()
	})
})

describe('diagnostics', () => {
	test('formatCode pads to width', () => {
		expect(formatCode(4, 3)).toBe('100')
		expect(formatCode(5, 4)).toBe('0101')
	})

	test('console diagnostics writes stats and trace lines', () => {
		const lines: string[] = []
		const warnings: string[] = []
		const diagnostics = createConsoleDiagnostics({
			trace: true,
			write: (line) => lines.push(line),
			writeWarning: (line) => warnings.push(line),
		})

		diagnostics.code?.(6, 3)
		diagnostics.stats?.({ direction: 'decode', codes: 6, bits: 20, pixels: 10, clearCodes: 1 })
		diagnostics.warn?.('unknown GIF version')

		expect(lines).toEqual(['110', 'lzwCodes=6, lzwBits=20, pixels=10, clearCodes=1'])
		expect(warnings).toEqual(['Warning: unknown GIF version'])
	})

	test('trace is off by default', () => {
		const diagnostics = createConsoleDiagnostics({ write: () => {} })
		expect(diagnostics.code).toBeUndefined()
	})

	test('statistics can be turned off', () => {
		const diagnostics = createConsoleDiagnostics({ trace: true, stats: false, write: () => {} })
		expect(diagnostics.stats).toBeUndefined()
		expect(diagnostics.code).toBeDefined()
	})
})
