/**
 * LZW dictionary shared by the GIF decoder and encoder
 *
 * Entries live in flat arrays indexed by code. Each dynamic entry is stored as
 * (parent code, appended symbol); the full sequence is rebuilt by walking parents.
 */

export const MAX_CODE_WIDTH = 12
export const MAX_DICTIONARY_SIZE = 1 << MAX_CODE_WIDTH

/** Smallest and largest LZW minimum code size accepted */
export const MIN_CODE_SIZE = 2
export const MAX_MIN_CODE_SIZE = 8

/**
 * Code width needed once the dictionary holds `size` entries
 * The smallest width, starting at minCodeSize + 1, whose power of two is >= size
 */
export function codeWidthFor(size: number, minCodeSize: number): number {
	let width = minCodeSize + 1
	while (width < MAX_CODE_WIDTH && (1 << width) < size) {
		width++
	}
	return width
}

export class LzwDictionary {
	readonly minCodeSize: number
	readonly clearCode: number
	readonly endCode: number

	private readonly parents = new Int16Array(MAX_DICTIONARY_SIZE)
	private readonly symbols = new Uint8Array(MAX_DICTIONARY_SIZE)
	private readonly firstSymbols = new Uint8Array(MAX_DICTIONARY_SIZE)
	private readonly lengths = new Uint16Array(MAX_DICTIONARY_SIZE)
	// (parent << 8 | symbol) -> code
	private readonly children = new Map<number, number>()
	private nextCode: number

	constructor(minCodeSize: number) {
		this.minCodeSize = minCodeSize
		this.clearCode = 1 << minCodeSize
		this.endCode = this.clearCode + 1

		for (let i = 0; i < this.clearCode; i++) {
			this.parents[i] = -1
			this.symbols[i] = i
			this.firstSymbols[i] = i
			this.lengths[i] = 1
		}
		// Clear and end codes carry no sequence
		this.parents[this.clearCode] = -1
		this.parents[this.endCode] = -1

		this.nextCode = this.endCode + 1
	}

	/** Number of assigned codes, reserved ones included; also the next code to assign */
	get size(): number {
		return this.nextCode
	}

	get isFull(): boolean {
		return this.nextCode >= MAX_DICTIONARY_SIZE
	}

	/**
	 * Drop every dynamic entry
	 */
	reset(): void {
		this.nextCode = this.endCode + 1
		this.children.clear()
	}

	/**
	 * Add `parent + symbol`; returns the new code, or -1 when full
	 */
	add(parent: number, symbol: number): number {
		if (this.isFull) return -1

		const code = this.nextCode++
		this.parents[code] = parent
		this.symbols[code] = symbol
		this.firstSymbols[code] = this.firstSymbols[parent]!
		this.lengths[code] = this.lengths[parent]! + 1
		this.children.set((parent << 8) | symbol, code)
		return code
	}

	/**
	 * Code of `parent + symbol`, if present
	 */
	find(parent: number, symbol: number): number | undefined {
		return this.children.get((parent << 8) | symbol)
	}

	lengthOf(code: number): number {
		return this.lengths[code]!
	}

	firstSymbolOf(code: number): number {
		return this.firstSymbols[code]!
	}

	/**
	 * Write the sequence of `code` into `output` at `offset`; returns its length
	 */
	copyTo(code: number, output: Uint8Array, offset: number): number {
		const length = this.lengths[code]!
		let pos = offset + length - 1
		let current = code
		while (current !== -1) {
			output[pos--] = this.symbols[current]!
			current = this.parents[current]!
		}
		return length
	}
}
