import { ConsistencyError } from '@gifraw/core'

// Interlace passes: rows 0, 8, 16... then 4, 12... then 2, 6... then 1, 3...
const PASS_STARTS = [0, 4, 2, 1] as const
const PASS_STEPS = [8, 8, 4, 2] as const

/**
 * Logical row index of each physical row in an interlaced image
 */
export function interlacedRowOrder(height: number): number[] {
	const order: number[] = []
	for (let pass = 0; pass < PASS_STARTS.length; pass++) {
		for (let y = PASS_STARTS[pass]!; y < height; y += PASS_STEPS[pass]!) {
			order.push(y)
		}
	}
	return order
}

/**
 * Reorder rows from interlace pass order to top-to-bottom order
 */
export function deinterlace(indices: Uint8Array, width: number, height: number): Uint8Array {
	if (indices.length !== width * height) {
		throw new ConsistencyError(
			'BUFFER_SIZE_MISMATCH',
			`Expected ${width * height} pixels to deinterlace, got ${indices.length}`
		)
	}

	const output = new Uint8Array(indices.length)
	const order = interlacedRowOrder(height)
	for (let row = 0; row < order.length; row++) {
		const src = row * width
		output.set(indices.subarray(src, src + width), order[row]! * width)
	}
	return output
}
