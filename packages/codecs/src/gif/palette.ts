/**
 * Palette construction and lookup
 *
 * GIF holds at most 256 colors per table. No quantization: a raster with more
 * distinct colors is rejected.
 */

import {
	CapacityError,
	ConsistencyError,
	type IndexedImage,
	InputFormatError,
	type RgbImage,
} from '@gifraw/core'

export const MAX_PALETTE_COLORS = 256

/**
 * Bits needed to index `colorCount` colors (at least 1)
 */
export function paletteBitDepth(colorCount: number): number {
	return Math.max(Math.ceil(Math.log2(colorCount)), 1)
}

/**
 * Map an RGB raster to palette indices
 * Palette entries are the distinct colors sorted by 0xRRGGBB value.
 */
export function buildPalette(image: RgbImage): IndexedImage {
	const { width, height, data } = image
	const pixelCount = width * height

	if (data.length !== pixelCount * 3) {
		throw new ConsistencyError(
			'BUFFER_SIZE_MISMATCH',
			`Expected ${pixelCount * 3} bytes of RGB data, got ${data.length}`
		)
	}

	// Collect unique colors
	const colors = new Set<number>()
	for (let i = 0; i < data.length; i += 3) {
		const key = (data[i]! << 16) | (data[i + 1]! << 8) | data[i + 2]!
		if (!colors.has(key)) {
			colors.add(key)
			if (colors.size > MAX_PALETTE_COLORS) {
				throw new CapacityError(
					'TOO_MANY_COLORS',
					`Image has more than ${MAX_PALETTE_COLORS} distinct colors`
				)
			}
		}
	}

	const sorted = Array.from(colors).sort((a, b) => a - b)

	// Build color lookup map
	const colorMap = new Map<number, number>()
	const palette = new Uint8Array(sorted.length * 3)
	for (let i = 0; i < sorted.length; i++) {
		const color = sorted[i]!
		colorMap.set(color, i)
		palette[i * 3] = (color >> 16) & 0xff
		palette[i * 3 + 1] = (color >> 8) & 0xff
		palette[i * 3 + 2] = color & 0xff
	}

	// Map pixels to palette indices
	const indices = new Uint8Array(pixelCount)
	for (let i = 0; i < pixelCount; i++) {
		const key = (data[i * 3]! << 16) | (data[i * 3 + 1]! << 8) | data[i * 3 + 2]!
		indices[i] = colorMap.get(key) ?? 0
	}

	return { width, height, indices, palette }
}

/**
 * Expand palette indices to RGB
 */
export function applyPalette(image: IndexedImage): RgbImage {
	const { width, height, indices, palette } = image
	const colorCount = Math.floor(palette.length / 3)
	const data = new Uint8Array(indices.length * 3)

	for (let i = 0; i < indices.length; i++) {
		const index = indices[i]!
		if (index >= colorCount) {
			throw new InputFormatError(
				'INVALID_INDEX',
				`Pixel ${i} uses index ${index} outside the ${colorCount}-color palette`
			)
		}
		data[i * 3] = palette[index * 3]!
		data[i * 3 + 1] = palette[index * 3 + 1]!
		data[i * 3 + 2] = palette[index * 3 + 2]!
	}

	return { width, height, data }
}
