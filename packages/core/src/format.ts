import type { Format } from './types'

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES: Partial<Record<Format, { bytes: number[]; offset?: number }>> = {
	gif: { bytes: [0x47, 0x49, 0x46] }, // "GIF"
}

/**
 * Check if bytes match magic signature
 */
function matchMagic(data: Uint8Array, magic: { bytes: number[]; offset?: number }): boolean {
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	for (let i = 0; i < magic.bytes.length; i++) {
		if (data[offset + i] !== magic.bytes[i]) return false
	}
	return true
}

/**
 * Detect format from magic bytes
 * Raw RGB data has no signature, so it is never detected
 */
export function detectFormat(data: Uint8Array): Format | null {
	for (const [format, magic] of Object.entries(MAGIC_BYTES)) {
		if (magic && matchMagic(data, magic) && isFormat(format)) {
			return format
		}
	}
	return null
}

export function isFormat(value: string): value is Format {
	return value === 'gif' || value === 'raw'
}
