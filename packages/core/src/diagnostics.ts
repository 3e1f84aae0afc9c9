/**
 * Diagnostics sink
 *
 * Passed explicitly into decode/encode calls. Codecs report what they did here and
 * never print anything themselves; nothing reported here changes the result.
 */

/**
 * Per-stream LZW statistics
 */
export interface LzwStats {
	readonly direction: 'decode' | 'encode'
	/** LZW codes read or written, clear and end codes included */
	readonly codes: number
	/** Bits used by those codes */
	readonly bits: number
	readonly pixels: number
	readonly clearCodes: number
}

export interface Diagnostics {
	/** Called for every LZW code read or written */
	code?(code: number, width: number): void
	/** Called once per LZW stream */
	stats?(stats: LzwStats): void
	/** Non-fatal oddities in the input */
	warn?(message: string): void
}

export const silentDiagnostics: Diagnostics = {}

export interface ConsoleDiagnosticsOptions {
	/** Emit one line per LZW code */
	trace?: boolean
	/** Emit one statistics line per LZW stream (default true) */
	stats?: boolean
	/** Line sink, defaults to console.log */
	write?: (line: string) => void
	/** Warning sink, defaults to console.error */
	writeWarning?: (line: string) => void
}

/**
 * Format a code the way the log prints it: binary, zero padded to its width
 */
export function formatCode(code: number, width: number): string {
	return code.toString(2).padStart(width, '0')
}

export function formatStats(stats: LzwStats): string {
	return `lzwCodes=${stats.codes}, lzwBits=${stats.bits}, pixels=${stats.pixels}, clearCodes=${stats.clearCodes}`
}

/**
 * Line-oriented diagnostics for the command line
 */
export function createConsoleDiagnostics(options: ConsoleDiagnosticsOptions = {}): Diagnostics {
	const write = options.write ?? ((line: string) => console.log(line))
	const writeWarning = options.writeWarning ?? ((line: string) => console.error(line))

	const diagnostics: Diagnostics = {
		warn(message) {
			writeWarning(`Warning: ${message}`)
		},
	}

	if (options.stats ?? true) {
		diagnostics.stats = (stats) => write(formatStats(stats))
	}
	if (options.trace) {
		diagnostics.code = (code, width) => write(formatCode(code, width))
	}

	return diagnostics
}
