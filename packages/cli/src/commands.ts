import { existsSync, readFileSync, writeFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { createConsoleDiagnostics, type Diagnostics, detectFormat, isCodecError } from '@gifraw/core'
import { formatGifStructure, getCodec, inspectGif } from '@gifraw/codecs'
import { type CliOptions, type Operation, parseArgs, UsageError } from './args'

/**
 * Where the CLI prints
 */
export interface CliIo {
	log(line: string): void
	error(line: string): void
}

export const consoleIo: CliIo = {
	log: (line) => console.log(line),
	error: (line) => console.error(line),
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const VERSION = '0.1.0'

const HELP = `
gifraw - GIF <-> raw RGB converter

USAGE:
  gifraw [options] <input> <output>   Convert a single file
  gifraw --info <file>                Show the block structure of a GIF file

The operation is inferred from the input when -o is omitted: a file with a GIF
signature is decoded, anything else is encoded.

OPTIONS:
  -o, --operation <d|e>  Decode (GIF to raw RGB) or encode (raw RGB to GIF)
  -w, --width <px>       Image width in pixels, required when encoding (1-65535)
  -r, --no-dict-reset    Keep the full LZW dictionary instead of resetting it
  -v, --verbose          Print LZW statistics, file sizes and timing
  -l, --log              Print every LZW code in binary
  -i, --info             Show GIF block structure
  --overwrite            Overwrite an existing output file
  -h, --help             Show this help
  -V, --version          Show version

EXAMPLES:
  gifraw -o e -w 640 image.data image.gif     # Encode raw RGB to GIF
  gifraw image.gif image.data                 # Decode GIF to raw RGB
  gifraw -r -w 640 image.data small.gif       # Encode without dictionary resets
  gifraw --info image.gif                     # List GIF blocks
`

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

function showHelp(io: CliIo): void {
	io.log(HELP)
}

function showVersion(io: CliIo): void {
	io.log(`gifraw v${VERSION}`)
}

function showInfo(inputs: string[], io: CliIo): number {
	if (inputs.length === 0) {
		throw new UsageError('--info requires a file path')
	}

	for (const input of inputs) {
		if (!existsSync(input)) {
			io.error(`Error: File not found: ${input}`)
			return 1
		}

		const data = new Uint8Array(readFileSync(input))
		try {
			const blocks = inspectGif(data, { diagnostics: { warn: (message) => io.error(`Warning: ${message}`) } })
			for (const line of formatGifStructure(blocks)) {
				io.log(line)
			}
		} catch (err) {
			if (!isCodecError(err)) throw err
			io.error(`Error in GIF file: ${err.message}`)
			return 1
		}
	}

	return 0
}

function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

// ─────────────────────────────────────────────────────────────────────────────
// Conversion
// ─────────────────────────────────────────────────────────────────────────────

function convert(data: Uint8Array, operation: Operation, options: CliOptions, diagnostics: Diagnostics): Uint8Array {
	if (operation === 'encode' && options.width === undefined) {
		throw new UsageError('--width is required when encoding')
	}

	const [from, to] = operation === 'decode' ? (['gif', 'raw'] as const) : (['raw', 'gif'] as const)
	const image = getCodec(from).decode(data, { width: options.width, diagnostics })
	return getCodec(to).encode(image, { noDictReset: options.noDictReset, diagnostics })
}

function convertFile(input: string, output: string, options: CliOptions, io: CliIo): number {
	const inputPath = resolve(input)
	const outputPath = resolve(output)

	if (!existsSync(inputPath)) {
		io.error(`Error: File not found: ${input}`)
		return 1
	}
	if (existsSync(outputPath) && !options.overwrite) {
		io.error(`Error: Output file already exists: ${output} (use --overwrite)`)
		return 1
	}

	const data = new Uint8Array(readFileSync(inputPath))
	const operation = options.operation ?? (detectFormat(data) === 'gif' ? 'decode' : 'encode')
	const diagnostics = createConsoleDiagnostics({
		trace: options.log,
		stats: options.verbose === true,
		write: io.log,
		writeWarning: io.error,
	})

	const start = performance.now()
	let result: Uint8Array
	try {
		result = convert(data, operation, options, diagnostics)
	} catch (err) {
		if (!isCodecError(err)) throw err
		const source = operation === 'decode' ? 'GIF file' : 'raw RGB data file'
		io.error(`Error in ${source}: ${err.message}`)
		return 1
	}

	writeFileSync(outputPath, result)

	if (options.verbose) {
		io.log(`${operation === 'decode' ? 'Decoded' : 'Encoded'}: ${input} → ${output}`)
		io.log(`Size: ${formatBytes(data.length)} → ${formatBytes(result.length)}`)
		io.log(`Time: ${(performance.now() - start).toFixed(1)} ms`)
	}

	return 0
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run the CLI with the given arguments; returns the exit code
 */
export function run(args: string[], io: CliIo = consoleIo): number {
	try {
		const { inputs, options } = parseArgs(args)

		if (options.help || (inputs.length === 0 && !options.version && !options.info)) {
			showHelp(io)
			return 0
		}

		if (options.version) {
			showVersion(io)
			return 0
		}

		if (options.info) {
			return showInfo(inputs, io)
		}

		if (inputs.length !== 2) {
			throw new UsageError(`Expected an input and an output file, got ${inputs.length} path(s)`)
		}

		return convertFile(inputs[0]!, inputs[1]!, options, io)
	} catch (err) {
		if (!(err instanceof UsageError)) throw err
		io.error(`Error: ${err.message}`)
		io.error('Run gifraw --help for usage')
		return 1
	}
}
