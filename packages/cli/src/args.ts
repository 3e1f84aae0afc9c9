// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type Operation = 'decode' | 'encode'

export interface CliOptions {
	// Conversion
	operation?: Operation
	width?: number
	noDictReset?: boolean
	overwrite?: boolean

	// Flags
	verbose?: boolean
	log?: boolean

	// Commands
	info?: boolean
	help?: boolean
	version?: boolean
}

/**
 * Bad command line; reported with a pointer to --help
 */
export class UsageError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'UsageError'
	}
}

const MAX_WIDTH = 0xffff

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parser
// ─────────────────────────────────────────────────────────────────────────────

function parseOperation(value: string): Operation {
	if (value === 'd' || value === 'decode') return 'decode'
	if (value === 'e' || value === 'encode') return 'encode'
	throw new UsageError(`Invalid operation: ${value} (expected d or e)`)
}

function parseWidth(value: string): number {
	const width = /^\d+$/.test(value) ? parseInt(value, 10) : Number.NaN
	if (!(width >= 1 && width <= MAX_WIDTH)) {
		throw new UsageError(`Invalid width: ${value} (expected 1-${MAX_WIDTH})`)
	}
	return width
}

export function parseArgs(args: string[]): { inputs: string[]; options: CliOptions } {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i]!

		if (arg === '--help' || arg === '-h') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--info' || arg === '-i') {
			options.info = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--log' || arg === '-l') {
			options.log = true
		} else if (arg === '--no-dict-reset' || arg === '-r') {
			options.noDictReset = true
		} else if (arg === '--overwrite') {
			options.overwrite = true
		} else if (arg === '--operation' || arg === '-o') {
			const value = args[++i]
			if (value === undefined) throw new UsageError(`${arg} requires a value`)
			options.operation = parseOperation(value)
		} else if (arg === '--width' || arg === '-w') {
			const value = args[++i]
			if (value === undefined) throw new UsageError(`${arg} requires a value`)
			options.width = parseWidth(value)
		} else if (!arg.startsWith('-')) {
			inputs.push(arg)
		} else {
			throw new UsageError(`Unknown option: ${arg}`)
		}

		i++
	}

	return { inputs, options }
}
