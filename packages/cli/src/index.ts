#!/usr/bin/env node
/**
 * gifraw CLI - GIF <-> raw RGB converter
 * Pure TypeScript, zero external dependencies
 */

import { run } from './commands'

try {
	process.exitCode = run(process.argv.slice(2))
} catch (err) {
	console.error('Fatal error:', err)
	process.exit(1)
}
