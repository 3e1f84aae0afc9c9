/**
 * Error taxonomy shared by every codec
 *
 * Codecs throw once and never return partial output. Callers decide how to report.
 */

export type InputFormatErrorCode =
	| 'INVALID_CODE'
	| 'UNEXPECTED_END'
	| 'SUBBLOCK_OVERRUN'
	| 'INVALID_SIGNATURE'
	| 'INVALID_BLOCK'
	| 'INVALID_EXTENSION'
	| 'INVALID_CODE_SIZE'
	| 'INVALID_IMAGE'
	| 'INVALID_INDEX'
	| 'NO_IMAGE'
	| 'NO_PALETTE'
	| 'INVALID_FILE_SIZE'

export type CapacityErrorCode =
	| 'INVALID_WIDTH'
	| 'INVALID_HEIGHT'
	| 'TOO_MANY_COLORS'
	| 'INVALID_PALETTE'
	| 'INVALID_CODE_SIZE'
	| 'INDEX_OUT_OF_RANGE'

export type ConsistencyErrorCode = 'PIXEL_COUNT_MISMATCH' | 'BUFFER_SIZE_MISMATCH'

export type CodecErrorCode = InputFormatErrorCode | CapacityErrorCode | ConsistencyErrorCode

/**
 * Base class for codec failures
 */
export class CodecError extends Error {
	readonly code: CodecErrorCode

	constructor(code: CodecErrorCode, message: string) {
		super(message)
		this.name = new.target.name
		this.code = code
	}
}

/**
 * Malformed input: bad LZW code, truncated stream, broken framing or container
 */
export class InputFormatError extends CodecError {
	declare readonly code: InputFormatErrorCode

	constructor(code: InputFormatErrorCode, message: string) {
		super(code, message)
	}
}

/**
 * Request exceeds what the format can represent
 */
export class CapacityError extends CodecError {
	declare readonly code: CapacityErrorCode

	constructor(code: CapacityErrorCode, message: string) {
		super(code, message)
	}
}

/**
 * Decoded data disagrees with declared geometry
 */
export class ConsistencyError extends CodecError {
	declare readonly code: ConsistencyErrorCode

	constructor(code: ConsistencyErrorCode, message: string) {
		super(code, message)
	}
}

export function isCodecError(err: unknown): err is CodecError {
	return err instanceof CodecError
}
