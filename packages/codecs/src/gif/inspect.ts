/**
 * GIF block structure
 *
 * Walks the container block by block, recording each block's offset and fields.
 * The decoder uses it to locate the first image; the CLI prints it.
 */

import { type Diagnostics, InputFormatError, silentDiagnostics } from '@gifraw/core'
import { measureSubBlocks, readSubBlocks } from './bitstream'
import {
	APPLICATION_EXTENSION,
	COMMENT_EXTENSION,
	DisposalMethod,
	EXTENSION_INTRODUCER,
	GIF_SIGNATURE,
	type GifBlock,
	type GraphicControlExtension,
	GRAPHIC_CONTROL_EXTENSION,
	IMAGE_SEPARATOR,
	type ImageDescriptor,
	KNOWN_VERSIONS,
	type LogicalScreenDescriptor,
	PLAIN_TEXT_EXTENSION,
	TRAILER,
} from './types'

export interface InspectOptions {
	/** Stop after the first image's data instead of reading to the trailer */
	untilFirstImage?: boolean
	diagnostics?: Diagnostics
}

function need(data: Uint8Array, pos: number, count: number, what: string): void {
	if (pos + count > data.length) {
		throw new InputFormatError('UNEXPECTED_END', `Unexpected end of file in ${what}`)
	}
}

function readUint16(data: Uint8Array, pos: number): number {
	return data[pos]! | (data[pos + 1]! << 8)
}

function latin1(bytes: Uint8Array): string {
	let text = ''
	for (const byte of bytes) {
		text += String.fromCharCode(byte)
	}
	return text
}

/**
 * Read the block list of a GIF file
 */
export function inspectGif(data: Uint8Array, options: InspectOptions = {}): GifBlock[] {
	const diagnostics = options.diagnostics ?? silentDiagnostics
	const blocks: GifBlock[] = []

	if (data.length < 3 || latin1(data.subarray(0, 3)) !== GIF_SIGNATURE) {
		throw new InputFormatError('INVALID_SIGNATURE', 'Not a GIF file')
	}

	// Header (6 bytes) and Logical Screen Descriptor (7 bytes)
	need(data, 0, 13, 'logical screen descriptor')
	const version = latin1(data.subarray(3, 6))
	if (!KNOWN_VERSIONS.includes(version)) {
		diagnostics.warn?.(`Unknown GIF version: ${version}`)
	}
	blocks.push({ type: 'header', offset: 0, version })

	const screen = readLogicalScreenDescriptor(data, 6)
	blocks.push({ type: 'screenDescriptor', offset: 6, descriptor: screen })
	let pos = 13

	if (screen.hasGlobalColorTable) {
		const tableSize = screen.globalColorTableColors * 3
		need(data, pos, tableSize, 'global color table')
		blocks.push({
			type: 'globalColorTable',
			offset: pos,
			colors: screen.globalColorTableColors,
			sorted: screen.sortFlag,
			backgroundColorIndex: screen.backgroundColorIndex,
			table: data.slice(pos, pos + tableSize),
		})
		pos += tableSize
	}

	while (true) {
		need(data, pos, 1, 'block type')
		const offset = pos
		const introducer = data[pos++]!

		if (introducer === TRAILER) {
			blocks.push({ type: 'trailer', offset })
			break
		}

		if (introducer === EXTENSION_INTRODUCER) {
			pos = readExtension(data, pos, offset, blocks)
		} else if (introducer === IMAGE_SEPARATOR) {
			pos = readImage(data, pos, offset, blocks)
			if (options.untilFirstImage) break
		} else {
			throw new InputFormatError(
				'INVALID_BLOCK',
				`Unknown GIF block type 0x${introducer.toString(16)} at offset ${offset}`
			)
		}
	}

	return blocks
}

/**
 * Read Logical Screen Descriptor
 */
function readLogicalScreenDescriptor(data: Uint8Array, pos: number): LogicalScreenDescriptor {
	const packed = data[pos + 4]!

	return {
		width: readUint16(data, pos),
		height: readUint16(data, pos + 2),
		hasGlobalColorTable: (packed & 0x80) !== 0,
		colorResolution: ((packed >> 4) & 0x07) + 1,
		sortFlag: (packed & 0x08) !== 0,
		globalColorTableColors: 1 << ((packed & 0x07) + 1),
		backgroundColorIndex: data[pos + 5]!,
		pixelAspectRatio: data[pos + 6]!,
	}
}

/**
 * Read Image Descriptor
 */
function readImageDescriptor(data: Uint8Array, pos: number): ImageDescriptor {
	const packed = data[pos + 8]!

	return {
		left: readUint16(data, pos),
		top: readUint16(data, pos + 2),
		width: readUint16(data, pos + 4),
		height: readUint16(data, pos + 6),
		hasLocalColorTable: (packed & 0x80) !== 0,
		interlaced: (packed & 0x40) !== 0,
		sortFlag: (packed & 0x20) !== 0,
		localColorTableColors: 1 << ((packed & 0x07) + 1),
	}
}

/**
 * Read an extension block; `pos` is just past the introducer
 */
function readExtension(data: Uint8Array, startPos: number, offset: number, blocks: GifBlock[]): number {
	let pos = startPos
	need(data, pos, 1, 'extension label')
	const label = data[pos++]!

	if (label === COMMENT_EXTENSION) {
		const { data: text, end } = readSubBlocks(data, pos)
		blocks.push({ type: 'comment', offset, text: latin1(text) })
		return end
	}

	if (
		label !== GRAPHIC_CONTROL_EXTENSION &&
		label !== APPLICATION_EXTENSION &&
		label !== PLAIN_TEXT_EXTENSION
	) {
		throw new InputFormatError(
			'INVALID_EXTENSION',
			`Unknown extension label 0x${label.toString(16)} at offset ${offset}`
		)
	}

	// Fixed-size block, then sub-blocks
	need(data, pos, 1, 'extension block size')
	const blockSize = data[pos++]!
	need(data, pos, blockSize, 'extension block')
	const fixed = data.subarray(pos, pos + blockSize)
	pos += blockSize

	if (label === GRAPHIC_CONTROL_EXTENSION) {
		if (blockSize < 4) {
			throw new InputFormatError('INVALID_EXTENSION', `Invalid graphic control block size: ${blockSize}`)
		}
		blocks.push({ type: 'graphicControl', offset, extension: readGraphicControl(fixed) })
		return measureSubBlocks(data, pos)
	}

	const { data: payload, end } = readSubBlocks(data, pos)

	if (label === APPLICATION_EXTENSION) {
		blocks.push({
			type: 'application',
			offset,
			identifier: latin1(fixed.subarray(0, 8)),
			authCode: latin1(fixed.subarray(8, 11)),
			dataSize: payload.length,
		})
	} else {
		blocks.push({ type: 'plainText', offset, dataSize: payload.length })
	}
	return end
}

function readGraphicControl(block: Uint8Array): GraphicControlExtension {
	const packed = block[0]!
	return {
		disposalMethod: (packed >> 2) & 0x07,
		userInputFlag: (packed & 0x02) !== 0,
		hasTransparency: (packed & 0x01) !== 0,
		delayTime: readUint16(block, 1),
		transparentColorIndex: block[3]!,
	}
}

/**
 * Read an image: descriptor, optional local color table, LZW data
 */
function readImage(data: Uint8Array, startPos: number, offset: number, blocks: GifBlock[]): number {
	let pos = startPos

	need(data, pos, 9, 'image descriptor')
	const descriptor = readImageDescriptor(data, pos)
	blocks.push({ type: 'imageDescriptor', offset, descriptor })
	pos += 9

	if (descriptor.hasLocalColorTable) {
		const tableSize = descriptor.localColorTableColors * 3
		need(data, pos, tableSize, 'local color table')
		blocks.push({
			type: 'localColorTable',
			offset: pos,
			colors: descriptor.localColorTableColors,
			sorted: descriptor.sortFlag,
			table: data.slice(pos, pos + tableSize),
		})
		pos += tableSize
	}

	need(data, pos, 1, 'LZW minimum code size')
	const dataOffset = pos
	const minCodeSize = data[pos++]!
	const end = measureSubBlocks(data, pos)

	// Payload size: everything except the length bytes
	let dataSize = 0
	let blockPos = pos
	while (blockPos < end - 1) {
		const size = data[blockPos]!
		dataSize += size
		blockPos += size + 1
	}

	blocks.push({
		type: 'imageData',
		offset: dataOffset,
		minCodeSize,
		dataSize,
		data: data.subarray(pos, end),
	})
	return end
}

// ─────────────────────────────────────────────────────────────────────────────
// Listing
// ─────────────────────────────────────────────────────────────────────────────

const DISPOSAL_NAMES: Record<number, string> = {
	[DisposalMethod.Unspecified]: 'unspecified',
	[DisposalMethod.DoNotDispose]: 'leave in place',
	[DisposalMethod.RestoreBackground]: 'restore to background color',
	[DisposalMethod.RestorePrevious]: 'restore to previous',
}

const yesNo = (value: boolean): string => (value ? 'yes' : 'no')

function escapeText(text: string): string {
	let escaped = ''
	for (const char of text) {
		const code = char.charCodeAt(0)
		escaped += code >= 0x20 && code < 0x7f ? char : `\\x${code.toString(16).padStart(2, '0')}`
	}
	return escaped
}

/**
 * Render a block list as an indented text listing
 */
export function formatGifStructure(blocks: GifBlock[]): string[] {
	const lines: string[] = []
	const heading = (title: string, offset: number) => {
		lines.push(`${title}:`)
		value('file offset', offset)
	}
	const value = (label: string, v: string | number) => {
		lines.push(`    ${label}: ${v}`)
	}

	for (const block of blocks) {
		switch (block.type) {
			case 'header':
				heading('Header', block.offset)
				value('version', block.version)
				break
			case 'screenDescriptor': {
				const d = block.descriptor
				heading('Logical Screen Descriptor', block.offset)
				value('width', d.width)
				value('height', d.height)
				value('original color resolution in bits per RGB channel', d.colorResolution)
				value(
					'pixel aspect ratio in 1/64ths',
					d.pixelAspectRatio ? d.pixelAspectRatio + 15 : 'unknown'
				)
				value('has Global Color Table', yesNo(d.hasGlobalColorTable))
				break
			}
			case 'globalColorTable':
				heading('Global Color Table', block.offset)
				value('colors', block.colors)
				value('sorted', yesNo(block.sorted))
				value('background color index', block.backgroundColorIndex)
				break
			case 'graphicControl': {
				const e = block.extension
				heading('Extension', block.offset)
				value('type', 'Graphic Control')
				value('delay time in 1/100ths of a second', e.delayTime || 'none')
				value('wait for user input', yesNo(e.userInputFlag))
				value('transparent color index', e.hasTransparency ? e.transparentColorIndex : 'none')
				value('disposal method', DISPOSAL_NAMES[e.disposalMethod] ?? '?')
				break
			}
			case 'comment':
				heading('Extension', block.offset)
				value('type', 'Comment')
				value('data', escapeText(block.text))
				break
			case 'application':
				heading('Extension', block.offset)
				value('type', 'Application')
				value('identifier', escapeText(block.identifier))
				value('authentication code', escapeText(block.authCode))
				break
			case 'plainText':
				heading('Extension', block.offset)
				value('type', 'Plain Text')
				break
			case 'imageDescriptor': {
				const d = block.descriptor
				heading('Image Descriptor', block.offset)
				value('x position', d.left)
				value('y position', d.top)
				value('width', d.width)
				value('height', d.height)
				value('interlaced', yesNo(d.interlaced))
				value('has Local Color Table', yesNo(d.hasLocalColorTable))
				break
			}
			case 'localColorTable':
				heading('Local Color Table', block.offset)
				value('colors', block.colors)
				value('sorted', yesNo(block.sorted))
				break
			case 'imageData':
				heading('LZW data', block.offset)
				value('palette bit depth', block.minCodeSize)
				value('data size', block.dataSize)
				break
			case 'trailer':
				heading('Trailer', block.offset)
				break
		}
	}

	return lines
}
