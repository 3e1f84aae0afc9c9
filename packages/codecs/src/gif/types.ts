/**
 * GIF format types and constants
 */

// GIF signatures
export const GIF_SIGNATURE = 'GIF'
export const GIF87A = 'GIF87a'
export const KNOWN_VERSIONS: readonly string[] = ['87a', '89a']

// Block types
export const EXTENSION_INTRODUCER = 0x21 // '!'
export const IMAGE_SEPARATOR = 0x2c // ','
export const TRAILER = 0x3b // ';'

// Extension labels
export const GRAPHIC_CONTROL_EXTENSION = 0xf9
export const COMMENT_EXTENSION = 0xfe
export const PLAIN_TEXT_EXTENSION = 0x01
export const APPLICATION_EXTENSION = 0xff

// Largest width or height a descriptor can hold
export const MAX_DIMENSION = 0xffff

// Disposal methods
export enum DisposalMethod {
	Unspecified = 0,
	DoNotDispose = 1,
	RestoreBackground = 2,
	RestorePrevious = 3,
}

/**
 * Logical Screen Descriptor
 */
export interface LogicalScreenDescriptor {
	width: number
	height: number
	hasGlobalColorTable: boolean
	colorResolution: number
	sortFlag: boolean
	/** Colors in the global color table (2^(n+1)) */
	globalColorTableColors: number
	backgroundColorIndex: number
	pixelAspectRatio: number
}

/**
 * Color table entry (RGB)
 */
export type ColorTable = Uint8Array // RGB triplets

/**
 * Graphic Control Extension
 */
export interface GraphicControlExtension {
	disposalMethod: number
	userInputFlag: boolean
	hasTransparency: boolean
	/** Hundredths of a second */
	delayTime: number
	transparentColorIndex: number
}

/**
 * Image Descriptor
 */
export interface ImageDescriptor {
	left: number
	top: number
	width: number
	height: number
	hasLocalColorTable: boolean
	interlaced: boolean
	sortFlag: boolean
	/** Colors in the local color table (2^(n+1)) */
	localColorTableColors: number
}

/**
 * Blocks of a GIF file in file order, each with its byte offset
 */
export type GifBlock =
	| { type: 'header'; offset: number; version: string }
	| { type: 'screenDescriptor'; offset: number; descriptor: LogicalScreenDescriptor }
	| {
			type: 'globalColorTable'
			offset: number
			colors: number
			sorted: boolean
			backgroundColorIndex: number
			table: ColorTable
	  }
	| { type: 'graphicControl'; offset: number; extension: GraphicControlExtension }
	| { type: 'comment'; offset: number; text: string }
	| { type: 'application'; offset: number; identifier: string; authCode: string; dataSize: number }
	| { type: 'plainText'; offset: number; dataSize: number }
	| { type: 'imageDescriptor'; offset: number; descriptor: ImageDescriptor }
	| { type: 'localColorTable'; offset: number; colors: number; sorted: boolean; table: ColorTable }
	| { type: 'imageData'; offset: number; minCodeSize: number; dataSize: number; data: Uint8Array }
	| { type: 'trailer'; offset: number }

/**
 * First image of a GIF file, ready for LZW decoding
 */
export interface GifImage {
	version: string
	screenDescriptor: LogicalScreenDescriptor
	globalColorTable: ColorTable | null
	imageDescriptor: ImageDescriptor
	localColorTable: ColorTable | null
	graphicControl: GraphicControlExtension | null
	minCodeSize: number
	/** Image data sub-blocks, terminator included */
	imageData: Uint8Array
}

/**
 * Input to the image data decoder
 */
export interface ImageDataInput {
	minCodeSize: number
	/** Framed LZW data */
	data: Uint8Array
	width: number
	height: number
	interlaced: boolean
}

/**
 * Input to the image data encoder
 */
export interface ImageDataEncodeInput {
	/** Palette indices in top-to-bottom row order */
	indices: Uint8Array
	width: number
	height: number
	minCodeSize: number
	noDictReset?: boolean
}
