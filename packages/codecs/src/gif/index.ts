export { GifCodec } from './codec'
export { decodeGif, decodeGifIndexed, decodeImageData, parseGif } from './decoder'
export type { GifDecodeOptions } from './decoder'
export { encodeGif, encodeGifIndexed, encodeImageData } from './encoder'
export type { GifEncodeOptions } from './encoder'
export { formatGifStructure, inspectGif } from './inspect'
export type { InspectOptions } from './inspect'
export { deinterlace, interlacedRowOrder } from './interlace'
export { lzwDecode, lzwEncode } from './lzw'
export type { LzwDecodeOptions, LzwEncodeOptions } from './lzw'
export { applyPalette, buildPalette, MAX_PALETTE_COLORS, paletteBitDepth } from './palette'
export * from './types'
