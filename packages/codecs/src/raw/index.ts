export { RawCodec } from './codec'
export { decodeRaw } from './decoder'
export { encodeRaw } from './encoder'
export * from './types'
