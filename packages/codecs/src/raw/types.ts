/**
 * Raw RGB format constants
 * Headerless 8-bit RGB triplets, row-major, top to bottom. The width is supplied
 * by the caller; the height follows from the file size.
 */

export const RAW_BYTES_PER_PIXEL = 3

// Largest width or height the GIF container can hold
export const RAW_MAX_DIMENSION = 0xffff
