/**
 * BMP debug export types and constants
 * Writes uncompressed 32-bit BITMAPINFOHEADER files only
 */

export const BMP_FILE_HEADER_SIZE = 14
export const BMP_INFO_HEADER_SIZE = 40
export const BMP_DATA_OFFSET = BMP_FILE_HEADER_SIZE + BMP_INFO_HEADER_SIZE

// ~72 DPI
export const BMP_PIXELS_PER_METER = 2835

/**
 * Layout of the source pixel buffer. `-srgb` variants are gamma-corrected on export.
 */
export type BmpPixelFormat = 'rgb8' | 'rgb8-srgb' | 'rgba8' | 'rgba8-srgb' | 'bgra8' | 'bgra8-srgb'

/**
 * One output pixel in file order: B, G, R, A
 */
export type Bgra = readonly [number, number, number, number]
