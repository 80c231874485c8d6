/**
 * qoikit codecs
 */

export * from './qoi'
export * from './bmp'
