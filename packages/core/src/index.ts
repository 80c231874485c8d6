export type { Codec, EncodeOptions, ImageCodec, ImageData, ImageFormat } from './types'
export { detectFormat, getExtension, getMimeType, isImageFormat } from './format'
