/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Supported image formats
 */
export type ImageFormat = 'qoi' | 'bmp'

/**
 * Codec interface for encoding/decoding
 */
export interface Codec<T, O = EncodeOptions> {
	readonly format: ImageFormat
	decode(data: Uint8Array): T
	encode(input: T, options?: O): Uint8Array
}

/**
 * Image codec
 */
export type ImageCodec<O = EncodeOptions> = Codec<ImageData, O>

/**
 * Encode options shared by every codec
 */
export interface EncodeOptions {
	/** Stored channel count; picked from the pixel data when omitted */
	channels?: 3 | 4
}
