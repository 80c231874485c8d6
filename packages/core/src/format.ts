import type { ImageFormat } from './types'

interface MagicSignature {
	bytes: number[]
	offset?: number
}

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES: Record<ImageFormat, MagicSignature> = {
	qoi: { bytes: [0x71, 0x6f, 0x69, 0x66] }, // "qoif"
	bmp: { bytes: [0x42, 0x4d] }, // "BM"
}

const MIME_TYPES: Record<ImageFormat, string> = {
	qoi: 'image/qoi',
	bmp: 'image/bmp',
}

/**
 * Check if bytes match magic signature
 */
function matchMagic(data: Uint8Array, magic: MagicSignature): boolean {
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	return magic.bytes.every((expected, i) => data[offset + i] === expected)
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): ImageFormat | null {
	if (matchMagic(data, MAGIC_BYTES.qoi)) return 'qoi'
	if (matchMagic(data, MAGIC_BYTES.bmp)) return 'bmp'
	return null
}

/**
 * Check if a string names a known format
 */
export function isImageFormat(value: string): value is ImageFormat {
	return Object.hasOwn(MAGIC_BYTES, value)
}

/**
 * Get file extension for format
 */
export function getExtension(format: ImageFormat): string {
	return format
}

/**
 * Get MIME type for format
 */
export function getMimeType(format: ImageFormat): string {
	return MIME_TYPES[format]
}
