import {
	BMP_DATA_OFFSET,
	BMP_INFO_HEADER_SIZE,
	BMP_PIXELS_PER_METER,
	type Bgra,
	type BmpPixelFormat,
} from './types'

/**
 * Write little-endian uint16
 */
function writeU16(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >> 8) & 0xff
}

/**
 * Write little-endian uint32
 */
function writeU32(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >> 8) & 0xff
	data[offset + 2] = (value >> 16) & 0xff
	data[offset + 3] = (value >>> 24) & 0xff
}

function gammaCorrect(value: number, gamma: number): number {
	return Math.floor((value / 255) ** gamma * 255)
}

/**
 * sRGB-encoded channel to linear for display
 */
export function srgbToLinear(value: number): number {
	return gammaCorrect(value, 1 / 2.2)
}

type Quad = readonly [number, number, number, number]

/**
 * Split a flat buffer into 4-channel tuples; 3-channel input gets 255 as its fourth value
 */
function* quads(data: Uint8Array, size: 3 | 4): Generator<Quad> {
	for (let i = 0; i + size <= data.length; i += size) {
		yield [data[i]!, data[i + 1]!, data[i + 2]!, size === 4 ? data[i + 3]! : 255]
	}
}

/**
 * Encode BMP with a custom pixel mapping.
 * Pixels are taken in row-major order, top row first.
 */
export function encodeBmpWith<T>(
	width: number,
	height: number,
	pixels: Iterable<T>,
	mapPixel: (pixel: T) => Bgra
): Uint8Array {
	const rowStride = width * 4
	const fileSize = BMP_DATA_OFFSET + rowStride * height
	const output = new Uint8Array(fileSize)

	// File header (14 bytes)
	output[0] = 0x42 // 'B'
	output[1] = 0x4d // 'M'
	writeU32(output, 2, fileSize)
	writeU32(output, 10, BMP_DATA_OFFSET)

	// BITMAPINFOHEADER (40 bytes)
	writeU32(output, 14, BMP_INFO_HEADER_SIZE)
	writeU32(output, 18, width)
	writeU32(output, 22, height) // Positive = bottom-up
	writeU16(output, 26, 1) // Planes
	writeU16(output, 28, 32) // Bits per pixel
	writeU32(output, 30, 0) // BI_RGB
	writeU32(output, 34, 0) // Image size, 0 allowed for BI_RGB
	writeU32(output, 38, BMP_PIXELS_PER_METER)
	writeU32(output, 42, BMP_PIXELS_PER_METER)

	const iterator = pixels[Symbol.iterator]()
	for (let y = 0; y < height; y++) {
		const dstRowOffset = BMP_DATA_OFFSET + (height - 1 - y) * rowStride

		for (let x = 0; x < width; x++) {
			const next = iterator.next()
			if (next.done) {
				throw new Error(`BMP export: pixel data ends at (${x}, ${y}) of ${width}x${height}`)
			}
			output.set(mapPixel(next.value), dstRowOffset + x * 4)
		}
	}

	return output
}

/**
 * Encode a flat pixel buffer as a 32-bit BMP for inspection
 */
export function encodeBmp(
	width: number,
	height: number,
	format: BmpPixelFormat,
	data: Uint8Array
): Uint8Array {
	switch (format) {
		case 'rgb8':
			return encodeBmpWith(width, height, quads(data, 3), ([r, g, b]) => [b, g, r, 255])
		case 'rgb8-srgb':
			return encodeBmpWith(width, height, quads(data, 3), ([r, g, b]) => [
				srgbToLinear(b),
				srgbToLinear(g),
				srgbToLinear(r),
				255,
			])
		case 'rgba8':
			return encodeBmpWith(width, height, quads(data, 4), ([r, g, b, a]) => [b, g, r, a])
		case 'rgba8-srgb':
			return encodeBmpWith(width, height, quads(data, 4), ([r, g, b, a]) => [
				srgbToLinear(b),
				srgbToLinear(g),
				srgbToLinear(r),
				a,
			])
		case 'bgra8':
			return encodeBmpWith(width, height, quads(data, 4), (bgra) => bgra)
		case 'bgra8-srgb':
			return encodeBmpWith(width, height, quads(data, 4), ([b, g, r, a]) => [
				srgbToLinear(b),
				srgbToLinear(g),
				srgbToLinear(r),
				a,
			])
	}
}
