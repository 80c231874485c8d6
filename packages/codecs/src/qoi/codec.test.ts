import type { ImageData } from '@qoikit/core'
import { describe, expect, test } from 'vitest'
import { QoiCodec } from './codec'
import { QoiColorSpace, QoiError } from './types'

function opaqueImage(width: number, height: number): ImageData {
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4).map((_, i) => (i % 4 === 3 ? 255 : (i * 29) % 256)),
	}
}

function translucentImage(width: number, height: number): ImageData {
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4).map((_, i) => (i % 4 === 3 ? (i % 8 === 3 ? 128 : 255) : (i * 29) % 256)),
	}
}

describe('QoiCodec', () => {
	describe('encode', () => {
		test('stores RGB when every pixel is opaque', () => {
			expect(QoiCodec.encode(opaqueImage(4, 4))[12]).toBe(3)
		})

		test('stores RGBA when any pixel is translucent', () => {
			expect(QoiCodec.encode(translucentImage(4, 4))[12]).toBe(4)
		})

		test('honours channel and colorspace options', () => {
			const encoded = QoiCodec.encode(opaqueImage(2, 2), { channels: 4, colorspace: QoiColorSpace.Linear })
			expect(encoded[12]).toBe(4)
			expect(encoded[13]).toBe(1)
		})

		test('channels: 3 discards alpha', () => {
			const image = translucentImage(2, 1)
			const encoded = QoiCodec.encode(image, { channels: 3 })
			expect(encoded[12]).toBe(3)

			const decoded = QoiCodec.decode(encoded)
			expect(Array.from(decoded.data)).toEqual([0, 29, 58, 255, 116, 145, 174, 255])
		})
	})

	describe('decode', () => {
		test('widens RGB streams to RGBA', () => {
			const image = opaqueImage(4, 4)
			const decoded = QoiCodec.decode(QoiCodec.encode(image))

			expect(decoded.width).toBe(4)
			expect(decoded.height).toBe(4)
			expect(decoded.data).toEqual(image.data)
		})

		test('keeps alpha of RGBA streams', () => {
			const image = translucentImage(4, 4)
			expect(QoiCodec.decode(QoiCodec.encode(image)).data).toEqual(image.data)
		})

		test('solid color compresses to runs', () => {
			const image: ImageData = {
				width: 64,
				height: 64,
				data: new Uint8Array(64 * 64 * 4).map((_, i) => (i % 4 === 3 ? 255 : 128)),
			}
			const encoded = QoiCodec.encode(image)

			expect(QoiCodec.decode(encoded).data).toEqual(image.data)
			// header + RGB literal + 67 runs + end marker
			expect(encoded.length).toBe(14 + 4 + 67 + 8)
		})

		test('rejects data that is not QOI', () => {
			expect(() => QoiCodec.decode(new Uint8Array([0, 1, 2]))).toThrow(QoiError)
			expect(() => QoiCodec.decode(new Uint8Array(14))).toThrow('Invalid QOI: bad magic')
		})
	})
})
