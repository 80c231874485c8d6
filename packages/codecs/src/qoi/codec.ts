import type { ImageCodec, ImageData } from '@qoikit/core'
import { decodeQoi } from './decoder'
import { encodeQoi } from './encoder'
import { QoiChannels, QoiColorSpace, type QoiEncodeOptions } from './types'

function hasAlpha(data: Uint8Array): boolean {
	for (let i = 3; i < data.length; i += 4) {
		if (data[i] !== 255) return true
	}
	return false
}

function storedChannels(data: Uint8Array, requested: 3 | 4 | undefined): QoiChannels {
	if (requested === 3) return QoiChannels.RGB
	if (requested === 4) return QoiChannels.RGBA
	return hasAlpha(data) ? QoiChannels.RGBA : QoiChannels.RGB
}

function dropAlpha(data: Uint8Array): Uint8Array {
	const rgb = new Uint8Array((data.length / 4) * 3)
	for (let src = 0, dst = 0; src + 3 < data.length; src += 4, dst += 3) {
		rgb[dst] = data[src]!
		rgb[dst + 1] = data[src + 1]!
		rgb[dst + 2] = data[src + 2]!
	}
	return rgb
}

function addAlpha(data: Uint8Array): Uint8Array {
	const rgba = new Uint8Array((data.length / 3) * 4)
	for (let src = 0, dst = 0; src + 2 < data.length; src += 3, dst += 4) {
		rgba[dst] = data[src]!
		rgba[dst + 1] = data[src + 1]!
		rgba[dst + 2] = data[src + 2]!
		rgba[dst + 3] = 255
	}
	return rgba
}

/**
 * QOI (Quite OK Image) codec
 */
export const QoiCodec: ImageCodec<QoiEncodeOptions> = {
	format: 'qoi',

	decode(data: Uint8Array): ImageData {
		const { header, data: pixels } = decodeQoi(data)
		return {
			width: header.width,
			height: header.height,
			data: header.channels === QoiChannels.RGB ? addAlpha(pixels) : pixels,
		}
	},

	encode(image: ImageData, options?: QoiEncodeOptions): Uint8Array {
		const { width, height, data } = image
		const channels = storedChannels(data, options?.channels)
		const colorspace = options?.colorspace ?? QoiColorSpace.SRGB

		return encodeQoi(
			{ width, height, channels, colorspace },
			channels === QoiChannels.RGB ? dropAlpha(data) : data
		)
	},
}
