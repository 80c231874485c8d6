import { type ByteSink, type ByteSource, readByteFrom, readFrom, writeTo } from './io'
import { QOI_MAGIC, QoiChannels, QoiColorSpace, QoiError, type QoiHeader } from './types'

function readU32BE(source: ByteSource): number {
	const bytes = readFrom(source, 4)
	return new DataView(bytes.buffer, bytes.byteOffset, 4).getUint32(0)
}

function u32BE(value: number): number[] {
	return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff]
}

function toChannels(byte: number): QoiChannels | null {
	if (byte === QoiChannels.RGB) return QoiChannels.RGB
	if (byte === QoiChannels.RGBA) return QoiChannels.RGBA
	return null
}

function toColorSpace(byte: number): QoiColorSpace | null {
	if (byte === QoiColorSpace.SRGB) return QoiColorSpace.SRGB
	if (byte === QoiColorSpace.Linear) return QoiColorSpace.Linear
	return null
}

/**
 * Read and validate the 14-byte QOI header.
 * Zero width or height is legal and yields an empty chunk stream.
 */
export function readQoiHeader(source: ByteSource): QoiHeader {
	const magic = readU32BE(source)
	if (magic !== QOI_MAGIC) {
		throw new QoiError('MalformedHeader', 'Invalid QOI: bad magic')
	}

	const width = readU32BE(source)
	const height = readU32BE(source)

	const channelsByte = readByteFrom(source)
	const channels = toChannels(channelsByte)
	if (channels === null) {
		throw new QoiError('InvalidChannelCount', `Invalid QOI: unsupported channel count ${channelsByte}`)
	}

	const colorspaceByte = readByteFrom(source)
	const colorspace = toColorSpace(colorspaceByte)
	if (colorspace === null) {
		throw new QoiError('InvalidColorspace', `Invalid QOI: unknown colorspace ${colorspaceByte}`)
	}

	return { width, height, channels, colorspace }
}

export function writeQoiHeader(sink: ByteSink, header: QoiHeader): void {
	writeTo(sink, [
		...u32BE(QOI_MAGIC),
		...u32BE(header.width),
		...u32BE(header.height),
		header.channels,
		header.colorspace,
	])
}
