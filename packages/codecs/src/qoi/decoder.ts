import { readQoiHeader } from './header'
import { type ByteSink, type ByteSource, ByteReader, ByteWriter, readByteFrom, readFrom, writeTo } from './io'
import {
	type DecodedQoi,
	QOI_END_MARKER,
	QOI_MASK_2,
	QOI_MASK_6,
	QOI_OP_DIFF,
	QOI_OP_INDEX,
	QOI_OP_LUMA,
	QOI_OP_RGB,
	QOI_OP_RGBA,
	QoiChannels,
	type QoiChunk,
	QoiError,
	type QoiHeader,
	type QoiPixel,
	createIndex,
	qoiHash,
	startPixel,
} from './types'

/**
 * Chunk-by-chunk QOI decoder.
 * One instance decodes one stream; state is never carried over.
 */
export class QoiDecoder {
	readonly header: QoiHeader
	readonly totalPixels: number
	private readonly index: QoiPixel[] = createIndex()
	private previous: QoiPixel = startPixel()
	private decoded = 0

	constructor(header: QoiHeader) {
		this.header = header
		this.totalPixels = header.width * header.height
	}

	/** Pixels produced so far */
	get pixelCount(): number {
		return this.decoded
	}

	get previousPixel(): QoiPixel {
		return { ...this.previous }
	}

	get isFinished(): boolean {
		return this.decoded >= this.totalPixels
	}

	/**
	 * Read one opcode and its payload
	 */
	readChunk(source: ByteSource): QoiChunk {
		const byte = readByteFrom(source)

		if (byte === QOI_OP_RGB) {
			const r = readByteFrom(source)
			const g = readByteFrom(source)
			const b = readByteFrom(source)
			return { op: 'rgb', r, g, b }
		}
		if (byte === QOI_OP_RGBA) {
			const r = readByteFrom(source)
			const g = readByteFrom(source)
			const b = readByteFrom(source)
			const a = readByteFrom(source)
			return { op: 'rgba', r, g, b, a }
		}

		switch (byte & QOI_MASK_2) {
			case QOI_OP_INDEX:
				return { op: 'index', index: byte & QOI_MASK_6 }
			case QOI_OP_DIFF:
				return {
					op: 'diff',
					dr: ((byte >> 4) & 0x03) - 2,
					dg: ((byte >> 2) & 0x03) - 2,
					db: (byte & 0x03) - 2,
				}
			case QOI_OP_LUMA: {
				const byte2 = readByteFrom(source)
				return {
					op: 'luma',
					dg: (byte & QOI_MASK_6) - 32,
					drDg: ((byte2 >> 4) & 0x0f) - 8,
					dbDg: (byte2 & 0x0f) - 8,
				}
			}
			default:
				return { op: 'run', length: (byte & QOI_MASK_6) + 1 }
		}
	}

	/**
	 * Apply a chunk to the running state and write the pixels it produces
	 */
	applyChunk(chunk: QoiChunk, sink: ByteSink): void {
		if (chunk.op === 'run') {
			// A run repeats the previous pixel; it never becomes a new "previous"
			const prev = this.previous
			writeTo(sink, this.repeat(prev, chunk.length))
			this.index[qoiHash(prev)] = { ...prev }
			this.decoded += chunk.length
			return
		}

		const pixel = this.resolvePixel(chunk)
		this.index[qoiHash(pixel)] = { ...pixel }
		this.previous = pixel
		this.decoded++
		writeTo(sink, this.repeat(pixel, 1))
	}

	decodeChunk(source: ByteSource, sink: ByteSink): void {
		this.applyChunk(this.readChunk(source), sink)
	}

	/**
	 * Check the 8-byte end marker that follows the last chunk
	 */
	verifyEndMarker(source: ByteSource): void {
		const marker = readFrom(source, QOI_END_MARKER.length)
		if (!QOI_END_MARKER.every((byte, i) => marker[i] === byte)) {
			throw new QoiError('InvalidEndMarker', 'Invalid QOI: bad end marker')
		}
	}

	private resolvePixel(chunk: Exclude<QoiChunk, { op: 'run' }>): QoiPixel {
		const prev = this.previous

		switch (chunk.op) {
			case 'rgb':
				return { r: chunk.r, g: chunk.g, b: chunk.b, a: prev.a }
			case 'rgba':
				return { r: chunk.r, g: chunk.g, b: chunk.b, a: chunk.a }
			case 'index':
				return { ...this.index[chunk.index]! }
			case 'diff':
				return {
					r: (prev.r + chunk.dr) & 0xff,
					g: (prev.g + chunk.dg) & 0xff,
					b: (prev.b + chunk.db) & 0xff,
					a: prev.a,
				}
			case 'luma':
				return {
					r: (prev.r + chunk.dg + chunk.drDg) & 0xff,
					g: (prev.g + chunk.dg) & 0xff,
					b: (prev.b + chunk.dg + chunk.dbDg) & 0xff,
					a: prev.a,
				}
		}
	}

	private repeat(pixel: QoiPixel, count: number): Uint8Array {
		const stride = this.header.channels
		const out = new Uint8Array(stride * count)
		for (let i = 0; i < out.length; i += stride) {
			out[i] = pixel.r
			out[i + 1] = pixel.g
			out[i + 2] = pixel.b
			if (stride === QoiChannels.RGBA) out[i + 3] = pixel.a
		}
		return out
	}
}

/**
 * Decode the chunk stream that follows an already-read header
 */
export function decodeChunks(source: ByteSource, header: QoiHeader, sink: ByteSink): void {
	const decoder = new QoiDecoder(header)

	while (!decoder.isFinished) {
		decoder.decodeChunk(source, sink)
	}
	decoder.verifyEndMarker(source)
}

/**
 * Decode a QOI stream, writing 3 or 4 bytes per pixel to the sink
 */
export function decode(source: ByteSource, sink: ByteSink): QoiHeader {
	const header = readQoiHeader(source)
	decodeChunks(source, header, sink)
	return header
}

/**
 * Decode QOI bytes held in memory
 */
export function decodeQoi(data: Uint8Array): DecodedQoi {
	const reader = new ByteReader(data)
	const header = readQoiHeader(reader)

	// A single chunk byte yields at most 62 pixels
	const expected = header.width * header.height * header.channels
	const writer = new ByteWriter(Math.min(expected, reader.remaining * 62 * header.channels))

	decodeChunks(reader, header, writer)
	return { header, data: writer.toBytes() }
}
