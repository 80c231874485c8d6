import { writeQoiHeader } from './header'
import { type ByteSink, ByteWriter, writeTo } from './io'
import {
	QOI_END_MARKER,
	QOI_HEADER_SIZE,
	QOI_MAX_RUN,
	QOI_OP_DIFF,
	QOI_OP_INDEX,
	QOI_OP_LUMA,
	QOI_OP_RGB,
	QOI_OP_RGBA,
	QOI_OP_RUN,
	QoiChannels,
	type QoiHeader,
	type QoiPixel,
	createIndex,
	pixelsEqual,
	qoiHash,
	startPixel,
} from './types'

/**
 * Iterator with one element of look-ahead
 */
export class PeekableIterator<T> {
	private readonly iterator: Iterator<T>
	private buffered: IteratorResult<T> | null = null

	constructor(iterable: Iterable<T>) {
		this.iterator = iterable[Symbol.iterator]()
	}

	peek(): IteratorResult<T> {
		if (this.buffered === null) this.buffered = this.iterator.next()
		return this.buffered
	}

	next(): IteratorResult<T> {
		const result = this.peek()
		this.buffered = null
		return result
	}

	/** Consume the next element only if it satisfies the predicate */
	nextIf(predicate: (value: T) => boolean): boolean {
		const result = this.peek()
		if (result.done || !predicate(result.value)) return false
		this.buffered = null
		return true
	}
}

/**
 * One chunk candidate. Returns the encoded bytes, or null if the opcode cannot represent the pixel.
 */
type ChunkAttempt = (pixel: QoiPixel, pixels: PeekableIterator<QoiPixel>) => number[] | null

/**
 * Reinterpret an 8-bit wrapping difference as signed
 */
function signedDelta(current: number, previous: number): number {
	return (((current - previous) & 0xff) << 24) >> 24
}

/**
 * Pixel-by-pixel QOI encoder.
 * Mirrors the decoder's state so both sides see the same cache and previous pixel.
 */
export class QoiEncoder {
	readonly header: QoiHeader
	private readonly sink: ByteSink
	private readonly index: QoiPixel[] = createIndex()
	private previous: QoiPixel = startPixel()

	// Order matters: the first attempt that fits wins
	private readonly attempts: readonly ChunkAttempt[] = [
		(pixel, pixels) => this.tryRun(pixel, pixels),
		(pixel) => this.tryRgbaOnAlphaChange(pixel),
		(pixel) => this.tryIndex(pixel),
		(pixel) => this.tryDiff(pixel),
		(pixel) => this.tryLuma(pixel),
		(pixel) => this.tryRgb(pixel),
	]

	constructor(header: QoiHeader, sink: ByteSink) {
		this.header = header
		this.sink = sink
	}

	writeHeader(): void {
		writeQoiHeader(this.sink, this.header)
	}

	/**
	 * Encode the next pixel (or run of pixels) as a single chunk
	 */
	encodeChunk(pixels: PeekableIterator<QoiPixel>): void {
		const next = pixels.next()
		if (next.done) return
		const pixel = next.value

		let bytes: number[] | null = null
		for (const attempt of this.attempts) {
			bytes = attempt(pixel, pixels)
			if (bytes !== null) break
		}
		writeTo(this.sink, bytes ?? this.rgba(pixel))

		this.previous = { ...pixel }
		this.index[qoiHash(pixel)] = { ...pixel }
	}

	finish(): void {
		writeTo(this.sink, QOI_END_MARKER)
	}

	private tryRun(pixel: QoiPixel, pixels: PeekableIterator<QoiPixel>): number[] | null {
		if (!pixelsEqual(pixel, this.previous)) return null

		let length = 1
		while (length < QOI_MAX_RUN && pixels.nextIf((p) => pixelsEqual(p, pixel))) {
			length++
		}
		return [QOI_OP_RUN | (length - 1)]
	}

	private tryRgbaOnAlphaChange(pixel: QoiPixel): number[] | null {
		// Every cheaper opcode keeps the previous alpha
		return pixel.a !== this.previous.a ? this.rgba(pixel) : null
	}

	private tryIndex(pixel: QoiPixel): number[] | null {
		const slot = qoiHash(pixel)
		return pixelsEqual(this.index[slot]!, pixel) ? [QOI_OP_INDEX | slot] : null
	}

	private tryDiff(pixel: QoiPixel): number[] | null {
		const dr = signedDelta(pixel.r, this.previous.r)
		const dg = signedDelta(pixel.g, this.previous.g)
		const db = signedDelta(pixel.b, this.previous.b)

		if (dr < -2 || dr > 1 || dg < -2 || dg > 1 || db < -2 || db > 1) return null
		return [QOI_OP_DIFF | ((dr + 2) << 4) | ((dg + 2) << 2) | (db + 2)]
	}

	private tryLuma(pixel: QoiPixel): number[] | null {
		const dg = signedDelta(pixel.g, this.previous.g)
		const drDg = signedDelta(pixel.r, this.previous.r) - dg
		const dbDg = signedDelta(pixel.b, this.previous.b) - dg

		if (dg < -32 || dg > 31 || drDg < -8 || drDg > 7 || dbDg < -8 || dbDg > 7) return null
		return [QOI_OP_LUMA | (dg + 32), ((drDg + 8) << 4) | (dbDg + 8)]
	}

	private tryRgb(pixel: QoiPixel): number[] | null {
		if (pixel.a !== this.previous.a) return null
		return [QOI_OP_RGB, pixel.r, pixel.g, pixel.b]
	}

	private rgba(pixel: QoiPixel): number[] {
		return [QOI_OP_RGBA, pixel.r, pixel.g, pixel.b, pixel.a]
	}
}

/**
 * Lazily read pixels from a flat buffer. RGB input is widened with alpha 255.
 */
export function* pixelsFromBytes(data: Uint8Array, channels: QoiChannels): Generator<QoiPixel> {
	for (let i = 0; i + channels <= data.length; i += channels) {
		yield {
			r: data[i]!,
			g: data[i + 1]!,
			b: data[i + 2]!,
			a: channels === QoiChannels.RGBA ? data[i + 3]! : 255,
		}
	}
}

/**
 * Encode a pixel sequence: header, one chunk per pixel or run, end marker
 */
export function encode(header: QoiHeader, pixels: Iterable<QoiPixel>, sink: ByteSink): void {
	const source = new PeekableIterator(pixels)
	const encoder = new QoiEncoder(header, sink)

	encoder.writeHeader()
	while (!source.peek().done) {
		encoder.encodeChunk(source)
	}
	encoder.finish()
}

/**
 * Encode a flat 3- or 4-channel pixel buffer to QOI bytes
 */
export function encodeQoi(header: QoiHeader, data: Uint8Array): Uint8Array {
	// Worst case: every pixel needs an RGBA chunk
	const pixelCount = Math.floor(data.length / header.channels)
	const writer = new ByteWriter(QOI_HEADER_SIZE + pixelCount * 5 + QOI_END_MARKER.length)

	encode(header, pixelsFromBytes(data, header.channels), writer)
	return writer.toBytes()
}
