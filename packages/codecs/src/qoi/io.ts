import { QoiError } from './types'

/**
 * Blocking byte source the decoder pulls from
 */
export interface ByteSource {
	/** Read one byte, throwing when none is left */
	readByte(): number
	/** Read exactly `length` bytes, throwing on a short read */
	read(length: number): Uint8Array
}

/**
 * Byte sink the encoder and decoder push to
 */
export interface ByteSink {
	write(bytes: Uint8Array | readonly number[]): void
}

/**
 * In-memory ByteSource over a Uint8Array
 */
export class ByteReader implements ByteSource {
	private readonly data: Uint8Array
	position = 0

	constructor(data: Uint8Array) {
		this.data = data
	}

	get remaining(): number {
		return this.data.length - this.position
	}

	readByte(): number {
		const byte = this.data[this.position]
		if (byte === undefined) {
			throw new QoiError('IoFailure', `Unexpected end of data at offset ${this.position}`)
		}
		this.position++
		return byte
	}

	read(length: number): Uint8Array {
		if (length > this.remaining) {
			throw new QoiError(
				'IoFailure',
				`Unexpected end of data: needed ${length} bytes at offset ${this.position}, ${this.remaining} left`
			)
		}
		const bytes = this.data.subarray(this.position, this.position + length)
		this.position += length
		return bytes
	}
}

/**
 * Growable in-memory ByteSink
 */
export class ByteWriter implements ByteSink {
	private buffer: Uint8Array
	private pos = 0

	constructor(initialCapacity = 1024) {
		this.buffer = new Uint8Array(Math.max(initialCapacity, 16))
	}

	get length(): number {
		return this.pos
	}

	write(bytes: Uint8Array | readonly number[]): void {
		this.ensureCapacity(bytes.length)
		this.buffer.set(bytes, this.pos)
		this.pos += bytes.length
	}

	toBytes(): Uint8Array {
		return this.buffer.slice(0, this.pos)
	}

	private ensureCapacity(extra: number): void {
		const needed = this.pos + extra
		if (needed <= this.buffer.length) return

		let capacity = this.buffer.length * 2
		while (capacity < needed) capacity *= 2
		const grown = new Uint8Array(capacity)
		grown.set(this.buffer.subarray(0, this.pos))
		this.buffer = grown
	}
}

function sourceFailure(err: unknown): QoiError {
	if (err instanceof QoiError) return err
	return new QoiError('IoFailure', 'Failed to read from input', { cause: err })
}

/**
 * Read exactly `length` bytes from a source, reporting any source failure
 * or short read as an IoFailure
 */
export function readFrom(source: ByteSource, length: number): Uint8Array {
	let bytes: Uint8Array
	try {
		bytes = source.read(length)
	} catch (err) {
		throw sourceFailure(err)
	}
	if (bytes.length !== length) {
		throw new QoiError('IoFailure', `Short read: needed ${length} bytes, got ${bytes.length}`)
	}
	return bytes
}

/**
 * Read one byte from a source, reporting any source failure as an IoFailure
 */
export function readByteFrom(source: ByteSource): number {
	let byte: number
	try {
		byte = source.readByte()
	} catch (err) {
		throw sourceFailure(err)
	}
	if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
		throw new QoiError('IoFailure', `Invalid byte from input: ${byte}`)
	}
	return byte
}

/**
 * Write to a sink, reporting any sink failure as an IoFailure
 */
export function writeTo(sink: ByteSink, bytes: Uint8Array | readonly number[]): void {
	try {
		sink.write(bytes)
	} catch (err) {
		if (err instanceof QoiError) throw err
		throw new QoiError('IoFailure', 'Failed to write to output', { cause: err })
	}
}
