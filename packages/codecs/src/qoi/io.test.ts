import { describe, expect, test } from 'vitest'
import { ByteReader, ByteWriter, readByteFrom, readFrom, writeTo } from './io'
import { QoiError, isQoiError } from './types'

describe('ByteReader', () => {
	test('reads bytes in order and tracks position', () => {
		const reader = new ByteReader(new Uint8Array([1, 2, 3, 4, 5]))

		expect(reader.readByte()).toBe(1)
		expect(Array.from(reader.read(3))).toEqual([2, 3, 4])
		expect(reader.position).toBe(4)
		expect(reader.remaining).toBe(1)
	})

	test('read(0) succeeds at end of data', () => {
		const reader = new ByteReader(new Uint8Array([7]))
		reader.readByte()
		expect(reader.read(0).length).toBe(0)
	})

	test('short read fails with IoFailure', () => {
		const reader = new ByteReader(new Uint8Array([1, 2]))

		expect(() => reader.read(3)).toThrow(QoiError)
		expect(() => reader.read(3)).toThrow('needed 3 bytes at offset 0, 2 left')
		// A failed read consumes nothing
		expect(reader.position).toBe(0)
	})

	test('readByte past the end fails with IoFailure', () => {
		const reader = new ByteReader(new Uint8Array(0))
		let caught: unknown
		try {
			reader.readByte()
		} catch (err) {
			caught = err
		}
		expect(isQoiError(caught, 'IoFailure')).toBe(true)
	})
})

describe('ByteWriter', () => {
	test('collects writes from arrays and typed arrays', () => {
		const writer = new ByteWriter()
		writer.write([1, 2])
		writer.write(new Uint8Array([3]))

		expect(writer.length).toBe(3)
		expect(Array.from(writer.toBytes())).toEqual([1, 2, 3])
	})

	test('grows past its initial capacity', () => {
		const writer = new ByteWriter(1)
		const chunk = Array.from({ length: 10 }, (_, i) => i)
		for (let i = 0; i < 5; i++) writer.write(chunk)

		const bytes = writer.toBytes()
		expect(bytes.length).toBe(50)
		expect(bytes[0]).toBe(0)
		expect(bytes[49]).toBe(9)
	})
})

describe('readFrom', () => {
	test('returns exactly the requested bytes', () => {
		const reader = new ByteReader(new Uint8Array([1, 2, 3]))
		expect(Array.from(readFrom(reader, 2))).toEqual([1, 2])
		expect(readByteFrom(reader)).toBe(3)
	})

	test('wraps source failures as IoFailure with the source error as cause', () => {
		const cause = new Error('EIO')
		const source = {
			readByte(): number {
				throw cause
			},
			read(): Uint8Array {
				throw cause
			},
		}

		for (const read of [() => readFrom(source, 4), () => readByteFrom(source)]) {
			let caught: unknown
			try {
				read()
			} catch (err) {
				caught = err
			}
			expect(isQoiError(caught, 'IoFailure')).toBe(true)
			expect(caught instanceof Error && caught.cause).toBe(cause)
		}
	})

	test('a short read is an IoFailure', () => {
		const source = {
			readByte: (): number => 0,
			read: (): Uint8Array => new Uint8Array(2),
		}
		expect(() => readFrom(source, 4)).toThrow('Short read: needed 4 bytes, got 2')
	})

	test('an out-of-range byte is an IoFailure', () => {
		const source = {
			readByte: (): number => 256,
			read: (length: number): Uint8Array => new Uint8Array(length),
		}
		expect(() => readByteFrom(source)).toThrow('Invalid byte from input: 256')
	})
})

describe('writeTo', () => {
	test('reports sink failures as IoFailure with the sink error as cause', () => {
		const cause = new Error('disk full')
		const sink = {
			write(): void {
				throw cause
			},
		}

		let caught: unknown
		try {
			writeTo(sink, [1])
		} catch (err) {
			caught = err
		}

		expect(isQoiError(caught, 'IoFailure')).toBe(true)
		expect(caught instanceof Error && caught.cause).toBe(cause)
	})
})
