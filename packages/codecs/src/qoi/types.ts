/**
 * QOI (Quite OK Image) format types and constants
 * https://qoiformat.org/qoi-specification.pdf
 */

import type { EncodeOptions } from '@qoikit/core'

// Magic bytes "qoif"
export const QOI_MAGIC = 0x716f6966

export const QOI_HEADER_SIZE = 14

// 7x 0x00 + 1x 0x01
export const QOI_END_MARKER: readonly number[] = [0, 0, 0, 0, 0, 0, 0, 1]

// Op codes
export const QOI_OP_RGB = 0xfe
export const QOI_OP_RGBA = 0xff
export const QOI_OP_INDEX = 0x00 // 00xxxxxx
export const QOI_OP_DIFF = 0x40 // 01xxxxxx
export const QOI_OP_LUMA = 0x80 // 10xxxxxx
export const QOI_OP_RUN = 0xc0 // 11xxxxxx

// Masks
export const QOI_MASK_2 = 0xc0
export const QOI_MASK_6 = 0x3f

export const QOI_INDEX_SIZE = 64
export const QOI_MAX_RUN = 62

// Color space
export enum QoiColorSpace {
	/** sRGB with linear alpha */
	SRGB = 0,
	/** All channels linear */
	Linear = 1,
}

// Channels
export enum QoiChannels {
	RGB = 3,
	RGBA = 4,
}

/**
 * QOI header structure (14 bytes)
 */
export interface QoiHeader {
	readonly width: number // 32-bit big-endian
	readonly height: number // 32-bit big-endian
	readonly channels: QoiChannels
	readonly colorspace: QoiColorSpace
}

/**
 * RGBA pixel
 */
export interface QoiPixel {
	r: number
	g: number
	b: number
	a: number
}

/**
 * One decoded opcode with its payload
 */
export type QoiChunk =
	| { op: 'rgb'; r: number; g: number; b: number }
	| { op: 'rgba'; r: number; g: number; b: number; a: number }
	| { op: 'index'; index: number }
	| { op: 'diff'; dr: number; dg: number; db: number }
	| { op: 'luma'; dg: number; drDg: number; dbDg: number }
	| { op: 'run'; length: number }

export interface DecodedQoi {
	readonly header: QoiHeader
	/** 3 or 4 bytes per pixel, matching header.channels */
	readonly data: Uint8Array
}

export interface QoiEncodeOptions extends EncodeOptions {
	colorspace?: QoiColorSpace
}

export type QoiErrorKind =
	| 'IoFailure'
	| 'MalformedHeader'
	| 'InvalidChannelCount'
	| 'InvalidColorspace'
	| 'InvalidEndMarker'

/**
 * Error raised by the QOI codec. Every kind aborts the current pass.
 */
export class QoiError extends Error {
	readonly kind: QoiErrorKind

	constructor(kind: QoiErrorKind, message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = 'QoiError'
		this.kind = kind
	}
}

export function isQoiError(err: unknown, kind?: QoiErrorKind): err is QoiError {
	return err instanceof QoiError && (kind === undefined || err.kind === kind)
}

export function startPixel(): QoiPixel {
	return { r: 0, g: 0, b: 0, a: 255 }
}

/**
 * Fresh color index: 64 zeroed pixels
 */
export function createIndex(): QoiPixel[] {
	return Array.from({ length: QOI_INDEX_SIZE }, () => ({ r: 0, g: 0, b: 0, a: 0 }))
}

/**
 * Calculate hash index for pixel
 */
export function qoiHash(pixel: QoiPixel): number {
	return (pixel.r * 3 + pixel.g * 5 + pixel.b * 7 + pixel.a * 11) % QOI_INDEX_SIZE
}

/**
 * Compare two pixels for equality
 */
export function pixelsEqual(a: QoiPixel, b: QoiPixel): boolean {
	return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a
}
