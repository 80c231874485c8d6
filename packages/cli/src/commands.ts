import { existsSync, readFileSync, statSync, writeFileSync } from 'node:fs'
import { basename, dirname, extname, join } from 'node:path'
import {
	ByteReader,
	type DecodedQoi,
	QoiChannels,
	QoiColorSpace,
	decodeQoi,
	encodeBmp,
	encodeQoi,
	readQoiHeader,
} from '@qoikit/codecs'
import { detectFormat, getMimeType } from '@qoikit/core'
import { type CliOptions, HELP, VERSION, parseArgs } from './args'

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

interface Output {
	log(message: string): void
	verbose(message: string): void
	error(message: string): void
}

function createOutput(options: CliOptions): Output {
	return {
		log: (message) => {
			if (!options.quiet) console.log(message)
		},
		verbose: (message) => {
			if (options.verbose && !options.quiet) console.log(message)
		},
		error: (message) => console.error(message),
	}
}

export function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

// ─────────────────────────────────────────────────────────────────────────────
// Files
// ─────────────────────────────────────────────────────────────────────────────

export function readQoiFile(path: string): DecodedQoi {
	if (!existsSync(path)) {
		throw new Error(`File not found: ${path}`)
	}
	return decodeQoi(new Uint8Array(readFileSync(path)))
}

function writeOutput(path: string, data: Uint8Array, options: CliOptions, out: Output): void {
	if (existsSync(path) && !options.overwrite) {
		throw new Error(`Output exists: ${path} (use --overwrite)`)
	}
	writeFileSync(path, data)
	out.verbose(`Wrote ${formatBytes(data.length)} to ${path}`)
}

function defaultBmpPath(input: string): string {
	return join(dirname(input), `${basename(input, extname(input))}.bmp`)
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

function runInfo(input: string, out: Output): void {
	if (!existsSync(input)) {
		throw new Error(`File not found: ${input}`)
	}
	const data = new Uint8Array(readFileSync(input))
	const format = detectFormat(data)

	out.log(`Source: ${input}`)
	out.log(`Size: ${formatBytes(statSync(input).size)}`)
	out.log(`Format: ${format ?? 'unknown'}`)
	if (format) out.log(`MIME: ${getMimeType(format)}`)

	if (format === 'qoi') {
		const header = readQoiHeader(new ByteReader(data))
		out.log(`Dimensions: ${header.width} x ${header.height}`)
		out.log(`Channels: ${header.channels === QoiChannels.RGBA ? 'RGBA' : 'RGB'}`)
		out.log(`Colorspace: ${header.colorspace === QoiColorSpace.Linear ? 'linear' : 'sRGB'}`)
		out.log(`Pixels: ${(header.width * header.height).toLocaleString('en-US')}`)
	}
}

function runRoundtrip(input: string, output: string, options: CliOptions, out: Output): void {
	const { header, data } = readQoiFile(input)
	out.verbose(`Decoded ${header.width}x${header.height}, ${formatBytes(data.length)} of pixels`)

	writeOutput(output, encodeQoi(header, data), options, out)
	out.log(`${input} -> ${output}`)
}

function runBmp(input: string, output: string, options: CliOptions, out: Output): void {
	const { header, data } = readQoiFile(input)
	const rgba = header.channels === QoiChannels.RGBA
	const format = options.srgb ? (rgba ? 'rgba8-srgb' : 'rgb8-srgb') : rgba ? 'rgba8' : 'rgb8'
	out.verbose(`Exporting ${header.width}x${header.height} as ${format}`)

	writeOutput(output, encodeBmp(header.width, header.height, format, data), options, out)
	out.log(`${input} -> ${output}`)
}

function runTime(input: string, output: string, options: CliOptions, out: Output): void {
	if (!existsSync(input)) {
		throw new Error(`File not found: ${input}`)
	}
	const fileData = new Uint8Array(readFileSync(input))

	const beforeDecode = performance.now()
	const { header, data } = decodeQoi(fileData)
	const afterDecode = performance.now()
	const encoded = encodeQoi(header, data)
	const afterEncode = performance.now()

	out.log(`decode time: ${(afterDecode - beforeDecode) / 1000} seconds`)
	out.log(`encode time: ${(afterEncode - afterDecode) / 1000} seconds`)

	writeOutput(output, encoded, options, out)
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run the CLI and return the process exit code
 */
export function runCli(args: string[]): number {
	const { command, inputs, options, unknown } = parseArgs(args)
	const out = createOutput(options)

	if (unknown.length > 0) {
		out.error(`Unknown option: ${unknown.join(', ')}`)
		return 1
	}
	if (options.version) {
		out.log(`qoi v${VERSION}`)
		return 0
	}
	if (options.help || command === undefined) {
		out.log(HELP)
		return options.help ? 0 : 1
	}

	const [input, output] = inputs
	if (input === undefined) {
		out.error(`Error: ${command} requires an input file`)
		return 1
	}

	try {
		switch (command) {
			case 'info':
				runInfo(input, out)
				break
			case 'roundtrip':
				runRoundtrip(input, output ?? 'roundtripped.qoi', options, out)
				break
			case 'bmp':
				runBmp(input, output ?? defaultBmpPath(input), options, out)
				break
			case 'time':
				runTime(input, output ?? 'roundtripped.qoi', options, out)
				break
		}
	} catch (err) {
		out.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
		return 1
	}
	return 0
}
