import { describe, expect, test } from 'vitest'
import { parseArgs } from './args'

describe('parseArgs', () => {
	test('command, inputs and flags', () => {
		expect(parseArgs(['bmp', 'in.qoi', 'out.bmp', '--srgb', '-v', '--overwrite'])).toEqual({
			command: 'bmp',
			inputs: ['in.qoi', 'out.bmp'],
			options: { srgb: true, verbose: true, overwrite: true },
			unknown: [],
		})
	})

	test('flags may precede the command', () => {
		const parsed = parseArgs(['--quiet', 'info', 'a.qoi'])
		expect(parsed.command).toBe('info')
		expect(parsed.inputs).toEqual(['a.qoi'])
		expect(parsed.options.quiet).toBe(true)
	})

	test('only the first command word is a command', () => {
		const parsed = parseArgs(['roundtrip', 'time', 'out.qoi'])
		expect(parsed.command).toBe('roundtrip')
		expect(parsed.inputs).toEqual(['time', 'out.qoi'])
	})

	test('collects unknown options', () => {
		expect(parseArgs(['info', 'a.qoi', '--fast', '-x']).unknown).toEqual(['--fast', '-x'])
	})

	test('help and version', () => {
		expect(parseArgs(['--help']).options).toEqual({ help: true })
		expect(parseArgs(['-V']).options).toEqual({ version: true })
		expect(parseArgs([]).command).toBeUndefined()
	})
})
