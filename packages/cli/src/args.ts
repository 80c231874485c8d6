// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type Command = 'info' | 'roundtrip' | 'bmp' | 'time'

export interface CliOptions {
	// Output
	overwrite?: boolean
	srgb?: boolean

	// Flags
	verbose?: boolean
	quiet?: boolean

	// Meta
	help?: boolean
	version?: boolean
}

export interface ParsedArgs {
	command?: Command
	inputs: string[]
	options: CliOptions
	unknown: string[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const VERSION = '0.1.0'

const COMMANDS: readonly Command[] = ['info', 'roundtrip', 'bmp', 'time']

export const HELP = `
qoi - QOI image toolkit

USAGE:
  qoi info <file>                   Show header and size of a QOI file
  qoi roundtrip <file> [output]     Decode and re-encode (default: roundtripped.qoi)
  qoi bmp <file> [output]           Export a BMP for inspection (default: <file>.bmp)
  qoi time <file> [output]          Time decode and encode, write the re-encoded file

OPTIONS:
  --srgb                Gamma-correct sRGB pixels on BMP export
  --overwrite           Overwrite existing files
  -v, --verbose         Verbose output
  --quiet               Suppress output
  --help                Show this help
  --version             Show version

EXAMPLES:
  qoi info photo.qoi
  qoi roundtrip photo.qoi copy.qoi --overwrite
  qoi bmp photo.qoi --srgb
`

function isCommand(value: string): value is Command {
	return COMMANDS.some((command) => command === value)
}

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parser
// ─────────────────────────────────────────────────────────────────────────────

export function parseArgs(args: string[]): ParsedArgs {
	const parsed: ParsedArgs = { inputs: [], options: {}, unknown: [] }
	const { options } = parsed

	for (const arg of args) {
		if (arg === '--help' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--overwrite') {
			options.overwrite = true
		} else if (arg === '--srgb') {
			options.srgb = true
		} else if (arg.startsWith('-')) {
			parsed.unknown.push(arg)
		} else if (parsed.command === undefined && isCommand(arg)) {
			parsed.command = arg
		} else {
			parsed.inputs.push(arg)
		}
	}

	return parsed
}
