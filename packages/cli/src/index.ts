#!/usr/bin/env node
/**
 * qoi CLI - QOI image toolkit
 */

import { runCli } from './commands'

process.exitCode = runCli(process.argv.slice(2))
