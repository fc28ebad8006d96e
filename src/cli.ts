#!/usr/bin/env node

import { errorMessage } from './failures.js'
import { setDebugEnabled } from './logger.js'
import { runProtocClean, runProtocGenerate, runProtocWatch, type RunOptions } from './run.js'

function getFlagValue(argv: string[], name: string): string | undefined {
	const idx = argv.indexOf(name)
	if (idx === -1) return undefined
	return argv[idx + 1]
}

function hasFlag(argv: string[], name: string): boolean {
	return argv.includes(name)
}

function usage() {
	console.log(`vite-protoc

Usage:
	vite-protoc generate [--watch] [--force] [--polling] [--debug] [--root <dir>] [--protoc <path>]
	vite-protoc clean [--root <dir>]

Without --root the Vite config in the current directory is loaded and the
options passed to protocPlugin() are used.
`)
}

function parseRunOptions(argv: string[]): RunOptions {
	const options: RunOptions = {}
	const root = getFlagValue(argv, '--root')
	const protoc = getFlagValue(argv, '--protoc')
	if (root) options.root = root
	if (protoc) options.protoc = protoc
	if (hasFlag(argv, '--force')) options.force = true
	if (hasFlag(argv, '--debug')) options.debug = true
	if (hasFlag(argv, '--watch')) options.watch = true
	if (hasFlag(argv, '--polling')) options.watcherUsePolling = true
	return options
}

async function main(argv: string[]): Promise<number> {
	if (hasFlag(argv, '-h') || hasFlag(argv, '--help')) {
		usage()
		return 0
	}
	const cmd = argv[0] && !argv[0].startsWith('-') ? argv[0] : 'generate'

	const options = parseRunOptions(argv)
	if (options.debug) setDebugEnabled(true)

	if (cmd === 'generate') {
		if (options.watch) {
			await runProtocWatch(options)
			return -1
		}
		await runProtocGenerate(options)
		return 0
	}
	if (cmd === 'clean') {
		await runProtocClean(options)
		return 0
	}

	console.error(`Unknown command: ${cmd}`)
	usage()
	return 1
}

main(process.argv.slice(2)).then(
	(code) => {
		// watch mode keeps the process alive
		if (code >= 0) process.exit(code)
	},
	(error: unknown) => {
		console.error('\x1b[31m%s\x1b[0m', `[protoc] ${errorMessage(error)}`)
		process.exit(1)
	}
)
