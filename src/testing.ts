import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { ProtocLogger } from './logger.js'
import type { ProtocRunner } from './types.js'

export function makeTempDir(prefix = 'vite-protoc-'): string {
	return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)))
}

export function writeFile(file: string, content = ''): string {
	fs.mkdirSync(path.dirname(file), { recursive: true })
	fs.writeFileSync(file, content)
	return file
}

/** Sets mtime (and atime) to `seconds` since the epoch. */
export function touch(file: string, seconds: number): void {
	fs.utimesSync(file, seconds, seconds)
}

export type MemoryLogger = ProtocLogger & {
	lines: Array<{ level: 'info' | 'warn' | 'error' | 'debug'; message: string }>
	messages(level: 'info' | 'warn' | 'error' | 'debug'): string[]
}

export function createMemoryLogger(): MemoryLogger {
	const lines: MemoryLogger['lines'] = []
	return {
		lines,
		info: (message) => lines.push({ level: 'info', message }),
		warn: (message) => lines.push({ level: 'warn', message }),
		error: (message) => lines.push({ level: 'error', message }),
		debug: (message) => lines.push({ level: 'debug', message }),
		messages: (level) => lines.filter((line) => line.level === level).map((line) => line.message),
	}
}

const SUFFIX_BY_KIND: Record<string, string> = {
	java: '.java',
	js: '_pb.js',
	python: '_pb2.py',
}

export type FakeProtoc = ProtocRunner & { calls: string[][] }

/**
 * In-process stand-in for protoc: for every `--<kind>_out=[opts:]<dir>` flag writes
 * one file per schema argument into `<dir>`, then returns `exitCode`.
 */
export function createFakeProtoc(exitCode = 0): FakeProtoc {
	const calls: string[][] = []
	const runner = (args: string[]) => {
		calls.push(args)
		if (exitCode !== 0) return exitCode
		const schemas = args.filter((arg) => arg.endsWith('.proto'))
		for (const arg of args) {
			const match = /^--(\w+)_out=(?:.*:)?(.+)$/.exec(arg)
			if (!match) continue
			const [, kind, dir] = match
			const suffix = SUFFIX_BY_KIND[kind] ?? `.${kind}`
			for (const schema of schemas) {
				writeFile(path.join(dir, path.basename(schema, '.proto') + suffix), `// from ${schema}\n`)
			}
		}
		return exitCode
	}
	return Object.assign(runner, { calls })
}
