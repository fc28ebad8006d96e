import { spawn } from 'node:child_process'
import path from 'node:path'
import readline from 'node:readline'
import { fail, launchFailure, ok, type Result } from './failures.js'
import type { ProtocLogger } from './logger.js'
import type { ProtocRunner } from './types.js'

/** `-I<dir>` per include path (order kept), then the options, then the schemas sorted. */
export function buildProtocArgs(includePaths: string[], options: string[], schemas: Iterable<string>): string[] {
	const includes = includePaths.map((dir) => `-I${path.resolve(dir)}`)
	const files = [...new Set([...schemas].map((schema) => path.resolve(schema)))].sort()
	return [...includes, ...options, ...files]
}

/**
 * Spawns protoc and waits for it to exit. stdout goes to the log as info, stderr
 * as errors. Rejects only when the process could not be started.
 */
export function runProtoc(binary: string, args: string[], logger: ProtocLogger): Promise<number> {
	return new Promise((resolve, reject) => {
		const child = spawn(binary, args, { stdio: ['ignore', 'pipe', 'pipe'] })
		readline.createInterface({ input: child.stdout }).on('line', (line) => logger.info(line))
		readline.createInterface({ input: child.stderr }).on('line', (line) => logger.error(line))
		child.once('error', reject)
		child.once('close', (code, signal) => {
			if (code === null) {
				logger.warn(`${binary} terminated by ${signal ?? 'unknown signal'}`)
				resolve(1)
				return
			}
			resolve(code)
		})
	})
}

export function createProtocRunner(binary: string, logger: ProtocLogger): ProtocRunner {
	return (args) => runProtoc(binary, args, logger)
}

/** Runs protoc through `runner`. Any error raised while doing so becomes a LaunchFailure. */
export async function executeProtoc(
	runner: ProtocRunner,
	includePaths: string[],
	options: string[],
	schemas: Iterable<string>
): Promise<Result<number>> {
	try {
		return ok(await runner(buildProtocArgs(includePaths, options, schemas)))
	} catch (error) {
		return fail(launchFailure(error))
	}
}
