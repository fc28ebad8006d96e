import chokidar from 'chokidar'
import path from 'node:path'
import readline from 'node:readline'
import { generate } from './generate.js'
import { errorMessage } from './failures.js'
import type { ProtocLogger } from './logger.js'
import { isSchemaFile, isWithin } from './resolve.js'
import type { GenerateOutcome, ProtocConfig } from './types.js'

export type Regenerate = (force?: boolean) => Promise<void>

/**
 * Serializes runs: a trigger during a run queues exactly one follow-up run (forced
 * if any queued trigger asked for it) instead of starting a second one.
 */
export function createRegenerator(run: (force: boolean) => Promise<void>): Regenerate {
	let current: Promise<void> | null = null
	let pending = false
	let pendingForce = false

	const loop = async (force: boolean) => {
		let nextForce = force
		do {
			pending = false
			pendingForce = false
			await run(nextForce)
			nextForce = pendingForce
		} while (pending)
	}

	return (force = false) => {
		if (current) {
			pending = true
			pendingForce = pendingForce || force
			return current
		}
		current = loop(force).finally(() => {
			current = null
		})
		return current
	}
}

/** Run `generate` and report the outcome through the logger. Never rejects. */
export function createLoggedGenerate(
	config: ProtocConfig,
	logger: ProtocLogger,
	onGenerated?: (outcome: GenerateOutcome) => void
): (force: boolean) => Promise<void> {
	return async (force) => {
		const start = performance.now()
		try {
			const result = await generate(force ? { ...config, force } : config, logger)
			const elapsed = ((performance.now() - start) / 1000).toFixed(3)
			if (!result.ok) {
				logger.error(`✗ ${result.error.message} (${elapsed}s)`)
				return
			}
			logger.info(
				result.value.cached
					? `✓ ${result.value.files.length} generated file(s) up to date`
					: `✓ ${result.value.files.length} file(s) generated in ${elapsed}s`
			)
			onGenerated?.(result.value)
		} catch (error) {
			logger.error(`✗ ${errorMessage(error)}`)
		}
	}
}

/** True for paths the schema watcher reacts to: schemas under a source dir, or a dependency archive. */
export function isWatchedChange(config: ProtocConfig, file: string): boolean {
	const abs = path.resolve(file)
	if (config.dependencies.includes(abs)) return true
	return isSchemaFile(abs) && config.sourceDirs.some((dir) => isWithin(dir, abs))
}

export interface SchemaWatcher {
	regenerate: Regenerate
	close(): Promise<void>
}

export function startSchemaWatcher({
	config,
	logger,
	usePolling = false,
	onGenerated,
}: {
	config: ProtocConfig
	logger: ProtocLogger
	usePolling?: boolean
	onGenerated?: (outcome: GenerateOutcome) => void
}): SchemaWatcher {
	const regenerate = createRegenerator(createLoggedGenerate(config, logger, onGenerated))

	const watcher = chokidar.watch([...config.sourceDirs, ...config.dependencies], {
		persistent: true,
		ignoreInitial: true,
		ignored: (p: string) => path.basename(p).startsWith('.'),
		usePolling,
	})
	const onEvent = (file: string) => {
		if (!isWatchedChange(config, file)) return
		logger.debug(`changed: ${path.relative(config.root, path.resolve(file))}`)
		void regenerate()
	}
	watcher.on('add', onEvent).on('change', onEvent).on('unlink', onEvent)

	const onKeypress = (_: string, key?: { ctrl?: boolean; name?: string }) => {
		if (key?.ctrl && key.name === 'c') process.exit(0)
		if (key?.name === 'r') void regenerate(true)
	}
	if (process.stdin.isTTY) {
		readline.emitKeypressEvents(process.stdin)
		process.stdin.on('keypress', onKeypress)
		process.stdin.setRawMode(true)
		process.stdin.resume()
		logger.info('watching schemas, press r to force a full regeneration')
	}

	void regenerate()

	return {
		regenerate,
		async close() {
			if (process.stdin.isTTY) {
				process.stdin.off('keypress', onKeypress)
				process.stdin.setRawMode(false)
				process.stdin.pause()
			}
			await watcher.close()
		},
	}
}
