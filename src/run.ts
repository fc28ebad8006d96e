import * as vite from 'vite'
import { resolveProtocConfig } from './config.js'
import { ProtocBuildError } from './failures.js'
import { generate, cleanGenerated } from './generate.js'
import { createProtocLogger, type ProtocLogger } from './logger.js'
import { state } from './state.js'
import type { GenerateOutcome, ProtocConfig, ProtocPluginOptions } from './types.js'
import { startSchemaWatcher, type SchemaWatcher } from './watcher.js'

export interface RunOptions extends ProtocPluginOptions {
	/** Project root. When omitted the Vite config of the current directory is loaded. */
	root?: string
	cacheDir?: string
	watch?: boolean
	/** Use polling instead of native watchers (network drives, containers). */
	watcherUsePolling?: boolean
	logger?: ProtocLogger
}

/**
 * Resolve root, cache dir and plugin options. Without an explicit root the Vite
 * config is resolved so options passed to `protocPlugin()` in vite.config apply.
 */
export async function resolveRunConfig(options: RunOptions = {}): Promise<ProtocConfig> {
	const { root, cacheDir, watch: _watch, watcherUsePolling: _polling, logger: _logger, ...overrides } = options
	if (root !== undefined) return resolveProtocConfig(overrides, { root, cacheDir })

	const resolved = await vite.resolveConfig({}, 'build', 'production', 'production')
	return resolveProtocConfig(
		{ ...state.storedPluginOptions, ...overrides },
		{ root: resolved.root, cacheDir: cacheDir ?? resolved.cacheDir }
	)
}

/** Generate once. Throws ProtocBuildError when a step fails. */
export async function runProtocGenerate(options: RunOptions = {}): Promise<GenerateOutcome> {
	const config = await resolveRunConfig(options)
	const logger = options.logger ?? createProtocLogger({ debug: config.debug })
	const result = await generate(config, logger)
	if (!result.ok) throw new ProtocBuildError(result.error)
	if (result.value.cached) logger.info('No schema changes detected, skipping protoc')
	return result.value
}

/** Generate, then keep regenerating as schemas or dependency archives change. */
export async function runProtocWatch(options: RunOptions = {}): Promise<SchemaWatcher> {
	const config = await resolveRunConfig(options)
	const logger = options.logger ?? createProtocLogger({ debug: config.debug })
	return startSchemaWatcher({ config, logger, usePolling: options.watcherUsePolling })
}

export async function runProtocClean(options: RunOptions = {}): Promise<string[]> {
	const config = await resolveRunConfig(options)
	const logger = options.logger ?? createProtocLogger({ debug: config.debug })
	const removed = cleanGenerated(config, logger)
	logger.info(removed.length ? `removed ${removed.length} director${removed.length === 1 ? 'y' : 'ies'}` : 'nothing to clean')
	return removed
}
