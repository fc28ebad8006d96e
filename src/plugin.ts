import type { Plugin, ResolvedConfig } from 'vite'
import path from 'node:path'
import { PLUGIN_NAME } from './constants.js'
import { resolveProtocConfig } from './config.js'
import { generate } from './generate.js'
import { createProtocLogger, type ProtocLogger } from './logger.js'
import { state } from './state.js'
import type { ProtocConfig, ProtocPluginOptions } from './types.js'
import { createLoggedGenerate, createRegenerator, isWatchedChange } from './watcher.js'

/**
 * Vite plugin that generates sources from .proto schemas before the build starts.
 * `vite build` fails when protoc fails; the dev server logs the error and keeps
 * regenerating as schemas change.
 */
export function protocPlugin(options: ProtocPluginOptions = {}): Plugin {
	state.storedPluginOptions = options
	let config: ProtocConfig | undefined
	let logger: ProtocLogger | undefined
	let command: ResolvedConfig['command'] = 'build'

	return {
		name: PLUGIN_NAME,
		enforce: 'pre',

		configResolved(resolved) {
			command = resolved.command
			config = resolveProtocConfig(options, { root: resolved.root, cacheDir: resolved.cacheDir })
			logger = createProtocLogger({ logger: resolved.logger, debug: config.debug })
		},

		async buildStart() {
			if (!config || !logger) return
			const result = await generate(config, logger)
			if (result.ok) {
				logger.debug(`${result.value.files.length} generated file(s)${result.value.cached ? ' (cached)' : ''}`)
				return
			}
			if (command === 'build') this.error(result.error.message)
			logger.error(result.error.message)
		},

		configureServer(server) {
			if (!config || !logger) return
			const protocConfig = config
			const regenerate = createRegenerator(createLoggedGenerate(protocConfig, logger))
			server.watcher.add([...protocConfig.sourceDirs, ...protocConfig.dependencies])
			server.watcher.on('all', (event, file) => {
				if (event !== 'add' && event !== 'change' && event !== 'unlink') return
				if (!isWatchedChange(protocConfig, path.resolve(file))) return
				void regenerate()
			})
		},
	}
}
