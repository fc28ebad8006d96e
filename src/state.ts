import type { ProtocPluginOptions } from './types.js'

export const state: {
	/** Options of the last `protocPlugin()` call, so the runner can pick them up from vite.config. */
	storedPluginOptions?: ProtocPluginOptions
} = {}
