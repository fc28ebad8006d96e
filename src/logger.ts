import { createLogger, type Logger } from 'vite'
import { ENV_DEBUG, LOG_PREFIX } from './constants.js'

export interface ProtocLogger {
	info(message: string): void
	warn(message: string): void
	error(message: string): void
	debug(message: string): void
}

let debugOverride = false

export function isDebugEnabled(): boolean {
	return debugOverride || process.env[ENV_DEBUG] === '1'
}

/** Force debug output on or off regardless of the environment. Mostly for tests. */
export function setDebugEnabled(enabled: boolean): void {
	debugOverride = enabled
}

/**
 * Wraps a Vite logger. Inside the plugin this is `config.logger`, so output follows
 * the user's `logLevel` and `customLogger`; elsewhere a fresh `createLogger()`.
 */
export function createProtocLogger({
	logger = createLogger('info', { allowClearScreen: false }),
	debug = false,
}: {
	logger?: Logger
	debug?: boolean
} = {}): ProtocLogger {
	const format = (message: string) => `${LOG_PREFIX} ${message}`
	return {
		info: (message) => logger.info(format(message)),
		warn: (message) => logger.warn(`\x1b[33m${format(message)}\x1b[0m`),
		error: (message) => logger.error(`\x1b[31m${format(message)}\x1b[0m`),
		debug: (message) => {
			if (!debug && !isDebugEnabled()) return
			logger.info(`\x1b[90m${format(message)}\x1b[0m`)
		},
	}
}
