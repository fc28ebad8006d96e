import crypto from 'node:crypto'
import fs from 'node:fs'
import path from 'node:path'
import { CACHE_VERSION } from './constants.js'
import { ok, type Result } from './failures.js'
import type { ProtocLogger } from './logger.js'
import type { CacheData, CacheOutcome, Fingerprint, FingerprintStyle } from './types.js'

function isFingerprintStyle(value: unknown): value is FingerprintStyle {
	return value === 'lastModified' || value === 'contentHash'
}

function isCacheData(value: unknown): value is CacheData {
	if (typeof value !== 'object' || value === null) return false
	if (!('version' in value) || value.version !== CACHE_VERSION) return false
	if (!('style' in value) || !isFingerprintStyle(value.style)) return false
	if (!('outputs' in value) || !Array.isArray(value.outputs)) return false
	if (!value.outputs.every((o) => typeof o === 'string')) return false
	if (!('inputs' in value) || typeof value.inputs !== 'object' || value.inputs === null) return false
	return Object.values(value.inputs).every((f) => typeof f === 'number' || typeof f === 'string')
}

/** Reads the last recorded build. Missing, unreadable or malformed records all read as null. */
export function loadCache(cachePath: string): CacheData | null {
	try {
		if (!fs.existsSync(cachePath)) return null
		const data: unknown = JSON.parse(fs.readFileSync(cachePath, 'utf-8'))
		return isCacheData(data) ? data : null
	} catch {
		return null
	}
}

export function saveCache(
	cachePath: string,
	style: FingerprintStyle,
	inputs: Record<string, Fingerprint>,
	outputs: string[]
): void {
	const dir = path.dirname(cachePath)
	if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true })
	const data: CacheData = { version: CACHE_VERSION, style, inputs, outputs }
	fs.writeFileSync(cachePath, JSON.stringify(data, null, 0), 'utf-8')
}

/**
 * mtime by default. `contentHash` trades a read of every schema for immunity to
 * timestamp granularity and to touches that leave content unchanged.
 */
export function fingerprintFiles(files: string[], style: FingerprintStyle): Record<string, Fingerprint> {
	const fingerprints: Record<string, Fingerprint> = {}
	for (const file of files) {
		try {
			fingerprints[file] =
				style === 'contentHash'
					? crypto.createHash('sha256').update(fs.readFileSync(file)).digest('hex')
					: fs.statSync(file).mtimeMs
		} catch {
			// vanished since discovery; the input set differs, so the cache is stale anyway
		}
	}
	return fingerprints
}

export function getChangedFiles(cache: CacheData | null, current: Record<string, Fingerprint>): string[] {
	if (!cache) return Object.keys(current)
	const changed: string[] = []
	for (const [file, fingerprint] of Object.entries(current)) {
		if (cache.inputs[file] !== fingerprint) changed.push(file)
	}
	for (const file of Object.keys(cache.inputs)) {
		if (!(file in current)) changed.push(file) // deleted
	}
	return changed
}

export function isCacheFresh(
	cache: CacheData | null,
	style: FingerprintStyle,
	current: Record<string, Fingerprint>
): boolean {
	if (!cache || cache.style !== style) return false
	if (Object.keys(cache.inputs).length !== Object.keys(current).length) return false
	if (getChangedFiles(cache, current).length > 0) return false
	return cache.outputs.every((output) => fs.existsSync(output))
}

export interface EvaluateOptions {
	style: FingerprintStyle
	force?: boolean
	logger?: ProtocLogger
}

/**
 * Returns the recorded outputs when `inputs` and those outputs are unchanged since
 * the last successful run; otherwise runs `compute` and records its result. A failed
 * `compute` leaves the previous record in place.
 */
export async function evaluateCached<E>(
	cachePath: string,
	inputs: string[],
	compute: (inputs: string[]) => Promise<Result<string[], E>>,
	{ style, force = false, logger }: EvaluateOptions
): Promise<Result<CacheOutcome, E>> {
	const cache = loadCache(cachePath)
	const current = fingerprintFiles(inputs, style)

	if (!force && cache && isCacheFresh(cache, style, current)) {
		logger?.debug(`up to date, ${cache.outputs.length} generated file(s) reused`)
		return ok({ files: cache.outputs, cached: true })
	}

	if (force) logger?.debug('forced regeneration')
	else if (!cache) logger?.debug('no previous protoc run recorded')
	else {
		const changed = getChangedFiles(cache, current).length
		logger?.debug(changed ? `${changed} schema file(s) changed` : 'generated files missing')
	}

	const result = await compute(inputs)
	if (!result.ok) return result
	saveCache(cachePath, style, current, result.value)
	return ok({ files: result.value, cached: false })
}
