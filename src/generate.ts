import fs from 'node:fs'
import { evaluateCached } from './cache.js'
import { compileSchemas } from './compile.js'
import { getCachePath } from './config.js'
import { discoverSchemas } from './discovery.js'
import { ok, type Result } from './failures.js'
import type { ProtocLogger } from './logger.js'
import type { GenerateOutcome, ProtocConfig } from './types.js'
import { unpackDependencies } from './unpack.js'

/**
 * Unpack dependency schemas, discover every schema (unpacked ones included) and run
 * protoc unless the cache shows nothing changed. Resolves with the generated files.
 */
export async function generate(config: ProtocConfig, logger: ProtocLogger): Promise<Result<GenerateOutcome>> {
	const unpacked = unpackDependencies(config.dependencies, config.externalIncludePath, logger)
	if (!unpacked.ok) return unpacked

	const schemas = discoverSchemas([...config.sourceDirs, config.externalIncludePath])

	const outcome = await evaluateCached(
		getCachePath(config),
		schemas,
		async (inputs) => {
			if (inputs.length === 0) {
				logger.info('No protobuf schemas found, skipping protoc')
				return ok([])
			}
			return compileSchemas(config, inputs, logger)
		},
		{ style: config.fingerprint, force: config.force, logger }
	)
	if (!outcome.ok) return outcome
	return ok({ ...outcome.value, unpacked: unpacked.value })
}

/** Remove generated target dirs and unpacked dependency schemas. */
export function cleanGenerated(config: ProtocConfig, logger?: ProtocLogger): string[] {
	const removed: string[] = []
	const dirs = [...config.generatedTargets.map((target) => target.dir), config.externalIncludePath]
	for (const dir of new Set(dirs)) {
		if (!fs.existsSync(dir)) continue
		fs.rmSync(dir, { recursive: true, force: true })
		removed.push(dir)
		logger?.debug(`removed ${dir}`)
	}
	return removed
}
