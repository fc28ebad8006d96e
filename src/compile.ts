import fs from 'node:fs'
import { collectOutputs } from './collect.js'
import { compileFailure, fail, ok, type Result } from './failures.js'
import type { ProtocLogger } from './logger.js'
import { createProtocRunner, executeProtoc } from './protoc.js'
import type { ProtocConfig } from './types.js'

export async function compileSchemas(
	config: ProtocConfig,
	schemas: string[],
	logger: ProtocLogger
): Promise<Result<string[]>> {
	const targetDirs = config.generatedTargets.map((target) => target.dir)
	for (const dir of targetDirs) fs.mkdirSync(dir, { recursive: true })

	logger.info(`Compiling ${schemas.length} protobuf files to ${targetDirs.join(',')}`)
	logger.debug('protoc options:')
	for (const option of config.protocOptions) logger.debug(`\t${option}`)
	for (const schema of schemas) logger.info(`Compiling schema ${schema}`)

	const runner = config.runProtoc ?? createProtocRunner(config.protoc, logger)
	const result = await executeProtoc(runner, config.includePaths, config.protocOptions, schemas)
	if (!result.ok) return result
	if (result.value !== 0) return fail(compileFailure(result.value))

	for (const dir of targetDirs) logger.info(`Protoc target directory: ${dir}`)
	return ok(collectOutputs(config.generatedTargets))
}
