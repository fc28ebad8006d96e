/**
 * vite-plugin-protoc
 *
 * Incremental protoc code generation for Vite:
 * - schemas inside dependency archives are unpacked and put on the include path
 * - protoc only runs when a schema's timestamp, the schema set, or a generated file changed
 * - the generated file list is whatever the target globs match after protoc exits
 */

export { protocPlugin } from './plugin.js'
export { resolveProtocConfig, deriveOutFlags, getCachePath } from './config.js'
export { generate, cleanGenerated } from './generate.js'
export { runProtocGenerate, runProtocWatch, runProtocClean } from './run.js'
export type { RunOptions } from './run.js'
export { unpackDependencies } from './unpack.js'
export { discoverSchemas } from './discovery.js'
export { evaluateCached, loadCache } from './cache.js'
export { buildProtocArgs, runProtoc, executeProtoc } from './protoc.js'
export { compileSchemas } from './compile.js'
export { collectOutputs } from './collect.js'
export { createProtocLogger } from './logger.js'
export type { ProtocLogger } from './logger.js'
export { ProtocBuildError } from './failures.js'
export type { ProtocFailure, LaunchFailure, CompileFailure, ExtractionFailure, Result } from './failures.js'
export type {
	GeneratedTarget,
	ProtocConfig,
	ProtocPluginOptions,
	ProtocRunner,
	GenerateOutcome,
	UnpackedDependencies,
	FingerprintStyle,
} from './types.js'
