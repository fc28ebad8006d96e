import path from 'node:path'
import {
	CACHE_NAME,
	CACHE_SUBDIR,
	DEFAULT_CACHE_DIR,
	DEFAULT_SOURCE_DIR,
	DEFAULT_TARGET_DIR,
	ENV_DEBUG,
	ENV_PROTOC,
	EXTERNAL_INCLUDE_DIR_NAME,
	KIND_BY_EXTENSION,
} from './constants.js'
import { resolveDependencyArchives } from './resolve.js'
import type { GeneratedTarget, ProtocConfig, ProtocPluginOptions, ResolvedTarget } from './types.js'

export const DEFAULT_TARGETS: GeneratedTarget[] = [
	{ dir: DEFAULT_TARGET_DIR, pattern: '*.js', outOptions: 'import_style=commonjs,binary' },
]

function configError(message: string): Error {
	return new Error(`invalid protoc config: ${message}`)
}

export function inferKind(pattern: string): string | null {
	return KIND_BY_EXTENSION[path.extname(pattern)] ?? null
}

/**
 * One `--<kind>_out` flag per known kind. When several targets share a kind the
 * first one wins; protoc accepts a single output dir per generator.
 */
export function deriveOutFlags(targets: ResolvedTarget[]): string[] {
	const flags: string[] = []
	const seen = new Set<string>()
	for (const target of targets) {
		if (!target.kind || seen.has(target.kind)) continue
		seen.add(target.kind)
		const dest = target.outOptions ? `${target.outOptions}:${target.dir}` : target.dir
		flags.push(`--${target.kind}_out=${dest}`)
	}
	return flags
}

export function getCachePath(config: Pick<ProtocConfig, 'cacheDir'>): string {
	return path.join(config.cacheDir, CACHE_SUBDIR, CACHE_NAME)
}

export function resolveProtocConfig(
	options: ProtocPluginOptions = {},
	{ root = process.cwd(), cacheDir }: { root?: string; cacheDir?: string } = {}
): ProtocConfig {
	const rootResolved = path.resolve(root)
	const abs = (p: string) => path.resolve(rootResolved, p)

	const sourceDirs = (options.sourceDirs ?? [DEFAULT_SOURCE_DIR]).map(abs)
	if (sourceDirs.length === 0) throw configError(`'sourceDirs' must name at least one directory`)

	const generatedTargets = (options.generatedTargets ?? DEFAULT_TARGETS).map((target, i) => {
		if (!target.dir) throw configError(`'generatedTargets[${i}].dir' is empty`)
		if (!target.pattern) throw configError(`'generatedTargets[${i}].pattern' is empty`)
		const resolved: ResolvedTarget = {
			dir: abs(target.dir),
			pattern: target.pattern,
			kind: target.kind ?? inferKind(target.pattern),
		}
		if (target.outOptions) resolved.outOptions = target.outOptions
		return resolved
	})

	const cacheDirResolved = abs(cacheDir ?? DEFAULT_CACHE_DIR)
	const externalIncludePath = abs(
		options.externalIncludePath ?? path.join(cacheDirResolved, EXTERNAL_INCLUDE_DIR_NAME)
	)

	return {
		root: rootResolved,
		sourceDirs,
		includePaths: [...sourceDirs, externalIncludePath, ...(options.includePaths ?? []).map(abs)],
		protocOptions: [...deriveOutFlags(generatedTargets), ...(options.protocOptions ?? [])],
		generatedTargets,
		dependencies: resolveDependencyArchives(options.dependencies ?? [], rootResolved),
		externalIncludePath,
		protoc: options.protoc ?? process.env[ENV_PROTOC] ?? 'protoc',
		cacheDir: cacheDirResolved,
		fingerprint: options.fingerprint ?? 'lastModified',
		force: options.force ?? false,
		runProtoc: options.runProtoc,
		debug: options.debug ?? process.env[ENV_DEBUG] === '1',
	}
}
