import fg from 'fast-glob'
import path from 'node:path'
import { SCHEMA_EXT } from './constants.js'

export function isSchemaFile(file: string): boolean {
	return file.endsWith(SCHEMA_EXT)
}

/** True when `file` is `dir` itself or lies somewhere below it. */
export function isWithin(dir: string, file: string): boolean {
	const rel = path.relative(path.resolve(dir), path.resolve(file))
	return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel))
}

/**
 * Expand the configured dependency archives. Glob patterns go through fast-glob;
 * literal paths are kept even when missing so unpacking reports them.
 */
export function resolveDependencyArchives(patterns: string[], rootResolved: string): string[] {
	const archives: string[] = []
	const seen = new Set<string>()
	const push = (file: string) => {
		const abs = path.resolve(rootResolved, file)
		if (seen.has(abs)) return
		seen.add(abs)
		archives.push(abs)
	}
	for (const pattern of patterns) {
		if (!fg.isDynamicPattern(pattern)) {
			push(pattern)
			continue
		}
		const matches = fg.sync(pattern.replace(/\\/g, '/'), {
			cwd: rootResolved,
			absolute: true,
			onlyFiles: true,
		})
		for (const match of matches.sort()) push(match)
	}
	return archives
}
