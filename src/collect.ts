import fg from 'fast-glob'
import fs from 'node:fs'
import path from 'node:path'
import type { ResolvedTarget } from './types.js'

/**
 * Every file under each target dir matching its pattern, whether or not the last
 * protoc run wrote it. Target dirs are expected to hold generated code only.
 */
export function collectOutputs(targets: ResolvedTarget[]): string[] {
	const files = new Set<string>()
	for (const { dir, pattern } of targets) {
		if (!fs.existsSync(dir)) continue
		const matches = fg.sync(`**/${pattern}`, { cwd: dir, absolute: true, onlyFiles: true, dot: true })
		for (const match of matches) files.add(path.resolve(match))
	}
	return [...files].sort()
}
