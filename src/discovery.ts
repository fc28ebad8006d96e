import fg from 'fast-glob'
import fs from 'node:fs'
import path from 'node:path'
import { SCHEMA_GLOB } from './constants.js'

/** All .proto files below the given directories, as sorted unique absolute paths. */
export function discoverSchemas(dirs: string[]): string[] {
	const schemas = new Set<string>()
	for (const dir of dirs) {
		if (!fs.existsSync(dir)) continue
		const matches = fg.sync(SCHEMA_GLOB, { cwd: dir, absolute: true, onlyFiles: true, dot: true })
		for (const match of matches) schemas.add(path.resolve(match))
	}
	return [...schemas].sort()
}
