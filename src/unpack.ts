import AdmZip from 'adm-zip'
import fs from 'node:fs'
import path from 'node:path'
import { isSchemaFile, isWithin } from './resolve.js'
import { extractionFailure, fail, ok, type Result } from './failures.js'
import type { ProtocLogger } from './logger.js'
import type { UnpackedDependencies } from './types.js'

/**
 * Extract the .proto entries of each archive into `extractTarget`, keeping their
 * paths inside the archive. Files whose bytes are unchanged are not rewritten, so
 * their mtimes stay put and the cache sees no change. Existing files are never
 * removed: schemas from a dropped dependency linger until the directory is cleaned.
 */
export function unpackDependencies(
	archives: string[],
	extractTarget: string,
	logger: ProtocLogger
): Result<UnpackedDependencies> {
	fs.mkdirSync(extractTarget, { recursive: true })
	const files: string[] = []
	for (const archive of archives) {
		try {
			const zip = new AdmZip(archive)
			const extracted: string[] = []
			for (const entry of zip.getEntries()) {
				if (entry.isDirectory || !isSchemaFile(entry.entryName)) continue
				const file = path.resolve(extractTarget, entry.entryName)
				if (!isWithin(extractTarget, file)) {
					logger.warn(`Skipping ${entry.entryName} from ${archive}: outside the extract directory`)
					continue
				}
				writeIfChanged(file, entry.getData())
				extracted.push(file)
			}
			if (extracted.length) {
				logger.debug(`Extracted ${extracted.map((f) => `\n * ${f}`).join('')}`)
			}
			files.push(...extracted)
		} catch (error) {
			return fail(extractionFailure(archive, error))
		}
	}
	return ok({ dir: extractTarget, files })
}

function writeIfChanged(file: string, data: Buffer): void {
	if (fs.existsSync(file) && fs.readFileSync(file).equals(data)) return
	fs.mkdirSync(path.dirname(file), { recursive: true })
	fs.writeFileSync(file, data)
}
