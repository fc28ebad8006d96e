import { describe, expect, it } from 'vitest'
import path from 'node:path'

import { isSchemaFile, isWithin, resolveDependencyArchives } from './resolve.js'
import { makeTempDir, writeFile } from './testing.js'

describe('isWithin', () => {
	it('matches the dir itself and anything below it', () => {
		expect(isWithin('/work/proto', '/work/proto')).toBe(true)
		expect(isWithin('/work/proto', '/work/proto/a/b.proto')).toBe(true)
		expect(isWithin('/work/proto', '/work/protocol/b.proto')).toBe(false)
		expect(isWithin('/work/proto', '/work/b.proto')).toBe(false)
	})
})

describe('isSchemaFile', () => {
	it('recognises the schema extension only', () => {
		expect(isSchemaFile('/p/a.proto')).toBe(true)
		expect(isSchemaFile('/p/a.proto.bak')).toBe(false)
	})
})

describe('resolveDependencyArchives', () => {
	it('expands globs in sorted order and keeps literal paths as given', () => {
		const root = makeTempDir()
		writeFile(path.join(root, 'libs/b.jar'))
		writeFile(path.join(root, 'libs/a.jar'))
		writeFile(path.join(root, 'libs/readme.txt'))

		const archives = resolveDependencyArchives(['libs/*.jar', 'vendor/missing.zip', 'libs/a.jar'], root)

		expect(archives).toEqual([
			path.join(root, 'libs/a.jar'),
			path.join(root, 'libs/b.jar'),
			path.join(root, 'vendor/missing.zip'),
		])
	})
})
