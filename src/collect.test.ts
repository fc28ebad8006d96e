import { describe, expect, it } from 'vitest'
import path from 'node:path'

import { collectOutputs } from './collect.js'
import { makeTempDir, writeFile } from './testing.js'

describe('collectOutputs', () => {
	it('unions the matches of every target', () => {
		const root = makeTempDir()
		writeFile(path.join(root, 'java/com/acme/Order.java'))
		writeFile(path.join(root, 'java/com/acme/Order.class'))
		writeFile(path.join(root, 'py/order_pb2.py'))

		const files = collectOutputs([
			{ dir: path.join(root, 'java'), pattern: '*.java', kind: 'java' },
			{ dir: path.join(root, 'py'), pattern: '*.py', kind: 'python' },
		])

		expect(files).toEqual([path.join(root, 'java/com/acme/Order.java'), path.join(root, 'py/order_pb2.py')])
	})

	it('reports stray matching files that protoc did not write', () => {
		const root = makeTempDir()
		const stray = writeFile(path.join(root, 'gen/left_over_pb.js'))

		expect(collectOutputs([{ dir: path.join(root, 'gen'), pattern: '*.js', kind: 'js' }])).toEqual([stray])
	})

	it('returns nothing for a missing target dir', () => {
		const root = makeTempDir()

		expect(collectOutputs([{ dir: path.join(root, 'gen'), pattern: '*.js', kind: 'js' }])).toEqual([])
	})
})
