import { describe, expect, it } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'

import { compileSchemas } from './compile.js'
import { resolveProtocConfig } from './config.js'
import { createFakeProtoc, createMemoryLogger, makeTempDir, writeFile } from './testing.js'

function setup(exitCode = 0) {
	const root = makeTempDir()
	const runProtoc = createFakeProtoc(exitCode)
	const config = resolveProtocConfig(
		{
			sourceDirs: ['proto'],
			generatedTargets: [
				{ dir: 'gen/java', pattern: '*.java' },
				{ dir: 'gen/py', pattern: '*.py' },
			],
			protocOptions: ['--experimental_allow_proto3_optional'],
			runProtoc,
		},
		{ root }
	)
	const schema = writeFile(path.join(root, 'proto/order.proto'))
	return { root, config, runProtoc, schema }
}

describe('compileSchemas', () => {
	it('creates target dirs, runs protoc and collects every matching output', async () => {
		const { root, config, runProtoc, schema } = setup()
		const stray = writeFile(path.join(root, 'gen/py/legacy_pb2.py'))

		const result = await compileSchemas(config, [schema], createMemoryLogger())

		expect(result).toEqual({
			ok: true,
			value: [path.join(root, 'gen/java/order.java'), stray, path.join(root, 'gen/py/order_pb2.py')],
		})
		expect(runProtoc.calls).toEqual([
			[
				`-I${path.join(root, 'proto')}`,
				`-I${path.join(root, 'node_modules/.vite/protobuf_external')}`,
				`--java_out=${path.join(root, 'gen/java')}`,
				`--python_out=${path.join(root, 'gen/py')}`,
				'--experimental_allow_proto3_optional',
				schema,
			],
		])
	})

	it('creates target dirs even when protoc writes nothing', async () => {
		const { root, config, schema } = setup()
		config.runProtoc = () => 0

		const result = await compileSchemas(config, [schema], createMemoryLogger())

		expect(result).toEqual({ ok: true, value: [] })
		expect(fs.statSync(path.join(root, 'gen/java')).isDirectory()).toBe(true)
		expect(fs.statSync(path.join(root, 'gen/py')).isDirectory()).toBe(true)
	})

	it('fails with the exit code when protoc exits nonzero', async () => {
		const { config, schema } = setup(2)

		const result = await compileSchemas(config, [schema], createMemoryLogger())

		expect(result).toEqual({
			ok: false,
			error: { kind: 'CompileFailure', message: 'protoc returned exit code: 2', exitCode: 2 },
		})
	})

	it('logs progress at info and the options at debug', async () => {
		const { root, config, schema } = setup()
		const logger = createMemoryLogger()

		await compileSchemas(config, [schema], logger)

		const java = path.join(root, 'gen/java')
		const py = path.join(root, 'gen/py')
		expect(logger.messages('info')).toEqual([
			`Compiling 1 protobuf files to ${java},${py}`,
			`Compiling schema ${schema}`,
			`Protoc target directory: ${java}`,
			`Protoc target directory: ${py}`,
		])
		expect(logger.messages('debug')).toEqual([
			'protoc options:',
			`\t--java_out=${java}`,
			`\t--python_out=${py}`,
			'\t--experimental_allow_proto3_optional',
		])
	})
})
