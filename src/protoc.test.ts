import { describe, expect, it, vi } from 'vitest'
import path from 'node:path'

import { buildProtocArgs, executeProtoc, runProtoc } from './protoc.js'
import { createMemoryLogger, makeTempDir } from './testing.js'

describe('buildProtocArgs', () => {
	it('places include flags first, then options, then schemas', () => {
		const args = buildProtocArgs(['/inc/A', '/inc/B'], ['--x'], new Set(['/src/s2.proto', '/src/s1.proto']))

		expect(args).toEqual(['-I/inc/A', '-I/inc/B', '--x', '/src/s1.proto', '/src/s2.proto'])
	})

	it('orders schemas the same way regardless of input order', () => {
		const forward = buildProtocArgs([], [], ['/p/b.proto', '/p/a.proto', '/p/c/a.proto'])
		const backward = buildProtocArgs([], [], ['/p/c/a.proto', '/p/a.proto', '/p/b.proto'])

		expect(forward).toEqual(['/p/a.proto', '/p/b.proto', '/p/c/a.proto'])
		expect(backward).toEqual(forward)
	})

	it('makes include and schema paths absolute', () => {
		const args = buildProtocArgs(['proto'], [], ['proto/a.proto'])

		expect(args).toEqual([`-I${path.resolve('proto')}`, path.resolve('proto/a.proto')])
	})
})

describe('executeProtoc', () => {
	it('hands the built argument vector to the runner and returns its exit code', async () => {
		const runner = vi.fn(() => 3)

		const result = await executeProtoc(runner, ['/inc'], ['--java_out=/gen'], ['/p/a.proto'])

		expect(result).toEqual({ ok: true, value: 3 })
		expect(runner).toHaveBeenCalledWith(['-I/inc', '--java_out=/gen', '/p/a.proto'])
	})

	it('wraps a runner error into a LaunchFailure', async () => {
		const cause = new Error('spawn protoc ENOENT')
		const runner = vi.fn(async (): Promise<number> => {
			throw cause
		})

		const result = await executeProtoc(runner, [], [], ['/p/a.proto'])

		expect(result).toEqual({
			ok: false,
			error: {
				kind: 'LaunchFailure',
				message: 'error occurred while compiling protobuf files: spawn protoc ENOENT',
				cause,
			},
		})
	})
})

describe('runProtoc', () => {
	it('rejects when the binary cannot be launched', async () => {
		const missing = path.join(makeTempDir(), 'no-such-protoc')

		await expect(runProtoc(missing, ['--version'], createMemoryLogger())).rejects.toMatchObject({
			code: 'ENOENT',
		})
	})

	it('resolves with the exit code and logs stdout as info, stderr as error', async () => {
		const logger = createMemoryLogger()
		const script = 'console.log("libprotoc 25.1"); console.error("a.proto:1:1: bad"); process.exit(3)'

		const code = await runProtoc(process.execPath, ['-e', script], logger)

		expect(code).toBe(3)
		expect(logger.messages('info')).toEqual(['libprotoc 25.1'])
		expect(logger.messages('error')).toEqual(['a.proto:1:1: bad'])
	})
})
