import { describe, expect, it } from 'vitest'

import { compileFailure, errorMessage, extractionFailure, launchFailure, ProtocBuildError } from './failures.js'

describe('failures', () => {
	it('builds messages that name the cause', () => {
		expect(launchFailure(new Error('spawn protoc EACCES')).message).toBe(
			'error occurred while compiling protobuf files: spawn protoc EACCES'
		)
		expect(compileFailure(127).message).toBe('protoc returned exit code: 127')
		expect(extractionFailure('/libs/a.jar', new Error('Invalid filename')).message).toBe(
			'failed to extract protobuf schemas from /libs/a.jar: Invalid filename'
		)
	})

	it('reads messages off non-Error values', () => {
		expect(errorMessage('plain')).toBe('plain')
		expect(errorMessage({ message: 42 })).toBe('42')
	})

	it('carries the failure and its cause on ProtocBuildError', () => {
		const cause = new Error('ENOENT')
		const error = new ProtocBuildError(launchFailure(cause))

		expect(error).toBeInstanceOf(Error)
		expect(error.name).toBe('ProtocBuildError')
		expect(error.failure.kind).toBe('LaunchFailure')
		expect(error.cause).toBe(cause)
		expect(new ProtocBuildError(compileFailure(2)).cause).toBe(undefined)
	})
})
