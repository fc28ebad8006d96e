export type LaunchFailure = {
	kind: 'LaunchFailure'
	message: string
	cause: unknown
}

export type CompileFailure = {
	kind: 'CompileFailure'
	message: string
	exitCode: number
}

export type ExtractionFailure = {
	kind: 'ExtractionFailure'
	message: string
	archive: string
	cause: unknown
}

export type ProtocFailure = LaunchFailure | CompileFailure | ExtractionFailure

export type Result<T, E = ProtocFailure> = { ok: true; value: T } | { ok: false; error: E }

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value })

export const fail = <E>(error: E): { ok: false; error: E } => ({ ok: false, error })

export function errorMessage(error: unknown): string {
	return typeof error === 'object' && error && 'message' in error ? String(error.message) : String(error)
}

export function launchFailure(cause: unknown): LaunchFailure {
	return {
		kind: 'LaunchFailure',
		message: `error occurred while compiling protobuf files: ${errorMessage(cause)}`,
		cause,
	}
}

export function compileFailure(exitCode: number): CompileFailure {
	return {
		kind: 'CompileFailure',
		message: `protoc returned exit code: ${exitCode}`,
		exitCode,
	}
}

export function extractionFailure(archive: string, cause: unknown): ExtractionFailure {
	return {
		kind: 'ExtractionFailure',
		message: `failed to extract protobuf schemas from ${archive}: ${errorMessage(cause)}`,
		archive,
		cause,
	}
}

/** Thrown at host boundaries (runner, CLI) where a failed step must abort. */
export class ProtocBuildError extends Error {
	readonly failure: ProtocFailure

	constructor(failure: ProtocFailure) {
		super(failure.message, { cause: 'cause' in failure ? failure.cause : undefined })
		this.name = 'ProtocBuildError'
		this.failure = failure
	}
}
