export type FingerprintStyle = 'lastModified' | 'contentHash'

/** Called with the argument vector (binary excluded); resolves with protoc's exit code. */
export type ProtocRunner = (args: string[]) => Promise<number> | number

export interface GeneratedTarget {
	/** Output directory, relative to the project root unless absolute. */
	dir: string
	/** Filename glob of the generated files, e.g. `*.java`. */
	pattern: string
	/** protoc output kind (`java` → `--java_out`). Inferred from the pattern's extension when omitted. */
	kind?: string
	/** Generator parameters, emitted as `--<kind>_out=<outOptions>:<dir>`. */
	outOptions?: string
}

export interface ResolvedTarget {
	dir: string
	pattern: string
	kind: string | null
	outOptions?: string
}

export interface ProtocPluginOptions {
	sourceDirs?: string[]
	/** Extra include paths, searched after the source dirs and the external include dir. */
	includePaths?: string[]
	/** Passed to protoc verbatim, after the derived `--<kind>_out` flags. */
	protocOptions?: string[]
	generatedTargets?: GeneratedTarget[]
	/** Archives (zip/jar) whose .proto entries are unpacked; literal paths or fast-glob patterns. */
	dependencies?: string[]
	externalIncludePath?: string
	/** Path or name of the protoc executable. Defaults to $PROTOC, then `protoc`. */
	protoc?: string
	runProtoc?: ProtocRunner
	fingerprint?: FingerprintStyle
	/** Regenerate even when the cache is fresh. */
	force?: boolean
	debug?: boolean
}

export interface ProtocConfig {
	root: string
	sourceDirs: string[]
	includePaths: string[]
	protocOptions: string[]
	generatedTargets: ResolvedTarget[]
	dependencies: string[]
	externalIncludePath: string
	protoc: string
	cacheDir: string
	fingerprint: FingerprintStyle
	force: boolean
	runProtoc?: ProtocRunner
	debug: boolean
}

export interface UnpackedDependencies {
	dir: string
	files: string[]
}

export type Fingerprint = number | string

export type CacheData = {
	version: number
	style: FingerprintStyle
	inputs: Record<string, Fingerprint>
	outputs: string[]
}

export interface CacheOutcome {
	files: string[]
	/** True when the recorded outputs were reused without running protoc. */
	cached: boolean
}

export interface GenerateOutcome extends CacheOutcome {
	unpacked: UnpackedDependencies
}
