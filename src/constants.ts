export const PLUGIN_NAME = 'vite-plugin-protoc'
export const LOG_PREFIX = '[protoc]'

export const SCHEMA_EXT = '.proto'
export const SCHEMA_GLOB = '**/*.proto'

export const DEFAULT_SOURCE_DIR = 'src/protobuf'
export const DEFAULT_TARGET_DIR = 'src/generated/protobuf'
export const DEFAULT_CACHE_DIR = 'node_modules/.vite'
export const EXTERNAL_INCLUDE_DIR_NAME = 'protobuf_external'
export const CACHE_SUBDIR = 'protobuf'
export const CACHE_NAME = 'protoc-cache.json'
export const CACHE_VERSION = 1

export const ENV_PROTOC = 'PROTOC'
export const ENV_DEBUG = 'VITE_PROTOC_DEBUG'

/** protoc output kind by generated file extension. */
export const KIND_BY_EXTENSION: Record<string, string> = {
	'.java': 'java',
	'.kt': 'kotlin',
	'.js': 'js',
	'.py': 'python',
	'.pyi': 'pyi',
	'.cc': 'cpp',
	'.h': 'cpp',
	'.cs': 'csharp',
	'.rb': 'ruby',
	'.php': 'php',
	'.m': 'objc',
}
