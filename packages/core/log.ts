import { type ConsolaInstance, consola } from "consola"
import { consolaLevel, readEnv } from "@/env"
import type { PackageId } from "@/types/branded"
import type { ParseError } from "@/types/error"
import type { DependencyKind } from "@/types/metadata"

const LOG_TAG = "crate-index"

let defaultLogger: ConsolaInstance | undefined

export function createLogger(level: number = consolaLevel(readEnv())): ConsolaInstance {
	const logger = consola.withTag(LOG_TAG)
	logger.level = level
	return logger
}

function getDefaultLogger(): ConsolaInstance {
	if (!defaultLogger) {
		defaultLogger = createLogger()
	}
	return defaultLogger
}

/**
 * Sink for non-fatal problems found while building or querying the index.
 * Pass one in the options to observe them; otherwise they go to consola.
 */
export interface Diagnostics {
	/** A declared platform condition could not be parsed and was dropped. */
	onPlatformParseError(event: {
		package: PackageId
		dependency: string
		platform: string
		error: ParseError
	}): void
	/** Declarations of different kinds were merged under one dependency name. */
	onMixedKindGroup(event: {
		package: PackageId
		dependency: string
		kinds: readonly DependencyKind[]
	}): void
	/** The same package id appeared twice in the snapshot. */
	onDuplicatePackage(event: { package: PackageId }): void
	/** The lockfile declares a format version other than the one we read. */
	onLockfileVersion(event: { version: number; path?: string }): void
}

export function consolaDiagnostics(logger: ConsolaInstance = getDefaultLogger()): Diagnostics {
	return {
		onDuplicatePackage({ package: id }) {
			logger.warn(`Duplicate package id ${id} in metadata; keeping the last one.`)
		},
		onLockfileVersion({ path, version }) {
			logger.warn(
				`Unrecognized Cargo.lock format version: ${version}${path ? ` (${path})` : ""}`,
			)
		},
		onMixedKindGroup({ dependency, kinds, package: id }) {
			logger.warn(
				`${id}: declarations of ${dependency} with kinds ${kinds.join(", ")} merged by name`,
			)
		},
		onPlatformParseError({ dependency, error, package: id }) {
			logger.error(`Failed to parse predicate for ${dependency} in ${id}: ${error.message}`)
		},
	}
}
