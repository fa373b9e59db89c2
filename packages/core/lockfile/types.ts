import type { Diagnostics } from "@/log"
import type { PackageSource } from "@/types/metadata"

export interface LockfileEntry {
	readonly name: string
	/** Semantic version, build metadata included. */
	readonly version: string
	readonly source: PackageSource | null
	readonly checksum: string | null
}

export interface Lockfile {
	/** Format version as declared in the file, even when unrecognized. */
	readonly version: number
	/** Sorted by (name, version, source). */
	readonly packages: readonly LockfileEntry[]
	readonly path?: string
}

export interface LockfileOptions {
	diagnostics?: Diagnostics
}
