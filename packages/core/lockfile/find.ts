import * as semver from "semver"
import type { Lockfile, LockfileEntry } from "@/lockfile/types"
import { sourceKey } from "@/metadata/source"
import type { Manifest, PackageSource } from "@/types/metadata"

interface LockfileKey {
	readonly name: string
	readonly version: string
	readonly source: PackageSource | null
}

function compareStrings(a: string, b: string): number {
	if (a < b) return -1
	if (a > b) return 1
	return 0
}

/** Orders by name, then semver precedence (build metadata included), then source. */
export function compareLockfileKeys(a: LockfileKey, b: LockfileKey): number {
	const byName = compareStrings(a.name, b.name)
	if (byName !== 0) return byName

	const byVersion = semver.compareBuild(a.version, b.version)
	if (byVersion !== 0) return byVersion

	const sourceA = sourceKey(a.source)
	const sourceB = sourceKey(b.source)
	if (sourceA === sourceB) return 0
	if (sourceA === null) return -1
	if (sourceB === null) return 1
	return compareStrings(sourceA, sourceB)
}

/**
 * Exact (name, version, source) lookup of a manifest in the lockfile.
 */
export function findLockfileEntry(lockfile: Lockfile, manifest: Manifest): LockfileEntry | null {
	if (semver.parse(manifest.version) === null) {
		return null
	}

	const key: LockfileKey = {
		name: manifest.name,
		source: manifest.source,
		version: manifest.version,
	}

	let low = 0
	let high = lockfile.packages.length - 1
	while (low <= high) {
		const middle = (low + high) >>> 1
		const entry = lockfile.packages[middle]
		if (!entry) {
			return null
		}
		const order = compareLockfileKeys(entry, key)
		if (order === 0) return entry
		if (order < 0) {
			low = middle + 1
		} else {
			high = middle - 1
		}
	}

	return null
}
