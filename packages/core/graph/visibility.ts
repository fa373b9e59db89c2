import { packageOf } from "@/graph/catalog"
import { resolvedDeps } from "@/graph/resolver"
import { type Catalog, type Index, type PublicTarget, publicTargetKey } from "@/graph/types"
import type { PackageRef } from "@/types/branded"
import type { TargetReq } from "@/types/metadata"

export interface Visibility {
	readonly publicPackages: ReadonlySet<PackageRef>
	readonly publicTargets: ReadonlyMap<string, PublicTarget>
}

/**
 * Public targets are the first-order dependencies of the root, plus the
 * root's own library and binaries when the root is a real package.
 * Later entries for the same key replace earlier ones.
 */
export function computeVisibility(
	catalog: Catalog,
	root: PackageRef,
	rootIsReal: boolean,
): Visibility {
	const topLevels: PackageRef[] = rootIsReal ? [root] : []

	// Cargo hands out renames with `-` replaced by `_`; map back to the original.
	const renames = new Map<string, string>()
	for (const dep of packageOf(catalog, root).dependencies) {
		if (dep.rename !== null) {
			renames.set(dep.rename.replaceAll("-", "_"), dep.rename)
		}
	}

	const publicTargets = new Map<string, PublicTarget>()
	const record = (target: PublicTarget) => {
		publicTargets.set(publicTargetKey(target.package, target.req), target)
	}

	for (const edge of resolvedDeps(catalog, root)) {
		record({
			package: edge.package,
			rename: renames.get(edge.name) ?? null,
			req: edge.depKind.targetReq,
		})
	}

	for (const ref of topLevels) {
		record({ package: ref, rename: null, req: "library" })
		record({ package: ref, rename: null, req: "any-binary" })
	}

	const publicPackages = new Set<PackageRef>()
	for (const target of publicTargets.values()) {
		publicPackages.add(target.package)
	}

	return { publicPackages, publicTargets }
}

export function isPublicPackage(index: Index, ref: PackageRef): boolean {
	return index.publicPackages.has(ref)
}

export function isPublicTarget(index: Index, ref: PackageRef, req: TargetReq): boolean {
	return index.publicTargets.has(publicTargetKey(ref, req))
}

export function isRootPackage(index: Index, ref: PackageRef): boolean {
	return index.root === ref
}

export function publicTargets(index: Index): PublicTarget[] {
	return [...index.publicTargets.values()]
}

function libraryRename(index: Index, ref: PackageRef): string | null {
	return index.publicTargets.get(publicTargetKey(ref, "library"))?.rename ?? null
}

/** Rule name a public package is exported under: its alias, else its name. */
export function publicRuleName(index: Index, ref: PackageRef): string {
	return libraryRename(index, ref) ?? packageOf(index, ref).name
}

/**
 * Fully versioned rule name. Suffixed with the alias when the root imports
 * the package under one, so two versions of a crate imported under different
 * aliases do not collide.
 */
export function privateRuleName(index: Index, ref: PackageRef): string {
	const manifest = packageOf(index, ref)
	const full = `${manifest.name}-${manifest.version}`
	const rename = libraryRename(index, ref)
	return rename === null ? full : `${full}-${rename}`
}
