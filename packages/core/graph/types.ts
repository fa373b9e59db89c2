import type { Diagnostics } from "@/log"
import type { PackageId, PackageRef, PlatformExpr } from "@/types/branded"
import type { Manifest, NodeDepKind, ResolvedNode, TargetReq } from "@/types/metadata"

/**
 * Side tables keyed by the integer handles handed out while indexing.
 * `packages[ref]` is the manifest for `ref`.
 */
export interface Catalog {
	readonly packages: readonly Manifest[]
	readonly refs: ReadonlyMap<PackageId, PackageRef>
	readonly nodes: ReadonlyMap<PackageRef, ResolvedNode>
}

export interface PublicTarget {
	readonly package: PackageRef
	readonly req: TargetReq
	/** Alias the root package imports this dependency under, if any. */
	readonly rename: string | null
}

export interface Index extends Catalog {
	readonly root: PackageRef
	readonly publicPackages: ReadonlySet<PackageRef>
	/** Keyed by {@link publicTargetKey}; insertion order is significant. */
	readonly publicTargets: ReadonlyMap<string, PublicTarget>
}

export interface IndexOptions {
	/**
	 * Whether the root manifest has real targets of its own. A virtual
	 * umbrella manifest only exposes its first-order dependencies.
	 */
	rootIsReal: boolean
	diagnostics?: Diagnostics
}

export interface ResolveOptions {
	diagnostics?: Diagnostics
}

/** One resolved edge of a package, fanned out per dependency kind. */
export interface ResolvedDepEdge {
	readonly name: string
	readonly depKind: NodeDepKind
	readonly package: PackageRef
}

export interface ResolvedDep {
	readonly package: PackageRef
	readonly manifest: Manifest
	/** Combined guard of every applicable declaration; null when unconditional. */
	readonly platform: PlatformExpr | null
	readonly rename: string
	/** Carries its own `target` platform, which is not merged into `platform`. */
	readonly depKind: NodeDepKind
}

export function publicTargetKey(ref: PackageRef, req: TargetReq): string {
	return `${ref}:${req}`
}
