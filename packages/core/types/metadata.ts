import type { PackageId } from "@/types/branded"

export type DependencyKind = "normal" | "dev" | "build"

export type TargetKind =
	| "library"
	| "binary"
	| "example"
	| "test"
	| "benchmark"
	| "procedural-macro"
	| "dynamic-library"
	| "custom-build-script"

/** Which target of a dependency a resolved edge asks for. */
export type TargetReq = "library" | "any-binary"

export type GitReference =
	| { type: "rev"; value: string }
	| { type: "branch"; value: string }
	| { type: "tag"; value: string }

export type PackageSource =
	| { type: "registry"; url: string; raw: string }
	| { type: "git"; repo: string; reference?: GitReference; commit?: string; raw: string }
	| { type: "local"; url: string; raw: string }
	| { type: "unrecognized"; raw: string }

export interface DeclaredDependency {
	readonly name: string
	readonly rename: string | null
	readonly kind: DependencyKind
	/** Platform condition as written in the manifest; null is unconditional. */
	readonly target: string | null
	readonly req?: string
	readonly optional: boolean
	readonly features: readonly string[]
	readonly usesDefaultFeatures: boolean
}

export interface BuildTarget {
	readonly name: string
	readonly kinds: readonly TargetKind[]
	readonly srcPath?: string
}

export interface Manifest {
	readonly id: PackageId
	readonly name: string
	readonly version: string
	readonly source: PackageSource | null
	readonly dependencies: readonly DeclaredDependency[]
	readonly targets: readonly BuildTarget[]
	/** Free-form `package.metadata` table. */
	readonly metadata: Readonly<Record<string, unknown>>
}

export interface NodeDepKind {
	readonly kind: DependencyKind
	readonly externName: string | null
	/** The edge's own platform condition, passed through untouched. */
	readonly target: string | null
	readonly targetReq: TargetReq
}

export interface ResolvedEdge {
	readonly pkg: PackageId
	readonly name: string | null
	readonly depKinds: readonly NodeDepKind[]
}

export interface ResolvedNode {
	readonly id: PackageId
	readonly deps: readonly ResolvedEdge[]
	readonly features: readonly string[]
}

export interface Resolve {
	readonly root: PackageId | null
	readonly nodes: readonly ResolvedNode[]
}

export interface Metadata {
	readonly packages: readonly Manifest[]
	readonly resolve: Resolve | null
}
