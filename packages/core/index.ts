/**
 * @crate-index/core
 *
 * Indexes a resolved `cargo metadata` snapshot for third-party build rule
 * generation, and looks packages up in Cargo.lock.
 */

export { EXTRA_METADATA_KEY, LOCKFILE_FILENAME, LOCKFILE_VERSION } from "@/constants"
export { type Env, readEnv } from "@/env"
export { buildIndex } from "@/graph/build"
export {
	allPackages,
	lookupPackage,
	packageOf,
	resolvedFeatures,
} from "@/graph/catalog"
export {
	applicableKinds,
	depsForTarget,
	isApplicable,
	resolvedDeps,
	resolvedDepsForTarget,
} from "@/graph/resolver"
export type {
	Catalog,
	Index,
	IndexOptions,
	PublicTarget,
	ResolvedDep,
	ResolvedDepEdge,
	ResolveOptions,
} from "@/graph/types"
export {
	isPublicPackage,
	isPublicTarget,
	isRootPackage,
	privateRuleName,
	publicRuleName,
	publicTargets,
} from "@/graph/visibility"
export { compareLockfileKeys, findLockfileEntry } from "@/lockfile/find"
export { loadLockfile, parseLockfile } from "@/lockfile/parse"
export type { Lockfile, LockfileEntry, LockfileOptions } from "@/lockfile/types"
export { consolaDiagnostics, createLogger, type Diagnostics } from "@/log"
export { decodeMetadata, parseMetadata } from "@/metadata/parse"
export { parseSource } from "@/metadata/source"
export {
	type ExtraMetadata,
	type ExtraMetadataError,
	loadExtraMetadata,
	type UnknownPackagesError,
} from "@/ownership/extra-metadata"
export { anyOf, formatPlatformPredicate, toPlatformExpr } from "@/platform/format"
export { parsePlatformPredicate } from "@/platform/parse"
export type { PlatformPredicate } from "@/platform/types"
export type { PackageId, PackageRef, PlatformExpr } from "@/types/branded"
export {
	assertPackageId,
	assertPackageRef,
	coercePackageId,
	coercePackageRef,
	coercePlatformExpr,
} from "@/types/coerce"
export type { BaseError, CoreError, InvariantError, Result } from "@/types/error"
export { IndexInvariantError } from "@/types/error"
export type {
	BuildTarget,
	DeclaredDependency,
	DependencyKind,
	Manifest,
	Metadata,
	NodeDepKind,
	PackageSource,
	ResolvedEdge,
	ResolvedNode,
	TargetKind,
	TargetReq,
} from "@/types/metadata"
