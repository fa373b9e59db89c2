import { nodeOf, packageOf } from "@/graph/catalog"
import type { Catalog, ResolvedDep, ResolvedDepEdge, ResolveOptions } from "@/graph/types"
import { consolaDiagnostics, type Diagnostics } from "@/log"
import { anyOf, formatPlatformPredicate, toPlatformExpr } from "@/platform/format"
import { parsePlatformPredicate } from "@/platform/parse"
import type { PlatformPredicate } from "@/platform/types"
import type { PackageId, PackageRef, PlatformExpr } from "@/types/branded"
import { IndexInvariantError } from "@/types/error"
import type { BuildTarget, DeclaredDependency, DependencyKind, TargetKind } from "@/types/metadata"

const APPLICABLE_KINDS: Record<DependencyKind, ReadonlySet<TargetKind>> = {
	build: new Set<TargetKind>(["custom-build-script"]),
	dev: new Set<TargetKind>(["benchmark", "test", "example"]),
	normal: new Set<TargetKind>(["library", "procedural-macro", "binary", "dynamic-library"]),
}

/** Target kinds a dependency of the given kind can supply. */
export function applicableKinds(kind: DependencyKind): ReadonlySet<TargetKind> {
	return APPLICABLE_KINDS[kind]
}

export function isApplicable(kind: DependencyKind, target: BuildTarget): boolean {
	const kinds = applicableKinds(kind)
	return target.kinds.some((targetKind) => kinds.has(targetKind))
}

/**
 * Resolved dependencies of a package, one entry per dependency kind of each
 * edge. Not filtered by target.
 */
export function resolvedDeps(catalog: Catalog, ref: PackageRef): ResolvedDepEdge[] {
	return nodeOf(catalog, ref).deps.flatMap((edge) =>
		edge.depKinds.map((depKind) => {
			const name = edge.name ?? depKind.externName
			const dependency = catalog.refs.get(edge.pkg)
			if (name === null || dependency === undefined) {
				throw new IndexInvariantError(
					`Unresolvable dependency ${edge.pkg} of ${packageOf(catalog, ref).id}.`,
				)
			}
			return { depKind, name, package: dependency }
		}),
	)
}

/**
 * Declared (unresolved) dependencies of a package that apply to one of its
 * targets.
 */
export function depsForTarget(
	catalog: Catalog,
	ref: PackageRef,
	target: BuildTarget,
): DeclaredDependency[] {
	const manifest = packageOf(catalog, ref)
	if (!manifest.targets.some((candidate) => sameTarget(candidate, target))) {
		throw new IndexInvariantError(
			`Target ${target.name} does not belong to package ${manifest.id}.`,
		)
	}

	return manifest.dependencies.filter((dep) => isApplicable(dep.kind, target))
}

/**
 * Resolved dependencies of one target, each with a single platform guard
 * combining every declaration of that dependency that applies to the target.
 */
export function resolvedDepsForTarget(
	catalog: Catalog,
	ref: PackageRef,
	target: BuildTarget,
	options: ResolveOptions = {},
): ResolvedDep[] {
	const diagnostics = options.diagnostics ?? consolaDiagnostics()
	const manifest = packageOf(catalog, ref)

	// A dependency may be declared several times under different platforms.
	const groups = new Map<string, DeclaredDependency[]>()
	for (const dep of depsForTarget(catalog, ref, target)) {
		const group = groups.get(dep.name)
		if (group) {
			group.push(dep)
		} else {
			groups.set(dep.name, [dep])
		}
	}

	for (const [dependency, group] of groups) {
		const kinds = [...new Set(group.map((dep) => dep.kind))]
		if (kinds.length > 1) {
			diagnostics.onMixedKindGroup({ dependency, kinds, package: manifest.id })
		}
	}

	const guards = new Map<string, PlatformExpr | null>()
	const results: ResolvedDep[] = []

	for (const edge of resolvedDeps(catalog, ref)) {
		const dependency = packageOf(catalog, edge.package)
		const group = groups.get(dependency.name)
		if (!group || group.length === 0) {
			continue
		}

		let platform = guards.get(dependency.name)
		if (platform === undefined) {
			platform = combinedPlatform(group, manifest.id, diagnostics)
			guards.set(dependency.name, platform)
		}

		results.push({
			depKind: edge.depKind,
			manifest: dependency,
			package: edge.package,
			platform,
			rename: edge.name,
		})
	}

	return results
}

function combinedPlatform(
	group: readonly DeclaredDependency[],
	packageId: PackageId,
	diagnostics: Diagnostics,
): PlatformExpr | null {
	if (group.some((dep) => dep.target === null)) {
		return null
	}

	const predicates: PlatformPredicate[] = []
	const seen = new Set<string>()
	for (const dep of group) {
		if (dep.target === null) {
			continue
		}
		const parsed = parsePlatformPredicate(dep.target)
		if (!parsed.ok) {
			diagnostics.onPlatformParseError({
				dependency: dep.name,
				error: parsed.error,
				package: packageId,
				platform: dep.target,
			})
			continue
		}
		const rendered = formatPlatformPredicate(parsed.value)
		if (!seen.has(rendered)) {
			seen.add(rendered)
			predicates.push(parsed.value)
		}
	}

	const [first] = predicates
	if (!first) {
		return null
	}
	if (predicates.length === 1) {
		return toPlatformExpr(first)
	}
	return toPlatformExpr(anyOf(predicates))
}

function sameTarget(a: BuildTarget, b: BuildTarget): boolean {
	return (
		a === b ||
		(a.name === b.name &&
			a.kinds.length === b.kinds.length &&
			a.kinds.every((kind, index) => b.kinds[index] === kind))
	)
}
