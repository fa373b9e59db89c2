import type { Catalog } from "@/graph/types"
import type { Diagnostics } from "@/log"
import type { PackageId, PackageRef } from "@/types/branded"
import { assertPackageRef } from "@/types/coerce"
import { IndexInvariantError, type InvariantError, type Result } from "@/types/error"
import type { Manifest, Metadata, ResolvedNode } from "@/types/metadata"

/**
 * Index the flat package and node lists of a snapshot by id.
 *
 * Every node, and every edge target, must name a package in the snapshot, and
 * every edge must resolve to a name through either the edge or its kind record.
 */
export function buildCatalog(
	metadata: Metadata,
	diagnostics: Diagnostics,
): Result<Catalog, InvariantError> {
	const packages: Manifest[] = []
	const refs = new Map<PackageId, PackageRef>()

	for (const pkg of metadata.packages) {
		const existing = refs.get(pkg.id)
		if (existing !== undefined) {
			diagnostics.onDuplicatePackage({ package: pkg.id })
			packages[existing] = pkg
			continue
		}
		refs.set(pkg.id, assertPackageRef(packages.length))
		packages.push(pkg)
	}

	const nodes = new Map<PackageRef, ResolvedNode>()
	for (const node of metadata.resolve?.nodes ?? []) {
		const ref = refs.get(node.id)
		if (ref === undefined) {
			return invariant(node.id, `Resolved node ${node.id} has no package in the metadata.`)
		}

		for (const edge of node.deps) {
			if (!refs.has(edge.pkg)) {
				return invariant(
					edge.pkg,
					`Dependency ${edge.pkg} of ${node.id} has no package in the metadata.`,
				)
			}
			for (const depKind of edge.depKinds) {
				if (edge.name === null && depKind.externName === null) {
					return invariant(
						edge.pkg,
						`Dependency ${edge.pkg} of ${node.id} has neither a name nor an extern name.`,
					)
				}
			}
		}

		nodes.set(ref, node)
	}

	return { ok: true, value: { nodes, packages, refs } }
}

export function packageOf(catalog: Catalog, ref: PackageRef): Manifest {
	const manifest = catalog.packages[ref]
	if (!manifest) {
		throw new IndexInvariantError(`Unknown package ref ${ref}.`)
	}
	return manifest
}

export function nodeOf(catalog: Catalog, ref: PackageRef): ResolvedNode {
	const node = catalog.nodes.get(ref)
	if (!node) {
		throw new IndexInvariantError(`No resolved node for ${packageOf(catalog, ref).id}.`)
	}
	return node
}

export function lookupPackage(catalog: Catalog, id: PackageId): PackageRef | null {
	return catalog.refs.get(id) ?? null
}

export function allPackages(catalog: Catalog): PackageRef[] {
	return catalog.packages.map((_, index) => assertPackageRef(index))
}

/** The feature set cargo resolved for the package. */
export function resolvedFeatures(catalog: Catalog, ref: PackageRef): readonly string[] {
	return nodeOf(catalog, ref).features
}

export function invariant(subject: string, message: string): Result<never, InvariantError> {
	return {
		error: {
			message,
			subject,
			type: "invariant",
		},
		ok: false,
	}
}
