import { buildCatalog, invariant } from "@/graph/catalog"
import type { Index, IndexOptions } from "@/graph/types"
import { computeVisibility } from "@/graph/visibility"
import { consolaDiagnostics } from "@/log"
import type { InvariantError, Result } from "@/types/error"
import type { Metadata } from "@/types/metadata"

/**
 * Build the index for a snapshot describing one top-level package and all of
 * its transitive dependencies. Fails without a partial index when the
 * snapshot breaks an invariant.
 */
export function buildIndex(
	metadata: Metadata,
	options: IndexOptions,
): Result<Index, InvariantError> {
	const diagnostics = options.diagnostics ?? consolaDiagnostics()

	const rootId = metadata.resolve?.root ?? null
	if (rootId === null) {
		return invariant("resolve.root", "Missing root package in metadata resolve.")
	}

	const catalog = buildCatalog(metadata, diagnostics)
	if (!catalog.ok) {
		return catalog
	}

	const root = catalog.value.refs.get(rootId)
	if (root === undefined) {
		return invariant(rootId, "Couldn't identify unambiguous top-level package.")
	}

	if (!catalog.value.nodes.has(root)) {
		return invariant(rootId, `No resolved node for root package ${rootId}.`)
	}

	const visibility = computeVisibility(catalog.value, root, options.rootIsReal)

	return {
		ok: true,
		value: {
			...catalog.value,
			publicPackages: visibility.publicPackages,
			publicTargets: visibility.publicTargets,
			root,
		},
	}
}
