import { z } from "zod"
import { EXTRA_METADATA_KEY } from "@/constants"
import { packageOf } from "@/graph/catalog"
import type { Index } from "@/graph/types"
import { type BaseError, formatZodError, type Result, type ValidationError } from "@/types/error"
import type { DeclaredDependency } from "@/types/metadata"

/** Ownership record kept in sync with the root's dependency list. */
export interface ExtraMetadata {
	/** Maintainer shortname. */
	readonly oncall: string
}

export type UnknownPackagesError = BaseError & {
	type: "unknown_packages"
	/** Sorted, without duplicates. */
	names: string[]
}

export type ExtraMetadataError = ValidationError | UnknownPackagesError

const ExtraMetadataSchema = z.object({
	oncall: z.string(),
})

const ExtraMetadataTableSchema = z.record(ExtraMetadataSchema)

/**
 * Read the `third-party` table from the root manifest's `package.metadata`.
 * Every key must name a direct dependency of the root; the ones that do not
 * are reported together once the whole table has been read.
 */
export function loadExtraMetadata(
	index: Index,
): Result<ReadonlyMap<string, ExtraMetadata>, ExtraMetadataError> {
	const root = packageOf(index, index.root)
	const raw = root.metadata[EXTRA_METADATA_KEY]
	if (raw === undefined || raw === null) {
		return { ok: true, value: new Map() }
	}

	const parsed = ExtraMetadataTableSchema.safeParse(raw)
	if (!parsed.success) {
		return {
			error: {
				field: EXTRA_METADATA_KEY,
				message: `Invalid ${EXTRA_METADATA_KEY} metadata: ${formatZodError(
					parsed.error,
					EXTRA_METADATA_KEY,
				)}`,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	const dependencies = new Map<string, DeclaredDependency>()
	for (const dep of root.dependencies) {
		dependencies.set(dep.name, dep)
	}

	const entries = new Map<string, ExtraMetadata>()
	const unknown = new Set<string>()
	for (const [name, value] of Object.entries(parsed.data)) {
		const dep = dependencies.get(name)
		if (!dep) {
			unknown.add(name)
			continue
		}
		entries.set(dep.name, { oncall: value.oncall })
	}

	if (unknown.size > 0) {
		const names = [...unknown].sort()
		return {
			error: {
				message: `Extra metadata for package(s): ${names.join(" ")}`,
				names,
				type: "unknown_packages",
			},
			ok: false,
		}
	}

	return { ok: true, value: entries }
}
