import { z } from "zod"
import { parseSource } from "@/metadata/source"
import type { PackageId } from "@/types/branded"
import { coercePackageId } from "@/types/coerce"
import { formatZodError, type Result } from "@/types/error"
import type { DependencyKind, Metadata, TargetKind, TargetReq } from "@/types/metadata"

const PackageIdSchema = z.string().transform((value, ctx): PackageId => {
	const id = coercePackageId(value)
	if (!id) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Package id must not be empty." })
		return z.NEVER
	}
	return id
})

const NonEmptyStringSchema = z.string().trim().min(1)

const DependencyKindSchema = z
	.enum(["dev", "build", "normal"])
	.nullable()
	.optional()
	.transform((value): DependencyKind => value ?? "normal")

const CARGO_TARGET_KINDS: ReadonlyMap<string, TargetKind> = new Map<string, TargetKind>([
	["bench", "benchmark"],
	["bin", "binary"],
	["cdylib", "dynamic-library"],
	["custom-build", "custom-build-script"],
	["dylib", "library"],
	["example", "example"],
	["lib", "library"],
	["proc-macro", "procedural-macro"],
	["rlib", "library"],
	["staticlib", "library"],
	["test", "test"],
])

const TargetKindSchema = z.string().transform((value, ctx): TargetKind => {
	const kind = CARGO_TARGET_KINDS.get(value)
	if (!kind) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: `Unknown target kind "${value}".`,
		})
		return z.NEVER
	}
	return kind
})

const DeclaredDependencySchema = z.object({
	features: z.array(z.string()).optional().default([]),
	kind: DependencyKindSchema,
	name: NonEmptyStringSchema,
	optional: z.boolean().optional().default(false),
	rename: NonEmptyStringSchema.nullable().optional(),
	req: z.string().optional(),
	target: z.string().nullable().optional(),
	uses_default_features: z.boolean().optional().default(true),
})

const BuildTargetSchema = z.object({
	kind: z.array(TargetKindSchema).min(1),
	name: NonEmptyStringSchema,
	src_path: z.string().optional(),
})

const PackageSchema = z.object({
	dependencies: z.array(DeclaredDependencySchema).optional().default([]),
	id: PackageIdSchema,
	metadata: z.record(z.unknown()).nullable().optional(),
	name: NonEmptyStringSchema,
	source: z.string().nullable().optional(),
	targets: z.array(BuildTargetSchema).optional().default([]),
	version: NonEmptyStringSchema,
})

const NodeDepKindSchema = z.object({
	artifact: z.string().nullable().optional(),
	extern_name: NonEmptyStringSchema.nullable().optional(),
	kind: DependencyKindSchema,
	target: z.string().nullable().optional(),
})

const NodeDepSchema = z.object({
	dep_kinds: z.array(NodeDepKindSchema).optional().default([]),
	name: z.string().nullable().optional(),
	pkg: PackageIdSchema,
})

const NodeSchema = z.object({
	deps: z.array(NodeDepSchema).optional().default([]),
	features: z.array(z.string()).optional().default([]),
	id: PackageIdSchema,
})

const MetadataSchema = z.object({
	packages: z.array(PackageSchema),
	resolve: z
		.object({
			nodes: z.array(NodeSchema),
			root: PackageIdSchema.nullable().optional(),
		})
		.nullable()
		.optional(),
})

type RawMetadata = z.infer<typeof MetadataSchema>

/**
 * Parse the JSON printed by `cargo metadata --format-version=1`.
 */
export function parseMetadata(contents: string): Result<Metadata> {
	let parsed: unknown
	try {
		parsed = JSON.parse(contents)
	} catch (error) {
		return {
			error: {
				message: "Invalid JSON in cargo metadata.",
				rawError: error instanceof Error ? error : undefined,
				source: "cargo metadata",
				type: "parse",
			},
			ok: false,
		}
	}

	return decodeMetadata(parsed)
}

export function decodeMetadata(value: unknown): Result<Metadata> {
	const result = MetadataSchema.safeParse(value)
	if (!result.success) {
		return {
			error: {
				field: "metadata",
				message: `Invalid cargo metadata: ${formatZodError(result.error, "metadata")}`,
				source: "zod",
				type: "validation",
				zodError: result.error,
			},
			ok: false,
		}
	}

	return { ok: true, value: toMetadata(result.data) }
}

function toMetadata(raw: RawMetadata): Metadata {
	return {
		packages: raw.packages.map((pkg) => ({
			dependencies: pkg.dependencies.map((dep) => ({
				features: dep.features,
				kind: dep.kind,
				name: dep.name,
				optional: dep.optional,
				rename: dep.rename ?? null,
				req: dep.req,
				target: dep.target ?? null,
				usesDefaultFeatures: dep.uses_default_features,
			})),
			id: pkg.id,
			metadata: pkg.metadata ?? {},
			name: pkg.name,
			source: pkg.source ? parseSource(pkg.source) : null,
			targets: pkg.targets.map((target) => ({
				kinds: target.kind,
				name: target.name,
				srcPath: target.src_path,
			})),
			version: pkg.version,
		})),
		resolve: raw.resolve
			? {
					nodes: raw.resolve.nodes.map((node) => ({
						deps: node.deps.map((dep) => ({
							depKinds: dep.dep_kinds.map((depKind) => ({
								externName: depKind.extern_name ?? null,
								kind: depKind.kind,
								target: depKind.target ?? null,
								targetReq: targetReqForArtifact(depKind.artifact),
							})),
							name: dep.name ? dep.name : null,
							pkg: dep.pkg,
						})),
						features: node.features,
						id: node.id,
					})),
					root: raw.resolve.root ?? null,
				}
			: null,
	}
}

function targetReqForArtifact(artifact: string | null | undefined): TargetReq {
	return artifact === "bin" ? "any-binary" : "library"
}
