import { readFile } from "node:fs/promises"
import * as semver from "semver"
import { parse, TomlError } from "smol-toml"
import { z } from "zod"
import { LOCKFILE_FILENAME, LOCKFILE_VERSION } from "@/constants"
import { compareLockfileKeys } from "@/lockfile/find"
import type { Lockfile, LockfileEntry, LockfileOptions } from "@/lockfile/types"
import { consolaDiagnostics } from "@/log"
import { parseSource } from "@/metadata/source"
import { formatZodError, type Result } from "@/types/error"

const LockfilePackageSchema = z.object({
	checksum: z.string().optional(),
	name: z.string().trim().min(1),
	source: z.string().optional(),
	version: z
		.string()
		.trim()
		.refine((value) => semver.parse(value) !== null, {
			message: "must be a semantic version",
		}),
})

const LockfileSchema = z.object({
	package: z.array(LockfilePackageSchema).optional().default([]),
	version: z.number().int().nonnegative(),
})

/**
 * Parse Cargo.lock contents. Entries come back sorted by
 * (name, version, source) so they can be binary searched.
 */
export function parseLockfile(
	contents: string,
	path?: string,
	options: LockfileOptions = {},
): Result<Lockfile> {
	let data: unknown
	try {
		data = parse(contents)
	} catch (error) {
		const message =
			error instanceof TomlError ? `Invalid TOML: ${error.message}` : "Invalid TOML."
		return {
			error: {
				message,
				path,
				rawError: error instanceof Error ? error : undefined,
				source: LOCKFILE_FILENAME,
				type: "parse",
			},
			ok: false,
		}
	}

	const parsed = LockfileSchema.safeParse(data)
	if (!parsed.success) {
		return {
			error: {
				field: "lockfile",
				message: `Invalid lockfile: ${formatZodError(parsed.error, "lockfile")}`,
				path,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	if (parsed.data.version !== LOCKFILE_VERSION) {
		const diagnostics = options.diagnostics ?? consolaDiagnostics()
		diagnostics.onLockfileVersion({ path, version: parsed.data.version })
	}

	const packages: LockfileEntry[] = parsed.data.package.map((pkg) => ({
		checksum: pkg.checksum ?? null,
		name: pkg.name,
		source: pkg.source ? parseSource(pkg.source) : null,
		version: pkg.version,
	}))
	packages.sort(compareLockfileKeys)

	return { ok: true, value: { packages, path, version: parsed.data.version } }
}

export async function loadLockfile(
	path: string,
	options: LockfileOptions = {},
): Promise<Result<Lockfile>> {
	let contents: string
	try {
		contents = await readFile(path, "utf8")
	} catch (error) {
		return {
			error: {
				message: `Failed to load ${path}`,
				operation: "read",
				path,
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}

	return parseLockfile(contents, path, options)
}
