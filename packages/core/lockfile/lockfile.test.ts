import { writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { findLockfileEntry } from "@/lockfile/find"
import { loadLockfile, parseLockfile } from "@/lockfile/parse"
import type { Lockfile } from "@/lockfile/types"
import { decodeMetadata } from "@/metadata/parse"
import {
	buildRawMetadata,
	buildRawPackage,
	REGISTRY,
	recordingDiagnostics,
	withTempDir,
} from "@/tests/helpers"
import type { Manifest } from "@/types/metadata"

const GIT_SOURCE = "git+https://example.com/owner/repo?branch=main#0123abcd"

const LOCKFILE = `# This file is automatically @generated by Cargo.
version = 3

[[package]]
name = "serde"
version = "1.0.195"
source = "${REGISTRY}"
checksum = "aaaa"

[[package]]
name = "app"
version = "0.1.0"
dependencies = ["log 0.4.20", "serde"]

[[package]]
name = "log"
version = "0.4.20"
source = "${REGISTRY}"
checksum = "bbbb"

[[package]]
name = "log"
version = "0.4.20"
source = "${GIT_SOURCE}"

[[package]]
name = "log"
version = "0.4.9"
source = "${REGISTRY}"
checksum = "cccc"
`

function mustLockfile(contents: string): Lockfile {
	const result = parseLockfile(contents, "Cargo.lock", { diagnostics: recordingDiagnostics() })
	if (!result.ok) {
		throw new Error(result.error.message)
	}
	return result.value
}

function manifest(name: string, version: string, source: string | null): Manifest {
	const result = decodeMetadata(
		buildRawMetadata([buildRawPackage(name, version, { source })], [], null),
	)
	if (!result.ok || !result.value.packages[0]) {
		throw new Error("Invalid manifest fixture")
	}
	return result.value.packages[0]
}

describe("parseLockfile", () => {
	it("sorts entries by name, version and source", () => {
		const lockfile = mustLockfile(LOCKFILE)

		expect(
			lockfile.packages.map((entry) => [entry.name, entry.version, entry.source?.raw ?? null]),
		).toEqual([
			["app", "0.1.0", null],
			["log", "0.4.9", REGISTRY],
			["log", "0.4.20", GIT_SOURCE],
			["log", "0.4.20", REGISTRY],
			["serde", "1.0.195", REGISTRY],
		])
		expect(lockfile.version).toBe(3)
	})

	it("finds every entry it loaded", () => {
		const lockfile = mustLockfile(LOCKFILE)

		for (const entry of lockfile.packages) {
			const found = findLockfileEntry(
				lockfile,
				manifest(entry.name, entry.version, entry.source?.raw ?? null),
			)
			expect(found).toBe(entry)
		}
	})

	it("warns about other format versions but still loads", () => {
		const diagnostics = recordingDiagnostics()

		const result = parseLockfile(
			'version = 4\n\n[[package]]\nname = "app"\nversion = "0.1.0"\n',
			"Cargo.lock",
			{ diagnostics },
		)

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.version).toBe(4)
			expect(result.value.packages).toHaveLength(1)
		}
		expect(diagnostics.onLockfileVersion).toHaveBeenCalledWith({ path: "Cargo.lock", version: 4 })
	})

	it("does not warn for version 3", () => {
		const diagnostics = recordingDiagnostics()

		parseLockfile(LOCKFILE, undefined, { diagnostics })

		expect(diagnostics.onLockfileVersion).not.toHaveBeenCalled()
	})

	it("rejects invalid TOML", () => {
		const result = parseLockfile("version = ", "Cargo.lock")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("parse")
			if (result.error.type === "parse") {
				expect(result.error.source).toBe("Cargo.lock")
			}
		}
	})

	it("rejects versions that are not semantic versions", () => {
		const result = parseLockfile('version = 3\n\n[[package]]\nname = "app"\nversion = "1.0"\n')

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("validation")
		}
	})
})

describe("findLockfileEntry", () => {
	it("returns the exact match", () => {
		const lockfile = mustLockfile(LOCKFILE)

		expect(findLockfileEntry(lockfile, manifest("log", "0.4.20", REGISTRY))?.checksum).toBe(
			"bbbb",
		)
		expect(findLockfileEntry(lockfile, manifest("app", "0.1.0", null))?.checksum).toBeNull()
	})

	it("does not match on a different source", () => {
		const lockfile = mustLockfile(LOCKFILE)

		expect(findLockfileEntry(lockfile, manifest("serde", "1.0.195", null))).toBeNull()
		expect(findLockfileEntry(lockfile, manifest("app", "0.1.0", REGISTRY))).toBeNull()
	})

	it("does not match on a nearby version", () => {
		const lockfile = mustLockfile(LOCKFILE)

		expect(findLockfileEntry(lockfile, manifest("log", "0.4.21", REGISTRY))).toBeNull()
		expect(findLockfileEntry(lockfile, manifest("log", "0.4.20+extra", REGISTRY))).toBeNull()
	})
})

describe("loadLockfile", () => {
	it("reads and parses the file", async () => {
		await withTempDir(async (dir) => {
			const path = join(dir, "Cargo.lock")
			await writeFile(path, LOCKFILE)

			const result = await loadLockfile(path, { diagnostics: recordingDiagnostics() })

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.path).toBe(path)
				expect(result.value.packages).toHaveLength(5)
			}
		})
	})

	it("reports a missing file as an io error", async () => {
		await withTempDir(async (dir) => {
			const result = await loadLockfile(join(dir, "Cargo.lock"))

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.type).toBe("io")
			}
		})
	})
})
