import { describe, expect, it } from "vitest"
import { decodeMetadata, parseMetadata } from "@/metadata/parse"
import { parseSource } from "@/metadata/source"
import {
	buildRawMetadata,
	buildRawNode,
	buildRawPackage,
	REGISTRY,
	registryId,
} from "@/tests/helpers"

describe("parseMetadata", () => {
	it("maps cargo's wire format onto the model", () => {
		const root = buildRawPackage("app", "0.1.0", {
			dependencies: [
				{ name: "log", rename: "logging" },
				{ kind: "dev", name: "tempfile", target: "cfg(unix)" },
				{ kind: "build", name: "cc" },
			],
			metadata: { "third-party": {} },
			source: null,
			targets: [
				{ kind: ["lib", "cdylib"], name: "app" },
				{ kind: ["custom-build"], name: "build-script-build" },
			],
		})
		const raw = buildRawMetadata(
			[root],
			[
				buildRawNode(
					root.id,
					[
						{
							dep_kinds: [{ artifact: "bin", extern_name: "tool", kind: null }],
							pkg: root.id,
						},
					],
					["default"],
				),
			],
			root.id,
		)

		const result = parseMetadata(JSON.stringify(raw))

		expect(result.ok).toBe(true)
		if (result.ok) {
			const [pkg] = result.value.packages
			expect(pkg?.source).toBeNull()
			expect(pkg?.metadata).toEqual({ "third-party": {} })
			expect(pkg?.dependencies.map((dep) => [dep.name, dep.rename, dep.kind, dep.target])).toEqual(
				[
					["log", "logging", "normal", null],
					["tempfile", null, "dev", "cfg(unix)"],
					["cc", null, "build", null],
				],
			)
			expect(pkg?.targets.map((target) => target.kinds)).toEqual([
				["library", "dynamic-library"],
				["custom-build-script"],
			])
			expect(result.value.resolve?.root).toBe(root.id)
			expect(result.value.resolve?.nodes[0]?.features).toEqual(["default"])
			expect(result.value.resolve?.nodes[0]?.deps[0]).toEqual({
				depKinds: [{ externName: "tool", kind: "normal", target: null, targetReq: "any-binary" }],
				name: null,
				pkg: root.id,
			})
		}
	})

	it("fills defaults for optional dependency fields", () => {
		const raw = buildRawMetadata([buildRawPackage("log", "0.4.20")], [], null)
		const result = decodeMetadata(raw)

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.packages[0]?.id).toBe(registryId("log", "0.4.20"))
			expect(result.value.packages[0]?.source).toEqual({
				raw: REGISTRY,
				type: "registry",
				url: "https://github.com/rust-lang/crates.io-index",
			})
			expect(result.value.resolve?.root).toBeNull()
		}
	})

	it("rejects invalid JSON", () => {
		const result = parseMetadata("{ not json")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("parse")
		}
	})

	it("rejects unknown target kinds", () => {
		const pkg = buildRawPackage("odd", "1.0.0", {
			targets: [{ kind: ["mystery"], name: "odd" }],
		})
		const result = decodeMetadata(buildRawMetadata([pkg], [], null))

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("validation")
			expect(result.error.message).toContain('Unknown target kind "mystery".')
		}
	})

	it("rejects target kinds named like object properties", () => {
		const pkg = buildRawPackage("odd", "1.0.0", {
			targets: [{ kind: ["toString"], name: "odd" }],
		})
		const result = decodeMetadata(buildRawMetadata([pkg], [], null))

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.message).toContain('Unknown target kind "toString".')
		}
	})
})

describe("parseSource", () => {
	it("splits git references and commits", () => {
		expect(parseSource("git+https://example.com/owner/repo?branch=main#0123abcd")).toEqual({
			commit: "0123abcd",
			raw: "git+https://example.com/owner/repo?branch=main#0123abcd",
			reference: { type: "branch", value: "main" },
			repo: "https://example.com/owner/repo",
			type: "git",
		})
	})

	it("recognizes local paths", () => {
		expect(parseSource("path+file:///workspace/app")).toEqual({
			raw: "path+file:///workspace/app",
			type: "local",
			url: "file:///workspace/app",
		})
	})

	it("keeps unknown schemes as unrecognized", () => {
		expect(parseSource("vendored")).toEqual({ raw: "vendored", type: "unrecognized" })
	})
})
