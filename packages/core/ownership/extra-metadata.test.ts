import { describe, expect, it } from "vitest"
import { loadExtraMetadata } from "@/ownership/extra-metadata"
import { buildRawMetadata, buildRawNode, buildRawPackage, mustIndex } from "@/tests/helpers"

function indexWithMetadata(metadata: Record<string, unknown> | null) {
	const log = buildRawPackage("log", "0.4.20")
	const serde = buildRawPackage("serde", "1.0.195")
	const root = buildRawPackage("third-party", "0.0.0", {
		dependencies: [{ name: "log" }, { name: "serde", rename: "serde1" }],
		metadata,
		source: null,
	})
	return mustIndex(
		buildRawMetadata(
			[root, log, serde],
			[buildRawNode(root.id), buildRawNode(log.id), buildRawNode(serde.id)],
			root.id,
		),
		false,
	)
}

describe("loadExtraMetadata", () => {
	it("returns an empty map when the table is absent", () => {
		const result = loadExtraMetadata(indexWithMetadata({ other: true }))

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.size).toBe(0)
		}
	})

	it("keys records by the root's dependency names", () => {
		const result = loadExtraMetadata(
			indexWithMetadata({
				"third-party": {
					log: { oncall: "logging_team" },
					serde: { oncall: "serde_team", notes: "ignored" },
				},
			}),
		)

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect([...result.value.entries()]).toEqual([
				["log", { oncall: "logging_team" }],
				["serde", { oncall: "serde_team" }],
			])
		}
	})

	it("keeps oncall values as written", () => {
		const result = loadExtraMetadata(
			indexWithMetadata({
				"third-party": {
					log: { oncall: "" },
					serde: { oncall: " serde_team " },
				},
			}),
		)

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.get("log")).toEqual({ oncall: "" })
			expect(result.value.get("serde")).toEqual({ oncall: " serde_team " })
		}
	})

	it("reports an unknown package as one aggregate error", () => {
		const result = loadExtraMetadata(
			indexWithMetadata({
				"third-party": {
					ghost: { oncall: "nobody" },
					log: { oncall: "logging_team" },
				},
			}),
		)

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("unknown_packages")
			expect(result.error.message).toBe("Extra metadata for package(s): ghost")
			if (result.error.type === "unknown_packages") {
				expect(result.error.names).toEqual(["ghost"])
			}
		}
	})

	it("collects every unknown package before failing", () => {
		const result = loadExtraMetadata(
			indexWithMetadata({
				"third-party": {
					zeta: { oncall: "a" },
					alpha: { oncall: "b" },
					serde1: { oncall: "c" },
				},
			}),
		)

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("unknown_packages")
			if (result.error.type === "unknown_packages") {
				expect(result.error.names).toEqual(["alpha", "serde1", "zeta"])
			}
		}
	})

	it("rejects malformed records without throwing", () => {
		const result = loadExtraMetadata(
			indexWithMetadata({ "third-party": { log: { oncall: 42 } } }),
		)

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("validation")
			expect(result.error.message).toContain("third-party")
		}
	})
})
