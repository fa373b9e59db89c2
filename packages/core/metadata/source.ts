import type { GitReference, PackageSource } from "@/types/metadata"

const GIT_REFERENCE_KEYS = ["rev", "branch", "tag"] as const

/**
 * Classify a cargo source string such as
 * `registry+https://github.com/rust-lang/crates.io-index` or
 * `git+https://github.com/owner/repo?branch=main#0123abcd`.
 */
export function parseSource(raw: string): PackageSource {
	if (raw.startsWith("registry+")) {
		return { raw, type: "registry", url: raw.slice("registry+".length) }
	}

	if (raw.startsWith("sparse+")) {
		return { raw, type: "registry", url: raw.slice("sparse+".length) }
	}

	if (raw.startsWith("path+")) {
		return { raw, type: "local", url: raw.slice("path+".length) }
	}

	if (raw.startsWith("git+")) {
		return parseGitSource(raw)
	}

	return { raw, type: "unrecognized" }
}

function parseGitSource(raw: string): PackageSource {
	const body = raw.slice("git+".length)
	const hashIndex = body.indexOf("#")
	const withoutCommit = hashIndex === -1 ? body : body.slice(0, hashIndex)
	const commit = hashIndex === -1 ? undefined : body.slice(hashIndex + 1) || undefined

	const queryIndex = withoutCommit.indexOf("?")
	const repo = queryIndex === -1 ? withoutCommit : withoutCommit.slice(0, queryIndex)
	const query = queryIndex === -1 ? "" : withoutCommit.slice(queryIndex + 1)

	let reference: GitReference | undefined
	const params = new URLSearchParams(query)
	for (const key of GIT_REFERENCE_KEYS) {
		const value = params.get(key)
		if (value) {
			reference = { type: key, value }
			break
		}
	}

	return { commit, raw, reference, repo, type: "git" }
}

/** The raw source string, used as the comparison key. */
export function sourceKey(source: PackageSource | null | undefined): string | null {
	return source ? source.raw : null
}
