import type { PlatformPredicate } from "@/platform/types"
import type { PlatformExpr } from "@/types/branded"
import { coercePlatformExpr } from "@/types/coerce"

export function formatPlatformPredicate(predicate: PlatformPredicate): string {
	switch (predicate.type) {
		case "bool":
			return predicate.key
		case "value":
			return `${predicate.key} = ${JSON.stringify(predicate.value)}`
		case "target":
			return `target = ${JSON.stringify(predicate.triple)}`
		case "not":
			return `not(${formatPlatformPredicate(predicate.predicate)})`
		case "all":
			return `all(${predicate.predicates.map(formatPlatformPredicate).join(", ")})`
		case "any":
			return `any(${predicate.predicates.map(formatPlatformPredicate).join(", ")})`
	}
}

/** Logical OR of the given predicates. */
export function anyOf(predicates: readonly PlatformPredicate[]): PlatformPredicate {
	return { predicates: [...predicates], type: "any" }
}

export function toPlatformExpr(predicate: PlatformPredicate): PlatformExpr {
	const rendered = `cfg(${formatPlatformPredicate(predicate)})`
	const expr = coercePlatformExpr(rendered)
	if (!expr) {
		throw new Error(`Rendered platform guard is not a cfg expression: ${rendered}`)
	}
	return expr
}
