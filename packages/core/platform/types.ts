export type PlatformPredicate =
	/** A bare cfg flag: `windows`, `unix`, `test`. */
	| { type: "bool"; key: string }
	/** A key/value cfg: `target_os = "linux"`. */
	| { type: "value"; key: string; value: string }
	/** A full target triple given instead of a cfg expression. */
	| { type: "target"; triple: string }
	| { type: "not"; predicate: PlatformPredicate }
	| { type: "all"; predicates: readonly PlatformPredicate[] }
	| { type: "any"; predicates: readonly PlatformPredicate[] }
