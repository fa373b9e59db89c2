import type { PlatformPredicate } from "@/platform/types"
import type { ParseError, Result } from "@/types/error"

type Token =
	| { type: "ident"; value: string; offset: number }
	| { type: "string"; value: string; offset: number }
	| { type: "punct"; value: "(" | ")" | "," | "="; offset: number }

const TRIPLE_PATTERN = /^[A-Za-z0-9_.]+(?:-[A-Za-z0-9_.]+)+$/
const IDENT_START = /[A-Za-z_]/
const IDENT_PART = /[A-Za-z0-9_]/

class PredicateSyntaxError extends Error {}

/**
 * Parse a platform condition as written in a `[target.'...'.dependencies]`
 * table: either `cfg(<expr>)` or a bare target triple.
 */
export function parsePlatformPredicate(input: string): Result<PlatformPredicate, ParseError> {
	const trimmed = input.trim()

	if (!trimmed.startsWith("cfg(")) {
		if (TRIPLE_PATTERN.test(trimmed)) {
			return { ok: true, value: { triple: trimmed, type: "target" } }
		}
		return failure(input, "expected cfg(...) or a target triple")
	}

	try {
		const tokens = tokenize(trimmed)
		const parser = new Parser(tokens)
		parser.expectIdent("cfg")
		parser.expectPunct("(")
		const predicate = parser.parseExpr()
		parser.expectPunct(")")
		parser.expectEnd()
		return { ok: true, value: predicate }
	} catch (error) {
		if (error instanceof PredicateSyntaxError) {
			return failure(input, error.message)
		}
		throw error
	}
}

function failure(input: string, reason: string): Result<never, ParseError> {
	return {
		error: {
			message: `Invalid platform predicate ${JSON.stringify(input)}: ${reason}.`,
			source: "platform",
			type: "parse",
		},
		ok: false,
	}
}

function tokenize(input: string): Token[] {
	const tokens: Token[] = []
	let index = 0

	while (index < input.length) {
		const char = input.charAt(index)

		if (/\s/.test(char)) {
			index += 1
			continue
		}

		if (char === "(" || char === ")" || char === "," || char === "=") {
			tokens.push({ offset: index, type: "punct", value: char })
			index += 1
			continue
		}

		if (char === '"') {
			const end = input.indexOf('"', index + 1)
			if (end === -1) {
				throw new PredicateSyntaxError(`unterminated string at offset ${index}`)
			}
			tokens.push({ offset: index, type: "string", value: input.slice(index + 1, end) })
			index = end + 1
			continue
		}

		if (IDENT_START.test(char)) {
			const start = index
			while (index < input.length && IDENT_PART.test(input.charAt(index))) {
				index += 1
			}
			tokens.push({ offset: start, type: "ident", value: input.slice(start, index) })
			continue
		}

		throw new PredicateSyntaxError(`unexpected "${char}" at offset ${index}`)
	}

	return tokens
}

class Parser {
	private position = 0

	constructor(private readonly tokens: readonly Token[]) {}

	parseExpr(): PlatformPredicate {
		const token = this.next()
		if (token.type !== "ident") {
			throw new PredicateSyntaxError(`expected identifier at offset ${token.offset}`)
		}

		const following = this.peek()
		if (following?.type === "punct" && following.value === "(") {
			switch (token.value) {
				case "all":
					return { predicates: this.parseList(), type: "all" }
				case "any":
					return { predicates: this.parseList(), type: "any" }
				case "not": {
					const list = this.parseList()
					const [predicate] = list
					if (list.length !== 1 || !predicate) {
						throw new PredicateSyntaxError("not() takes exactly one predicate")
					}
					return { predicate, type: "not" }
				}
				default:
					throw new PredicateSyntaxError(`unknown operator "${token.value}"`)
			}
		}

		if (following?.type === "punct" && following.value === "=") {
			this.position += 1
			const value = this.next()
			if (value.type !== "string") {
				throw new PredicateSyntaxError(
					`expected string value for "${token.value}" at offset ${value.offset}`,
				)
			}
			return { key: token.value, type: "value", value: value.value }
		}

		return { key: token.value, type: "bool" }
	}

	expectIdent(value: string): void {
		const token = this.next()
		if (token.type !== "ident" || token.value !== value) {
			throw new PredicateSyntaxError(`expected "${value}" at offset ${token.offset}`)
		}
	}

	expectPunct(value: "(" | ")" | "," | "="): void {
		const token = this.next()
		if (token.type !== "punct" || token.value !== value) {
			throw new PredicateSyntaxError(`expected "${value}" at offset ${token.offset}`)
		}
	}

	expectEnd(): void {
		const token = this.peek()
		if (token) {
			throw new PredicateSyntaxError(`unexpected trailing input at offset ${token.offset}`)
		}
	}

	private parseList(): PlatformPredicate[] {
		this.expectPunct("(")
		const predicates: PlatformPredicate[] = []

		for (;;) {
			const token = this.peek()
			if (token?.type === "punct" && token.value === ")") {
				this.position += 1
				return predicates
			}

			predicates.push(this.parseExpr())

			const separator = this.next()
			if (separator.type === "punct" && separator.value === ")") {
				return predicates
			}
			if (separator.type !== "punct" || separator.value !== ",") {
				throw new PredicateSyntaxError(`expected "," or ")" at offset ${separator.offset}`)
			}
		}
	}

	private peek(): Token | undefined {
		return this.tokens[this.position]
	}

	private next(): Token {
		const token = this.tokens[this.position]
		if (!token) {
			throw new PredicateSyntaxError("unexpected end of input")
		}
		this.position += 1
		return token
	}
}
