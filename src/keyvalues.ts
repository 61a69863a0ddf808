/**
 * Valve KeyValues (text) parser
 *
 * Reads the nested `"key" "value"` / `"key" { ... }` format used by
 * libraryfolders.vdf and appmanifest_*.acf. The first top-level pair is the
 * document root; sibling names may repeat and keep their file order.
 */

import { readFile } from "node:fs/promises"

export interface KeyValueNode {
	name: string
	/** Scalar value; undefined for section nodes */
	value: string | undefined
	children: KeyValueNode[]
}

export class KeyValueParseError extends Error {
	/** Cause without location prefix */
	readonly reason: string
	readonly line: number | undefined
	readonly source: string | undefined

	constructor(
		reason: string,
		details: { line?: number | undefined; source?: string | undefined; cause?: unknown } = {},
	) {
		const where = [
			details.source,
			details.line !== undefined ? `line ${details.line}` : undefined,
		]
			.filter(Boolean)
			.join(", ")
		super(where ? `${where}: ${reason}` : reason, { cause: details.cause })
		this.name = "KeyValueParseError"
		this.reason = reason
		this.line = details.line
		this.source = details.source
	}
}

export type KeyValueParseResult =
	| { ok: true; node: KeyValueNode }
	| { ok: false; error: KeyValueParseError }

// ─────────────────────────────────────────────────────────────────────────────
// Tokenizer
// ─────────────────────────────────────────────────────────────────────────────

type Token =
	| { kind: "string"; text: string; line: number }
	| { kind: "open"; line: number }
	| { kind: "close"; line: number }

const ESCAPES: Record<string, string> = {
	n: "\n",
	t: "\t",
	"\\": "\\",
	'"': '"',
}

function isSpace(ch: string): boolean {
	return ch === " " || ch === "\t" || ch === "\r" || ch === "\n"
}

function tokenize(text: string): Token[] {
	const tokens: Token[] = []
	let line = 1
	let i = 0

	while (i < text.length) {
		const ch = text.charAt(i)

		if (isSpace(ch)) {
			if (ch === "\n") line++
			i++
			continue
		}

		if (ch === "/" && text.charAt(i + 1) === "/") {
			while (i < text.length && text.charAt(i) !== "\n") i++
			continue
		}

		if (ch === "{") {
			tokens.push({ kind: "open", line })
			i++
			continue
		}

		if (ch === "}") {
			tokens.push({ kind: "close", line })
			i++
			continue
		}

		// Platform conditionals such as [$WIN32] are ignored
		if (ch === "[") {
			const end = text.indexOf("]", i)
			if (end === -1) {
				throw new KeyValueParseError("unterminated conditional", { line })
			}
			i = end + 1
			continue
		}

		if (ch === '"') {
			const startLine = line
			let value = ""
			i++
			for (;;) {
				if (i >= text.length) {
					throw new KeyValueParseError("unterminated string", {
						line: startLine,
					})
				}
				const c = text.charAt(i)
				if (c === '"') {
					i++
					break
				}
				if (c === "\\" && i + 1 < text.length) {
					const next = text.charAt(i + 1)
					const escaped = ESCAPES[next]
					value += escaped ?? `\\${next}`
					i += 2
					continue
				}
				if (c === "\n") line++
				value += c
				i++
			}
			tokens.push({ kind: "string", text: value, line: startLine })
			continue
		}

		let word = ""
		while (i < text.length) {
			const c = text.charAt(i)
			if (isSpace(c) || c === "{" || c === "}" || c === '"') break
			word += c
			i++
		}
		tokens.push({ kind: "string", text: word, line })
	}

	return tokens
}

// ─────────────────────────────────────────────────────────────────────────────
// Parser
// ─────────────────────────────────────────────────────────────────────────────

class Parser {
	private pos = 0

	constructor(private readonly tokens: Token[]) {}

	parseDocument(): KeyValueNode {
		const first = this.tokens[0]
		if (!first) {
			throw new KeyValueParseError("document is empty")
		}

		const root = this.parsePair()
		// Later top-level pairs are validated for balance but not kept
		while (this.pos < this.tokens.length) {
			this.parsePair()
		}
		return root
	}

	private parsePair(): KeyValueNode {
		const key = this.tokens[this.pos++]
		if (!key) {
			throw new KeyValueParseError("unexpected end of document")
		}
		if (key.kind !== "string") {
			throw new KeyValueParseError(
				`expected a key, found '${key.kind === "open" ? "{" : "}"}'`,
				{ line: key.line },
			)
		}

		const next = this.tokens[this.pos++]
		if (!next) {
			throw new KeyValueParseError(`key "${key.text}" has no value`, {
				line: key.line,
			})
		}

		if (next.kind === "string") {
			return { name: key.text, value: next.text, children: [] }
		}
		if (next.kind === "close") {
			throw new KeyValueParseError(
				`key "${key.text}" has no value before '}'`,
				{ line: next.line },
			)
		}

		const node: KeyValueNode = { name: key.text, value: undefined, children: [] }
		for (;;) {
			const token = this.tokens[this.pos]
			if (!token) {
				throw new KeyValueParseError(
					`unbalanced braces: section "${key.text}" opened at line ${next.line} is never closed`,
					{ line: next.line },
				)
			}
			if (token.kind === "close") {
				this.pos++
				return node
			}
			node.children.push(this.parsePair())
		}
	}
}

/**
 * Parse KeyValues text into a node tree.
 */
export function parseKeyValues(
	text: string,
	source?: string,
): KeyValueParseResult {
	try {
		const node = new Parser(tokenize(text)).parseDocument()
		return { ok: true, node }
	} catch (err) {
		if (err instanceof KeyValueParseError) {
			return {
				ok: false,
				error:
					source === undefined
						? err
						: new KeyValueParseError(err.reason, { source, line: err.line }),
			}
		}
		throw err
	}
}

/**
 * Read and parse a KeyValues file. Read errors are returned as parse errors.
 */
export async function readKeyValuesFile(
	path: string,
): Promise<KeyValueParseResult> {
	let text: string
	try {
		text = await readFile(path, "utf-8")
	} catch (err) {
		return {
			ok: false,
			error: new KeyValueParseError(
				`cannot read file: ${err instanceof Error ? err.message : String(err)}`,
				{ source: path, cause: err },
			),
		}
	}
	return parseKeyValues(text, path)
}

// ─────────────────────────────────────────────────────────────────────────────
// Lookup
// ─────────────────────────────────────────────────────────────────────────────

/** First child with the given name (case-insensitive) */
export function findChild(
	node: KeyValueNode,
	name: string,
): KeyValueNode | undefined {
	const wanted = name.toLowerCase()
	return node.children.find(child => child.name.toLowerCase() === wanted)
}

export function childValue(
	node: KeyValueNode,
	name: string,
): string | undefined {
	return findChild(node, name)?.value
}

/**
 * Build a node tree from a decoded JS object, e.g. PICS app info as
 * delivered by steam-user.
 */
export function keyValuesFromObject(name: string, value: unknown): KeyValueNode {
	if (value === null || value === undefined) {
		return { name, value: undefined, children: [] }
	}
	if (Array.isArray(value)) {
		return {
			name,
			value: undefined,
			children: value.map((item, index) =>
				keyValuesFromObject(String(index), item),
			),
		}
	}
	if (typeof value === "object" && !Buffer.isBuffer(value)) {
		return {
			name,
			value: undefined,
			children: Object.entries(value).map(([key, child]) =>
				keyValuesFromObject(key, child),
			),
		}
	}
	return { name, value: String(value), children: [] }
}
