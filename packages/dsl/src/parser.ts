import {
	atomNode,
	listNode,
	mapNode,
	symbolNode,
	type AstNode,
	type ListDelimiter,
} from "./ast";
import { dec } from "./decimal";
import { DslParseError } from "./errors";
import { tokenize, type Token, type TokenKind } from "./lexer";

export interface ParseOptions {
	/** Deepest allowed nesting of lists and maps. Defaults to 512. */
	maxDepth?: number;
}

const DEFAULT_MAX_DEPTH = 512;

type OpeningKind = "LPAREN" | "LBRACKET" | "LBRACE";

const CLOSERS: Record<OpeningKind, TokenKind> = {
	LPAREN: "RPAREN",
	LBRACKET: "RBRACKET",
	LBRACE: "RBRACE",
};

const CLOSER_TEXT: Partial<Record<TokenKind, string>> = {
	RPAREN: ")",
	RBRACKET: "]",
	RBRACE: "}",
};

const UNCLOSED: Record<OpeningKind, string> = {
	LPAREN: "unclosed list '('",
	LBRACKET: "unclosed vector '['",
	LBRACE: "unclosed map '{'",
};

const ESCAPES: Record<string, string> = {
	'"': '"',
	"\\": "\\",
	n: "\n",
	t: "\t",
	r: "\r",
};

/** Resolves the escapes of a raw string lexeme, quotes included. */
export const unescapeString = (lexeme: string): string => {
	const body = lexeme.slice(1, -1);
	let result = "";
	for (let i = 0; i < body.length; i += 1) {
		const char = body[i];
		if (char === "\\" && i + 1 < body.length) {
			const next = body[i + 1];
			result += ESCAPES[next] ?? `\\${next}`;
			i += 1;
			continue;
		}
		result += char;
	}
	return result;
};

const isClosing = (kind: TokenKind): boolean => kind in CLOSER_TEXT;

class Parser {
	private index = 0;

	constructor(
		private readonly tokens: Token[],
		private readonly maxDepth: number
	) {}

	parseDocument(): AstNode {
		if (!this.tokens.length) {
			throw new DslParseError("empty input");
		}
		const node = this.parseExpression(0);
		const extra = this.tokens[this.index];
		if (extra) {
			throw new DslParseError(
				"unexpected tokens after expression",
				extra.position
			);
		}
		return node;
	}

	private parseExpression(depth: number): AstNode {
		const token = this.tokens[this.index];
		this.index += 1;

		switch (token.kind) {
			case "LPAREN":
			case "LBRACKET":
			case "LBRACE":
				return this.parseCollection(token, token.kind, depth + 1);
			case "RPAREN":
			case "RBRACKET":
			case "RBRACE":
				throw new DslParseError(
					`unexpected closing '${token.lexeme}'`,
					token.position
				);
			case "STRING":
				return atomNode(unescapeString(token.lexeme));
			case "INTEGER":
			case "FLOAT":
				return atomNode(dec(token.lexeme));
			case "KEYWORD":
			case "SYMBOL":
				return symbolNode(token.lexeme);
		}
	}

	private parseCollection(
		open: Token,
		kind: OpeningKind,
		depth: number
	): AstNode {
		if (depth > this.maxDepth) {
			throw new DslParseError(
				`maximum nesting depth of ${this.maxDepth} exceeded`,
				open.position
			);
		}
		const closer = CLOSERS[kind];
		const children: AstNode[] = [];

		for (;;) {
			const next = this.tokens[this.index];
			if (!next) {
				throw new DslParseError(UNCLOSED[kind], open.position);
			}
			if (next.kind === closer) {
				this.index += 1;
				break;
			}
			if (isClosing(next.kind)) {
				throw new DslParseError(
					`mismatched delimiter: expected '${CLOSER_TEXT[closer]}' but found '${next.lexeme}'`,
					next.position
				);
			}
			children.push(this.parseExpression(depth));

			if (kind === "LBRACE") {
				const value = this.tokens[this.index];
				if (!value) {
					throw new DslParseError(UNCLOSED[kind], open.position);
				}
				if (isClosing(value.kind)) {
					throw new DslParseError("missing value in map", value.position);
				}
				children.push(this.parseExpression(depth));
			}
		}

		if (kind === "LBRACE") {
			return mapNode(children);
		}
		const delimiter: ListDelimiter = kind === "LPAREN" ? "paren" : "bracket";
		return listNode(children, delimiter);
	}
}

/**
 * Parses exactly one top-level expression. `(...)` and `[...]` become list
 * nodes, `{...}` a map node, numbers exact decimals.
 */
export const parse = (text: string, options: ParseOptions = {}): AstNode => {
	const tokens = tokenize(text);
	return new Parser(tokens, options.maxDepth ?? DEFAULT_MAX_DEPTH).parseDocument();
};
