import { DslParseError, type SourcePosition } from "./errors";

export type TokenKind =
	| "LPAREN"
	| "RPAREN"
	| "LBRACKET"
	| "RBRACKET"
	| "LBRACE"
	| "RBRACE"
	| "STRING"
	| "INTEGER"
	| "FLOAT"
	| "KEYWORD"
	| "SYMBOL";

export interface Token {
	kind: TokenKind;
	/** Raw source text; strings keep their quotes and escapes. */
	lexeme: string;
	position: SourcePosition;
}

const DELIMITERS: Record<string, TokenKind> = {
	"(": "LPAREN",
	")": "RPAREN",
	"[": "LBRACKET",
	"]": "RBRACKET",
	"{": "LBRACE",
	"}": "RBRACE",
};

const SYMBOL_CHAR = /[A-Za-z0-9_\-+*/<>=!?.%&']/;
const WHITESPACE = /\s/;
const INTEGER_PATTERN = /^-?\d+$/;
const FLOAT_PATTERN = /^-?\d+\.\d+$/;

class Scanner {
	private offset = 0;
	private line = 1;
	private column = 1;

	constructor(private readonly text: string) {}

	get done(): boolean {
		return this.offset >= this.text.length;
	}

	peek(): string {
		return this.text[this.offset];
	}

	position(): SourcePosition {
		return { offset: this.offset, line: this.line, column: this.column };
	}

	advance(): string {
		const char = this.text[this.offset];
		this.offset += 1;
		if (char === "\n") {
			this.line += 1;
			this.column = 1;
		} else {
			this.column += 1;
		}
		return char;
	}
}

const readString = (scanner: Scanner, start: SourcePosition): string => {
	let lexeme = scanner.advance();
	while (!scanner.done) {
		const char = scanner.advance();
		lexeme += char;
		if (char === "\\") {
			if (scanner.done) {
				break;
			}
			lexeme += scanner.advance();
			continue;
		}
		if (char === '"') {
			return lexeme;
		}
	}
	throw new DslParseError("unterminated string", start);
};

const readRun = (scanner: Scanner): string => {
	let lexeme = "";
	while (!scanner.done && SYMBOL_CHAR.test(scanner.peek())) {
		lexeme += scanner.advance();
	}
	return lexeme;
};

const classifyRun = (lexeme: string): TokenKind => {
	if (INTEGER_PATTERN.test(lexeme)) {
		return "INTEGER";
	}
	if (FLOAT_PATTERN.test(lexeme)) {
		return "FLOAT";
	}
	return "SYMBOL";
};

/**
 * Splits source text into tokens. Whitespace, commas and `;` line comments
 * produce no tokens.
 */
export const tokenize = (text: string): Token[] => {
	const scanner = new Scanner(text);
	const tokens: Token[] = [];

	while (!scanner.done) {
		const char = scanner.peek();

		if (WHITESPACE.test(char) || char === ",") {
			scanner.advance();
			continue;
		}

		if (char === ";") {
			while (!scanner.done && scanner.peek() !== "\n") {
				scanner.advance();
			}
			continue;
		}

		const position = scanner.position();
		const delimiter = DELIMITERS[char];
		if (delimiter) {
			tokens.push({ kind: delimiter, lexeme: scanner.advance(), position });
			continue;
		}

		if (char === '"') {
			tokens.push({
				kind: "STRING",
				lexeme: readString(scanner, position),
				position,
			});
			continue;
		}

		if (char === ":") {
			scanner.advance();
			const name = readRun(scanner);
			if (!name) {
				throw new DslParseError("keyword without a name", position);
			}
			tokens.push({ kind: "KEYWORD", lexeme: `:${name}`, position });
			continue;
		}

		if (SYMBOL_CHAR.test(char)) {
			const lexeme = readRun(scanner);
			tokens.push({ kind: classifyRun(lexeme), lexeme, position });
			continue;
		}

		throw new DslParseError(`unexpected character '${char}'`, position);
	}

	return tokens;
};
