import type { Decimal } from "./decimal";

export interface AtomNode {
	readonly type: "atom";
	readonly value: Decimal | string;
}

/** Identifiers, operator glyphs and keywords (keywords keep their `:`). */
export interface SymbolNode {
	readonly type: "symbol";
	readonly name: string;
}

export type ListDelimiter = "paren" | "bracket";

export interface ListNode {
	readonly type: "list";
	readonly delimiter: ListDelimiter;
	readonly children: readonly AstNode[];
}

/** `{}` literal; children alternate key, value. */
export interface MapNode {
	readonly type: "map";
	readonly children: readonly AstNode[];
}

export type AstNode = AtomNode | SymbolNode | ListNode | MapNode;

export const atomNode = (value: Decimal | string): AtomNode => {
	const node: AtomNode = { type: "atom", value };
	return Object.freeze(node);
};

export const symbolNode = (name: string): SymbolNode => {
	const node: SymbolNode = { type: "symbol", name };
	return Object.freeze(node);
};

export const listNode = (
	children: readonly AstNode[],
	delimiter: ListDelimiter = "paren"
): ListNode => {
	const node: ListNode = {
		type: "list",
		delimiter,
		children: Object.freeze([...children]),
	};
	return Object.freeze(node);
};

export const mapNode = (children: readonly AstNode[]): MapNode => {
	if (children.length % 2 !== 0) {
		throw new Error("Map node requires an even number of children");
	}
	const node: MapNode = { type: "map", children: Object.freeze([...children]) };
	return Object.freeze(node);
};

/** Name of the head symbol when `node` is a non-empty list headed by one. */
export const headSymbol = (node: AstNode): string | null => {
	if (node.type !== "list" || node.children.length === 0) {
		return null;
	}
	const head = node.children[0];
	return head.type === "symbol" ? head.name : null;
};

export const isStringAtom = (
	node: AstNode
): node is AtomNode & { readonly value: string } =>
	node.type === "atom" && typeof node.value === "string";
