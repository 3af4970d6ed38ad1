import type { AstNode } from "./ast";

const escapeString = (value: string): string =>
	value
		.replace(/\\/g, "\\\\")
		.replace(/"/g, '\\"')
		.replace(/\n/g, "\\n")
		.replace(/\t/g, "\\t")
		.replace(/\r/g, "\\r");

/**
 * Writes an AST back to source text. Parsing the output yields a structurally
 * equal tree; numbers are written without exponents.
 */
export const formatNode = (node: AstNode): string => {
	switch (node.type) {
		case "atom":
			return typeof node.value === "string"
				? `"${escapeString(node.value)}"`
				: node.value.toFixed();
		case "symbol":
			return node.name;
		case "list": {
			const inner = node.children.map(formatNode).join(" ");
			return node.delimiter === "bracket" ? `[${inner}]` : `(${inner})`;
		}
		case "map": {
			const pairs: string[] = [];
			for (let i = 0; i < node.children.length; i += 2) {
				pairs.push(
					`${formatNode(node.children[i])} ${formatNode(node.children[i + 1])}`
				);
			}
			return `{${pairs.join(", ")}}`;
		}
	}
};
