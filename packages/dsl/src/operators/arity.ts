import type { AstNode } from "../ast";
import { DslEvaluationError } from "../errors";

export const expectArgs = (
	operator: string,
	args: readonly AstNode[],
	min: number,
	max = min
): void => {
	if (args.length >= min && args.length <= max) {
		return;
	}
	const expected =
		min === max
			? `exactly ${min}`
			: max === Number.POSITIVE_INFINITY
				? `at least ${min}`
				: `${min} to ${max}`;
	throw new DslEvaluationError(
		`expects ${expected} argument${min === 1 && max === 1 ? "" : "s"}, got ${args.length}`,
		operator
	);
};
