import Decimal from "decimal.js";

/**
 * Decimal constructor used for every weight and comparison in the DSL:
 * 28 significant digits, banker's rounding.
 */
export const DslDecimal = Decimal.clone({
	precision: 28,
	rounding: Decimal.ROUND_HALF_EVEN,
});

export const dec = (value: Decimal.Value): Decimal => new DslDecimal(value);

export const ZERO = dec(0);
export const ONE = dec(1);

export { Decimal };
