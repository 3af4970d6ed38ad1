const canonicalizePrimitive = (value: unknown): unknown => {
	if (value === null) {
		return null;
	}
	if (typeof value === "number") {
		if (!Number.isFinite(value)) {
			return String(value);
		}
		return Object.is(value, -0) ? 0 : value;
	}
	if (typeof value === "string") {
		return value.normalize();
	}
	if (typeof value === "boolean") {
		return value;
	}
	if (typeof value === "bigint") {
		return value.toString();
	}
	return undefined;
};

/**
 * Converts a value into plain JSON data with sorted object keys, so that two
 * structurally equal values serialize identically.
 */
export const canonicalize = (value: unknown): unknown => {
	const primitive = canonicalizePrimitive(value);
	if (primitive !== undefined || value === undefined) {
		return primitive;
	}
	if (Array.isArray(value)) {
		return value.map(canonicalize).filter((entry) => entry !== undefined);
	}
	if (value && typeof value === "object") {
		const next: Record<string, unknown> = {};
		for (const [key, entry] of Object.entries(value).sort(([a], [b]) =>
			a < b ? -1 : a > b ? 1 : 0
		)) {
			const canonicalEntry = canonicalize(entry);
			if (canonicalEntry !== undefined) {
				next[key] = canonicalEntry;
			}
		}
		return next;
	}
	return String(value);
};

const stableStringifyInternal = (value: unknown): string => {
	if (value === null || typeof value !== "object") {
		return JSON.stringify(value) ?? "null";
	}
	if (Array.isArray(value)) {
		return `[${value.map(stableStringifyInternal).join(",")}]`;
	}
	const entries = Object.entries(value).map(
		([key, val]) => `${JSON.stringify(key)}:${stableStringifyInternal(val)}`
	);
	return `{${entries.join(",")}}`;
};

export const stableStringify = (value: unknown): string =>
	stableStringifyInternal(canonicalize(value));
