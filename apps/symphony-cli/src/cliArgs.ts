export type ArgValue = string | boolean | string[];

export type CliArgs = Record<string, ArgValue>;

/** Flags that may be given more than once; their values accumulate. */
const REPEATABLE = new Set(["file"]);

const assign = (args: CliArgs, key: string, value: string | boolean): void => {
	if (!REPEATABLE.has(key) || typeof value !== "string") {
		args[key] = value;
		return;
	}
	const current = args[key];
	args[key] = Array.isArray(current) ? [...current, value] : [value];
};

export const parseCliArgs = (argv: string[]): CliArgs => {
	const args: CliArgs = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			assign(args, token.slice(2, eqIdx), token.slice(eqIdx + 1));
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			assign(args, key, next);
			i += 1;
		} else {
			assign(args, key, true);
		}
	}
	for (const positional of positionals) {
		assign(args, "file", positional);
	}
	return args;
};

export const readString = (args: CliArgs, key: string): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new Error(`--${key} expects a value`);
	}
	return value;
};

export const readList = (args: CliArgs, key: string): string[] => {
	const value = args[key];
	if (value === undefined) {
		return [];
	}
	if (typeof value === "boolean") {
		throw new Error(`--${key} expects a value`);
	}
	return Array.isArray(value) ? value : [value];
};

export const readFlag = (args: CliArgs, key: string): boolean => {
	const value = args[key];
	return value === true || value === "true";
};
