import { config as dotenvConfig } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";

const loaded = new Set<string>();

/**
 * Loads `SYMPHONY_ENV_FILE`, `.env` and `.env.local` from the project root,
 * later files overriding earlier ones. Each file is read at most once.
 */
export function loadEnvFiles(projectRoot: string): string[] {
	const candidates = filterUnique(
		[process.env.SYMPHONY_ENV_FILE, ".env", ".env.local"].filter(
			(value): value is string => typeof value === "string" && value.length > 0
		)
	);

	const applied: string[] = [];
	candidates.forEach((candidate) => {
		const fullPath = path.isAbsolute(candidate) ? candidate : path.join(projectRoot, candidate);
		if (!existsSync(fullPath) || loaded.has(fullPath)) {
			return;
		}
		dotenvConfig({ path: fullPath, override: true });
		loaded.add(fullPath);
		applied.push(fullPath);
	});
	return applied;
}

function filterUnique(values: string[]): string[] {
	return values.filter((value, index) => values.indexOf(value) === index);
}
