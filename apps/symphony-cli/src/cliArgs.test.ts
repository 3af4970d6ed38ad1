import { describe, it, expect } from "vitest";
import { parseCliArgs, readFlag, readList, readString } from "./cliArgs";

describe("symphony CLI arg parsing", () => {
	it("captures flags with space and equals syntax", () => {
		const args = parseCliArgs(["--profile", "live", "--asOf=2024-06-30"]);
		expect(readString(args, "profile")).toBe("live");
		expect(readString(args, "asOf")).toBe("2024-06-30");
	});

	it("collects repeated --file flags and positionals", () => {
		const args = parseCliArgs(["--file", "a.clj", "--file=b.clj", "c.clj"]);
		expect(readList(args, "file")).toEqual(["a.clj", "b.clj", "c.clj"]);
	});

	it("treats a flag without a value as boolean", () => {
		const args = parseCliArgs(["--json", "--profile", "default"]);
		expect(readFlag(args, "json")).toBe(true);
		expect(readFlag(args, "help")).toBe(false);
		expect(() => readString(args, "json")).toThrow("--json expects a value");
	});
});
