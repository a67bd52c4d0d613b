// CHANGE: Specs for loading and layering lawful-sums.config.json
// PURITY: SHELL (temporary directories on the local filesystem)
// INVARIANT: defaults < config file < CLI overrides

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { InvalidConfig } from "../../../src/core/errors.js";
import * as Result from "../../../src/core/result.js";
import {
	CONFIG_FILE_NAME,
	loadConfigFile,
	resolveHarnessConfig,
	toConfigInput,
} from "../../../src/shell/config/index.js";

let dir = "";

beforeEach(() => {
	dir = fs.mkdtempSync(path.join(os.tmpdir(), "lawful-sums-config-"));
});

afterEach(() => {
	fs.rmSync(dir, { recursive: true, force: true });
});

const writeConfig = (contents: string, name = CONFIG_FILE_NAME): string => {
	const file = path.join(dir, name);
	fs.writeFileSync(file, contents, "utf8");
	return file;
};

const expectInvalid = <A>(
	result: Result.Result<A, InvalidConfig>,
	field: string,
	detail: string,
): void => {
	expect(Result.isFailure(result)).toBe(true);
	if (Result.isFailure(result)) {
		expect(result.error.field).toBe(field);
		expect(result.error.detail).toBe(detail);
	}
};

describe("toConfigInput", () => {
	it("keeps known keys and ignores unknown ones", () => {
		expect(
			toConfigInput({
				trials: 10,
				subjects: ["optional"],
				shrink: true,
				comment: "ignored",
			}),
		).toEqual(Result.success({ trials: 10, subjects: ["optional"], shrink: true }));
	});

	it("rejects a non-object document", () => {
		expectInvalid(toConfigInput([1]), "lawful-sums.config.json:$", "expected a JSON object");
	});

	it("rejects a numeric key of the wrong type", () => {
		expectInvalid(
			toConfigInput({ trials: "ten" }),
			"lawful-sums.config.json:trials",
			"expected a number",
		);
	});

	it("rejects a name list with non-strings", () => {
		expectInvalid(
			toConfigInput({ laws: [1] }),
			"lawful-sums.config.json:laws",
			"expected an array of strings",
		);
	});

	it("rejects a non-boolean shrink", () => {
		expectInvalid(
			toConfigInput({ shrink: "yes" }),
			"lawful-sums.config.json:shrink",
			"expected a boolean",
		);
	});
});

describe("loadConfigFile", () => {
	it("returns no overrides when the default file is missing", () => {
		vi.spyOn(process, "cwd").mockReturnValue(dir);
		expect(loadConfigFile()).toEqual(Result.success({}));
	});

	it("reads the default file from the working directory", () => {
		writeConfig('{ "seed": 3 }');
		vi.spyOn(process, "cwd").mockReturnValue(dir);
		expect(loadConfigFile()).toEqual(Result.success({ seed: 3 }));
	});

	it("fails when an explicit file is missing", () => {
		const missing = path.join(dir, "missing.json");
		const result = loadConfigFile(missing);
		expect(Result.isFailure(result)).toBe(true);
		if (Result.isFailure(result)) {
			expect(result.error.field).toBe(missing);
			expect(result.error.detail).toContain("ENOENT");
		}
	});

	it("fails on malformed JSON", () => {
		const file = writeConfig("{ trials: ", "broken.json");
		const result = loadConfigFile(file);
		expect(Result.isFailure(result)).toBe(true);
		if (Result.isFailure(result)) {
			expect(result.error.field).toBe(file);
		}
	});
});

describe("resolveHarnessConfig", () => {
	it("layers CLI overrides over the config file", () => {
		const file = writeConfig('{ "trials": 10, "seed": 5 }', "custom.json");
		const resolved = resolveHarnessConfig(file, { trials: 20 });
		expect(Result.map(resolved, (config) => [config.trials, config.seed])).toEqual(
			Result.success([20, 5]),
		);
	});

	it("validates the merged result", () => {
		const file = writeConfig('{ "minInt": 3 }', "custom.json");
		const resolved = resolveHarnessConfig(file, { maxInt: 2 });
		expectInvalid(resolved, "integerRange", "min 3 exceeds max 2");
	});
});
