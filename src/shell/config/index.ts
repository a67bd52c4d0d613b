// CHANGE: Resolve the effective harness configuration from file and CLI layers
// PURITY: SHELL (delegates to filesystem loader)
// INVARIANT: Precedence is defaults < config file < CLI flags
// COMPLEXITY: O(n) where n = config file size

import { pipe } from "effect";

import {
	type HarnessConfigInput,
	mergeConfigInputs,
	validateHarnessConfig,
} from "../../core/config.js";
import type { InvalidConfig } from "../../core/errors.js";
import type { HarnessConfig } from "../../core/models.js";
import * as Result from "../../core/result.js";
import { loadConfigFile } from "./loader.js";

export { type CLICommand, parseCLIArgs } from "./cli.js";
export { CONFIG_FILE_NAME, loadConfigFile, toConfigInput } from "./loader.js";

/**
 * Loads the config file (if any), overlays CLI overrides and validates.
 *
 * @pure false - reads filesystem
 */
export const resolveHarnessConfig = (
	configPath: string | undefined,
	overrides: HarnessConfigInput,
): Result.Result<HarnessConfig, InvalidConfig> =>
	pipe(
		loadConfigFile(configPath),
		Result.map((fromFile) => mergeConfigInputs(fromFile, overrides)),
		Result.flatMap(validateHarnessConfig),
	);
