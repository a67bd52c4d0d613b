// CHANGE: Architecture rules enforced through ts-morph
// PURITY: SHELL (reads the project's sources)
// INVARIANT: CORE never imports SHELL/APP and never touches console or process

import { Project } from "ts-morph";
import { describe, expect, it } from "vitest";

import {
	checkAppLayerDependencies,
	checkCoreImports,
	checkCorePurity,
	collectViolations,
} from "../../scripts/architecture-rules.js";

const inMemory = (): Project => new Project({ useInMemoryFileSystem: true });

describe("project layering", () => {
	it("has no violations in src/", () => {
		const project = new Project({ skipAddingFilesFromTsConfig: true });
		project.addSourceFilesAtPaths("src/**/*.ts");
		expect(project.getSourceFiles().length).toBeGreaterThan(0);
		expect(collectViolations(project)).toEqual([]);
	});
});

describe("architecture rules", () => {
	it("flags a CORE import of SHELL", () => {
		const file = inMemory().createSourceFile(
			"/src/core/bad.ts",
			'import { readSource } from "../shell/demo/source.js";\nexport const x = readSource;\n',
		);
		expect(checkCoreImports(file)).toEqual([
			{
				file: "/src/core/bad.ts",
				line: 1,
				rule: "core-no-shell-imports",
				message: "CORE file imports SHELL: ../shell/demo/source.js",
				severity: "error",
			},
		]);
	});

	it("flags console and process access in CORE", () => {
		const file = inMemory().createSourceFile(
			"/src/core/noisy.ts",
			'export const f = (): void => {\n\tconsole.log("x");\n\tprocess.exit(1);\n};\n',
		);
		expect(checkCorePurity(file).map((v) => [v.line, v.message])).toEqual([
			[2, "CORE contains side effect: console.log"],
			[3, "CORE contains side effect: process.exit"],
		]);
	});

	it("ignores the same code outside CORE", () => {
		const file = inMemory().createSourceFile(
			"/src/shell/loud.ts",
			'export const f = (): void => {\n\tconsole.log("x");\n};\n',
		);
		expect(checkCorePurity(file)).toEqual([]);
	});

	it("warns when APP imports an unexpected package", () => {
		const file = inMemory().createSourceFile(
			"/src/app/extra.ts",
			'import { Effect } from "effect";\nimport fc from "fast-check";\nexport const a = [Effect, fc];\n',
		);
		expect(
			checkAppLayerDependencies(file).map((v) => [v.line, v.severity, v.message]),
		).toEqual([
			[2, "warning", "APP layer imports unexpected external dependency: fast-check"],
		]);
	});
});
