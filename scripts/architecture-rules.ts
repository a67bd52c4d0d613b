// CHANGE: Layering rules for the functional core, checked with ts-morph
// PURITY: SHELL (walks ts-morph ASTs handed in by the caller)
// FORMAT THEOREM: ∀ file ∈ Core: imports(file) ∩ (Shell ∪ App) = ∅ ∧ ¬usesHostGlobals(file)
// INVARIANT: Returns violations or empty array; never throws on well-formed sources
// COMPLEXITY: O(n) where n = number of nodes in the checked files

import { type Project, type SourceFile, SyntaxKind } from "ts-morph";

export interface ArchitectureViolation {
	readonly file: string;
	readonly line: number;
	readonly rule: string;
	readonly message: string;
	readonly severity: "error" | "warning";
}

const isCore = (sourceFile: SourceFile): boolean =>
	sourceFile.getFilePath().includes("/core/");

const isApp = (sourceFile: SourceFile): boolean =>
	sourceFile.getFilePath().includes("/app/");

/**
 * CORE must not import SHELL or APP.
 *
 * @invariant ∀ f ∈ Core: imports(f) ∩ (Shell ∪ App) = ∅
 * @complexity O(m) where m = number of imports in file
 */
export function checkCoreImports(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!isCore(sourceFile)) return [];
	return sourceFile.getImportDeclarations().flatMap((importDecl) => {
		const specifier = importDecl.getModuleSpecifierValue();
		const layer = specifier.includes("/shell/")
			? "SHELL"
			: specifier.includes("/app/")
				? "APP"
				: undefined;
		return layer === undefined
			? []
			: [
					{
						file: sourceFile.getFilePath(),
						line: importDecl.getStartLineNumber(),
						rule: `core-no-${layer.toLowerCase()}-imports`,
						message: `CORE file imports ${layer}: ${specifier}`,
						severity: "error" as const,
					},
				];
	});
}

const HOST_GLOBALS = ["console", "process"];

/**
 * CORE must not touch the console or the process.
 *
 * @invariant one violation per `console.*` / `process.*` access
 * @complexity O(n) where n = number of property accesses
 */
export function checkCorePurity(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!isCore(sourceFile)) return [];
	return sourceFile
		.getDescendantsOfKind(SyntaxKind.PropertyAccessExpression)
		.filter((access) => HOST_GLOBALS.includes(access.getExpression().getText()))
		.map((access) => ({
			file: sourceFile.getFilePath(),
			line: access.getStartLineNumber(),
			rule: "core-purity",
			message: `CORE contains side effect: ${access.getText()}`,
			severity: "error" as const,
		}));
}

const APP_FRAMEWORKS = ["effect", "ts-pattern"];

/**
 * APP composes CORE and SHELL; its only external imports are the frameworks.
 *
 * @complexity O(m) where m = number of imports
 */
export function checkAppLayerDependencies(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!isApp(sourceFile)) return [];
	return sourceFile
		.getImportDeclarations()
		.filter((importDecl) => {
			const specifier = importDecl.getModuleSpecifierValue();
			return (
				!specifier.startsWith(".") &&
				!APP_FRAMEWORKS.some((framework) => specifier.startsWith(framework))
			);
		})
		.map((importDecl) => ({
			file: sourceFile.getFilePath(),
			line: importDecl.getStartLineNumber(),
			rule: "app-layer-dependencies",
			message: `APP layer imports unexpected external dependency: ${importDecl.getModuleSpecifierValue()}`,
			severity: "warning" as const,
		}));
}

/**
 * Runs every rule over the project's files, skipping node_modules.
 */
export function collectViolations(
	project: Project,
): readonly ArchitectureViolation[] {
	return project
		.getSourceFiles()
		.filter((sourceFile) => !sourceFile.getFilePath().includes("node_modules"))
		.flatMap((sourceFile) => [
			...checkCoreImports(sourceFile),
			...checkCorePurity(sourceFile),
			...checkAppLayerDependencies(sourceFile),
		]);
}
