/**
 * Library entry: the generator's building blocks
 */

export { generateBaseline, collectBaseline, type GeneratorDeps } from './baseline/generator.js';
export { discoverFrameworks, frameworkNamesFromEntries, nameColumnWidth } from './baseline/discovery.js';
export { filterDependencies } from './baseline/filter.js';
export { renderBaseline, renderEntry, HEADER, FOOTER, type FrameworkEntry } from './baseline/render.js';
export { scanFramework, scanArguments } from './baseline/scanner.js';
export { decodeScanResponse, collectDirectDependencies, type ModuleIdentifier } from './baseline/scan-response.js';
export { spawnRunner, type CommandRunner, type RunResult } from './baseline/runner.js';
export { loadBaselineConfig, ALLOWED_LIBS, type BaselineConfig } from './config/baseline-config.js';
export { BaselineError, UsageError, InputError } from './utils/BaselineError.js';
export { runCli } from './main.js';
