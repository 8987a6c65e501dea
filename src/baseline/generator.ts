/**
 * Baseline generation: discover, scan each framework in order, filter, render
 */

import type { BaselineConfig } from '../config/baseline-config.js';
import type { Logger } from '../utils/logger.js';
import { discoverFrameworks, nameColumnWidth } from './discovery.js';
import { filterDependencies } from './filter.js';
import { type FrameworkEntry, renderBaseline } from './render.js';
import type { CommandRunner } from './runner.js';
import { scanFramework } from './scanner.js';

export interface GeneratorDeps {
  run: CommandRunner;
  logger: Logger;
  /** Defaults to reading `config.frameworksDir` */
  discover?: (frameworksDir: string) => string[];
}

/**
 * Scan every framework sequentially and collect its filtered dependencies
 */
export function collectBaseline(config: BaselineConfig, deps: GeneratorDeps): FrameworkEntry[] {
  const discover = deps.discover ?? discoverFrameworks;
  const frameworks = discover(config.frameworksDir);
  const discovered = new Set(frameworks);

  return frameworks.map((name) => {
    const raw = scanFramework(name, config, deps.run, deps.logger);
    return {
      name,
      dependencies: filterDependencies(name, raw, discovered, config.allowedLibs),
    };
  });
}

/**
 * Produce the complete frameworks baseline document
 *
 * @throws InputError when the frameworks directory cannot be listed
 */
export function generateBaseline(config: BaselineConfig, deps: GeneratorDeps): string {
  const entries = collectBaseline(config, deps);
  const width = nameColumnWidth(entries.map((entry) => entry.name));
  return renderBaseline(entries, width);
}
