/**
 * Per-framework dependency scan through the Swift compiler
 *
 * Swift is used rather than Clang because importing a framework from Swift
 * pulls in both its Clang module and its Swift overlay.
 *
 * Known limitations:
 * - It is unverified whether a Swift module can completely shadow the Clang
 *   module of the same name; both are unioned here.
 * - "module 'X' is incompatible with feature 'swift'" is not handled; such a
 *   framework scans as failed and gets no dependencies.
 */

import * as path from 'path';
import type { BaselineConfig } from '../config/baseline-config.js';
import type { Logger } from '../utils/logger.js';
import type { CommandRunner, RunResult } from './runner.js';
import { collectDirectDependencies, decodeScanResponse, describeIdentifier } from './scan-response.js';

/**
 * Compiler arguments for scanning one framework
 *
 * `-I` and `-resource-dir` are explicit: a toolchain patch stops the compiler
 * adding `<sdk>/usr/lib/swift` itself, and the compiler's own shims would
 * otherwise clash with the SDK's copy.
 */
export function scanArguments(sdkPath: string): string[] {
  const swiftLibDir = path.join(sdkPath, 'usr', 'lib', 'swift');
  return ['-scan-dependencies', '-', '-sdk', sdkPath, '-I', swiftLibDir, '-resource-dir', swiftLibDir];
}

export function importSnippet(framework: string): string {
  return `import ${framework}`;
}

function describeFailure(result: RunResult): string {
  if (result.error) return result.error.message;
  if (result.status !== null) return `exit code ${result.status}`;
  return `killed by ${result.signal ?? 'unknown signal'}`;
}

/**
 * Scan one framework and return its raw (unfiltered) direct dependencies
 *
 * Never throws for a bad scan: failures are logged and yield `[]`.
 */
export function scanFramework(
  framework: string,
  config: BaselineConfig,
  run: CommandRunner,
  logger: Logger
): string[] {
  logger.progress(`# scanning ${framework}`);

  const result = run(config.compiler, scanArguments(config.sdkPath), importSnippet(framework));
  if (result.error || result.status !== 0) {
    logger.warn(`# Scanning ${framework} failed (${describeFailure(result)})`);
    return [];
  }

  if (result.stdout.length === 0) {
    return [];
  }

  const decoded = decodeScanResponse(result.stdout);
  if (!decoded.ok) {
    logger.warn(`# Scanning ${framework} produced unreadable output: ${decoded.reason}`);
    return [];
  }

  const collected = collectDirectDependencies(decoded.modules, framework, (id, meta) => {
    const deps = meta.directDependencies.map(describeIdentifier).join(', ');
    logger.detail(`${describeIdentifier(id)} -> [${deps}]`);
  });
  if (!collected.ok) {
    logger.warn(`# Scanning ${framework} produced unreadable output: ${collected.reason}`);
    return [];
  }
  return collected.dependencies;
}
