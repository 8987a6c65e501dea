/**
 * Generator configuration
 *
 * Built once per run from the SDK path argument and the environment, then
 * passed explicitly to every step. Nothing reads process state after this.
 */

import * as path from 'path';
import { z } from 'zod';
import { type Env, SWIFTC_ENV, isVerbose } from '../utils/env-check.js';

/**
 * Libraries that are not framework bundles but may still appear as
 * dependencies, because they are packaged separately.
 */
export const ALLOWED_LIBS: readonly string[] = Object.freeze(['simd']);

export const DEFAULT_COMPILER = 'swiftc';

/**
 * Where framework bundles live inside an SDK
 */
export const FRAMEWORKS_SUBDIR = path.join('System', 'Library', 'Frameworks');

export interface BaselineConfig {
  /** SDK root as given on the command line */
  readonly sdkPath: string;
  /** `<sdkPath>/System/Library/Frameworks` */
  readonly frameworksDir: string;
  /** Compiler binary run in dependency-scan mode */
  readonly compiler: string;
  /** Extra dependency names accepted besides discovered frameworks */
  readonly allowedLibs: readonly string[];
  /** Print unfiltered dependency listings (on unless FRAMEWORKS_BASELINE_QUIET is set) */
  readonly verbose: boolean;
}

const EnvSchema = z.object({
  [SWIFTC_ENV]: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : DEFAULT_COMPILER)),
});

export function loadBaselineConfig(sdkPath: string, env: Env = {}): BaselineConfig {
  const parsed = EnvSchema.parse(env);

  return Object.freeze({
    sdkPath,
    frameworksDir: path.join(sdkPath, FRAMEWORKS_SUBDIR),
    compiler: parsed[SWIFTC_ENV],
    allowedLibs: ALLOWED_LIBS,
    verbose: isVerbose(env),
  });
}
