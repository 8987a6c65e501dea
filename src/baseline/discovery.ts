/**
 * Framework 发现
 */

import * as fs from 'fs';
import { InputError } from '../utils/BaselineError.js';

export const FRAMEWORK_SUFFIX = '.framework';

/**
 * 把目录项名转换为排序、去重后的 framework 名
 *
 * `_` 开头的是私有项，跳过。按 UTF-16 码元排序，`Zeta` 排在 `alpha` 之前。
 */
export function frameworkNamesFromEntries(entries: Iterable<string>): string[] {
  const names = new Set<string>();
  for (const entry of entries) {
    if (entry.startsWith('_')) continue;
    names.add(entry.endsWith(FRAMEWORK_SUFFIX) ? entry.slice(0, -FRAMEWORK_SUFFIX.length) : entry);
  }
  return [...names].sort();
}

/**
 * 列出 SDK frameworks 目录下的 framework 名
 *
 * @throws InputError 目录不可读时
 */
export function discoverFrameworks(frameworksDir: string): string[] {
  let entries: string[];
  try {
    entries = fs.readdirSync(frameworksDir);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputError(`Cannot list frameworks in ${frameworksDir}: ${reason}`, frameworksDir);
  }
  return frameworkNamesFromEntries(entries);
}

/**
 * 对齐输出用的列宽：最长名称的长度，没有名称时为 0
 */
export function nameColumnWidth(names: readonly string[]): number {
  return names.reduce((width, name) => Math.max(width, name.length), 0);
}
