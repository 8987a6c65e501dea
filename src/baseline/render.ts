/**
 * Nix rendering of the frameworks baseline
 */

export const HEADER = '{ libs, frameworks }: with libs; with frameworks;\n{\n';

export const FOOTER = '}\n';

export interface FrameworkEntry {
  name: string;
  /** Sorted, filtered dependency names */
  dependencies: readonly string[];
}

/**
 * One attribute line, name padded to `width`
 *
 * `  Foo = {};` or `  Foo = { inherit Bar simd; };`
 */
export function renderEntry(entry: FrameworkEntry, width: number): string {
  const name = entry.name.padEnd(width);
  if (entry.dependencies.length === 0) {
    return `  ${name} = {};\n`;
  }
  return `  ${name} = { inherit ${entry.dependencies.join(' ')}; };\n`;
}

export function renderBaseline(entries: readonly FrameworkEntry[], width: number): string {
  return HEADER + entries.map((entry) => renderEntry(entry, width)).join('') + FOOTER;
}
