/**
 * Keep only dependencies that are packaged separately
 *
 * Modules that are neither a discovered framework nor allow-listed live inside
 * some other bundle and are dropped. The framework itself is dropped too: a
 * Swift overlay reports its own Clang module as a dependency.
 */
export function filterDependencies(
  framework: string,
  rawDependencies: Iterable<string>,
  discovered: ReadonlySet<string>,
  allowedLibs: readonly string[]
): string[] {
  const allowed = new Set<string>([...discovered, ...allowedLibs]);
  const deps = new Set<string>();
  for (const dep of rawDependencies) {
    if (dep !== framework && allowed.has(dep)) deps.add(dep);
  }
  return [...deps].sort();
}
