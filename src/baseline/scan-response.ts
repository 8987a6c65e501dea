/**
 * 编译器 `-scan-dependencies` JSON 解码
 *
 * 文档结构为 `{ "modules": [ident, meta, ident, meta, ...] }`。标识符用 Swift 名
 * (`{ "swift": "Foo" }`) 或 Clang 名 (`{ "clang": "Foo" }`) 指明模块；编译器还会
 * 报告其他类型（prebuilt、placeholder），解码为 `other`，永远不会匹配。
 *
 * 只有标识符与当前 framework 匹配的条目才会校验其元数据，
 * 其他模块的元数据原样保留为 unknown。
 */

import { z } from 'zod';

export type ModuleIdentifier =
  | { kind: 'swift'; name: string }
  | { kind: 'clang'; name: string }
  | { kind: 'other'; raw: Record<string, unknown> };

// swift 在前：同时带两个键时以 Swift 名为准
const ModuleIdentifierSchema = z.union([
  z.object({ swift: z.string() }).transform((v): ModuleIdentifier => ({ kind: 'swift', name: v.swift })),
  z.object({ clang: z.string() }).transform((v): ModuleIdentifier => ({ kind: 'clang', name: v.clang })),
  z.record(z.unknown()).transform((raw): ModuleIdentifier => ({ kind: 'other', raw })),
]);

const ModuleMetadataSchema = z.object({
  directDependencies: z.array(ModuleIdentifierSchema).default([]),
});

export type ModuleMetadata = z.infer<typeof ModuleMetadataSchema>;

/**
 * 一对 (标识符, 元数据)；元数据尚未校验
 */
export interface ScannedModule {
  id: ModuleIdentifier;
  meta: unknown;
}

const ScanResponseSchema = z
  .object({
    modules: z.array(z.unknown()),
  })
  .superRefine((data, ctx) => {
    if (data.modules.length % 2 !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['modules'],
        message: `expected identifier/metadata pairs, got ${data.modules.length} entries`,
      });
    }
  })
  .transform((data, ctx): ScannedModule[] => {
    const pairs: ScannedModule[] = [];
    for (let i = 0; i + 1 < data.modules.length; i += 2) {
      const id = ModuleIdentifierSchema.safeParse(data.modules[i]);
      if (!id.success) {
        const issue = id.error.issues[0];
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['modules', i, ...(issue ? issue.path : [])],
          message: issue ? issue.message : 'invalid module identifier',
        });
        return z.NEVER;
      }
      pairs.push({ id: id.data, meta: data.modules[i + 1] });
    }
    return pairs;
  });

export type DecodeResult =
  | { ok: true; modules: ScannedModule[] }
  | { ok: false; reason: string };

export type CollectResult =
  | { ok: true; dependencies: string[] }
  | { ok: false; reason: string };

function describeIssue(error: z.ZodError, prefix: ReadonlyArray<string | number> = []): string {
  const first = error.issues[0];
  if (!first) return 'invalid scan output';
  const path = [...prefix, ...first.path];
  return `${path.length > 0 ? `${path.join('.')}: ` : ''}${first.message}`;
}

/**
 * 标识符对应的名称；无名称的类型返回 null
 */
export function nameOf(id: ModuleIdentifier): string | null {
  return id.kind === 'other' ? null : id.name;
}

/**
 * 诊断输出用的简写：`swift:Foo`、`clang:Foo` 或原始 JSON
 */
export function describeIdentifier(id: ModuleIdentifier): string {
  return id.kind === 'other' ? JSON.stringify(id.raw) : `${id.kind}:${id.name}`;
}

/**
 * 解析并校验编译器的 stdout
 */
export function decodeScanResponse(stdout: string): DecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }

  const result = ScanResponseSchema.safeParse(json);
  if (!result.success) {
    return { ok: false, reason: describeIssue(result.error) };
  }
  return { ok: true, modules: result.data };
}

/**
 * 收集所有解析为 `framework` 的模块的直接依赖名
 *
 * 一个 framework 可能匹配两次（Swift overlay 与 Clang 模块），全部计入。
 * 匹配条目的元数据不合法时整体失败。
 */
export function collectDirectDependencies(
  modules: readonly ScannedModule[],
  framework: string,
  onMatch?: (id: ModuleIdentifier, meta: ModuleMetadata) => void
): CollectResult {
  const dependencies: string[] = [];
  for (const [index, module] of modules.entries()) {
    if (nameOf(module.id) !== framework) continue;

    const meta = ModuleMetadataSchema.safeParse(module.meta);
    if (!meta.success) {
      return { ok: false, reason: describeIssue(meta.error, ['modules', index * 2 + 1]) };
    }

    onMatch?.(module.id, meta.data);
    for (const dep of meta.data.directDependencies) {
      const name = nameOf(dep);
      if (name !== null) dependencies.push(name);
    }
  }
  return { ok: true, dependencies };
}
