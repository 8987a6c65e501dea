/**
 * 扫描结果 JSON 解码测试
 */

import { describe, expect, it } from 'vitest';
import {
  collectDirectDependencies,
  decodeScanResponse,
  describeIdentifier,
  nameOf,
} from '../../src/baseline/scan-response.js';
import { scanJson } from '../helpers/fake-compiler.js';

function decodeOk(text: string) {
  const result = decodeScanResponse(text);
  if (!result.ok) throw new Error(`expected a decoded response, got: ${result.reason}`);
  return result.modules;
}

describe('decodeScanResponse', () => {
  it('应该按 (标识符, 元数据) 成对解码', () => {
    const modules = decodeOk(scanJson([[{ swift: 'Foo' }, [{ clang: 'Bar' }]]]));

    expect(modules).toHaveLength(2);
    expect(modules[1]?.id).toEqual({ kind: 'swift', name: 'Foo' });
    expect(modules[1]?.meta).toEqual({ directDependencies: [{ clang: 'Bar' }], details: { swift: {} } });
  });

  it('同时有 swift 和 clang 时应该以 swift 名为准', () => {
    const modules = decodeOk(
      JSON.stringify({ modules: [{ swift: 'Native', clang: 'Interop' }, { directDependencies: [] }] })
    );

    expect(modules[0]?.id).toEqual({ kind: 'swift', name: 'Native' });
  });

  it('其他类型的标识符应该保留且没有名称', () => {
    const modules = decodeOk(
      JSON.stringify({ modules: [{ swiftPrebuiltExternal: 'Foo' }, { directDependencies: [] }] })
    );
    const id = modules[0]?.id;

    expect(id?.kind).toBe('other');
    expect(id && nameOf(id)).toBeNull();
  });

  it('应该拒绝无效 JSON', () => {
    expect(decodeScanResponse('{"modules": [').ok).toBe(false);
  });

  it('应该拒绝缺少 modules 的文档', () => {
    expect(decodeScanResponse('{}')).toEqual({ ok: false, reason: 'modules: Required' });
  });

  it('应该拒绝奇数个 modules 条目', () => {
    expect(decodeScanResponse(JSON.stringify({ modules: [{ swift: 'Foo' }] }))).toEqual({
      ok: false,
      reason: 'modules: expected identifier/metadata pairs, got 1 entries',
    });
  });

  it('应该拒绝不是对象的标识符', () => {
    expect(decodeScanResponse(JSON.stringify({ modules: ['Foo', {}] }))).toEqual({
      ok: false,
      reason: 'modules.0: Invalid input',
    });
  });

  it('不应该校验元数据', () => {
    const modules = decodeOk(JSON.stringify({ modules: [{ clang: 'Z' }, { directDependencies: ['bad'] }] }));

    expect(modules).toHaveLength(1);
  });
});

describe('collectDirectDependencies', () => {
  it('应该收集所有匹配模块的依赖', () => {
    const modules = decodeOk(
      scanJson([
        [{ swift: 'Foo' }, [{ clang: 'Foo' }, { swift: 'Bar' }]],
        [{ clang: 'Foo' }, [{ clang: 'Baz' }]],
        [{ clang: 'Other' }, [{ clang: 'Qux' }]],
      ])
    );

    expect(collectDirectDependencies(modules, 'Foo')).toEqual({ ok: true, dependencies: ['Foo', 'Bar', 'Baz'] });
  });

  it('无关模块的元数据损坏时不应该影响匹配模块', () => {
    const modules = decodeOk(
      JSON.stringify({
        modules: [
          { swift: 'A' },
          { directDependencies: [{ swift: 'B' }] },
          { clang: 'Z' },
          { directDependencies: ['bad'] },
        ],
      })
    );

    expect(collectDirectDependencies(modules, 'A')).toEqual({ ok: true, dependencies: ['B'] });
  });

  it('匹配模块的元数据损坏时应该失败', () => {
    const modules = decodeOk(
      JSON.stringify({ modules: [{ swift: 'A' }, {}, { clang: 'Z' }, { directDependencies: ['bad'] }] })
    );

    expect(collectDirectDependencies(modules, 'Z')).toEqual({
      ok: false,
      reason: 'modules.3.directDependencies.0: Invalid input',
    });
  });

  it('匹配模块的元数据不是对象时应该失败', () => {
    const modules = decodeOk(JSON.stringify({ modules: [{ swift: 'Foo' }, 5] }));

    expect(collectDirectDependencies(modules, 'Foo')).toEqual({
      ok: false,
      reason: 'modules.1: Expected object, received number',
    });
  });

  it('缺少 directDependencies 时视为没有依赖', () => {
    const modules = decodeOk(JSON.stringify({ modules: [{ clang: 'Foo' }, { details: {} }] }));

    expect(collectDirectDependencies(modules, 'Foo')).toEqual({ ok: true, dependencies: [] });
  });

  it('应该跳过没有名称的依赖', () => {
    const modules = decodeOk(scanJson([[{ swift: 'Foo' }, [{ swiftPlaceholder: 'X' }, { clang: 'Bar' }]]]));

    expect(collectDirectDependencies(modules, 'Foo')).toEqual({ ok: true, dependencies: ['Bar'] });
  });

  it('应该对每个匹配模块回调', () => {
    const modules = decodeOk(scanJson([[{ swift: 'Foo' }, []], [{ clang: 'Foo' }, []]]));
    const matched: string[] = [];

    collectDirectDependencies(modules, 'Foo', (id) => matched.push(describeIdentifier(id)));

    expect(matched).toEqual(['swift:Foo', 'clang:Foo']);
  });
});

describe('describeIdentifier', () => {
  it('应该格式化有名称和其他类型的标识符', () => {
    expect(describeIdentifier({ kind: 'clang', name: 'Darwin' })).toBe('clang:Darwin');
    expect(describeIdentifier({ kind: 'other', raw: { swiftPlaceholder: 'X' } })).toBe('{"swiftPlaceholder":"X"}');
  });
});
