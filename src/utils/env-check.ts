/**
 * 环境变量检查辅助函数
 */

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * 检查环境变量是否为真值
 * 支持多种格式: "1", "true", "yes", "on" (不区分大小写)
 */
export function isTruthy(value: string | boolean | undefined): boolean {
  if (!value) return false;
  if (typeof value === 'boolean') return value;
  const normalized = value.toLowerCase().trim();
  return ['1', 'true', 'yes', 'on'].includes(normalized);
}

/**
 * 覆盖编译器可执行文件
 */
export const SWIFTC_ENV = 'FRAMEWORKS_BASELINE_SWIFTC';

/**
 * 关闭 stderr 上每个匹配模块的未过滤依赖列表
 */
export const QUIET_ENV = 'FRAMEWORKS_BASELINE_QUIET';

/**
 * 默认输出未过滤依赖列表，设置 FRAMEWORKS_BASELINE_QUIET 后关闭
 */
export function isVerbose(env: Env): boolean {
  return !isTruthy(env[QUIET_ENV]);
}
