/**
 * 终止生成过程的错误类
 *
 * 每个错误携带对应的进程退出码（sysexits.h）。
 * 单个 framework 扫描失败不属于错误：只在 stderr 上报告，依赖集为空。
 */

/** sysexits.h: 命令用法错误 */
export const EX_USAGE = 64;

/** sysexits.h: 输入文件或目录不存在或不可读 */
export const EX_NOINPUT = 66;

/** 其他非预期错误 */
export const EX_SOFTWARE = 70;

export class BaselineError extends Error {
  /**
   * 进程退出码
   */
  public readonly exitCode: number;

  /**
   * 是否为操作错误
   * - true: 操作错误（输入有误、目录缺失），只输出消息
   * - false: 编程错误，输出堆栈
   */
  public readonly isOperational: boolean;

  constructor(
    message: string,
    exitCode: number = EX_SOFTWARE,
    isOperational: boolean = true
  ) {
    super(message);

    this.name = new.target.name;
    this.exitCode = exitCode;
    this.isOperational = isOperational;

    // 设置原型链，以便子类 instanceof 正确工作
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 命令行用法错误（参数个数不对）
 */
export class UsageError extends BaselineError {
  constructor(message: string) {
    super(message, EX_USAGE, true);
  }
}

/**
 * 无法列出 SDK 的 frameworks 目录
 */
export class InputError extends BaselineError {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message, EX_NOINPUT, true);
    this.path = path;
  }
}

/**
 * 把任意抛出值格式化为一条诊断消息
 */
export function formatError(err: unknown): string {
  if (err instanceof BaselineError && err.isOperational) {
    return err.message;
  }
  if (err instanceof Error) {
    return err.stack ?? `${err.name}: ${err.message}`;
  }
  return String(err);
}

/**
 * 任意抛出值对应的退出码
 */
export function exitCodeOf(err: unknown): number {
  return err instanceof BaselineError ? err.exitCode : EX_SOFTWARE;
}
