/**
 * 写到 stderr 的诊断输出
 *
 * stdout 只输出生成的文档，进度和错误行都经过 Logger。
 */

import { chalkStderr } from 'chalk';

export interface Logger {
  /** 进度行，如 `# scanning Foundation` */
  progress(message: string): void;
  /** 某个 framework 扫描失败，继续运行 */
  warn(message: string): void;
  /** 未过滤依赖列表，可关闭 */
  detail(message: string): void;
  /** 退出前报告的致命错误 */
  error(message: string): void;
}

export type WriteFn = (chunk: string) => void;

export interface StderrLoggerOptions {
  /** 输出 `detail` 行 */
  verbose?: boolean;
}

export function createStderrLogger(
  write: WriteFn,
  options: StderrLoggerOptions = {}
): Logger {
  const line = (text: string): void => write(`${text}\n`);

  return {
    progress: (message) => line(chalkStderr.gray(message)),
    warn: (message) => line(chalkStderr.yellow(message)),
    detail: (message) => {
      if (options.verbose) line(chalkStderr.dim(message));
    },
    error: (message) => line(chalkStderr.red(message)),
  };
}
