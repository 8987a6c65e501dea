/**
 * 阻塞式子进程执行
 */

import { spawnSync } from 'child_process';

// 64MB，大型 framework 的扫描输出可达数 MB
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export interface RunResult {
  /** 退出码；进程未正常退出时为 null */
  status: number | null;
  /** 终止进程的信号 */
  signal: NodeJS.Signals | null;
  stdout: string;
  /** 无法启动或输出超限时设置 */
  error?: Error;
}

/**
 * 运行命令直到结束，`input` 写入 stdin
 */
export type CommandRunner = (command: string, args: readonly string[], input: string) => RunResult;

/**
 * 基于 spawnSync 的实现；子进程 stderr 直接透传
 */
export const spawnRunner: CommandRunner = (command, args, input) => {
  const result = spawnSync(command, [...args], {
    input,
    encoding: 'utf8',
    stdio: ['pipe', 'pipe', 'inherit'],
    maxBuffer: MAX_OUTPUT_BYTES,
  });

  return {
    status: result.status,
    signal: result.signal,
    stdout: result.stdout ?? '',
    ...(result.error ? { error: result.error } : {}),
  };
};
