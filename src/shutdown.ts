import type { Logger } from './logger.js';

export interface Closeable {
  close(): Promise<void> | void;
}

// targets close in reverse order; the exit code never goes back down
export function createShutdown(log: Logger, setExitCode: (code: number) => void) {
  const targets: Closeable[] = [];
  let exitCode = 0;

  const register = (target: Closeable) => {
    targets.push(target);
  };

  const shutdown = async (reason: string, code = 0) => {
    exitCode = Math.max(exitCode, code);
    setExitCode(exitCode);
    log.info({ reason, exitCode }, 'shutting down');
    for (const target of [...targets].reverse()) await target.close();
  };

  return { register, shutdown };
}
