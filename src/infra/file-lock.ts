import lockfile from "proper-lockfile";

export type FileLockOptions = {
  retries?: {
    retries: number;
    factor: number;
    minTimeout: number;
    maxTimeout: number;
    randomize: boolean;
  };
  stale?: number;
};

/**
 * Run `fn` while holding an advisory lock on `filePath`. The lock is taken on
 * the path itself, which therefore does not need to exist yet.
 */
export async function withFileLock<T>(
  filePath: string,
  options: FileLockOptions,
  fn: () => Promise<T>,
): Promise<T> {
  const release = await lockfile.lock(filePath, {
    ...options,
    realpath: false,
  });
  try {
    return await fn();
  } finally {
    await release();
  }
}
