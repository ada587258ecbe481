/**
 * Advisory file locks shared between processes
 *
 * Exclusive locks are proper-lockfile locks (a `<path>.lock` directory with
 * mtime-based stale detection). Shared holders do not create a lock of
 * their own: they wait until no exclusive holder is present and then
 * proceed, so any number of readers run side by side.
 */

import lockfile from "proper-lockfile";

export interface LockOptions {
  /** Attempts before giving up */
  retries?: number;
  /** Delay between attempts */
  retryDelayMs?: number;
  /** A lock older than this is considered abandoned */
  staleMs?: number;
}

export class LockTimeoutError extends Error {
  code = "LOCK_TIMEOUT" as const;
  path: string;

  constructor(path: string, mode: "shared" | "exclusive") {
    super(`Timed out acquiring ${mode} lock on ${path}`);
    this.name = "LockTimeoutError";
    this.path = path;
  }
}

const DEFAULTS = {
  retries: 20,
  retryDelayMs: 50,
  staleMs: 10_000,
} satisfies Required<LockOptions>;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isLockedError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ELOCKED"
  );
}

async function acquireExclusive(
  path: string,
  { retries, retryDelayMs, staleMs }: Required<LockOptions>
): Promise<() => Promise<void>> {
  try {
    return await lockfile.lock(path, {
      realpath: false,
      stale: staleMs,
      retries: {
        retries,
        minTimeout: retryDelayMs,
        maxTimeout: retryDelayMs * 4,
      },
    });
  } catch (error) {
    if (isLockedError(error)) {
      throw new LockTimeoutError(path, "exclusive");
    }
    throw error;
  }
}

/**
 * Run `fn` while holding an exclusive lock on `path`.
 * The file itself need not exist.
 */
export async function withExclusiveLock<T>(
  path: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const release = await acquireExclusive(path, { ...DEFAULTS, ...options });

  try {
    return await fn();
  } finally {
    await release();
  }
}

/**
 * Run `fn` once no exclusive holder is present on `path`.
 */
export async function withSharedLock<T>(
  path: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const { retries, retryDelayMs, staleMs } = { ...DEFAULTS, ...options };

  for (let attempt = 0; ; attempt++) {
    const locked = await lockfile.check(path, {
      realpath: false,
      stale: staleMs,
    });
    if (!locked) break;
    if (attempt >= retries) {
      throw new LockTimeoutError(path, "shared");
    }
    await sleep(retryDelayMs);
  }

  return fn();
}
