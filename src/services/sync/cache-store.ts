/**
 * Durable cache of the last synced dataset
 *
 * The cache file is the only state that survives restarts. Writes go to a
 * sibling `.tmp` file under an exclusive lock, are fsynced and then renamed
 * over the target, so readers in any process see either the previous or the
 * new file, never a partial one.
 */

import { mkdir, open, readFile, rename, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { Value } from "@sinclair/typebox/value";

import { cacheLogger } from "../../logger.js";
import { CacheFileSchema } from "../../schemas/clusters.js";
import {
  withExclusiveLock,
  withSharedLock,
  type LockOptions,
} from "../../utils/file-lock.js";

import type { CacheFile, SyncedDataset } from "../../types/index.js";

export interface CacheStoreOptions {
  writeRetries?: number;
  writeRetryDelayMs?: number;
  readRetries?: number;
  readRetryDelayMs?: number;
  lock?: LockOptions;
  /** Clock for `last_updated`; tests pin it */
  now?: () => Date;
}

export interface CacheFileInfo {
  exists: boolean;
  modifiedAt: Date | null;
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class CacheStore {
  readonly tempPath: string;

  private readonly writeRetries: number;
  private readonly writeRetryDelayMs: number;
  private readonly readRetries: number;
  private readonly readRetryDelayMs: number;
  private readonly lockOptions: LockOptions;
  private readonly now: () => Date;

  constructor(
    readonly filePath: string,
    options: CacheStoreOptions = {}
  ) {
    this.tempPath = `${filePath}.tmp`;
    this.writeRetries = options.writeRetries ?? 5;
    this.writeRetryDelayMs = options.writeRetryDelayMs ?? 200;
    this.readRetries = options.readRetries ?? 3;
    this.readRetryDelayMs = options.readRetryDelayMs ?? 100;
    this.lockOptions = options.lock ?? {};
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Persist a dataset. Returns false after exhausting retries; never throws.
   */
  async save(data: SyncedDataset): Promise<boolean> {
    const cacheFile: CacheFile = {
      last_updated: this.now().toISOString(),
      data,
    };
    const content = JSON.stringify(cacheFile, null, 2);

    for (let attempt = 1; attempt <= this.writeRetries; attempt++) {
      try {
        await this.writeAtomically(content);
        cacheLogger.info(
          { file: this.filePath, lastUpdated: cacheFile.last_updated },
          "Cache updated"
        );
        return true;
      } catch (error) {
        if (attempt < this.writeRetries) {
          cacheLogger.warn(
            { file: this.filePath, attempt, error: describe(error) },
            "Cache write failed, retrying"
          );
          await sleep(this.writeRetryDelayMs);
          continue;
        }
        cacheLogger.error(
          {
            file: this.filePath,
            attempts: this.writeRetries,
            error: describe(error),
          },
          "Failed to save cache"
        );
      }
    }

    return false;
  }

  /**
   * Load the cached dataset, or null when the cache is missing or unreadable.
   */
  async load(): Promise<SyncedDataset | null> {
    const cacheFile = await this.readCacheFile();
    if (cacheFile === null) {
      return null;
    }

    cacheLogger.debug(
      { file: this.filePath, lastUpdated: cacheFile.last_updated },
      "Loaded cache"
    );
    return cacheFile.data;
  }

  async getLastUpdated(): Promise<string | null> {
    const cacheFile = await this.readCacheFile();
    return cacheFile?.last_updated ?? null;
  }

  async getFileInfo(): Promise<CacheFileInfo> {
    try {
      const info = await stat(this.filePath);
      return { exists: true, modifiedAt: info.mtime };
    } catch (error) {
      if (!isNotFound(error)) {
        cacheLogger.warn(
          { file: this.filePath, error: describe(error) },
          "Could not stat cache file"
        );
      }
      return { exists: false, modifiedAt: null };
    }
  }

  private async writeAtomically(content: string): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });

    await withExclusiveLock(
      this.tempPath,
      async () => {
        const handle = await open(this.tempPath, "w");
        try {
          await handle.writeFile(content, "utf-8");
          await handle.sync();
        } finally {
          await handle.close();
        }
        await rename(this.tempPath, this.filePath);
      },
      this.lockOptions
    );
  }

  private async readCacheFile(): Promise<CacheFile | null> {
    for (let attempt = 1; attempt <= this.readRetries; attempt++) {
      let content: string;
      try {
        content = await withSharedLock(
          this.tempPath,
          () => readFile(this.filePath, "utf-8"),
          this.lockOptions
        );
      } catch (error) {
        if (isNotFound(error)) {
          return null;
        }
        if (attempt < this.readRetries) {
          cacheLogger.warn(
            { file: this.filePath, attempt, error: describe(error) },
            "Cache read failed, retrying"
          );
          await sleep(this.readRetryDelayMs);
          continue;
        }
        cacheLogger.error(
          {
            file: this.filePath,
            attempts: this.readRetries,
            error: describe(error),
          },
          "Failed to read cache"
        );
        return null;
      }

      return this.parse(content);
    }

    return null;
  }

  private parse(content: string): CacheFile | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      cacheLogger.error(
        { file: this.filePath, error: describe(error) },
        "Invalid JSON in cache file"
      );
      return null;
    }

    if (!Value.Check(CacheFileSchema, parsed)) {
      const [first] = [...Value.Errors(CacheFileSchema, parsed)];
      cacheLogger.error(
        {
          file: this.filePath,
          path: first?.path,
          error: first?.message,
        },
        "Cache file has unexpected shape"
      );
      return null;
    }

    return parsed;
  }
}
