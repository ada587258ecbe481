import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import lockfile from "proper-lockfile";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  LockTimeoutError,
  withExclusiveLock,
  withSharedLock,
} from "../../../src/utils/file-lock.js";

describe("utils/file-lock", () => {
  let dir: string;
  let target: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "file-lock-"));
    target = join(dir, "data.json.tmp");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("withExclusiveLock", () => {
    it("should hold the lock while fn runs and release it afterwards", async () => {
      const heldDuring = await withExclusiveLock(target, () =>
        lockfile.check(target, { realpath: false })
      );

      expect(heldDuring).toBe(true);
      await expect(lockfile.check(target, { realpath: false })).resolves.toBe(
        false
      );
    });

    it("should release the lock when fn throws", async () => {
      await expect(
        withExclusiveLock(target, async () => {
          throw new Error("write failed");
        })
      ).rejects.toThrow("write failed");

      await expect(lockfile.check(target, { realpath: false })).resolves.toBe(
        false
      );
    });

    it("should time out while another writer holds the lock", async () => {
      const release = await lockfile.lock(target, { realpath: false });

      try {
        await expect(
          withExclusiveLock(target, async () => "never", {
            retries: 0,
            retryDelayMs: 1,
          })
        ).rejects.toBeInstanceOf(LockTimeoutError);
      } finally {
        await release();
      }
    });
  });

  describe("withSharedLock", () => {
    it("should run immediately when nothing holds the lock", async () => {
      await expect(withSharedLock(target, async () => 42)).resolves.toBe(42);
    });

    it("should wait for the writer to finish", async () => {
      const release = await lockfile.lock(target, { realpath: false });
      const order: string[] = [];

      const reader = withSharedLock(
        target,
        async () => {
          order.push("read");
        },
        { retries: 100, retryDelayMs: 5 }
      );
      await new Promise((resolve) => setTimeout(resolve, 30));
      order.push("release");
      await release();
      await reader;

      expect(order).toEqual(["release", "read"]);
    });

    it("should give up after the configured retries", async () => {
      const release = await lockfile.lock(target, { realpath: false });

      try {
        await expect(
          withSharedLock(target, async () => "never", {
            retries: 1,
            retryDelayMs: 1,
          })
        ).rejects.toMatchObject({ code: "LOCK_TIMEOUT", path: target });
      } finally {
        await release();
      }
    });
  });
});
