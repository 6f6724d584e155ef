import { expect, expectTypeOf, test, vi } from "vitest";
import type { AttachOptions } from "../../src/config.ts";
import { NO_PAGE, ReplacementStrategy } from "../../src/constants.ts";
import type { DiagnosticsSink, DiagnosticsSnapshot } from "../../src/diagnostics.ts";
import {
  BlockStoreError,
  CapacityExhaustedError,
  InvalidArgumentError,
  PageNotFoundError,
  PoolNotInitializedError,
  StoreIOError,
} from "../../src/errors.ts";
import { BufferPool } from "../../src/pool/bufferPool.ts";
import { MemoryBlockStore } from "../../src/storage/memoryBlockStore.ts";
import { FlakyBlockStore, RecordingBlockStore } from "../support/testStores.ts";

const BLOCK_SIZE = 64;

function memoryPool(capacity: number, strategy = ReplacementStrategy.FIFO) {
  const store = new RecordingBlockStore("mem", { blockSize: BLOCK_SIZE });
  const pool = BufferPool.attach(store, { capacity, strategy });
  return { store, pool };
}

function expectInvariants(pool: BufferPool): void {
  const pages = pool.frameContents();
  const dirty = pool.dirtyFlags();
  const pins = pool.pinCounts();
  pages.forEach((page, index) => {
    expect(pins[index]).toBeGreaterThanOrEqual(0);
    if (page === NO_PAGE) {
      expect(dirty[index]).toBe(false);
      expect(pins[index]).toBe(0);
    }
  });
  const resident = pages.filter((page) => page !== NO_PAGE);
  expect(new Set(resident).size).toBe(resident.length);
}

test("a fresh pool has empty frames and zero counters", () => {
  const { pool } = memoryPool(3);
  expect(pool.frameContents()).toEqual([NO_PAGE, NO_PAGE, NO_PAGE]);
  expect(pool.dirtyFlags()).toEqual([false, false, false]);
  expect(pool.pinCounts()).toEqual([0, 0, 0]);
  expect(pool.readCount()).toBe(0);
  expect(pool.writeCount()).toBe(0);
  expect(pool.getStats()).toEqual({ readCount: 0, writeCount: 0, hits: 0, misses: 0, evictions: 0 });
});

test("FIFO evicts the page that was loaded first", async () => {
  const { pool } = memoryPool(2, ReplacementStrategy.FIFO);
  await pool.pin(0);
  await pool.pin(1);
  await pool.unpin(0);
  await pool.unpin(1);

  await pool.pin(2);
  expect(pool.frameContents()).toEqual([2, 1]);
  expect(pool.readCount()).toBe(3);
  expect(pool.writeCount()).toBe(0);
});

test("LRU evicts the least recently pinned page", async () => {
  const { pool } = memoryPool(2, ReplacementStrategy.LRU);
  for (const page of [0, 1, 0]) {
    await pool.pin(page);
    await pool.unpin(page);
  }

  await pool.pin(2);
  expect(pool.frameContents()).toEqual([0, 2]);
});

test("cache hits do not refresh FIFO arrival order", async () => {
  const { pool } = memoryPool(2, ReplacementStrategy.FIFO);
  for (const page of [0, 1, 0]) {
    await pool.pin(page);
    await pool.unpin(page);
  }

  await pool.pin(2);
  expect(pool.frameContents()).toEqual([2, 1]);
});

test("a dirty victim is written back before the new page is read", async () => {
  const { pool, store } = memoryPool(1);
  const page = await pool.pin(0);
  page.data.write("dirty", 0, "utf8");
  await pool.markDirty(0);
  await pool.unpin(0);

  await pool.pin(1);
  expect(pool.writeCount()).toBe(1);
  expect(pool.readCount()).toBe(2);
  expect(pool.frameContents()).toEqual([1]);
  expect(store.log).toEqual(["read:0", "write:0", "read:1"]);

  const persisted = Buffer.alloc(BLOCK_SIZE);
  await store.readBlock(0, persisted);
  expect(persisted.toString("utf8", 0, 5)).toBe("dirty");
});

test("a clean victim is dropped without a write", async () => {
  const { pool, store } = memoryPool(1);
  await pool.pin(0);
  await pool.unpin(0);
  await pool.pin(1);
  expect(pool.writeCount()).toBe(0);
  expect(store.log).toEqual(["read:0", "read:1"]);
  expect(pool.getStats().evictions).toBe(1);
});

test("pin refuses an uncached page when every frame is pinned", async () => {
  const { pool } = memoryPool(2);
  await pool.pin(0);
  await pool.pin(1);

  await expect(pool.pin(2)).rejects.toBeInstanceOf(CapacityExhaustedError);
  expect(pool.frameContents()).toEqual([0, 1]);
  expect(pool.pinCounts()).toEqual([1, 1]);
  expect(pool.readCount()).toBe(2);
  expect(pool.getStats().misses).toBe(2);

  await pool.unpin(0);
  await pool.pin(2);
  expect(pool.frameContents()).toEqual([2, 1]);
});

test("a pinned page can still be pinned again when the pool is full", async () => {
  const { pool } = memoryPool(1);
  await pool.pin(0);
  const again = await pool.pin(0);
  expect(again.pageNumber).toBe(0);
  expect(pool.pinCounts()).toEqual([2]);
});

test("re-pinning a cached page returns the same buffer without I/O", async () => {
  const { pool } = memoryPool(3);
  const first = await pool.pin(3);
  first.data[0] = 42;
  const second = await pool.pin(3);
  expect(second.data).toBe(first.data);
  expect(second.data[0]).toBe(42);
  expect(pool.pinCounts()).toEqual([2, 0, 0]);
  expect(pool.readCount()).toBe(1);
  expect(pool.getStats()).toMatchObject({ hits: 1, misses: 1 });
});

test("pin rejects negative and fractional page numbers", async () => {
  const { pool } = memoryPool(2);
  await expect(pool.pin(-1)).rejects.toBeInstanceOf(InvalidArgumentError);
  await expect(pool.pin(1.5)).rejects.toMatchObject({ code: "INVALID_ARGUMENT" });
  expect(pool.frameContents()).toEqual([NO_PAGE, NO_PAGE]);
});

test("pinning past the end of the store grows it", async () => {
  const { pool, store } = memoryPool(2);
  expect(store.totalBlocks()).toBe(1);
  const page = await pool.pin(5);
  expect(store.totalBlocks()).toBe(6);
  expect(page.data.equals(Buffer.alloc(BLOCK_SIZE))).toBe(true);
});

test("unpin stops at zero but fails for pages that are not cached", async () => {
  const { pool } = memoryPool(2);
  await pool.pin(0);
  await pool.unpin(0);
  await pool.unpin(0);
  expect(pool.pinCounts()).toEqual([0, 0]);

  await expect(pool.unpin(9)).rejects.toBeInstanceOf(PageNotFoundError);
  await expect(pool.markDirty(9)).rejects.toMatchObject({ code: "PAGE_NOT_FOUND", pageNumber: 9 });
  await expect(pool.force(9)).rejects.toBeInstanceOf(PageNotFoundError);
});

test("unpin with the dirty flag marks the page dirty", async () => {
  const { pool } = memoryPool(2);
  await pool.pin(4);
  await pool.unpin(4, true);
  expect(pool.dirtyFlags()).toEqual([true, false]);
  await pool.pin(4);
  await pool.unpin(4);
  expect(pool.dirtyFlags()).toEqual([true, false]);
});

test("force writes a dirty page even while pinned and is a no-op when clean", async () => {
  const { pool } = memoryPool(2);
  await pool.pin(0);
  await pool.force(0);
  expect(pool.writeCount()).toBe(0);

  await pool.markDirty(0);
  await pool.force(0);
  expect(pool.writeCount()).toBe(1);
  expect(pool.dirtyFlags()).toEqual([false, false]);
  expect(pool.pinCounts()).toEqual([1, 0]);

  await pool.force(0);
  expect(pool.writeCount()).toBe(1);
});

test("flushAll skips pinned dirty frames", async () => {
  const { pool, store } = memoryPool(3);
  await pool.pin(0);
  await pool.markDirty(0);
  await pool.pin(1);
  await pool.markDirty(1);
  await pool.unpin(1);

  await pool.flushAll();
  expect(pool.writeCount()).toBe(1);
  expect(pool.dirtyFlags()).toEqual([true, false, false]);
  expect(store.log).toEqual(["read:0", "read:1", "write:1"]);
});

test("shutdown flushes unpinned pages, closes the store and retires the pool", async () => {
  const { pool, store } = memoryPool(3);
  await pool.pin(0);
  await pool.unpin(0, true);
  await pool.pin(1);
  await pool.markDirty(1);

  await pool.shutdown();
  expect(store.log).toEqual(["read:0", "read:1", "write:0"]);
  expect(store.isOpen).toBe(false);
  expect(pool.isOpen).toBe(false);

  await expect(pool.pin(0)).rejects.toBeInstanceOf(PoolNotInitializedError);
  await expect(pool.unpin(1)).rejects.toMatchObject({ code: "NOT_INITIALIZED" });
  await expect(pool.shutdown()).rejects.toBeInstanceOf(PoolNotInitializedError);
  expect(() => pool.frameContents()).toThrow(PoolNotInitializedError);
  expect(() => pool.readCount()).toThrow(PoolNotInitializedError);
});

test("a failed write-back aborts the pin and keeps the old page dirty", async () => {
  const store = new FlakyBlockStore("flaky", { blockSize: BLOCK_SIZE });
  const pool = BufferPool.attach(store, { capacity: 1 });
  await pool.pin(0);
  await pool.unpin(0, true);

  store.failWrites = true;
  const failure = await pool.pin(1).catch((error: unknown) => error);
  expect(failure).toBeInstanceOf(StoreIOError);
  expect(failure).toMatchObject({ code: "STORE_IO_FAILURE" });
  expect(failure instanceof StoreIOError && failure.cause).toBeInstanceOf(BlockStoreError);
  expect(pool.frameContents()).toEqual([0]);
  expect(pool.dirtyFlags()).toEqual([true]);
  expect(pool.writeCount()).toBe(0);
  expect(pool.readCount()).toBe(1);

  store.failWrites = false;
  await pool.pin(1);
  expect(pool.frameContents()).toEqual([1]);
  expect(pool.writeCount()).toBe(1);
});

test("a failed read leaves the previous page resident", async () => {
  const store = new FlakyBlockStore("flaky", { blockSize: BLOCK_SIZE });
  const pool = BufferPool.attach(store, { capacity: 1 });
  const page = await pool.pin(0);
  page.data[0] = 7;
  await pool.markDirty(0);
  await pool.unpin(0);

  store.failReads = true;
  await expect(pool.pin(1)).rejects.toBeInstanceOf(StoreIOError);
  expect(pool.frameContents()).toEqual([0]);
  expect(pool.dirtyFlags()).toEqual([false]);
  expect(pool.writeCount()).toBe(1);
  expect(pool.readCount()).toBe(1);

  const again = await pool.pin(0);
  expect(again.data[0]).toBe(7);
  expect(pool.readCount()).toBe(1);
});

test("shutdown can be retried after its flush fails", async () => {
  const store = new FlakyBlockStore("flaky", { blockSize: BLOCK_SIZE });
  const pool = BufferPool.attach(store, { capacity: 2 });
  await pool.pin(0);
  await pool.unpin(0, true);

  store.failWrites = true;
  await expect(pool.shutdown()).rejects.toBeInstanceOf(StoreIOError);
  expect(pool.isOpen).toBe(true);
  expect(store.isOpen).toBe(true);
  expect(pool.frameContents()).toEqual([0, NO_PAGE]);
  expect(pool.dirtyFlags()).toEqual([true, false]);

  store.failWrites = false;
  await pool.shutdown();
  expect(pool.isOpen).toBe(false);
  expect(store.isOpen).toBe(false);
});

test("calls made without awaiting apply in order", async () => {
  const { pool } = memoryPool(2);
  const [handle] = await Promise.all([pool.pin(0), pool.markDirty(0), pool.pin(0)]);
  expect(handle.pageNumber).toBe(0);
  expect(pool.dirtyFlags()).toEqual([true, false]);
  expect(pool.pinCounts()).toEqual([2, 0]);
});

test("attach rejects a non-positive capacity", () => {
  const store = new MemoryBlockStore();
  expect(() => BufferPool.attach(store, { capacity: 0 })).toThrow(InvalidArgumentError);
  expect(() => BufferPool.attach(store, { capacity: -3 })).toThrow(InvalidArgumentError);
});

test("attach sizes frames from the store and takes no store options", async () => {
  expectTypeOf<AttachOptions>().not.toHaveProperty("blockSize");
  expectTypeOf<AttachOptions>().not.toHaveProperty("createIfMissing");

  const store = new MemoryBlockStore("mem", { blockSize: 48 });
  const pool = BufferPool.attach(store, { capacity: 1 });
  const handle = await pool.pin(0);
  expect(handle.data.length).toBe(48);
});

test("a throwing diagnostics sink does not fail pins", async () => {
  const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
  const sink: DiagnosticsSink = {
    onSnapshot: () => {
      throw new Error("sink down");
    },
    onAlert: async () => {
      throw new Error("sink down");
    },
  };
  try {
    const pool = BufferPool.attach(new MemoryBlockStore("mem", { blockSize: BLOCK_SIZE }), {
      capacity: 1,
      diagnostics: sink,
    });
    await pool.pin(0);
    await pool.unpin(0);
    const handle = await pool.pin(1);
    expect(handle.pageNumber).toBe(1);
    expect(pool.frameContents()).toEqual([1]);
    expect(pool.getStats()).toMatchObject({ readCount: 2, misses: 2, evictions: 1 });

    await expect(pool.pin(2)).rejects.toBeInstanceOf(CapacityExhaustedError);
    expect(pool.getStats().misses).toBe(2);
    expect(warn).toHaveBeenCalledWith(
      "[BufferPool][ALERT]",
      "diagnostics sink failed on evict:",
      "sink down",
    );
    expect(warn).toHaveBeenCalledTimes(2);
  } finally {
    warn.mockRestore();
  }
});

test("diagnostics receive eviction snapshots and capacity alerts", async () => {
  const snapshots: DiagnosticsSnapshot[] = [];
  const alerts: string[] = [];
  const sink: DiagnosticsSink = {
    onSnapshot: (snapshot) => {
      snapshots.push(snapshot);
    },
    onAlert: (message) => {
      alerts.push(message);
    },
  };
  const pool = BufferPool.attach(new MemoryBlockStore("mem", { blockSize: BLOCK_SIZE }), {
    capacity: 1,
    strategy: ReplacementStrategy.LRU,
    diagnostics: sink,
  });
  await pool.pin(0);
  await pool.unpin(0);
  await pool.pin(1);

  expect(snapshots.map((snapshot) => snapshot.reason)).toEqual(["evict"]);
  expect(snapshots[0]).toMatchObject({
    store: "mem",
    strategy: "LRU",
    frameContents: [1],
    dirtyFlags: [false],
    pinCounts: [1],
    stats: { evictions: 1, readCount: 2 },
  });

  await expect(pool.pin(2)).rejects.toBeInstanceOf(CapacityExhaustedError);
  expect(alerts).toEqual(["Cannot pin page 2: all 1 frames are pinned"]);
});

test("invariants hold across a long mixed workload", async () => {
  const { pool } = memoryPool(3, ReplacementStrategy.LRU);
  let seed = 12345;
  const next = () => {
    seed = (seed * 48271) % 2147483647;
    return seed;
  };
  const held: number[] = [];

  for (let step = 0; step < 400; step += 1) {
    const action = next() % 3;
    if (action === 0) {
      const page = next() % 6;
      try {
        await pool.pin(page);
        held.push(page);
      } catch (error) {
        expect(error).toBeInstanceOf(CapacityExhaustedError);
        expect(pool.pinCounts().every((count) => count > 0)).toBe(true);
      }
    } else if (held.length > 0) {
      const [page] = held.splice(next() % held.length, 1);
      if (page === undefined) {
        continue;
      }
      if (action === 1) {
        await pool.unpin(page);
      } else {
        await pool.markDirty(page);
        held.push(page);
      }
    }

    expectInvariants(pool);
    const pages = pool.frameContents();
    const pins = pool.pinCounts();
    pages.forEach((page, index) => {
      if (page !== NO_PAGE) {
        expect(pins[index]).toBe(held.filter((heldPage) => heldPage === page).length);
      }
    });
  }
});
