import type { ReplacementStrategy } from "../constants.ts";
import {
  resolveBufferPoolOptions,
  type AttachOptions,
  type BufferPoolOptions,
  type ResolvedBufferPoolOptions,
} from "../config.ts";
import type { DiagnosticsReason, DiagnosticsSink, DiagnosticsSnapshot } from "../diagnostics.ts";
import {
  CapacityExhaustedError,
  InvalidArgumentError,
  PageNotFoundError,
  PoolNotInitializedError,
  StoreIOError,
} from "../errors.ts";
import type { BlockStore } from "../storage/blockStore.ts";
import { FileBlockStore } from "../storage/fileBlockStore.ts";
import { AsyncMutex } from "../utils/locks.ts";
import { FrameTable } from "./frameTable.ts";
import type { BufferPoolStats, FrameSlot, PageHandle, ResidentFrame } from "./types.ts";
import { selectVictim } from "./victimSelector.ts";

function assertPageNumber(pageNumber: number): void {
  if (!Number.isInteger(pageNumber) || pageNumber < 0) {
    throw new InvalidArgumentError(
      `Invalid page number ${pageNumber} - expected a non-negative integer`,
    );
  }
}

function reportSinkFailure(reason: DiagnosticsReason, error: unknown): void {
  console.warn(
    "[BufferPool][ALERT]",
    `diagnostics sink failed on ${reason}:`,
    error instanceof Error ? error.message : error,
  );
}

/**
 * Fixed set of frames caching blocks of a {@link BlockStore}.
 *
 * Every mutating call runs under one mutex, so calls apply in the order they
 * were made even when block I/O is in flight. A frame with a non-zero pin
 * count is never evicted, and a dirty frame is always written back before its
 * slot is reused.
 */
export class BufferPool {
  readonly store: BlockStore;
  readonly capacity: number;
  readonly strategy: ReplacementStrategy;
  #frames: FrameTable;
  #scratch: Buffer;
  #mutex = new AsyncMutex();
  #diagnostics?: DiagnosticsSink;
  #open = true;
  #stats: BufferPoolStats = {
    readCount: 0,
    writeCount: 0,
    hits: 0,
    misses: 0,
    evictions: 0,
  };

  private constructor(store: BlockStore, options: ResolvedBufferPoolOptions) {
    this.store = store;
    this.capacity = options.capacity;
    this.strategy = options.strategy;
    this.#diagnostics = options.diagnostics;
    this.#frames = new FrameTable(options.capacity, store.blockSize);
    this.#scratch = Buffer.alloc(store.blockSize);
  }

  /** Opens the block file at `storePath` and builds a pool of empty frames over it. */
  static async init(storePath: string, options: BufferPoolOptions = {}): Promise<BufferPool> {
    const resolved = resolveBufferPoolOptions(options);
    const storeOptions = { blockSize: resolved.blockSize };
    let store: FileBlockStore;
    try {
      store = resolved.createIfMissing
        ? await FileBlockStore.openOrCreate(storePath, storeOptions)
        : await FileBlockStore.open(storePath, storeOptions);
    } catch (error) {
      throw new StoreIOError(`Cannot open block store ${storePath}`, error);
    }
    return new BufferPool(store, resolved);
  }

  /**
   * Builds a pool over a store the caller already opened. Frames take the
   * store's block size. Shutdown closes the store.
   */
  static attach(store: BlockStore, options: AttachOptions = {}): BufferPool {
    return new BufferPool(
      store,
      resolveBufferPoolOptions({ ...options, blockSize: store.blockSize }),
    );
  }

  get isOpen(): boolean {
    return this.#open;
  }

  async pin(pageNumber: number): Promise<PageHandle> {
    return this.#exclusive(async () => {
      assertPageNumber(pageNumber);

      const cached = this.#frames.findByPage(pageNumber);
      if (cached >= 0) {
        const frame = this.#residentAt(cached);
        frame.pinCount += 1;
        this.#frames.recordUse(frame);
        this.#stats.hits += 1;
        return this.#handle(cached, pageNumber);
      }

      let index = this.#frames.findEmpty();
      if (index < 0) {
        const victim = selectVictim(this.#frames.states(), this.strategy);
        if (victim === null) {
          const error = new CapacityExhaustedError(pageNumber, this.capacity);
          await this.#alert(error.message, "capacity-exhausted");
          throw error;
        }
        index = victim;
      }

      const { frame, evicted } = await this.#load(index, pageNumber);
      frame.pinCount = 1;
      this.#frames.recordUse(frame);
      this.#stats.misses += 1;
      if (evicted) {
        await this.#emitSnapshot("evict");
      }
      return this.#handle(index, pageNumber);
    });
  }

  /**
   * Releases one pin. Unpinning a page whose pin count is already zero is a
   * no-op; unpinning a page that is not cached fails with PageNotFoundError.
   */
  async unpin(pageNumber: number, dirty = false): Promise<void> {
    return this.#exclusive(() => {
      const { frame } = this.#requireResident(pageNumber);
      if (frame.pinCount > 0) {
        frame.pinCount -= 1;
      }
      frame.dirty ||= dirty;
    });
  }

  async markDirty(pageNumber: number): Promise<void> {
    return this.#exclusive(() => {
      const { frame } = this.#requireResident(pageNumber);
      frame.dirty = true;
    });
  }

  /** Writes the page back now if it is dirty, pinned or not. */
  async force(pageNumber: number): Promise<void> {
    return this.#exclusive(async () => {
      const { slot, frame } = this.#requireResident(pageNumber);
      await this.#writeBack(slot, frame);
    });
  }

  /** Writes back every dirty frame that nobody holds a pin on. Pinned frames stay dirty. */
  async flushAll(): Promise<void> {
    return this.#exclusive(async () => {
      await this.#flushUnpinned();
    });
  }

  /**
   * Flushes like {@link flushAll}, then closes the store and drops the frames.
   * If the flush fails nothing is released and shutdown can be retried.
   */
  async shutdown(): Promise<void> {
    return this.#exclusive(async () => {
      await this.#flushUnpinned();
      const pinned = this.#frames.residentFrames().filter((frame) => frame.pinCount > 0);
      if (pinned.length > 0) {
        const pages = pinned.map((frame) => frame.pageNumber).join(", ");
        await this.#alert(`Shutting down with pinned pages: ${pages}`, "shutdown");
      }
      await this.#emitSnapshot("shutdown");
      try {
        await this.store.close();
      } catch (error) {
        throw new StoreIOError(`Failed to close block store ${this.store.name}`, error);
      }
      this.#frames.release();
      this.#open = false;
    });
  }

  frameContents(): number[] {
    this.#assertOpen();
    return this.#frames.pageNumbers();
  }

  dirtyFlags(): boolean[] {
    this.#assertOpen();
    return this.#frames.dirtyFlags();
  }

  pinCounts(): number[] {
    this.#assertOpen();
    return this.#frames.pinCounts();
  }

  readCount(): number {
    this.#assertOpen();
    return this.#stats.readCount;
  }

  writeCount(): number {
    this.#assertOpen();
    return this.#stats.writeCount;
  }

  getStats(): BufferPoolStats {
    this.#assertOpen();
    return { ...this.#stats };
  }

  async #exclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.#mutex.runExclusive(() => {
      this.#assertOpen();
      return fn();
    });
  }

  #assertOpen(): void {
    if (!this.#open) {
      throw new PoolNotInitializedError();
    }
  }

  #residentAt(index: number): ResidentFrame {
    const frame = this.#frames.resident(index);
    if (!frame) {
      throw new RangeError(`Frame ${index} holds no page`);
    }
    return frame;
  }

  #requireResident(pageNumber: number): { slot: FrameSlot; frame: ResidentFrame } {
    assertPageNumber(pageNumber);
    const index = this.#frames.findByPage(pageNumber);
    if (index < 0) {
      throw new PageNotFoundError(pageNumber);
    }
    return { slot: this.#frames.slot(index), frame: this.#residentAt(index) };
  }

  #handle(index: number, pageNumber: number): PageHandle {
    return { pageNumber, data: this.#frames.slot(index).buffer };
  }

  /**
   * Replaces whatever the slot holds with `pageNumber`. The old occupant is
   * written back first if dirty. The block is read into scratch space and only
   * copied into the frame once the read succeeded, so a failed load leaves the
   * previous page resident.
   */
  async #load(
    index: number,
    pageNumber: number,
  ): Promise<{ frame: ResidentFrame; evicted: boolean }> {
    const slot = this.#frames.slot(index);
    const previous = slot.state;
    if (previous.kind === "resident") {
      await this.#writeBack(slot, previous);
    }

    try {
      if (pageNumber >= this.store.totalBlocks()) {
        await this.store.ensureCapacity(pageNumber + 1);
      }
      await this.store.readBlock(pageNumber, this.#scratch);
    } catch (error) {
      throw new StoreIOError(`Failed to load page ${pageNumber}`, error);
    }
    this.#stats.readCount += 1;
    this.#scratch.copy(slot.buffer);

    const frame = this.#frames.occupy(index, pageNumber);
    const evicted = previous.kind === "resident";
    if (evicted) {
      this.#stats.evictions += 1;
    }
    return { frame, evicted };
  }

  async #writeBack(slot: FrameSlot, frame: ResidentFrame): Promise<boolean> {
    if (!frame.dirty) {
      return false;
    }
    try {
      await this.store.writeBlock(frame.pageNumber, slot.buffer);
    } catch (error) {
      throw new StoreIOError(`Failed to write back page ${frame.pageNumber}`, error);
    }
    this.#stats.writeCount += 1;
    frame.dirty = false;
    return true;
  }

  async #flushUnpinned(): Promise<number> {
    let flushed = 0;
    for (let index = 0; index < this.#frames.capacity; index += 1) {
      const slot = this.#frames.slot(index);
      const { state } = slot;
      if (state.kind !== "resident" || state.pinCount > 0) {
        continue;
      }
      if (await this.#writeBack(slot, state)) {
        flushed += 1;
      }
    }
    if (flushed > 0) {
      await this.#emitSnapshot("flush-all");
    }
    return flushed;
  }

  #snapshot(reason: DiagnosticsReason): DiagnosticsSnapshot {
    return {
      reason,
      store: this.store.name,
      strategy: this.strategy,
      stats: { ...this.#stats },
      frameContents: this.#frames.pageNumbers(),
      dirtyFlags: this.#frames.dirtyFlags(),
      pinCounts: this.#frames.pinCounts(),
    };
  }

  // Sinks observe finished state only; a failing sink never fails the pool call.
  async #emitSnapshot(reason: DiagnosticsReason): Promise<void> {
    const sink = this.#diagnostics;
    if (!sink?.onSnapshot) {
      return;
    }
    try {
      await sink.onSnapshot(this.#snapshot(reason));
    } catch (error) {
      reportSinkFailure(reason, error);
    }
  }

  async #alert(message: string, reason: DiagnosticsReason): Promise<void> {
    const sink = this.#diagnostics;
    if (!sink?.onAlert) {
      return;
    }
    try {
      await sink.onAlert(message, this.#snapshot(reason));
    } catch (error) {
      reportSinkFailure(reason, error);
    }
  }
}
