export interface EmptyFrame {
  kind: "empty";
}

export interface ResidentFrame {
  kind: "resident";
  pageNumber: number;
  dirty: boolean;
  pinCount: number;
  /** Clock value when the page was loaded; FIFO key. */
  arrivalOrder: number;
  /** Clock value of the latest pin; LRU key. */
  lastUsed: number;
}

export type FrameState = EmptyFrame | ResidentFrame;

export interface FrameSlot {
  readonly index: number;
  /** Exactly one block, owned by the slot for the lifetime of the pool. */
  readonly buffer: Buffer;
  state: FrameState;
}

/**
 * What pin hands back. `data` is the frame's own buffer: writes go straight
 * into the cache and stay valid until the page is evicted or the pool shuts down.
 */
export interface PageHandle {
  readonly pageNumber: number;
  readonly data: Buffer;
}

export interface BufferPoolStats {
  readCount: number;
  writeCount: number;
  hits: number;
  misses: number;
  evictions: number;
}
