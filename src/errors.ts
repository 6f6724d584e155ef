export type BufferPoolErrorCode =
  | "INVALID_ARGUMENT"
  | "NOT_INITIALIZED"
  | "PAGE_NOT_FOUND"
  | "CAPACITY_EXHAUSTED"
  | "STORE_IO_FAILURE";

export type BlockStoreErrorCode =
  | "STORE_NOT_FOUND"
  | "NON_EXISTING_BLOCK"
  | "WRITE_FAILED"
  | "STORE_CLOSED";

/**
 * Base class for every error the pool raises to its caller.
 */
export class BufferPoolError extends Error {
  readonly code: BufferPoolErrorCode;

  constructor(code: BufferPoolErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BufferPoolError";
    this.code = code;
  }
}

export class InvalidArgumentError extends BufferPoolError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

export class PoolNotInitializedError extends BufferPoolError {
  constructor() {
    super("NOT_INITIALIZED", "Buffer pool is not initialized or has been shut down");
    this.name = "PoolNotInitializedError";
  }
}

export class PageNotFoundError extends BufferPoolError {
  readonly pageNumber: number;

  constructor(pageNumber: number) {
    super("PAGE_NOT_FOUND", `Page ${pageNumber} not found in buffer pool`);
    this.name = "PageNotFoundError";
    this.pageNumber = pageNumber;
  }
}

/**
 * Raised by pin when the page is not cached and every frame is pinned.
 * Recoverable: unpin something and retry.
 */
export class CapacityExhaustedError extends BufferPoolError {
  readonly pageNumber: number;
  readonly capacity: number;

  constructor(pageNumber: number, capacity: number) {
    super(
      "CAPACITY_EXHAUSTED",
      `Cannot pin page ${pageNumber}: all ${capacity} frames are pinned`,
    );
    this.name = "CapacityExhaustedError";
    this.pageNumber = pageNumber;
    this.capacity = capacity;
  }
}

/**
 * Wraps a block store failure. The store's own error is kept as `cause`.
 */
export class StoreIOError extends BufferPoolError {
  constructor(message: string, cause: unknown) {
    super("STORE_IO_FAILURE", message, { cause });
    this.name = "StoreIOError";
  }
}

export class BlockStoreError extends Error {
  readonly code: BlockStoreErrorCode;

  constructor(code: BlockStoreErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BlockStoreError";
    this.code = code;
  }
}
