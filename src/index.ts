export { BufferPool } from "./pool/bufferPool.ts";
export { selectVictim } from "./pool/victimSelector.ts";
export { formatPageContent, formatPoolContents } from "./pool/poolPrinter.ts";
export type {
  BufferPoolStats,
  EmptyFrame,
  FrameState,
  PageHandle,
  ResidentFrame,
} from "./pool/types.ts";
export { BaseBlockStore } from "./storage/blockStore.ts";
export type { BlockStore, BlockStoreOptions } from "./storage/blockStore.ts";
export { FileBlockStore } from "./storage/fileBlockStore.ts";
export { MemoryBlockStore } from "./storage/memoryBlockStore.ts";
export type { MemoryBlockStoreOptions } from "./storage/memoryBlockStore.ts";
export { BLOCK_SIZE_BYTES, DEFAULT_POOL_FRAMES, NO_PAGE, ReplacementStrategy } from "./constants.ts";
export { parseReplacementStrategy, resolveBufferPoolOptions } from "./config.ts";
export type { AttachOptions, BufferPoolOptions, ResolvedBufferPoolOptions } from "./config.ts";
export { ConsoleDiagnosticsSink, FileDiagnosticsSink } from "./diagnostics.ts";
export type { DiagnosticsReason, DiagnosticsSink, DiagnosticsSnapshot } from "./diagnostics.ts";
export {
  BlockStoreError,
  BufferPoolError,
  CapacityExhaustedError,
  InvalidArgumentError,
  PageNotFoundError,
  PoolNotInitializedError,
  StoreIOError,
} from "./errors.ts";
export type { BlockStoreErrorCode, BufferPoolErrorCode } from "./errors.ts";
