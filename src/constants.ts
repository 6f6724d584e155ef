export const BLOCK_SIZE_BYTES = 4 * 1024; // 4KB default block size
export const DEFAULT_POOL_FRAMES = 3;

// Reported by introspection for a frame that holds no page.
export const NO_PAGE = -1;

export enum ReplacementStrategy {
  FIFO = "FIFO",
  LRU = "LRU",
  // Accepted but not implemented; victim selection treats them as LRU.
  Clock = "CLOCK",
  LFU = "LFU",
  LRUK = "LRU_K",
}
