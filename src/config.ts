import { BLOCK_SIZE_BYTES, DEFAULT_POOL_FRAMES, ReplacementStrategy } from "./constants.ts";
import type { DiagnosticsSink } from "./diagnostics.ts";
import { InvalidArgumentError } from "./errors.ts";

export interface BufferPoolOptions {
  capacity?: number;
  strategy?: ReplacementStrategy;
  blockSize?: number;
  createIfMissing?: boolean;
  diagnostics?: DiagnosticsSink;
}

/** Options for a pool over an existing store, whose block size is already fixed. */
export type AttachOptions = Omit<BufferPoolOptions, "blockSize" | "createIfMissing">;

export interface ResolvedBufferPoolOptions {
  capacity: number;
  strategy: ReplacementStrategy;
  blockSize: number;
  createIfMissing: boolean;
  diagnostics?: DiagnosticsSink;
}

export function resolveBufferPoolOptions(
  options: BufferPoolOptions = {},
): ResolvedBufferPoolOptions {
  const {
    capacity = DEFAULT_POOL_FRAMES,
    strategy = ReplacementStrategy.FIFO,
    blockSize = BLOCK_SIZE_BYTES,
    createIfMissing = false,
    diagnostics,
  } = options;
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new InvalidArgumentError(`capacity must be a positive integer, got ${capacity}`);
  }
  if (!Number.isInteger(blockSize) || blockSize <= 0) {
    throw new InvalidArgumentError(`blockSize must be a positive integer, got ${blockSize}`);
  }
  return { capacity, strategy, blockSize, createIfMissing, diagnostics };
}

const STRATEGIES: readonly ReplacementStrategy[] = Object.values(ReplacementStrategy);

export function parseReplacementStrategy(input: string): ReplacementStrategy {
  const normalized = input.trim().toUpperCase().replace("-", "_");
  const match = STRATEGIES.find((strategy) => strategy === normalized);
  if (!match) {
    throw new InvalidArgumentError(
      `Unknown replacement strategy "${input}" - expected one of ${STRATEGIES.join(", ")}`,
    );
  }
  return match;
}
