import { BlockStoreError } from "../errors.ts";

/**
 * Fixed-size block storage addressed by non-negative block numbers. The pool
 * only ever talks to its store through this interface.
 */
export interface BlockStore {
  readonly name: string;
  readonly blockSize: number;
  totalBlocks(): number;
  currentPosition(): number;
  /** Reads one block into `out`; fails for blocks at or past `totalBlocks()`. */
  readBlock(blockNumber: number, out: Buffer): Promise<void>;
  /** Writes one block, growing the store first when the block is past the end. */
  writeBlock(blockNumber: number, data: Buffer): Promise<void>;
  appendEmptyBlock(): Promise<void>;
  /** Appends zero-filled blocks until the store holds at least `blocks`. */
  ensureCapacity(blocks: number): Promise<void>;
  close(): Promise<void>;
  destroy(): Promise<void>;
}

export interface BlockStoreOptions {
  blockSize?: number;
}

export abstract class BaseBlockStore implements BlockStore {
  readonly name: string;
  readonly blockSize: number;
  protected position = 0;

  protected constructor(name: string, blockSize: number) {
    if (!Number.isInteger(blockSize) || blockSize <= 0) {
      throw new RangeError("blockSize must be a positive integer");
    }
    this.name = name;
    this.blockSize = blockSize;
  }

  abstract totalBlocks(): number;
  abstract readBlock(blockNumber: number, out: Buffer): Promise<void>;
  abstract writeBlock(blockNumber: number, data: Buffer): Promise<void>;
  abstract appendEmptyBlock(): Promise<void>;
  abstract ensureCapacity(blocks: number): Promise<void>;
  abstract close(): Promise<void>;
  abstract destroy(): Promise<void>;

  currentPosition(): number {
    return this.position;
  }

  readFirstBlock(out: Buffer): Promise<void> {
    return this.readBlock(0, out);
  }

  readPreviousBlock(out: Buffer): Promise<void> {
    return this.readBlock(this.position - 1, out);
  }

  readCurrentBlock(out: Buffer): Promise<void> {
    return this.readBlock(this.position, out);
  }

  readNextBlock(out: Buffer): Promise<void> {
    return this.readBlock(this.position + 1, out);
  }

  readLastBlock(out: Buffer): Promise<void> {
    return this.readBlock(this.totalBlocks() - 1, out);
  }

  writeCurrentBlock(data: Buffer): Promise<void> {
    return this.writeBlock(this.position, data);
  }

  protected checkReadable(blockNumber: number, out: Buffer): void {
    if (out.length !== this.blockSize) {
      throw new RangeError(`Read buffer must be exactly ${this.blockSize} bytes`);
    }
    if (!Number.isInteger(blockNumber) || blockNumber < 0 || blockNumber >= this.totalBlocks()) {
      throw new BlockStoreError(
        "NON_EXISTING_BLOCK",
        `Block ${blockNumber} does not exist in ${this.name} (${this.totalBlocks()} blocks)`,
      );
    }
  }

  protected checkWritable(blockNumber: number, data: Buffer): void {
    if (data.length !== this.blockSize) {
      throw new BlockStoreError("WRITE_FAILED", "Block writes must cover the entire block");
    }
    if (!Number.isInteger(blockNumber) || blockNumber < 0) {
      throw new BlockStoreError("WRITE_FAILED", `Cannot write block ${blockNumber}`);
    }
  }
}
