import { open, rm } from "fs/promises";
import type { FileHandle } from "fs/promises";
import { BLOCK_SIZE_BYTES } from "../constants.ts";
import { BlockStoreError } from "../errors.ts";
import { BaseBlockStore, type BlockStoreOptions } from "./blockStore.ts";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Block store over a single flat file: block `k` lives at byte offset
 * `k * blockSize`, with no header.
 */
export class FileBlockStore extends BaseBlockStore {
  #handle: FileHandle | null;
  #totalBlocks: number;

  private constructor(
    filePath: string,
    handle: FileHandle,
    blockSize: number,
    totalBlocks: number,
  ) {
    super(filePath, blockSize);
    this.#handle = handle;
    this.#totalBlocks = totalBlocks;
  }

  /** Creates (or truncates) the file with one zero-filled block and opens it. */
  static async create(
    filePath: string,
    { blockSize = BLOCK_SIZE_BYTES }: BlockStoreOptions = {},
  ): Promise<FileBlockStore> {
    const handle = await open(filePath, "w+");
    const store = new FileBlockStore(filePath, handle, blockSize, 0);
    try {
      await store.appendEmptyBlock();
    } catch (error) {
      await store.close();
      throw error;
    }
    return store;
  }

  static async open(
    filePath: string,
    { blockSize = BLOCK_SIZE_BYTES }: BlockStoreOptions = {},
  ): Promise<FileBlockStore> {
    let handle: FileHandle;
    try {
      handle = await open(filePath, "r+");
    } catch (error) {
      if (isMissingFile(error)) {
        throw new BlockStoreError("STORE_NOT_FOUND", `Block store ${filePath} does not exist`, {
          cause: error,
        });
      }
      throw error;
    }
    const stats = await handle.stat();
    // An empty file still counts as one (zero-filled) block.
    const totalBlocks = Math.max(1, Math.ceil(stats.size / blockSize));
    return new FileBlockStore(filePath, handle, blockSize, totalBlocks);
  }

  static async openOrCreate(
    filePath: string,
    options: BlockStoreOptions = {},
  ): Promise<FileBlockStore> {
    try {
      return await FileBlockStore.open(filePath, options);
    } catch (error) {
      if (error instanceof BlockStoreError && error.code === "STORE_NOT_FOUND") {
        return FileBlockStore.create(filePath, options);
      }
      throw error;
    }
  }

  static async destroy(filePath: string): Promise<void> {
    try {
      await rm(filePath);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new BlockStoreError("STORE_NOT_FOUND", `Block store ${filePath} does not exist`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  get isOpen(): boolean {
    return this.#handle !== null;
  }

  totalBlocks(): number {
    return this.#totalBlocks;
  }

  async close(): Promise<void> {
    await this.#handle?.close();
    this.#handle = null;
  }

  async destroy(): Promise<void> {
    await this.close();
    await FileBlockStore.destroy(this.name);
  }

  async readBlock(blockNumber: number, out: Buffer): Promise<void> {
    const handle = this.#requireHandle();
    this.checkReadable(blockNumber, out);
    const { bytesRead } = await handle.read(out, 0, this.blockSize, this.#offset(blockNumber));
    if (bytesRead < this.blockSize) {
      out.fill(0, bytesRead);
    }
    this.position = blockNumber;
  }

  async writeBlock(blockNumber: number, data: Buffer): Promise<void> {
    const handle = this.#requireHandle();
    this.checkWritable(blockNumber, data);
    await this.ensureCapacity(blockNumber + 1);
    await this.#writeAt(handle, data, this.#offset(blockNumber));
    this.position = blockNumber;
  }

  async appendEmptyBlock(): Promise<void> {
    await this.ensureCapacity(this.#totalBlocks + 1);
  }

  async ensureCapacity(blocks: number): Promise<void> {
    const handle = this.#requireHandle();
    if (this.#totalBlocks >= blocks) {
      return;
    }
    const missing = blocks - this.#totalBlocks;
    const padding = Buffer.alloc(missing * this.blockSize);
    await this.#writeAt(handle, padding, this.#offset(this.#totalBlocks));
    this.#totalBlocks = blocks;
  }

  #offset(blockNumber: number): number {
    return blockNumber * this.blockSize;
  }

  async #writeAt(handle: FileHandle, data: Buffer, offset: number): Promise<void> {
    let bytesWritten: number;
    try {
      ({ bytesWritten } = await handle.write(data, 0, data.length, offset));
    } catch (error) {
      throw new BlockStoreError("WRITE_FAILED", `Write to ${this.name} failed`, { cause: error });
    }
    if (bytesWritten !== data.length) {
      throw new BlockStoreError(
        "WRITE_FAILED",
        `Short write to ${this.name}: ${bytesWritten} of ${data.length} bytes`,
      );
    }
  }

  #requireHandle(): FileHandle {
    if (!this.#handle) {
      throw new BlockStoreError("STORE_CLOSED", `Block store ${this.name} is closed`);
    }
    return this.#handle;
  }
}
