import { BLOCK_SIZE_BYTES } from "../constants.ts";
import { BlockStoreError } from "../errors.ts";
import { BaseBlockStore, type BlockStoreOptions } from "./blockStore.ts";

export interface MemoryBlockStoreOptions extends BlockStoreOptions {
  initialBlocks?: number;
}

/** Block store kept entirely in process memory. */
export class MemoryBlockStore extends BaseBlockStore {
  #blocks: Buffer[] = [];
  #open = true;

  constructor(
    name = "memory",
    { blockSize = BLOCK_SIZE_BYTES, initialBlocks = 1 }: MemoryBlockStoreOptions = {},
  ) {
    super(name, blockSize);
    for (let i = 0; i < initialBlocks; i += 1) {
      this.#blocks.push(Buffer.alloc(blockSize));
    }
  }

  get isOpen(): boolean {
    return this.#open;
  }

  totalBlocks(): number {
    return this.#blocks.length;
  }

  async close(): Promise<void> {
    this.#open = false;
  }

  async destroy(): Promise<void> {
    this.#open = false;
    this.#blocks = [];
  }

  async readBlock(blockNumber: number, out: Buffer): Promise<void> {
    this.#requireOpen();
    this.checkReadable(blockNumber, out);
    const block = this.#blocks[blockNumber];
    if (block) {
      block.copy(out);
    } else {
      out.fill(0);
    }
    this.position = blockNumber;
  }

  async writeBlock(blockNumber: number, data: Buffer): Promise<void> {
    this.#requireOpen();
    this.checkWritable(blockNumber, data);
    await this.ensureCapacity(blockNumber + 1);
    this.#blocks[blockNumber] = Buffer.from(data);
    this.position = blockNumber;
  }

  async appendEmptyBlock(): Promise<void> {
    await this.ensureCapacity(this.#blocks.length + 1);
  }

  async ensureCapacity(blocks: number): Promise<void> {
    this.#requireOpen();
    while (this.#blocks.length < blocks) {
      this.#blocks.push(Buffer.alloc(this.blockSize));
    }
  }

  #requireOpen(): void {
    if (!this.#open) {
      throw new BlockStoreError("STORE_CLOSED", `Block store ${this.name} is closed`);
    }
  }
}
