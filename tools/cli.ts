#!/usr/bin/env tsx
import { Command } from "commander";
import {
  BLOCK_SIZE_BYTES,
  BufferPool,
  ConsoleDiagnosticsSink,
  DEFAULT_POOL_FRAMES,
  FileBlockStore,
  formatPageContent,
  parseReplacementStrategy,
} from "../src/index.ts";
import { runTrace } from "./trace.ts";

type Format = "utf8" | "hex" | "base64";

interface GlobalOptions {
  file: string;
  frames: string;
  strategy: string;
  blockSize: string;
  format: string;
  verbose?: boolean;
}

const program = new Command();
program
  .name("bufpool")
  .description("Manage block files and drive a buffer pool over them")
  .option("-f, --file <path>", "path to the block file", "./pages.bin")
  .option("-n, --frames <count>", "number of frames in the pool", String(DEFAULT_POOL_FRAMES))
  .option("-s, --strategy <name>", "replacement strategy: FIFO or LRU", "FIFO")
  .option("--block-size <bytes>", "block size in bytes", String(BLOCK_SIZE_BYTES))
  .option(
    "--format <mode>",
    "value encoding: utf8 (default), hex, or base64",
    "utf8",
  )
  .option("-v, --verbose", "log pool diagnostics to the console");

function parseCount(input: string, label: string): number {
  const value = Number(input);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid ${label} "${input}" - expected a non-negative integer`);
  }
  return value;
}

function parseFormat(input: string): Format {
  switch (input) {
    case "utf8":
    case "hex":
    case "base64":
      return input;
    default:
      throw new Error(`Unsupported format "${input}"`);
  }
}

const globalOptions = () => {
  const opts = program.opts<GlobalOptions>();
  return {
    file: opts.file,
    capacity: parseCount(opts.frames, "frame count"),
    strategy: parseReplacementStrategy(opts.strategy),
    blockSize: parseCount(opts.blockSize, "block size"),
    format: parseFormat(opts.format),
    verbose: opts.verbose ?? false,
  };
};

async function withPool<T>(fn: (pool: BufferPool) => Promise<T>): Promise<T> {
  const opts = globalOptions();
  const pool = await BufferPool.init(opts.file, {
    capacity: opts.capacity,
    strategy: opts.strategy,
    blockSize: opts.blockSize,
    diagnostics: opts.verbose ? new ConsoleDiagnosticsSink() : undefined,
  });
  try {
    return await fn(pool);
  } finally {
    await pool.shutdown();
  }
}

program
  .command("create")
  .description("create a block file holding one zero-filled block")
  .action(async () => {
    const opts = globalOptions();
    const store = await FileBlockStore.create(opts.file, { blockSize: opts.blockSize });
    await store.close();
    console.log(`created ${opts.file}`);
  });

program
  .command("destroy")
  .description("delete the block file")
  .action(async () => {
    const opts = globalOptions();
    await FileBlockStore.destroy(opts.file);
    console.log(`destroyed ${opts.file}`);
  });

program
  .command("info")
  .description("print block size and block count")
  .action(async () => {
    const opts = globalOptions();
    const store = await FileBlockStore.open(opts.file, { blockSize: opts.blockSize });
    try {
      console.log(
        JSON.stringify(
          { file: store.name, blockSize: store.blockSize, totalBlocks: store.totalBlocks() },
          null,
          2,
        ),
      );
    } finally {
      await store.close();
    }
  });

program
  .command("read")
  .argument("<page>", "page number")
  .option("-b, --bytes <n>", "number of bytes to dump", "64")
  .description("pin a page and hex-dump its leading bytes")
  .action(async (pageStr: string, cmdOpts: { bytes: string }) => {
    const page = parseCount(pageStr, "page number");
    const limit = parseCount(cmdOpts.bytes, "byte count");
    await withPool(async (pool) => {
      const handle = await pool.pin(page);
      try {
        console.log(formatPageContent(handle, limit));
      } finally {
        await pool.unpin(page);
      }
    });
  });

program
  .command("write")
  .argument("<page>", "page number")
  .argument("<value>", "value encoded according to --format")
  .description("overwrite the start of a page and zero the rest")
  .action(async (pageStr: string, valueStr: string) => {
    const { format } = globalOptions();
    const page = parseCount(pageStr, "page number");
    const value = Buffer.from(valueStr, format);
    await withPool(async (pool) => {
      if (value.length > pool.store.blockSize) {
        throw new Error(`Value is ${value.length} bytes, block size is ${pool.store.blockSize}`);
      }
      const handle = await pool.pin(page);
      handle.data.fill(0);
      value.copy(handle.data);
      await pool.unpin(page, true);
    });
    console.log(`wrote page ${page}`);
  });

program
  .command("trace")
  .argument("<ops...>", "operations: p<N> pin, u<N> unpin, d<N> mark dirty, f<N> force")
  .description("replay pool operations and print the frames after each one")
  .action(async (ops: string[]) => {
    await withPool((pool) => runTrace(pool, ops, (line) => console.log(line)));
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
