import {
  BufferPool,
  formatPoolContents,
  MemoryBlockStore,
  ReplacementStrategy,
} from "../src/index.ts";

async function run(strategy: ReplacementStrategy) {
  const pool = BufferPool.attach(new MemoryBlockStore(), { capacity: 2, strategy });
  try {
    for (const pageNumber of [0, 1, 0, 2]) {
      await pool.pin(pageNumber);
      await pool.unpin(pageNumber);
    }
    console.log(formatPoolContents(pool));
  } finally {
    await pool.shutdown();
  }
}

async function main() {
  // FIFO drops page 0 (loaded first), LRU drops page 1 (used least recently)
  await run(ReplacementStrategy.FIFO);
  await run(ReplacementStrategy.LRU);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
