import { BufferPool, formatPoolContents, ReplacementStrategy } from "../src/index.ts";

async function main() {
  const pool = await BufferPool.init("./basicUsage.bin", {
    capacity: 3,
    strategy: ReplacementStrategy.LRU,
    createIfMissing: true,
  });
  try {
    // Write a greeting into page 4; the file grows to five blocks on demand
    const page = await pool.pin(4);
    page.data.write("hello from page 4", 0, "utf8");
    await pool.markDirty(4);
    await pool.force(4);
    await pool.unpin(4);

    // Touch a few more pages so page 4 gets evicted
    for (const pageNumber of [0, 1, 2]) {
      await pool.pin(pageNumber);
      await pool.unpin(pageNumber);
    }
    console.log(formatPoolContents(pool));

    const again = await pool.pin(4);
    console.log("page 4 =", again.data.toString("utf8", 0, 17));
    await pool.unpin(4);
    console.log("stats", pool.getStats());
  } finally {
    await pool.shutdown();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
