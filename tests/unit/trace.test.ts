import { expect, test } from "vitest";
import { NO_PAGE, ReplacementStrategy } from "../../src/constants.ts";
import { BufferPool } from "../../src/pool/bufferPool.ts";
import { MemoryBlockStore } from "../../src/storage/memoryBlockStore.ts";
import { parseTraceOp, runTrace } from "../../tools/trace.ts";

test("parseTraceOp maps each letter to a pool action", () => {
  expect(parseTraceOp("p0")).toEqual({ action: "pin", page: 0 });
  expect(parseTraceOp("u12")).toEqual({ action: "unpin", page: 12 });
  expect(parseTraceOp("d3")).toEqual({ action: "markDirty", page: 3 });
  expect(parseTraceOp("f7")).toEqual({ action: "force", page: 7 });
});

test("parseTraceOp rejects malformed operations", () => {
  for (const op of ["p", "x1", "p-1", "P1", "p1.5", "pp1"]) {
    expect(() => parseTraceOp(op)).toThrow(`Invalid operation "${op}"`);
  }
});

test("runTrace prints the frames after each operation and the stats last", async () => {
  const pool = BufferPool.attach(new MemoryBlockStore("mem", { blockSize: 16 }), {
    capacity: 2,
    strategy: ReplacementStrategy.FIFO,
  });
  const lines: string[] = [];
  await runTrace(pool, ["p0", "d0", "p1", "u0", "u1", "p2", "f1"], (line) => lines.push(line));

  expect(lines).toEqual([
    "p0    {FIFO 2}: [0 1],[-1 0]",
    "d0    {FIFO 2}: [0x1],[-1 0]",
    "p1    {FIFO 2}: [0x1],[1 1]",
    "u0    {FIFO 2}: [0x0],[1 1]",
    "u1    {FIFO 2}: [0x0],[1 0]",
    "p2    {FIFO 2}: [2 1],[1 0]",
    "f1    {FIFO 2}: [2 1],[1 0]",
    '{"readCount":3,"writeCount":1,"hits":0,"misses":3,"evictions":1}',
  ]);
});

test("runTrace runs nothing when any operation is malformed", async () => {
  const pool = BufferPool.attach(new MemoryBlockStore("mem", { blockSize: 16 }), { capacity: 2 });
  const lines: string[] = [];
  await expect(runTrace(pool, ["p0", "z9"], (line) => lines.push(line))).rejects.toThrow(
    'Invalid operation "z9"',
  );
  expect(lines).toEqual([]);
  expect(pool.frameContents()).toEqual([NO_PAGE, NO_PAGE]);
});
