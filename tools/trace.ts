import { type BufferPool, formatPoolContents } from "../src/index.ts";

export type TraceAction = "pin" | "unpin" | "markDirty" | "force";

export interface TraceOp {
  action: TraceAction;
  page: number;
}

const TRACE_OP = /^([pudf])(\d+)$/;

const ACTIONS: Record<string, TraceAction> = {
  p: "pin",
  u: "unpin",
  d: "markDirty",
  f: "force",
};

/** Parses `p3`, `u3`, `d3` or `f3` into an action on page 3. */
export function parseTraceOp(op: string): TraceOp {
  const match = TRACE_OP.exec(op);
  const action = match?.[1] ? ACTIONS[match[1]] : undefined;
  if (!action || !match?.[2]) {
    throw new Error(`Invalid operation "${op}"`);
  }
  return { action, page: Number(match[2]) };
}

/**
 * Replays `ops` against the pool, printing the frames after each one and the
 * stats at the end. Every op is parsed before the first one runs.
 */
export async function runTrace(
  pool: BufferPool,
  ops: readonly string[],
  print: (line: string) => void,
): Promise<void> {
  const parsed = ops.map((op) => ({ op, ...parseTraceOp(op) }));
  for (const { op, action, page } of parsed) {
    switch (action) {
      case "pin":
        await pool.pin(page);
        break;
      case "unpin":
        await pool.unpin(page);
        break;
      case "markDirty":
        await pool.markDirty(page);
        break;
      case "force":
        await pool.force(page);
        break;
    }
    print(`${op.padEnd(6)}${formatPoolContents(pool)}`);
  }
  print(JSON.stringify(pool.getStats()));
}
