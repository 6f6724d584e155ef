import type { BufferPool } from "./bufferPool.ts";
import type { PageHandle } from "./types.ts";

const BYTES_PER_GROUP = 8;
const GROUPS_PER_LINE = 4;

/**
 * One-line view of a pool: `{FIFO 3}: [0 1],[4x0],[-1 0]`. Each bracket is a
 * frame: page number, `x` when dirty, then the pin count.
 */
export function formatPoolContents(pool: BufferPool): string {
  const pages = pool.frameContents();
  const dirty = pool.dirtyFlags();
  const pins = pool.pinCounts();
  const frames = pages.map(
    (page, index) => `[${page}${dirty[index] ? "x" : " "}${pins[index] ?? 0}]`,
  );
  return `{${pool.strategy} ${pool.capacity}}: ${frames.join(",")}`;
}

/** Hex dump of a pinned page, eight bytes per group, four groups per line. */
export function formatPageContent(handle: PageHandle, limit = handle.data.length): string {
  const bytes = handle.data.subarray(0, Math.max(0, limit));
  const lines = [`[Page ${handle.pageNumber}]`];
  const lineBytes = BYTES_PER_GROUP * GROUPS_PER_LINE;
  for (let offset = 0; offset < bytes.length; offset += lineBytes) {
    const groups: string[] = [];
    for (let group = offset; group < Math.min(offset + lineBytes, bytes.length); group += BYTES_PER_GROUP) {
      groups.push(bytes.subarray(group, group + BYTES_PER_GROUP).toString("hex"));
    }
    lines.push(groups.join(" "));
  }
  return lines.join("\n");
}
