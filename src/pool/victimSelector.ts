import { ReplacementStrategy } from "../constants.ts";
import type { FrameState, ResidentFrame } from "./types.ts";

type EvictionKey = (frame: ResidentFrame) => number;

function evictionKey(strategy: ReplacementStrategy): EvictionKey {
  switch (strategy) {
    case ReplacementStrategy.FIFO:
      return (frame) => frame.arrivalOrder;
    case ReplacementStrategy.LRU:
      return (frame) => frame.lastUsed;
    default:
      // CLOCK, LFU and LRU-K have no dedicated policy yet.
      return (frame) => frame.lastUsed;
  }
}

/**
 * Picks the frame to evict: the unpinned resident frame with the smallest
 * FIFO/LRU key, lowest index on ties. Returns null when nothing is evictable.
 */
export function selectVictim(
  frames: readonly FrameState[],
  strategy: ReplacementStrategy,
): number | null {
  const keyOf = evictionKey(strategy);
  let victim: number | null = null;
  let bestKey = Number.POSITIVE_INFINITY;
  for (const [index, frame] of frames.entries()) {
    if (frame.kind !== "resident" || frame.pinCount > 0) {
      continue;
    }
    const key = keyOf(frame);
    if (key < bestKey) {
      bestKey = key;
      victim = index;
    }
  }
  return victim;
}
