import { appendFile } from "fs/promises";
import type { BufferPoolStats } from "./pool/types.ts";

export type DiagnosticsReason = "evict" | "flush-all" | "shutdown" | "capacity-exhausted";

export interface DiagnosticsSnapshot {
  reason: DiagnosticsReason;
  store: string;
  strategy: string;
  stats: BufferPoolStats;
  frameContents: number[];
  dirtyFlags: boolean[];
  pinCounts: number[];
}

export interface DiagnosticsSink {
  onSnapshot?(snapshot: DiagnosticsSnapshot): void | Promise<void>;
  onAlert?(message: string, snapshot: DiagnosticsSnapshot): void | Promise<void>;
}

export class ConsoleDiagnosticsSink implements DiagnosticsSink {
  onSnapshot(snapshot: DiagnosticsSnapshot): void {
    console.debug("[BufferPool]", snapshot.reason, {
      frames: snapshot.frameContents,
      reads: snapshot.stats.readCount,
      writes: snapshot.stats.writeCount,
      evictions: snapshot.stats.evictions,
    });
  }

  onAlert(message: string, snapshot: DiagnosticsSnapshot): void {
    console.warn("[BufferPool][ALERT]", message, {
      frames: snapshot.frameContents,
      dirty: snapshot.dirtyFlags,
      pins: snapshot.pinCounts,
    });
  }
}

interface FrameRecord {
  frame: number;
  page: number;
  dirty: boolean;
  pins: number;
}

function frameRecords(snapshot: DiagnosticsSnapshot): FrameRecord[] {
  return snapshot.frameContents.map((page, frame) => ({
    frame,
    page,
    dirty: snapshot.dirtyFlags[frame] ?? false,
    pins: snapshot.pinCounts[frame] ?? 0,
  }));
}

/** Appends one JSON line per event, with a record per frame. */
export class FileDiagnosticsSink implements DiagnosticsSink {
  constructor(private readonly filePath: string) {}

  async onSnapshot(snapshot: DiagnosticsSnapshot): Promise<void> {
    await this.#append({ type: "snapshot", message: null }, snapshot);
  }

  async onAlert(message: string, snapshot: DiagnosticsSnapshot): Promise<void> {
    await this.#append({ type: "alert", message }, snapshot);
  }

  async #append(
    event: { type: "snapshot" | "alert"; message: string | null },
    snapshot: DiagnosticsSnapshot,
  ): Promise<void> {
    const line = {
      ...event,
      reason: snapshot.reason,
      store: snapshot.store,
      strategy: snapshot.strategy,
      stats: snapshot.stats,
      frames: frameRecords(snapshot),
    };
    await appendFile(this.filePath, JSON.stringify(line) + "\n");
  }
}
