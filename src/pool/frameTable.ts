import { NO_PAGE } from "../constants.ts";
import type { FrameSlot, FrameState, ResidentFrame } from "./types.ts";

export class FrameTable {
  #slots: FrameSlot[] = [];
  #clock = 0;

  constructor(capacity: number, blockSize: number) {
    for (let index = 0; index < capacity; index += 1) {
      this.#slots.push({ index, buffer: Buffer.alloc(blockSize), state: { kind: "empty" } });
    }
  }

  get capacity(): number {
    return this.#slots.length;
  }

  get clock(): number {
    return this.#clock;
  }

  slot(index: number): FrameSlot {
    const slot = this.#slots[index];
    if (!slot) {
      throw new RangeError(`Frame ${index} is out of range`);
    }
    return slot;
  }

  states(): FrameState[] {
    return this.#slots.map((slot) => slot.state);
  }

  findByPage(pageNumber: number): number {
    return this.#slots.findIndex(
      (slot) => slot.state.kind === "resident" && slot.state.pageNumber === pageNumber,
    );
  }

  findEmpty(): number {
    return this.#slots.findIndex((slot) => slot.state.kind === "empty");
  }

  resident(index: number): ResidentFrame | null {
    const { state } = this.slot(index);
    return state.kind === "resident" ? state : null;
  }

  /**
   * Marks the slot as holding `pageNumber`, clean and unpinned, and stamps it
   * with two clock ticks: arrival first, then use.
   */
  occupy(index: number, pageNumber: number): ResidentFrame {
    const frame: ResidentFrame = {
      kind: "resident",
      pageNumber,
      dirty: false,
      pinCount: 0,
      arrivalOrder: 0,
      lastUsed: 0,
    };
    this.recordArrival(frame);
    this.recordUse(frame);
    this.slot(index).state = frame;
    return frame;
  }

  recordArrival(frame: ResidentFrame): void {
    this.#clock += 1;
    frame.arrivalOrder = this.#clock;
  }

  recordUse(frame: ResidentFrame): void {
    this.#clock += 1;
    frame.lastUsed = this.#clock;
  }

  pageNumbers(): number[] {
    return this.#slots.map((slot) =>
      slot.state.kind === "resident" ? slot.state.pageNumber : NO_PAGE,
    );
  }

  dirtyFlags(): boolean[] {
    return this.#slots.map((slot) => slot.state.kind === "resident" && slot.state.dirty);
  }

  pinCounts(): number[] {
    return this.#slots.map((slot) => (slot.state.kind === "resident" ? slot.state.pinCount : 0));
  }

  residentFrames(): ResidentFrame[] {
    const frames: ResidentFrame[] = [];
    for (const slot of this.#slots) {
      if (slot.state.kind === "resident") {
        frames.push(slot.state);
      }
    }
    return frames;
  }

  /** Drops every slot and its buffer. The table is unusable afterwards. */
  release(): void {
    this.#slots = [];
  }
}
