import type { TraceEvent } from "@/cpu/chip8/types";

const hex = (v: number, width: number): string => v.toString(16).toUpperCase().padStart(width, "0");

/** One trace line, e.g. "PC=0200 6A05 LD Vx, byte". */
export const formatTrace = (ev: TraceEvent): string => `PC=${hex(ev.pc, 4)} ${hex(ev.word, 4)} ${ev.name}`;
