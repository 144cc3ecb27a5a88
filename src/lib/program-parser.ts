/**
 * Program File Format Parsers
 *
 * Parses raw binary images and hex-word text listings into MemoryRegion
 * arrays suitable for loading into CHIP-8 memory at $200.
 *
 * Hex-word text holds one big-endian 16-bit word per line:
 *
 *   0x00e0
 *   0xa100   ; anything after the word is ignored
 *
 * Lines that do not start with "0x" (after leading whitespace) are skipped.
 * A line that does start with "0x" but is not a valid 1-4 digit hex word
 * fails the whole parse; nothing is returned for partial input.
 */

import { MEMORY_SIZE, PROGRAM_START } from "@/cpu/chip8/types";

/** Supported program file formats. */
export type ProgramFileFormat = "hex-text" | "binary" | "zip";

/** A contiguous block of bytes to load at a specific address. */
export interface MemoryRegion {
  /** Start address in the machine's address space (e.g., 0x200). */
  startAddress: number;
  /** Raw bytes to load. */
  data: Uint8Array;
}

/** Result from parsing a program file. */
export interface ParsedProgram {
  regions: MemoryRegion[];
  entryPoint: number;
  format: Exclude<ProgramFileFormat, "zip">;
  sizeBytes: number;
  addressRange: string;
}

export class ProgramParseError extends Error {
  /** 1-based line number, when the error is tied to a line of text. */
  readonly line: number | undefined;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `Line ${line}: ${message}`);
    this.name = "ProgramParseError";
    this.line = line;
  }
}

const MAX_PROGRAM_SIZE = MEMORY_SIZE - PROGRAM_START;
const HEX_WORD = /^0x[0-9A-Fa-f]{1,4}$/;

/** Format a 12-bit address as a hex string (e.g., "$200"). */
function formatAddr(addr: number): string {
  return "$" + addr.toString(16).toUpperCase().padStart(3, "0");
}

/** Compute address range string from regions. */
function computeAddressRange(regions: MemoryRegion[]): string {
  let lo = MEMORY_SIZE;
  let hi = -1;
  for (const r of regions) {
    if (r.data.length === 0) continue;
    lo = Math.min(lo, r.startAddress);
    hi = Math.max(hi, r.startAddress + r.data.length - 1);
  }
  if (hi < 0) return formatAddr(PROGRAM_START);
  return lo === hi ? formatAddr(lo) : `${formatAddr(lo)}-${formatAddr(hi)}`;
}

function buildProgram(data: Uint8Array, format: ParsedProgram["format"]): ParsedProgram {
  if (data.length > MAX_PROGRAM_SIZE) {
    throw new ProgramParseError(
      `Program too large (${data.length} bytes, max ${MAX_PROGRAM_SIZE})`
    );
  }
  const regions: MemoryRegion[] = [{ startAddress: PROGRAM_START, data }];
  return {
    regions,
    entryPoint: PROGRAM_START,
    format,
    sizeBytes: data.length,
    addressRange: computeAddressRange(regions),
  };
}

/** Check if data looks like a ZIP file (PK magic bytes). */
function isZipMagic(data: Uint8Array): boolean {
  return data.length >= 4 && data[0] === 0x50 && data[1] === 0x4b && data[2] === 0x03 && data[3] === 0x04;
}

/** Try to decode bytes as ASCII text. Returns null if it looks like binary. */
function tryDecodeText(data: Uint8Array): string | null {
  // If more than 10% of bytes are non-printable (excluding whitespace), it's binary
  let nonPrintable = 0;
  const limit = Math.min(data.length, 512);
  for (let i = 0; i < limit; i++) {
    const b = data[i];
    if (b < 0x09 || (b > 0x0d && b < 0x20) || b > 0x7e) {
      nonPrintable++;
    }
  }
  if (limit > 0 && nonPrintable / limit > 0.1) return null;
  return new TextDecoder("utf-8").decode(data);
}

/**
 * Auto-detect file format from content.
 *
 * - ZIP: PK\x03\x04 header
 * - Hex-word text: printable, with any line starting with "0x"
 * - Otherwise: raw binary
 */
export function detectFormat(data: Uint8Array | string): ProgramFileFormat {
  if (typeof data !== "string" && isZipMagic(data)) return "zip";

  const text = typeof data === "string" ? data : tryDecodeText(data);
  if (text === null) return "binary";

  const hasWord = text.split(/\r?\n/).some((line) => line.trimStart().startsWith("0x"));
  return hasWord ? "hex-text" : "binary";
}

/** Parse a hex-word text listing into big-endian bytes loaded at $200. */
export function parseHexText(text: string): ParsedProgram {
  const bytes: number[] = [];

  const lines = text.split(/\r?\n/);
  for (let lineNum = 0; lineNum < lines.length; lineNum++) {
    const line = lines[lineNum].trimStart();
    if (!line.startsWith("0x")) continue;

    const token = line.split(/\s+/)[0];
    if (!HEX_WORD.test(token)) {
      throw new ProgramParseError(`invalid hex word "${token}"`, lineNum + 1);
    }

    const word = parseInt(token.slice(2), 16);
    bytes.push((word >> 8) & 0xff, word & 0xff);
  }

  return buildProgram(new Uint8Array(bytes), "hex-text");
}

/** Wrap a raw binary image into a single region at $200. */
export function parseBinary(data: Uint8Array): ParsedProgram {
  return buildProgram(data, "binary");
}

/**
 * Unified parse function. Auto-detects format if not specified.
 * ZIP archives must be unpacked first (see findProgramInZip).
 */
export function parseProgram(
  data: Uint8Array | string,
  options?: { format?: ProgramFileFormat }
): ParsedProgram {
  const format = options?.format ?? detectFormat(data);
  switch (format) {
    case "hex-text": {
      const text = typeof data === "string" ? data : new TextDecoder("utf-8").decode(data);
      return parseHexText(text);
    }
    case "binary": {
      const bytes = typeof data === "string" ? new TextEncoder().encode(data) : data;
      return parseBinary(bytes);
    }
    case "zip":
      throw new ProgramParseError("ZIP archives must be extracted before parsing");
  }
}
