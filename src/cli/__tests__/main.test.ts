import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PNG } from "pngjs";
import { main, runHeadless } from "../main";
import { formatTrace } from "../trace";
import { Chip8System } from "@/emulator/chip8/system";

describe("formatTrace", () => {
  it("prints PC, word and mnemonic", () => {
    expect(formatTrace({ pc: 0x200, word: 0x6a05, name: "LD Vx, byte" })).toBe("PC=0200 6A05 LD Vx, byte");
  });
});

describe("runHeadless", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs the requested number of frames", async () => {
    const system = new Chip8System({ seed: 1 });
    system.loadProgram("0x6001\n0x1202\n");
    expect(await runHeadless(system, 3)).toBe(3);
    expect(system.cpu.instructions).toBe(30);
    expect(system.isHalted()).toBe(false);
  });

  it("stops when the program waits for a key", async () => {
    const system = new Chip8System({ seed: 1 });
    system.loadProgram("0x6001\n0xf30a\n");
    expect(await runHeadless(system, 5)).toBe(1);
    expect(system.haltReason).toBe("halted");
    expect(system.getPC()).toBe(0x202);
    expect(console.log).toHaveBeenCalledWith("[chip8] stopped: waiting for a key at PC=202");
    expect(system.keypad.isWaiting()).toBe(false);
  });
});

describe("main", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "chip8-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("prints usage for --help", async () => {
    expect(await main(["node", "chip8", "--help"], {})).toBe(0);
    expect(console.log).toHaveBeenCalledTimes(1);
  });

  it("exits 2 on a usage error", async () => {
    expect(await main(["node", "chip8", "--frames", "1"], {})).toBe(2);
    expect(console.error).toHaveBeenCalledWith(
      "[chip8] Program path not provided. Pass it as an argument or set CHIP8_PROGRAM."
    );
  });

  it("exits 2 on an invalid frame count", async () => {
    expect(await main(["node", "chip8", "game.ch8", "--frames", "abc"], {})).toBe(2);
    expect(console.error).toHaveBeenCalledWith("[chip8] Invalid value for --frames: abc");
  });

  it("exits 1 when the program cannot be read", async () => {
    const missing = join(dir, "missing.ch8");
    expect(await main(["node", "chip8", missing, "--frames", "1"], {})).toBe(1);
  });

  it("exits 1 when the program is malformed", async () => {
    const path = join(dir, "bad.hex");
    await writeFile(path, "0x00e0\n0x12345\n");
    expect(await main(["node", "chip8", path, "--frames", "1"], {})).toBe(1);
    expect(console.error).toHaveBeenCalledWith(`[chip8] Failed to load ${path}: Line 2: invalid hex word "0x12345"`);
  });

  it("exits 1 on a fatal machine error", async () => {
    const path = join(dir, "ret.ch8");
    await writeFile(path, new Uint8Array([0x00, 0xee]));
    expect(await main(["node", "chip8", path, "--frames", "1"], {})).toBe(1);
    expect(console.error).toHaveBeenCalledWith("[chip8] Cannot RET when the stack is empty (at PC=$200)");
  });

  it("runs headless, reports a tight loop and writes a snapshot", async () => {
    const program = join(dir, "zero.hex");
    const snapshot = join(dir, "zero.png");
    await writeFile(program, "0x00e0\n0xa100\n0xd005\n0x1206\n");

    const code = await main(
      ["node", "chip8", program, "--frames", "2", "--stop-on-tight-loop", "--snapshot", snapshot, "--scale", "1"],
      {}
    );

    expect(code).toBe(0);
    expect(console.log).toHaveBeenCalledWith("[chip8] ran 1 frames, 4 instructions");
    expect(console.log).toHaveBeenCalledWith("[chip8] stopped: tight loop at PC=206");
    const png = PNG.sync.read(await readFile(snapshot));
    expect(png.width).toBe(64);
    expect(Array.from(png.data.subarray(0, 4))).toEqual([255, 255, 255, 255]);
  });
});
