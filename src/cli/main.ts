/**
 * Terminal host for the CHIP-8 machine.
 *
 * - Loads a program (raw binary, hex-word text, or a ZIP archive holding one)
 * - Interactive: runs one frame of instructions every 1/60 s, renders the
 *   screen with half-block characters, rings the bell for the sound timer,
 *   and polls the keyboard on its own interval
 * - Headless (--frames N): runs N frames as fast as possible and exits
 *
 * Exit codes: 0 on a clean stop, 1 on a fatal machine or load error,
 * 2 on a usage error.
 */

import { readFile, writeFile } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { Chip8System } from "@/emulator/chip8/system";
import { FRAMES_PER_SECOND } from "@/emulator/chip8/config";
import { framebufferToPng } from "@/lib/png-snapshot";
import { findProgramInZip, isZipData } from "@/lib/zip-extract";
import { type CliConfig, USAGE, UsageError, parseCliArgs, resolveCliConfig } from "./args";
import { InputPoller } from "./input-poller";
import { TerminalBeeper } from "./beeper";
import { TerminalRenderer, attachTerminalInput } from "./terminal";
import { formatTrace } from "./trace";

const FRAME_MS = 1000 / FRAMES_PER_SECOND;

const hex3 = (v: number): string => v.toString(16).toUpperCase().padStart(3, "0");
const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

async function readProgram(path: string): Promise<Uint8Array> {
  const data = new Uint8Array(await readFile(path));
  if (!isZipData(data)) return data;

  const found = await findProgramInZip(data);
  if (!found) {
    throw new Error(`No CHIP-8 program found in archive: ${path}`);
  }
  console.error(`[chip8] using ${found.path} from ${path}`);
  return found.data;
}

function createSystem(cfg: CliConfig, renderer: TerminalRenderer | null): Chip8System {
  return new Chip8System({
    cyclesPerFrame: cfg.cyclesPerFrame,
    stopOnTightLoop: cfg.stopOnTightLoop,
    seed: cfg.seed,
    renderer,
    onTrace: cfg.trace ? (ev) => console.error(formatTrace(ev)) : undefined,
  });
}

/**
 * Run `frames` frames without pacing or a terminal. With no keyboard
 * attached, a program that waits for a key stops the run instead.
 */
export async function runHeadless(system: Chip8System, frames: number): Promise<number> {
  system.keypad.setWaitCallback(() => {
    console.log(`[chip8] stopped: waiting for a key at PC=${hex3(system.cpu.pc - 2)}`);
    system.halt();
  });
  let frame = 0;
  while (frame < frames && !system.isHalted()) {
    await system.runFrame();
    frame++;
  }
  system.keypad.setWaitCallback(null);
  return frame;
}

async function runInteractive(system: Chip8System, renderer: TerminalRenderer): Promise<void> {
  const poller = new InputPoller(system, { onQuit: () => system.halt() });
  const beeper = new TerminalBeeper(system.soundTimer, process.stdout);
  const detach = attachTerminalInput(process.stdin, poller);

  renderer.begin();
  poller.start();
  beeper.start();
  try {
    while (!system.isHalted()) {
      const frameStart = performance.now();
      await system.runFrame();
      renderer.flush();
      const elapsed = performance.now() - frameStart;
      await sleep(Math.max(0, FRAME_MS - elapsed));
    }
  } finally {
    renderer.flush();
    beeper.stop();
    poller.stop();
    detach();
    renderer.end();
  }
}

export async function main(argv: string[], env: Record<string, string | undefined>): Promise<number> {
  let cfg: CliConfig;
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return 0;
    }
    cfg = resolveCliConfig(args, env);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`[chip8] ${err.message}`);
      console.error(USAGE);
      return 2;
    }
    throw err;
  }

  const headless = cfg.frames !== undefined;
  if (!headless && !process.stdin.isTTY) {
    console.error("[chip8] Interactive mode needs a terminal; use --frames N to run headless.");
    return 2;
  }

  const renderer = headless ? null : new TerminalRenderer(process.stdout);
  const system = createSystem(cfg, renderer);
  let program: Uint8Array;
  try {
    program = await readProgram(cfg.programPath);
  } catch (err) {
    console.error(`[chip8] Cannot read ${cfg.programPath}: ${errorMessage(err)}`);
    return 1;
  }
  if (!system.loadProgram(program, cfg.format)) {
    console.error(`[chip8] Failed to load ${cfg.programPath}: ${system.lastLoadError?.message ?? "unknown error"}`);
    return 1;
  }

  let exitCode = 0;
  try {
    if (cfg.frames !== undefined) {
      const ran = await runHeadless(system, cfg.frames);
      console.log(`[chip8] ran ${ran} frames, ${system.cpu.instructions} instructions`);
    } else if (renderer) {
      await runInteractive(system, renderer);
    }
  } catch (err) {
    console.error(`[chip8] ${errorMessage(err)}`);
    exitCode = 1;
  }

  if (system.haltReason === "tight-loop") {
    console.log(`[chip8] stopped: tight loop at PC=${hex3(system.getPC())}`);
  }

  if (cfg.snapshotPath) {
    await writeFile(cfg.snapshotPath, framebufferToPng(system.display, { scale: cfg.scale }));
    console.log(`[chip8] wrote ${cfg.snapshotPath}`);
  }

  return exitCode;
}
