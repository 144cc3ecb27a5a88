/**
 * Command-line arguments and configuration for the terminal host.
 *
 * Precedence: argv, then environment (CHIP8_PROGRAM, CHIP8_CYCLES_PER_FRAME),
 * then defaults. Invalid numbers fall back to the default.
 */

import type { ProgramFileFormat } from "@/lib/program-parser";
import { DEFAULT_CHIP8_CONFIG } from "@/emulator/chip8/config";

export const USAGE = `Usage:
  chip8 <program> [options]

Options:
  --format hex-text|binary   Program format (default: auto-detect)
  --cycles-per-frame N       Instructions per 60 Hz frame (default: ${DEFAULT_CHIP8_CONFIG.cyclesPerFrame})
  --stop-on-tight-loop       Stop when the program jumps to itself
  --seed N                   Seed for the random number generator
  --frames N                 Run N frames without a terminal, then exit
  --snapshot path.png        Write the final screen as a PNG
  --scale N                  PNG pixels per screen pixel (default: 8)
  --trace                    Print every instruction to stderr
  --help                     Show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliArgs {
  programCli?: string;
  format?: string;
  cyclesPerFrame?: number;
  stopOnTightLoop?: boolean;
  seed?: number;
  frames?: number;
  snapshotPath?: string;
  scale?: number;
  trace?: boolean;
  help?: boolean;
}

export interface CliConfig {
  programPath: string;
  format?: Exclude<ProgramFileFormat, "zip">;
  cyclesPerFrame: number;
  stopOnTightLoop: boolean;
  seed?: number;
  /** Set for headless runs. */
  frames?: number;
  snapshotPath?: string;
  scale: number;
  trace: boolean;
}

const DEFAULT_SCALE = 8;

/** Parse a decimal or 0x-prefixed integer; undefined if not a non-negative integer. */
export function parseNum(val: string | undefined): number | undefined {
  if (val === undefined) return undefined;
  const s = val.trim();
  if (/^0x[0-9a-f]+$/i.test(s)) return parseInt(s.slice(2), 16);
  if (/^\d+$/.test(s)) return Number(s);
  return undefined;
}

/** Split argv (as given by process.argv) into raw options. */
export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i] ?? "";
    const next = (): string | undefined => (i + 1 < argv.length ? argv[++i] : undefined);
    switch (a) {
      case "--format":
        args.format = next();
        break;
      case "--cycles-per-frame":
        args.cyclesPerFrame = parseNum(next());
        break;
      case "--stop-on-tight-loop":
        args.stopOnTightLoop = true;
        break;
      case "--seed":
        args.seed = parseNum(next());
        break;
      case "--frames": {
        // Selects headless mode; an unreadable count is a usage error
        const raw = next();
        const frames = parseNum(raw);
        if (frames === undefined) {
          throw new UsageError(`Invalid value for --frames: ${raw ?? "(missing)"}`);
        }
        args.frames = frames;
        break;
      }
      case "--snapshot":
        args.snapshotPath = next();
        break;
      case "--scale":
        args.scale = parseNum(next());
        break;
      case "--trace":
        args.trace = true;
        break;
      case "--help":
      case "-h":
        args.help = true;
        break;
      default:
        if (a.startsWith("--")) {
          throw new UsageError(`Unknown option: ${a}`);
        }
        args.programCli = a;
    }
  }
  return args;
}

export function resolveCliConfig(
  args: CliArgs,
  env: Record<string, string | undefined> = {}
): CliConfig {
  const programPath = args.programCli ?? env.CHIP8_PROGRAM ?? "";
  if (!programPath) {
    throw new UsageError("Program path not provided. Pass it as an argument or set CHIP8_PROGRAM.");
  }

  let format: CliConfig["format"];
  if (args.format !== undefined) {
    if (args.format !== "hex-text" && args.format !== "binary") {
      throw new UsageError(`Unknown format: ${args.format}`);
    }
    format = args.format;
  }

  const cycles = args.cyclesPerFrame ?? parseNum(env.CHIP8_CYCLES_PER_FRAME);
  const scale = args.scale;

  return {
    programPath,
    format,
    cyclesPerFrame: cycles !== undefined && cycles > 0 ? cycles : DEFAULT_CHIP8_CONFIG.cyclesPerFrame,
    stopOnTightLoop: args.stopOnTightLoop ?? false,
    seed: args.seed,
    frames: args.frames,
    snapshotPath: args.snapshotPath,
    scale: scale !== undefined && scale > 0 ? scale : DEFAULT_SCALE,
    trace: args.trace ?? false,
  };
}
