export * from './cpu/chip8';
export { Chip8System, type HaltReason } from './emulator/chip8/system';
export { Chip8Memory, MAX_PROGRAM_SIZE } from './emulator/chip8/memory';
export { Chip8Display, framebufferToLines } from './emulator/chip8/display';
export { Chip8Keypad, keyFromChar } from './emulator/chip8/keypad';
export { Timer60Hz, ticksElapsed, monotonicClock } from './emulator/chip8/timer';
export { type Chip8Config, DEFAULT_CHIP8_CONFIG, FRAMES_PER_SECOND, resolveChip8Config } from './emulator/chip8/config';
export { CHIP8_FONT } from './emulator/chip8/roms/font';
export { RequestChannel, RequestCancelledError } from './lib/request-channel';
export {
  type MemoryRegion,
  type ParsedProgram,
  type ProgramFileFormat,
  ProgramParseError,
  detectFormat,
  parseBinary,
  parseHexText,
  parseProgram,
} from './lib/program-parser';
export { findProgramInZip, listZipFiles, extractZipFile, isZipData } from './lib/zip-extract';
export { framebufferToPng, type SnapshotOptions } from './lib/png-snapshot';
export { createPrng, type Prng } from './lib/prng';
