/**
 * CHIP-8 Memory: 4K flat address space
 *
 *   $000-$1FF  Interpreter area (digit sprites at $100-$14F)
 *   $200-$FFF  Program space
 *
 * Code and data share the one buffer and nothing is write-protected, so
 * programs may rewrite their own instructions.
 *
 * Implements the Memory interface required by the Chip8Cpu class.
 */

import { type Memory, MEMORY_SIZE, PROGRAM_START, FONT_BASE } from '@/cpu/chip8/types';
import type { MemoryRegion } from '@/lib/program-parser';
import { CHIP8_FONT } from './roms/font';

/** Largest program that fits between PROGRAM_START and the end of memory. */
export const MAX_PROGRAM_SIZE = MEMORY_SIZE - PROGRAM_START;

export class Chip8Memory implements Memory {
  private ram: Uint8Array = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.installFont();
  }

  static inRange(address: number): boolean {
    return Number.isInteger(address) && address >= 0 && address < MEMORY_SIZE;
  }

  read(address: number): number {
    if (!Chip8Memory.inRange(address)) {
      throw new RangeError(`Memory read outside $000-$FFF: ${address}`);
    }
    return this.ram[address];
  }

  write(address: number, value: number): void {
    if (!Chip8Memory.inRange(address)) {
      throw new RangeError(`Memory write outside $000-$FFF: ${address}`);
    }
    this.ram[address] = value & 0xff;
  }

  /** Clear all memory and reinstall the digit sprites. */
  reset(): void {
    this.ram.fill(0);
    this.installFont();
  }

  /**
   * Check that every region lies inside memory.
   * Used before loading so that a bad image never partially loads.
   */
  static fits(regions: MemoryRegion[]): boolean {
    return regions.every(
      (r) => r.startAddress >= 0 && r.startAddress + r.data.length <= MEMORY_SIZE
    );
  }

  /** Copy regions into memory. Throws RangeError (before writing anything) if one does not fit. */
  loadRegions(regions: MemoryRegion[]): void {
    if (!Chip8Memory.fits(regions)) {
      throw new RangeError('Program image does not fit in memory');
    }
    for (const region of regions) {
      this.ram.set(region.data, region.startAddress);
    }
  }

  /** Copy of a range of memory, for inspection. */
  dump(start: number, length: number): Uint8Array {
    return this.ram.slice(start, start + length);
  }

  private installFont(): void {
    this.ram.set(CHIP8_FONT, FONT_BASE);
  }
}
