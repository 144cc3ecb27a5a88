import type { Chip8Cpu } from './chip8';
import { type Operands, FLAG_REGISTER, FONT_BASE, FONT_GLYPH_BYTES, keyFromNibble } from './types';

export interface Opcode {
  /** Mnemonic with operand placeholders, e.g. "ADD Vx, Vy". */
  name: string;
  /** Bits of the instruction word that select this opcode. */
  mask: number;
  /** Required value of `word & mask`. */
  match: number;
  execute: (cpu: Chip8Cpu, op: Operands) => void | Promise<void>;
}

/**
 * Build the opcode table, grouped by the high nibble of the instruction word.
 * Within a group, more specific patterns come first ($00E0 and $00EE before $0nnn).
 */
export function buildOpcodeTable(): Opcode[][] {
  const groups: Opcode[][] = Array.from({ length: 16 }, () => []);

  const def = (
    name: string,
    mask: number,
    match: number,
    execute: Opcode['execute'],
  ) => {
    groups[(match >> 12) & 0xf].push({ name, mask, match, execute });
  };

  // --- 0: system ---
  def('CLS', 0xffff, 0x00e0, (cpu) => {
    cpu.screen.clear();
    cpu.screen.present();
  });
  def('RET', 0xffff, 0x00ee, (cpu) => {
    cpu.pc = cpu.pop();
  });
  // Native machine-code call: no portable meaning, treated as a no-op.
  def('SYS addr', 0xf000, 0x0000, () => {});

  // --- Control flow ---
  def('JP addr', 0xf000, 0x1000, (cpu, op) => {
    cpu.pc = op.nnn;
  });
  def('CALL addr', 0xf000, 0x2000, (cpu, op) => {
    cpu.checkRange(op.nnn, 2, 'CALL target');
    cpu.push(cpu.pc);
    cpu.pc = op.nnn;
  });
  def('SE Vx, byte', 0xf000, 0x3000, (cpu, op) => {
    cpu.skipIf(cpu.v[op.x] === op.kk);
  });
  def('SNE Vx, byte', 0xf000, 0x4000, (cpu, op) => {
    cpu.skipIf(cpu.v[op.x] !== op.kk);
  });
  def('SE Vx, Vy', 0xf00f, 0x5000, (cpu, op) => {
    cpu.skipIf(cpu.v[op.x] === cpu.v[op.y]);
  });

  // --- Register loads and arithmetic ---
  def('LD Vx, byte', 0xf000, 0x6000, (cpu, op) => {
    cpu.v[op.x] = op.kk;
  });
  def('ADD Vx, byte', 0xf000, 0x7000, (cpu, op) => {
    cpu.v[op.x] = (cpu.v[op.x] + op.kk) & 0xff;
  });
  def('LD Vx, Vy', 0xf00f, 0x8000, (cpu, op) => {
    cpu.v[op.x] = cpu.v[op.y];
  });
  def('OR Vx, Vy', 0xf00f, 0x8001, (cpu, op) => {
    cpu.v[op.x] |= cpu.v[op.y];
  });
  def('AND Vx, Vy', 0xf00f, 0x8002, (cpu, op) => {
    cpu.v[op.x] &= cpu.v[op.y];
  });
  def('XOR Vx, Vy', 0xf00f, 0x8003, (cpu, op) => {
    cpu.v[op.x] ^= cpu.v[op.y];
  });
  def('ADD Vx, Vy', 0xf00f, 0x8004, (cpu, op) => {
    const sum = cpu.v[op.x] + cpu.v[op.y];
    cpu.v[op.x] = sum & 0xff;
    cpu.v[FLAG_REGISTER] = sum > 0xff ? 1 : 0;
  });
  // VF = NOT borrow. Equal operands count as "no borrow" (>=, not >).
  def('SUB Vx, Vy', 0xf00f, 0x8005, (cpu, op) => {
    const a = cpu.v[op.x];
    const b = cpu.v[op.y];
    cpu.v[op.x] = (a - b) & 0xff;
    cpu.v[FLAG_REGISTER] = a >= b ? 1 : 0;
  });
  def('SHR Vx', 0xf00f, 0x8006, (cpu, op) => {
    const value = cpu.v[op.x];
    cpu.v[op.x] = value >> 1;
    cpu.v[FLAG_REGISTER] = value & 0x01;
  });
  def('SUBN Vx, Vy', 0xf00f, 0x8007, (cpu, op) => {
    const a = cpu.v[op.x];
    const b = cpu.v[op.y];
    cpu.v[op.x] = (b - a) & 0xff;
    cpu.v[FLAG_REGISTER] = b >= a ? 1 : 0;
  });
  def('SHL Vx', 0xf00f, 0x800e, (cpu, op) => {
    const value = cpu.v[op.x];
    cpu.v[op.x] = (value << 1) & 0xff;
    cpu.v[FLAG_REGISTER] = (value & 0x80) !== 0 ? 1 : 0;
  });
  def('SNE Vx, Vy', 0xf00f, 0x9000, (cpu, op) => {
    cpu.skipIf(cpu.v[op.x] !== cpu.v[op.y]);
  });

  // --- Addressing ---
  def('LD I, addr', 0xf000, 0xa000, (cpu, op) => {
    cpu.i = op.nnn;
  });
  def('JP V0, addr', 0xf000, 0xb000, (cpu, op) => {
    cpu.pc = cpu.v[0] + op.nnn;
  });
  def('RND Vx, byte', 0xf000, 0xc000, (cpu, op) => {
    cpu.v[op.x] = cpu.random() & 0xff & op.kk;
  });

  // --- Drawing ---
  def('DRW Vx, Vy, nibble', 0xf000, 0xd000, (cpu, op) => {
    const rows = new Uint8Array(op.n);
    for (let row = 0; row < op.n; row++) {
      rows[row] = cpu.readByte(cpu.i + row);
    }
    const collision = cpu.screen.xorSprite(cpu.v[op.x], cpu.v[op.y], rows);
    cpu.v[FLAG_REGISTER] = collision ? 1 : 0;
    cpu.screen.present();
  });

  // --- Keypad ---
  def('SKP Vx', 0xf0ff, 0xe09e, (cpu, op) => {
    cpu.skipIf(cpu.keys.isPressed(keyFromNibble(cpu.v[op.x])));
  });
  def('SKNP Vx', 0xf0ff, 0xe0a1, (cpu, op) => {
    cpu.skipIf(!cpu.keys.isPressed(keyFromNibble(cpu.v[op.x])));
  });

  // --- Timers, keypad wait, memory transfers ---
  def('LD Vx, DT', 0xf0ff, 0xf007, (cpu, op) => {
    cpu.v[op.x] = cpu.delayTimer.value();
  });
  def('LD Vx, K', 0xf0ff, 0xf00a, async (cpu, op) => {
    cpu.v[op.x] = await cpu.waitForKey();
  });
  def('LD DT, Vx', 0xf0ff, 0xf015, (cpu, op) => {
    cpu.delayTimer.set(cpu.v[op.x]);
  });
  def('LD ST, Vx', 0xf0ff, 0xf018, (cpu, op) => {
    cpu.soundTimer.set(cpu.v[op.x]);
  });
  // I is not bounds-checked here; only the accesses that use it are.
  def('ADD I, Vx', 0xf0ff, 0xf01e, (cpu, op) => {
    cpu.i = (cpu.i + cpu.v[op.x]) & 0xffff;
  });
  def('LD F, Vx', 0xf0ff, 0xf029, (cpu, op) => {
    cpu.i = FONT_BASE + FONT_GLYPH_BYTES * (cpu.v[op.x] % 16);
  });
  def('LD B, Vx', 0xf0ff, 0xf033, (cpu, op) => {
    const value = cpu.v[op.x];
    cpu.checkRange(cpu.i, 3, 'BCD write');
    cpu.writeByte(cpu.i, Math.floor(value / 100));
    cpu.writeByte(cpu.i + 1, Math.floor(value / 10) % 10);
    cpu.writeByte(cpu.i + 2, value % 10);
  });
  def('LD [I], Vx', 0xf0ff, 0xf055, (cpu, op) => {
    cpu.checkRange(cpu.i, op.x + 1, 'Register store');
    for (let r = 0; r <= op.x; r++) {
      cpu.writeByte(cpu.i + r, cpu.v[r]);
    }
  });
  def('LD Vx, [I]', 0xf0ff, 0xf065, (cpu, op) => {
    cpu.checkRange(cpu.i, op.x + 1, 'Register load');
    for (let r = 0; r <= op.x; r++) {
      cpu.v[r] = cpu.readByte(cpu.i + r);
    }
  });

  return groups;
}

/** Find the opcode matching `word`, or null if the word is not a valid instruction. */
export function decode(table: Opcode[][], word: number): Opcode | null {
  for (const opcode of table[(word >> 12) & 0xf]) {
    if ((word & opcode.mask) === opcode.match) return opcode;
  }
  return null;
}
