export { Chip8Cpu, type Chip8CpuOptions, type Chip8Devices, type Screen } from './chip8';
export { buildOpcodeTable, decode, type Opcode } from './opcodes';
export * from './errors';
export * from './types';
