import type {
  Condition,
  DataSize,
  DataType,
  Register16,
  Register32,
  Register64,
  Register8,
  RegisterF,
  RelocKind,
  Rounding,
} from './types.js';

/**
 * Thrown when a value is constructible but has no textual form (e.g. `RIP` at 32 bits).
 *
 * This is a generator bug: callers must not catch it and emit something else instead.
 */
export class UnrepresentableValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnrepresentableValueError';
  }
}

const REGISTER64_NAMES = {
  RAX: 'rax',
  RBX: 'rbx',
  RDI: 'rdi',
  RSI: 'rsi',
  RDX: 'rdx',
  RCX: 'rcx',
  RBP: 'rbp',
  RSP: 'rsp',
  R8: 'r8',
  R9: 'r9',
  R10: 'r10',
  R11: 'r11',
  R12: 'r12',
  R13: 'r13',
  R14: 'r14',
  R15: 'r15',
  RIP: 'rip',
} as const satisfies Record<Register64, string>;

const REGISTER32_NAMES = {
  RAX: 'eax',
  RBX: 'ebx',
  RDI: 'edi',
  RSI: 'esi',
  RDX: 'edx',
  RCX: 'ecx',
  RSP: 'esp',
  RBP: 'ebp',
  R8: 'r8d',
  R9: 'r9d',
  R10: 'r10d',
  R11: 'r11d',
  R12: 'r12d',
  R13: 'r13d',
  R14: 'r14d',
  R15: 'r15d',
} as const satisfies Record<Exclude<Register64, 'RIP'>, string>;

const REGISTER16_NAMES = {
  AX: 'ax',
  BX: 'bx',
  DI: 'di',
  SI: 'si',
  DX: 'dx',
  CX: 'cx',
  SP: 'sp',
  BP: 'bp',
  R8W: 'r8w',
  R9W: 'r9w',
  R10W: 'r10w',
  R11W: 'r11w',
  R12W: 'r12w',
  R13W: 'r13w',
  R14W: 'r14w',
  R15W: 'r15w',
} as const satisfies Record<Register16, string>;

const REGISTER8_NAMES = {
  AL: 'al',
  BL: 'bl',
  CL: 'cl',
  DL: 'dl',
  AH: 'ah',
  BH: 'bh',
  CH: 'ch',
  DH: 'dh',
  DIL: 'dil',
  SIL: 'sil',
  R8B: 'r8b',
  R9B: 'r9b',
  R10B: 'r10b',
  R11B: 'r11b',
  BPL: 'bpl',
  R12B: 'r12b',
  R13B: 'r13b',
  SPL: 'spl',
  R14B: 'r14b',
  R15B: 'r15b',
} as const satisfies Record<Register8, string>;

export function register64Name(reg: Register64): string {
  return REGISTER64_NAMES[reg];
}

export function register32Name(reg: Register32): string {
  const r64 = reg.reg;
  if (r64 === 'RIP') {
    throw new UnrepresentableValueError('RIP has no 32-bit register name');
  }
  return REGISTER32_NAMES[r64];
}

export function register16Name(reg: Register16): string {
  return REGISTER16_NAMES[reg];
}

export function register8Name(reg: Register8): string {
  return REGISTER8_NAMES[reg];
}

export function registerFName(reg: RegisterF): string {
  switch (reg.kind) {
    case 'xmm':
      return `xmm${reg.index}`;
    case 'tos':
      return 'tos';
    case 'st':
      return `st(${reg.index})`;
  }
}

/**
 * Lowercase mnemonic suffix for a condition (`NAE` -> `nae`). Aliases keep their own spelling.
 */
export function conditionName(cond: Condition): string {
  return cond.toLowerCase();
}

export function dataSizeName(size: DataSize): string {
  return size.toLowerCase();
}

export function dataSizeBits(size: DataSize): 8 | 16 | 32 | 64 {
  switch (size) {
    case 'B8':
      return 8;
    case 'B16':
      return 16;
    case 'B32':
      return 32;
    case 'B64':
      return 64;
  }
}

/**
 * MASM keyword for a declared data type. `NO` has none.
 */
export function dataTypeKeyword(type: DataType): string {
  if (type === 'NO') {
    throw new UnrepresentableValueError('data type NO has no keyword');
  }
  return type;
}

/**
 * Immediate operand of SSE4.1 `roundsd` for a rounding mode.
 */
export function roundingImmediate(rounding: Rounding): number {
  switch (rounding) {
    case 'nearest':
      return 0;
    case 'down':
      return 1;
    case 'up':
      return 2;
    case 'truncate':
      return 3;
  }
}

export function relocSuffix(reloc: RelocKind): string {
  return reloc === 'PLT' ? '@PLT' : '@GOTPCREL';
}
