/**
 * x86 instruction and directive contracts.
 *
 * This module defines values only. Name resolution lives in `names.ts`, constructors in `dsl.ts`,
 * and textual rendering in `../formats/`.
 */

export const CONDITIONS = [
  'O',
  'NO',
  'B',
  'C',
  'NAE',
  'NB',
  'NC',
  'AE',
  'Z',
  'E',
  'NZ',
  'NE',
  'BE',
  'NA',
  'NBE',
  'A',
  'S',
  'NS',
  'P',
  'PE',
  'NP',
  'PO',
  'L',
  'NGE',
  'NL',
  'GE',
  'LE',
  'NG',
  'NLE',
  'G',
] as const;

/**
 * Condition-code tag used by `set`, `j` and `cmov`. Aliases (e.g. `Z`/`E`) stay distinct values.
 */
export type Condition = (typeof CONDITIONS)[number];

export type Rounding = 'nearest' | 'down' | 'up' | 'truncate';

export type RelocKind = 'PLT' | 'GOTPCREL';

/**
 * Range of an immediate, or the width a symbol is used at (B32 for displacements, B64 for
 * 64-bit immediates).
 */
export type DataSize = 'B8' | 'B16' | 'B32' | 'B64';

/**
 * Declared type of a memory operand or label. Only MASM prints it; `NO` means "untyped".
 */
export type DataType =
  | 'NO'
  | 'REAL4'
  | 'REAL8'
  | 'REAL10'
  | 'BYTE'
  | 'WORD'
  | 'DWORD'
  | 'QWORD'
  | 'TBYTE'
  | 'OWORD'
  | 'NEAR'
  | 'PROC';

export const REGISTERS_64 = [
  'RAX',
  'RBX',
  'RDI',
  'RSI',
  'RDX',
  'RCX',
  'RBP',
  'RSP',
  'R8',
  'R9',
  'R10',
  'R11',
  'R12',
  'R13',
  'R14',
  'R15',
  'RIP',
] as const;
export type Register64 = (typeof REGISTERS_64)[number];

export const REGISTERS_16 = [
  'AX',
  'BX',
  'DI',
  'SI',
  'DX',
  'CX',
  'SP',
  'BP',
  'R8W',
  'R9W',
  'R10W',
  'R11W',
  'R12W',
  'R13W',
  'R14W',
  'R15W',
] as const;
export type Register16 = (typeof REGISTERS_16)[number];

export const REGISTERS_8 = [
  'AL',
  'BL',
  'CL',
  'DL',
  'AH',
  'BH',
  'CH',
  'DH',
  'DIL',
  'SIL',
  'R8B',
  'R9B',
  'R10B',
  'R11B',
  'BPL',
  'R12B',
  'R13B',
  'SPL',
  'R14B',
  'R15B',
] as const;
export type Register8 = (typeof REGISTERS_8)[number];

/**
 * 32-bit view of a 64-bit register. `RIP` is representable here but has no 32-bit name.
 */
export interface Register32 {
  kind: 'r32';
  reg: Register64;
}

export type RegisterF =
  | { kind: 'xmm'; index: number }
  | { kind: 'tos' }
  | { kind: 'st'; index: number };

export type Constant =
  | { kind: 'int'; size: DataSize; value: bigint }
  /** Decimal text, printed as given. */
  | { kind: 'float'; text: string }
  | { kind: 'label'; name: string; reloc?: RelocKind }
  | { kind: 'add'; left: Constant; right: Constant }
  | { kind: 'sub'; left: Constant; right: Constant };

export interface SymbolRef {
  name: string;
  reloc?: RelocKind;
}

/**
 * Direct value: an optional symbol plus a 64-bit displacement.
 */
export interface Offset {
  symbol?: SymbolRef;
  displacement: bigint;
}

export type Scale = 0 | 1 | 2 | 4 | 8;

/**
 * Register part of an addressing expression.
 *
 * With `scale === 0` the registers are ignored and only the offset is used.
 * With `scale === 1` and no `base`, `index` acts as the base register.
 */
export interface AddrRegs<R> {
  index: R;
  scale: Scale;
  base?: R;
}

export interface Addr<R> {
  regs?: AddrRegs<R>;
  offset: Offset;
}

export type Mem = { width: 32; addr: Addr<Register32> } | { width: 64; addr: Addr<Register64> };

export type Operand =
  | { kind: 'imm'; size: DataSize; offset: Offset }
  | { kind: 'rel'; size: DataSize; offset: Offset }
  | { kind: 'reg8'; reg: Register8 }
  | { kind: 'reg16'; reg: Register16 }
  | { kind: 'reg32'; reg: Register32 }
  | { kind: 'reg64'; reg: Register64 }
  | { kind: 'regf'; reg: RegisterF }
  | { kind: 'mem'; type: DataType; mem: Mem };

export const NULLARY_OPS = [
  'nop',
  'hlt',
  'ret',
  'cdq',
  'cqo',
  'leave',
  'fcompp',
  'fchs',
  'fabs',
  'fld1',
  'fpatan',
  'fptan',
  'fcos',
  'fldln2',
  'fldlg2',
  'fyl2x',
  'fsin',
  'fsqrt',
  'fldz',
] as const;
export type NullaryOp = (typeof NULLARY_OPS)[number];

export const UNARY_OPS = [
  'inc',
  'dec',
  'neg',
  'idiv',
  'push',
  'pop',
  'call',
  'jmp',
  'bswap',
  'fstp',
  'fcomp',
  'fld',
  'fnstsw',
  'fnstcw',
  'fldcw',
  'fild',
  'fistp',
] as const;
export type UnaryOp = (typeof UNARY_OPS)[number];

export const BINARY_OPS = [
  'add',
  'sub',
  'xor',
  'or',
  'and',
  'cmp',
  'lea',
  'test',
  'mov',
  'movzx',
  'movsx',
  'movsxd',
  'movss',
  'movsd',
  'addsd',
  'subsd',
  'mulsd',
  'divsd',
  'sqrtsd',
  'cvtss2sd',
  'cvtsd2ss',
  'cvtsi2sd',
  'cvtsd2si',
  'cvttsd2si',
  'ucomisd',
  'comisd',
  'xorpd',
  'andpd',
  'movapd',
  'movlpd',
  'xchg',
  'sar',
  'shr',
  'sal',
  'faddp',
  'fsubp',
  'fmulp',
  'fdivp',
  'fsubrp',
  'fdivrp',
] as const;
export type BinaryOp = (typeof BINARY_OPS)[number];

export const X87_ARITH_OPS = ['fadd', 'fsub', 'fmul', 'fdiv', 'fsubr', 'fdivr'] as const;
export type X87ArithOp = (typeof X87_ARITH_OPS)[number];

/**
 * Machine instruction. Two-operand forms carry `src` and `dst` explicitly; each dialect
 * decides the printed order.
 */
export type Instruction =
  | { op: NullaryOp }
  | { op: UnaryOp; arg: Operand }
  | { op: BinaryOp; src: Operand; dst: Operand }
  | { op: X87ArithOp; arg: Operand; arg2?: Operand }
  | { op: 'fxch'; arg?: Operand }
  | { op: 'imul'; src: Operand; dst?: Operand }
  | { op: 'roundsd'; rounding: Rounding; src: Operand; dst: Operand }
  | { op: 'set'; cond: Condition; arg: Operand }
  | { op: 'j'; cond: Condition; arg: Operand }
  | { op: 'cmov'; cond: Condition; src: Operand; dst: Operand };

/**
 * One assembly line. Some variants only make sense for one object-format convention; the
 * dialect renderer decides whether to honour or ignore each of them.
 */
export type Directive =
  | { kind: 'ins'; ins: Instruction }
  | { kind: 'section'; names: string[]; flags?: string; args: string[] }
  | { kind: 'global'; name: string }
  | { kind: 'external'; name: string; type: DataType }
  | { kind: 'privateExtern'; name: string }
  | { kind: 'label'; name: string; type: DataType }
  | { kind: 'bytes'; data: string }
  | { kind: 'space'; size: number }
  | { kind: 'comment'; text: string }
  | { kind: 'constant'; value: Constant; size: DataSize }
  | { kind: 'set'; name: string; value: Constant }
  /** `powerOfTwo`: `value` is an exponent (align to `2 ** value` bytes) rather than a byte count. */
  | { kind: 'align'; powerOfTwo: boolean; value: number }
  | { kind: 'file'; fileNum: number; name: string }
  | { kind: 'loc'; fileNum: number; line: number }
  | { kind: 'cfiStartProc' }
  | { kind: 'cfiEndProc' }
  | { kind: 'cfiAdjustCfaOffset'; delta: number }
  | { kind: 'indirectSymbol'; name: string }
  | { kind: 'type'; name: string; type: string }
  | { kind: 'size'; name: string; value: Constant }
  | { kind: 'mode386' }
  | { kind: 'model'; name: string }
  | { kind: 'end' };

/**
 * Flat, ordered directive sequence exchanged between pipeline stages.
 */
export type Program = readonly Directive[];

/**
 * Named group of directives destined for one region of the object file.
 */
export interface Section {
  name: string;
  directives: readonly Directive[];
}

export type Arch = 'X64' | 'X86';

export const TARGET_SYSTEMS = [
  'macosx',
  'gnu',
  'cygwin',
  'solaris',
  'win32',
  'linux_elf',
  'bsd_elf',
  'beos',
  'mingw',
  'win64',
  'linux',
  'mingw64',
  'unknown',
] as const;
export type TargetSystem = (typeof TARGET_SYSTEMS)[number];
