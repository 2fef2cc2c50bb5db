import type {
  Addr,
  AddrRegs,
  BinaryOp,
  Condition,
  Constant,
  DataSize,
  DataType,
  Directive,
  Instruction,
  NullaryOp,
  Offset,
  Operand,
  Register16,
  Register32,
  Register64,
  Register8,
  RelocKind,
  Rounding,
  Scale,
  SymbolRef,
  UnaryOp,
  X87ArithOp,
} from './types.js';

/**
 * Value constructors for generators and tests.
 *
 * Nothing here validates operand combinations: whether `mov mem, mem` is encodable is the
 * assembler's concern.
 */

function symbolRef(symbol: string | SymbolRef): SymbolRef {
  return typeof symbol === 'string' ? { name: symbol } : symbol;
}

function offsetOf(symbol: string | SymbolRef | undefined, displacement: number | bigint): Offset {
  const offset: Offset = { displacement: BigInt(displacement) };
  if (symbol !== undefined) offset.symbol = symbolRef(symbol);
  return offset;
}

// Operands

export function imm(value: number | bigint, size: DataSize = 'B32'): Operand {
  return { kind: 'imm', size, offset: offsetOf(undefined, value) };
}

export function immSym(
  symbol: string | SymbolRef,
  displacement: number | bigint = 0,
  size: DataSize = 'B64',
): Operand {
  return { kind: 'imm', size, offset: offsetOf(symbol, displacement) };
}

export function rel(symbol: string | SymbolRef, size: DataSize = 'B32'): Operand {
  return { kind: 'rel', size, offset: offsetOf(symbol, 0) };
}

export function reg8(reg: Register8): Operand {
  return { kind: 'reg8', reg };
}

export function reg16(reg: Register16): Operand {
  return { kind: 'reg16', reg };
}

export function r32(reg: Register64): Register32 {
  return { kind: 'r32', reg };
}

export function reg32(reg: Register64): Operand {
  return { kind: 'reg32', reg: r32(reg) };
}

export function reg64(reg: Register64): Operand {
  return { kind: 'reg64', reg };
}

export function xmm(index: number): Operand {
  return { kind: 'regf', reg: { kind: 'xmm', index } };
}

export function tos(): Operand {
  return { kind: 'regf', reg: { kind: 'tos' } };
}

export function st(index: number): Operand {
  return { kind: 'regf', reg: { kind: 'st', index } };
}

export interface AddrParts<R> {
  base?: R;
  index?: R;
  scale?: Scale;
  symbol?: string | SymbolRef;
  displacement?: number | bigint;
}

function addrOf<R>(parts: AddrParts<R>): Addr<R> {
  const offset = offsetOf(parts.symbol, parts.displacement ?? 0);
  let regs: AddrRegs<R> | undefined;
  if (parts.index !== undefined) {
    regs = { index: parts.index, scale: parts.scale ?? 1 };
    if (parts.base !== undefined) regs.base = parts.base;
  } else if (parts.base !== undefined) {
    regs = { index: parts.base, scale: 1 };
  }
  return regs ? { regs, offset } : { offset };
}

export function mem64(type: DataType, parts: AddrParts<Register64>): Operand {
  return { kind: 'mem', type, mem: { width: 64, addr: addrOf(parts) } };
}

export function mem32(type: DataType, parts: AddrParts<Register64>): Operand {
  const wrapped: AddrParts<Register32> = {};
  if (parts.base !== undefined) wrapped.base = r32(parts.base);
  if (parts.index !== undefined) wrapped.index = r32(parts.index);
  if (parts.scale !== undefined) wrapped.scale = parts.scale;
  if (parts.symbol !== undefined) wrapped.symbol = parts.symbol;
  if (parts.displacement !== undefined) wrapped.displacement = parts.displacement;
  return { kind: 'mem', type, mem: { width: 32, addr: addrOf(wrapped) } };
}

/**
 * `symbol(%rip)` memory operand.
 */
export function ripRel(type: DataType, symbol: string | SymbolRef, displacement = 0): Operand {
  return mem64(type, { base: 'RIP', symbol, displacement });
}

// Constants

export function constInt(value: number | bigint, size: DataSize = 'B64'): Constant {
  return { kind: 'int', size, value: BigInt(value) };
}

export function constFloat(text: string): Constant {
  return { kind: 'float', text };
}

export function constLabel(name: string, reloc?: RelocKind): Constant {
  return reloc ? { kind: 'label', name, reloc } : { kind: 'label', name };
}

export function constAdd(left: Constant, right: Constant): Constant {
  return { kind: 'add', left, right };
}

export function constSub(left: Constant, right: Constant): Constant {
  return { kind: 'sub', left, right };
}

// Instructions

export function nullary(op: NullaryOp): Instruction {
  return { op };
}

export function unary(op: UnaryOp, arg: Operand): Instruction {
  return { op, arg };
}

export function binary(op: BinaryOp, src: Operand, dst: Operand): Instruction {
  return { op, src, dst };
}

export function x87(op: X87ArithOp, arg: Operand, arg2?: Operand): Instruction {
  return arg2 ? { op, arg, arg2 } : { op, arg };
}

export function fxch(arg?: Operand): Instruction {
  return arg ? { op: 'fxch', arg } : { op: 'fxch' };
}

export function imul(src: Operand, dst?: Operand): Instruction {
  return dst ? { op: 'imul', src, dst } : { op: 'imul', src };
}

export function roundsd(rounding: Rounding, src: Operand, dst: Operand): Instruction {
  return { op: 'roundsd', rounding, src, dst };
}

export function setcc(cond: Condition, arg: Operand): Instruction {
  return { op: 'set', cond, arg };
}

export function jcc(cond: Condition, arg: Operand): Instruction {
  return { op: 'j', cond, arg };
}

export function cmov(cond: Condition, src: Operand, dst: Operand): Instruction {
  return { op: 'cmov', cond, src, dst };
}

// Directives

export function ins(instruction: Instruction): Directive {
  return { kind: 'ins', ins: instruction };
}

export function section(names: string[], flags?: string, args: string[] = []): Directive {
  return flags === undefined
    ? { kind: 'section', names, args }
    : { kind: 'section', names, flags, args };
}

export function global(name: string): Directive {
  return { kind: 'global', name };
}

export function external(name: string, type: DataType = 'NO'): Directive {
  return { kind: 'external', name, type };
}

export function privateExtern(name: string): Directive {
  return { kind: 'privateExtern', name };
}

export function label(name: string, type: DataType = 'NO'): Directive {
  return { kind: 'label', name, type };
}

export function bytes(data: string): Directive {
  return { kind: 'bytes', data };
}

export function space(size: number): Directive {
  return { kind: 'space', size };
}

export function comment(text: string): Directive {
  return { kind: 'comment', text };
}

export function constant(value: Constant, size: DataSize): Directive {
  return { kind: 'constant', value, size };
}

export function setSymbol(name: string, value: Constant): Directive {
  return { kind: 'set', name, value };
}

export function align(value: number, powerOfTwo = false): Directive {
  return { kind: 'align', powerOfTwo, value };
}

export function file(fileNum: number, name: string): Directive {
  return { kind: 'file', fileNum, name };
}

export function loc(fileNum: number, line: number): Directive {
  return { kind: 'loc', fileNum, line };
}

export function cfiStartProc(): Directive {
  return { kind: 'cfiStartProc' };
}

export function cfiEndProc(): Directive {
  return { kind: 'cfiEndProc' };
}

export function cfiAdjustCfaOffset(delta: number): Directive {
  return { kind: 'cfiAdjustCfaOffset', delta };
}

export function indirectSymbol(name: string): Directive {
  return { kind: 'indirectSymbol', name };
}

export function symbolType(name: string, type: string): Directive {
  return { kind: 'type', name, type };
}

export function symbolSize(name: string, value: Constant): Directive {
  return { kind: 'size', name, value };
}

export function mode386(): Directive {
  return { kind: 'mode386' };
}

export function model(name: string): Directive {
  return { kind: 'model', name };
}

export function end(): Directive {
  return { kind: 'end' };
}
