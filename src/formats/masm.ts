import {
  UnrepresentableValueError,
  conditionName,
  dataTypeKeyword,
  register16Name,
  register32Name,
  register64Name,
  register8Name,
  registerFName,
  roundingImmediate,
} from '../x86/names.js';
import type {
  Addr,
  Constant,
  DataSize,
  DataType,
  Directive,
  Instruction,
  Offset,
  Operand,
  RegisterF,
} from '../x86/types.js';
import { alignmentBytes, byteDirectiveLines } from './common.js';
import { fitsInt32, hex64 } from './strings.js';

// Intel syntax: bare registers, destination first, `TYPE PTR` memory operands.

function intLiteral(n: bigint): string {
  return fitsInt32(n) ? n.toString() : `0${hex64(n)}H`;
}

function offsetText(offset: Offset): string {
  const d = offset.displacement;
  if (!offset.symbol) return intLiteral(d);
  const sym = offset.symbol.name;
  if (d === 0n) return sym;
  return d > 0n ? `${sym}+${d}` : `${sym}${d}`;
}

function displacementSuffix(d: bigint): string {
  if (d === 0n) return '';
  return d > 0n ? `+${intLiteral(d)}` : intLiteral(d);
}

function ptrPrefix(type: DataType): string {
  return type === 'NO' ? '' : `${dataTypeKeyword(type)} PTR `;
}

function addrText<R>(addr: Addr<R>, regName: (r: R) => string): string {
  const regs = addr.regs;
  const { symbol, displacement } = addr.offset;
  if (!regs || regs.scale === 0) {
    return symbol ? offsetText(addr.offset) : `[${intLiteral(displacement)}]`;
  }
  const index = regName(regs.index);
  // The assembler makes symbol references RIP-relative by itself.
  if (index === 'rip') return offsetText(addr.offset);

  let inner = regs.base !== undefined ? `${regName(regs.base)}+${index}` : index;
  if (regs.scale !== 1) inner += `*${regs.scale}`;
  inner += displacementSuffix(displacement);
  return `${symbol ? symbol.name : ''}[${inner}]`;
}

function regfText(reg: RegisterF): string {
  return reg.kind === 'tos' ? 'st(0)' : registerFName(reg);
}

function operand(op: Operand): string {
  switch (op.kind) {
    case 'imm':
      return op.offset.symbol ? `OFFSET ${offsetText(op.offset)}` : intLiteral(op.offset.displacement);
    case 'rel':
      return offsetText(op.offset);
    case 'reg8':
      return register8Name(op.reg);
    case 'reg16':
      return register16Name(op.reg);
    case 'reg32':
      return register32Name(op.reg);
    case 'reg64':
      return register64Name(op.reg);
    case 'regf':
      return regfText(op.reg);
    case 'mem': {
      const { mem } = op;
      const addr =
        mem.width === 64
          ? addrText(mem.addr, register64Name)
          : addrText(mem.addr, register32Name);
      return `${ptrPrefix(op.type)}${addr}`;
    }
  }
}

/** Branch targets print bare, without `OFFSET`. */
function branchTarget(op: Operand): string {
  return op.kind === 'imm' ? offsetText(op.offset) : operand(op);
}

function line(mnemonic: string, ...args: Operand[]): string {
  if (args.length === 0) return `\t${mnemonic}`;
  return `\t${mnemonic}\t${args.map(operand).join(', ')}`;
}

export function masmInstruction(ins: Instruction): string {
  switch (ins.op) {
    case 'nop':
    case 'hlt':
    case 'ret':
    case 'cdq':
    case 'cqo':
    case 'leave':
    case 'fcompp':
    case 'fchs':
    case 'fabs':
    case 'fld1':
    case 'fpatan':
    case 'fptan':
    case 'fcos':
    case 'fldln2':
    case 'fldlg2':
    case 'fyl2x':
    case 'fsin':
    case 'fsqrt':
    case 'fldz':
      return `\t${ins.op}`;

    case 'call':
    case 'jmp':
      return `\t${ins.op}\t${branchTarget(ins.arg)}`;
    case 'inc':
    case 'dec':
    case 'neg':
    case 'idiv':
    case 'push':
    case 'pop':
    case 'bswap':
    case 'fstp':
    case 'fcomp':
    case 'fld':
    case 'fnstsw':
    case 'fnstcw':
    case 'fldcw':
    case 'fild':
    case 'fistp':
      return line(ins.op, ins.arg);

    case 'add':
    case 'sub':
    case 'xor':
    case 'or':
    case 'and':
    case 'cmp':
    case 'lea':
    case 'test':
    case 'mov':
    case 'movzx':
    case 'movsx':
    case 'movsxd':
    case 'movss':
    case 'movsd':
    case 'addsd':
    case 'subsd':
    case 'mulsd':
    case 'divsd':
    case 'sqrtsd':
    case 'cvtss2sd':
    case 'cvtsd2ss':
    case 'cvtsi2sd':
    case 'cvtsd2si':
    case 'cvttsd2si':
    case 'ucomisd':
    case 'comisd':
    case 'xorpd':
    case 'andpd':
    case 'movapd':
    case 'movlpd':
    case 'xchg':
    case 'sar':
    case 'shr':
    case 'sal':
    case 'faddp':
    case 'fsubp':
    case 'fmulp':
    case 'fdivp':
    case 'fsubrp':
    case 'fdivrp':
      return line(ins.op, ins.dst, ins.src);

    case 'fadd':
    case 'fsub':
    case 'fmul':
    case 'fdiv':
    case 'fsubr':
    case 'fdivr':
      return ins.arg2 ? line(ins.op, ins.arg2, ins.arg) : line(ins.op, ins.arg);
    case 'fxch':
      return ins.arg ? line('fxch', ins.arg) : '\tfxch';
    case 'imul':
      return ins.dst ? line('imul', ins.dst, ins.src) : line('imul', ins.src);
    case 'roundsd':
      return `\troundsd\t${operand(ins.dst)}, ${operand(ins.src)}, ${roundingImmediate(ins.rounding)}`;
    case 'set':
      return line(`set${conditionName(ins.cond)}`, ins.arg);
    case 'j':
      return `\tj${conditionName(ins.cond)}\t${branchTarget(ins.arg)}`;
    case 'cmov':
      return line(`cmov${conditionName(ins.cond)}`, ins.dst, ins.src);
  }
}

function scst(c: Constant): string {
  switch (c.kind) {
    case 'int':
      return intLiteral(c.value);
    case 'float':
      return c.text;
    case 'label':
      return c.name;
    case 'add':
      return `(${scst(c.left)} + ${scst(c.right)})`;
    case 'sub':
      return `(${scst(c.left)} - ${scst(c.right)})`;
  }
}

export function masmConstant(c: Constant): string {
  switch (c.kind) {
    case 'add':
      return `${scst(c.left)} + ${scst(c.right)}`;
    case 'sub':
      return `${scst(c.left)} - ${scst(c.right)}`;
    default:
      return scst(c);
  }
}

function dataDirective(size: DataSize): string {
  switch (size) {
    case 'B8':
      return 'BYTE';
    case 'B16':
      return 'WORD';
    case 'B32':
      return 'DWORD';
    case 'B64':
      return 'QWORD';
  }
}

/**
 * Render one directive as MASM text. Returns `''` for directives MASM has no use for
 * (debug lines, CFI, Mach-O/ELF symbol typing).
 */
export function masmDirective(d: Directive): string {
  switch (d.kind) {
    case 'ins':
      return `${masmInstruction(d.ins)}\n`;
    case 'section': {
      const plain = d.flags === undefined && d.args.length === 0 && d.names.length === 1;
      if (plain && d.names[0] === '.text') return '\t.CODE\n';
      if (plain && d.names[0] === '.data') return '\t.DATA\n';
      throw new UnrepresentableValueError(`MASM has no form for section ${d.names.join(',')}`);
    }
    case 'global':
      return `\tPUBLIC\t${d.name}\n`;
    case 'external':
      return `\tEXTRN\t${d.name}: ${dataTypeKeyword(d.type)}\n`;
    case 'label':
      return d.type === 'NO' ? `${d.name}:\n` : `${d.name} LABEL ${dataTypeKeyword(d.type)}\n`;
    case 'bytes':
      return byteDirectiveLines('BYTE', d.data);
    case 'space':
      return `\tBYTE\t${d.size} DUP (?)\n`;
    case 'comment':
      return `\t\t\t\t; ${d.text}\n`;
    case 'constant':
      return `\t${dataDirective(d.size)}\t${masmConstant(d.value)}\n`;
    case 'set':
      return `${d.name} EQU ${masmConstant(d.value)}\n`;
    case 'align':
      return `\tALIGN\t${alignmentBytes(d)}\n`;
    case 'mode386':
      return '\t.386\n';
    case 'model':
      return `\t.MODEL ${d.name}\n`;
    case 'end':
      return '\tEND\n';
    case 'privateExtern':
    case 'file':
    case 'loc':
    case 'cfiStartProc':
    case 'cfiEndProc':
    case 'cfiAdjustCfaOffset':
    case 'indirectSymbol':
    case 'type':
    case 'size':
      return '';
  }
}
