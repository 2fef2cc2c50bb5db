import {
  UnrepresentableValueError,
  conditionName,
  register16Name,
  register32Name,
  register64Name,
  register8Name,
  registerFName,
  relocSuffix,
  roundingImmediate,
} from '../x86/names.js';
import type {
  Addr,
  Constant,
  DataSize,
  Directive,
  Instruction,
  Mem,
  Offset,
  Operand,
  RegisterF,
  SymbolRef,
} from '../x86/types.js';
import { escapeStringLiteral, fitsInt32, hex64 } from './strings.js';
import type { RenderOptions } from './types.js';
import { alignmentBytes, byteDirectiveLines } from './common.js';

// AT&T syntax: `%reg`, `$imm`, source operand first, size suffixes on the mnemonic.

function intLiteral(n: bigint): string {
  return fitsInt32(n) ? n.toString() : `0x${hex64(n)}`;
}

function symbolText(sym: SymbolRef): string {
  return sym.reloc ? `${sym.name}${relocSuffix(sym.reloc)}` : sym.name;
}

function offsetText(offset: Offset): string {
  const d = offset.displacement;
  if (!offset.symbol) return intLiteral(d);
  const sym = symbolText(offset.symbol);
  if (d === 0n) return sym;
  return d > 0n ? `${sym}+${d}` : `${sym}${d}`;
}

function addrText<R>(addr: Addr<R>, regName: (r: R) => string): string {
  const regs = addr.regs;
  if (!regs || regs.scale === 0) return offsetText(addr.offset);

  const disp =
    addr.offset.symbol || addr.offset.displacement !== 0n ? offsetText(addr.offset) : '';
  const index = `%${regName(regs.index)}`;
  if (regs.base !== undefined) {
    const scale = regs.scale === 1 ? '' : `,${regs.scale}`;
    return `${disp}(%${regName(regs.base)},${index}${scale})`;
  }
  if (regs.scale === 1) return `${disp}(${index})`;
  return `${disp}(,${index},${regs.scale})`;
}

function memText(mem: Mem): string {
  return mem.width === 64 ? addrText(mem.addr, register64Name) : addrText(mem.addr, register32Name);
}

function regfText(reg: RegisterF): string {
  return reg.kind === 'tos' ? '%st' : `%${registerFName(reg)}`;
}

function operand(op: Operand): string {
  switch (op.kind) {
    case 'imm':
      return `$${offsetText(op.offset)}`;
    case 'rel':
      return offsetText(op.offset);
    case 'reg8':
      return `%${register8Name(op.reg)}`;
    case 'reg16':
      return `%${register16Name(op.reg)}`;
    case 'reg32':
      return `%${register32Name(op.reg)}`;
    case 'reg64':
      return `%${register64Name(op.reg)}`;
    case 'regf':
      return regfText(op.reg);
    case 'mem':
      return memText(op.mem);
  }
}

/** Direct targets print bare; register and memory targets take `*`. */
function branchTarget(op: Operand): string {
  if (op.kind === 'rel') return offsetText(op.offset);
  if (op.kind === 'imm') return offsetText(op.offset);
  return `*${operand(op)}`;
}

function intSuffix(op: Operand | undefined): string {
  if (!op) return '';
  switch (op.kind) {
    case 'reg8':
      return 'b';
    case 'reg16':
      return 'w';
    case 'reg32':
      return 'l';
    case 'reg64':
      return 'q';
    case 'mem':
      switch (op.type) {
        case 'BYTE':
          return 'b';
        case 'WORD':
          return 'w';
        case 'DWORD':
          return 'l';
        case 'QWORD':
          return 'q';
        default:
          return '';
      }
    default:
      return '';
  }
}

function floatSuffix(op: Operand): string {
  if (op.kind !== 'mem') return '';
  switch (op.type) {
    case 'REAL4':
      return 's';
    case 'REAL8':
      return 'l';
    case 'REAL10':
      return 't';
    default:
      return '';
  }
}

/** x87 integer loads/stores: `s` = 16-bit, `l` = 32-bit, `q` = 64-bit. */
function x87IntSuffix(op: Operand): string {
  if (op.kind !== 'mem') return '';
  switch (op.type) {
    case 'WORD':
      return 's';
    case 'DWORD':
      return 'l';
    case 'QWORD':
      return 'q';
    default:
      return '';
  }
}

/**
 * GNU `as` reads the reversible x87 mnemonics the other way round when the destination is
 * `%st(i)` with i > 0, so they are printed swapped to encode the intended operation.
 */
const reversedX87 = {
  fadd: 'fadd',
  fmul: 'fmul',
  fsub: 'fsubr',
  fsubr: 'fsub',
  fdiv: 'fdivr',
  fdivr: 'fdiv',
  fsubp: 'fsubrp',
  fsubrp: 'fsubp',
  fdivp: 'fdivrp',
  fdivrp: 'fdivp',
} as const;

function isStackSlot(op: Operand): boolean {
  return op.kind === 'regf' && op.reg.kind === 'st' && op.reg.index !== 0;
}

function line(mnemonic: string, ...args: Operand[]): string {
  if (args.length === 0) return `\t${mnemonic}`;
  return `\t${mnemonic}\t${args.map(operand).join(', ')}`;
}

export function gasInstruction(ins: Instruction): string {
  switch (ins.op) {
    case 'cdq':
      return '\tcltd';
    case 'cqo':
      return '\tcqto';
    case 'nop':
    case 'hlt':
    case 'ret':
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
      return line(`${ins.op}${intSuffix(ins.arg)}`, ins.arg);
    case 'bswap':
    case 'fnstsw':
    case 'fnstcw':
    case 'fldcw':
      return line(ins.op, ins.arg);
    case 'fstp':
    case 'fcomp':
    case 'fld':
      return line(`${ins.op}${floatSuffix(ins.arg)}`, ins.arg);
    case 'fild':
    case 'fistp':
      return line(`${ins.op}${x87IntSuffix(ins.arg)}`, ins.arg);

    case 'add':
    case 'sub':
    case 'xor':
    case 'or':
    case 'and':
    case 'cmp':
    case 'lea':
    case 'test':
    case 'mov':
    case 'xchg':
      return line(`${ins.op}${intSuffix(ins.dst) || intSuffix(ins.src)}`, ins.src, ins.dst);
    case 'sar':
    case 'shr':
    case 'sal':
      // The source is the count (`$n` or `%cl`), never the operand size.
      return line(`${ins.op}${intSuffix(ins.dst)}`, ins.src, ins.dst);
    case 'movzx':
      return line(`movz${intSuffix(ins.src)}${intSuffix(ins.dst)}`, ins.src, ins.dst);
    case 'movsx':
      return line(`movs${intSuffix(ins.src)}${intSuffix(ins.dst)}`, ins.src, ins.dst);
    case 'movsxd':
      return line('movslq', ins.src, ins.dst);
    case 'cvtsi2sd':
      return line(`cvtsi2sd${intSuffix(ins.src)}`, ins.src, ins.dst);
    case 'movss':
    case 'movsd':
    case 'addsd':
    case 'subsd':
    case 'mulsd':
    case 'divsd':
    case 'sqrtsd':
    case 'cvtss2sd':
    case 'cvtsd2ss':
    case 'cvtsd2si':
    case 'cvttsd2si':
    case 'ucomisd':
    case 'comisd':
    case 'xorpd':
    case 'andpd':
    case 'movapd':
    case 'movlpd':
    case 'faddp':
    case 'fmulp':
      return line(ins.op, ins.src, ins.dst);
    case 'fsubp':
    case 'fdivp':
    case 'fsubrp':
    case 'fdivrp':
      return line(reversedX87[ins.op], ins.src, ins.dst);

    case 'fadd':
    case 'fsub':
    case 'fmul':
    case 'fdiv':
    case 'fsubr':
    case 'fdivr':
      if (!ins.arg2) return line(`${ins.op}${floatSuffix(ins.arg)}`, ins.arg);
      return line(isStackSlot(ins.arg2) ? reversedX87[ins.op] : ins.op, ins.arg, ins.arg2);
    case 'fxch':
      return ins.arg ? line('fxch', ins.arg) : '\tfxch';
    case 'imul':
      return ins.dst
        ? line(`imul${intSuffix(ins.dst)}`, ins.src, ins.dst)
        : line(`imul${intSuffix(ins.src)}`, ins.src);
    case 'roundsd':
      return `\troundsd\t$${roundingImmediate(ins.rounding)}, ${operand(ins.src)}, ${operand(ins.dst)}`;
    case 'set':
      return line(`set${conditionName(ins.cond)}`, ins.arg);
    case 'j':
      return `\tj${conditionName(ins.cond)}\t${branchTarget(ins.arg)}`;
    case 'cmov':
      return line(`cmov${conditionName(ins.cond)}`, ins.src, ins.dst);
  }
}

function scst(c: Constant): string {
  switch (c.kind) {
    case 'int':
      return intLiteral(c.value);
    case 'float':
      return c.text;
    case 'label':
      return c.reloc ? `${c.name}${relocSuffix(c.reloc)}` : c.name;
    case 'add':
      return `(${scst(c.left)} + ${scst(c.right)})`;
    case 'sub':
      return `(${scst(c.left)} - ${scst(c.right)})`;
  }
}

/**
 * Constant expression text; only nested sums and differences are parenthesized.
 */
export function gasConstant(c: Constant): string {
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
      return '.byte';
    case 'B16':
      return '.word';
    case 'B32':
      return '.long';
    case 'B64':
      return '.quad';
  }
}

function log2Exact(n: number): number {
  const k = Math.log2(n);
  if (!Number.isInteger(k)) {
    throw new UnrepresentableValueError(`alignment ${n} is not a power of two`);
  }
  return k;
}

/**
 * Render one directive as GAS text. Returns `''` for directives GAS has no use for.
 */
export function gasDirective(d: Directive, opts: RenderOptions): string {
  const { system } = opts;
  switch (d.kind) {
    case 'ins':
      return `${gasInstruction(d.ins)}\n`;
    case 'section': {
      const plain = d.flags === undefined && d.args.length === 0 && d.names.length === 1;
      if (plain && d.names[0] === '.text') return '\t.text\n';
      if (plain && d.names[0] === '.data') return '\t.data\n';
      let out = `\t.section ${d.names.join(',')}`;
      if (d.flags !== undefined) out += `,"${escapeStringLiteral(d.flags)}"`;
      if (d.args.length > 0) out += `,${d.args.join(',')}`;
      return `${out}\n`;
    }
    case 'global':
      return `\t.globl\t${d.name}\n`;
    case 'privateExtern':
      return `\t.private_extern\t${d.name}\n`;
    case 'label':
      return `${d.name}:\n`;
    case 'bytes':
      if (system === 'solaris') return byteDirectiveLines('.byte', d.data);
      return `\t.ascii\t"${escapeStringLiteral(d.data)}"\n`;
    case 'space':
      return system === 'solaris' ? `\t.zero\t${d.size}\n` : `\t.space\t${d.size}\n`;
    case 'comment':
      return `\t\t\t\t/* ${d.text} */\n`;
    case 'constant':
      return `\t${dataDirective(d.size)}\t${gasConstant(d.value)}\n`;
    case 'set':
      return `\t.set ${d.name}, ${gasConstant(d.value)}\n`;
    case 'align': {
      // Mach-O `.align` takes an exponent.
      const n = alignmentBytes(d);
      return system === 'macosx' ? `\t.align\t${log2Exact(n)}\n` : `\t.align\t${n}\n`;
    }
    case 'file':
      return `\t.file\t${d.fileNum}\t"${escapeStringLiteral(d.name)}"\n`;
    case 'loc':
      return `\t.loc\t${d.fileNum}\t${d.line}\n`;
    case 'cfiStartProc':
      return '\t.cfi_startproc\n';
    case 'cfiEndProc':
      return '\t.cfi_endproc\n';
    case 'cfiAdjustCfaOffset':
      return `\t.cfi_adjust_cfa_offset ${d.delta}\n`;
    case 'indirectSymbol':
      return `\t.indirect_symbol ${d.name}\n`;
    case 'type':
      return `\t.type ${d.name},${d.type}\n`;
    case 'size':
      return `\t.size ${d.name},${gasConstant(d.value)}\n`;
    case 'external':
    case 'mode386':
    case 'model':
    case 'end':
      return '';
  }
}
