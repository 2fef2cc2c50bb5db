import { describe, expect, it } from 'vitest';

import { renderDirective, renderProgram } from '../src/formats/index.js';
import { masmConstant, masmInstruction } from '../src/formats/masm.js';
import type { RenderOptions } from '../src/formats/types.js';
import {
  align,
  binary,
  bytes,
  cfiStartProc,
  cmov,
  comment,
  constAdd,
  constInt,
  constLabel,
  constSub,
  constant,
  end,
  external,
  file,
  global,
  imm,
  immSym,
  imul,
  ins,
  jcc,
  label,
  mem32,
  mem64,
  mode386,
  model,
  nullary,
  privateExtern,
  reg32,
  reg64,
  reg8,
  rel,
  ripRel,
  roundsd,
  section,
  setSymbol,
  setcc,
  space,
  st,
  tos,
  unary,
  x87,
  xmm,
} from '../src/x86/dsl.js';
import { UnrepresentableValueError } from '../src/x86/names.js';

const win64: RenderOptions = { system: 'win64', arch64: true };

describe('MASM instructions', () => {
  it('prints destination first with bare registers', () => {
    expect(masmInstruction(binary('mov', imm(42), reg32('RAX')))).toBe('\tmov\teax, 42');
    expect(masmInstruction(binary('add', reg64('RBX'), reg64('RAX')))).toBe('\tadd\trax, rbx');
    expect(masmInstruction(cmov('GE', reg64('RBX'), reg64('RAX')))).toBe('\tcmovge\trax, rbx');
    expect(masmInstruction(setcc('NE', reg8('CL')))).toBe('\tsetne\tcl');
  });

  it('prints typed memory operands', () => {
    const load = (m: ReturnType<typeof mem64>) => masmInstruction(binary('mov', m, reg64('RAX')));
    expect(load(mem64('QWORD', { base: 'RSP', displacement: 16 }))).toBe(
      '\tmov\trax, QWORD PTR [rsp+16]',
    );
    expect(load(mem64('DWORD', { base: 'RAX', index: 'RBX', scale: 4, displacement: -8 }))).toBe(
      '\tmov\trax, DWORD PTR [rax+rbx*4-8]',
    );
    expect(load(mem64('QWORD', { index: 'RCX', scale: 8, symbol: 'tbl' }))).toBe(
      '\tmov\trax, QWORD PTR tbl[rcx*8]',
    );
    expect(load(mem64('NO', { base: 'RSP' }))).toBe('\tmov\trax, [rsp]');
    expect(load(mem64('QWORD', { displacement: 64 }))).toBe('\tmov\trax, QWORD PTR [64]');
    expect(load(mem64('QWORD', { symbol: 'caml_globals', displacement: 8 }))).toBe(
      '\tmov\trax, QWORD PTR caml_globals+8',
    );
  });

  it('leaves RIP-relative references to the assembler and drops relocations', () => {
    const m = ripRel('QWORD', { name: 'caml_young_ptr', reloc: 'GOTPCREL' });
    expect(masmInstruction(binary('mov', m, reg64('RAX')))).toBe(
      '\tmov\trax, QWORD PTR caml_young_ptr',
    );
    expect(masmInstruction(unary('call', rel({ name: 'caml_alloc', reloc: 'PLT' })))).toBe(
      '\tcall\tcaml_alloc',
    );
  });

  it('prints symbolic immediates as OFFSET and wide integers in hex', () => {
    expect(masmInstruction(binary('mov', immSym('caml_exn'), reg64('RAX')))).toBe(
      '\tmov\trax, OFFSET caml_exn',
    );
    expect(masmInstruction(binary('mov', imm(0x1_0000_0000n, 'B64'), reg64('RAX')))).toBe(
      '\tmov\trax, 0100000000H',
    );
    expect(masmInstruction(binary('mov', imm(-1n, 'B64'), reg64('RAX')))).toBe(
      '\tmov\trax, -1',
    );
  });

  it('prints branches without indirection markers', () => {
    expect(masmInstruction(jcc('LE', rel('L7')))).toBe('\tjle\tL7');
    expect(masmInstruction(unary('jmp', reg64('RAX')))).toBe('\tjmp\trax');
    expect(masmInstruction(unary('call', immSym('caml_call_gc')))).toBe('\tcall\tcaml_call_gc');
    expect(masmInstruction(unary('jmp', immSym('caml_raise', 0, 'B32')))).toBe(
      '\tjmp\tcaml_raise',
    );
    expect(masmInstruction(jcc('E', immSym('L9')))).toBe('\tje\tL9');
    expect(masmInstruction(unary('call', mem64('QWORD', { base: 'RAX' })))).toBe(
      '\tcall\tQWORD PTR [rax]',
    );
  });

  it('prints x87 and SSE forms', () => {
    expect(masmInstruction(x87('fadd', st(1), tos()))).toBe('\tfadd\tst(0), st(1)');
    expect(masmInstruction(binary('fsubp', tos(), st(1)))).toBe('\tfsubp\tst(1), st(0)');
    expect(masmInstruction(x87('fsub', tos(), st(1)))).toBe('\tfsub\tst(1), st(0)');
    expect(masmInstruction(x87('fmul', mem64('REAL8', { base: 'RSP' })))).toBe(
      '\tfmul\tREAL8 PTR [rsp]',
    );
    expect(masmInstruction(roundsd('truncate', xmm(1), xmm(0)))).toBe('\troundsd\txmm0, xmm1, 3');
    expect(masmInstruction(binary('addsd', xmm(2), xmm(3)))).toBe('\taddsd\txmm3, xmm2');
    expect(masmInstruction(nullary('cqo'))).toBe('\tcqo');
  });

  it('prints one- and two-operand imul', () => {
    expect(masmInstruction(imul(imm(3), reg64('RCX')))).toBe('\timul\trcx, 3');
    expect(masmInstruction(imul(reg64('RCX')))).toBe('\timul\trcx');
  });

  it('prints 32-bit addressing', () => {
    const dst = mem32('DWORD', { base: 'RAX', index: 'RDX', scale: 2 });
    const store = binary('mov', reg32('RCX'), dst);
    expect(masmInstruction(store)).toBe('\tmov\tDWORD PTR [eax+edx*2], ecx');
  });
});

describe('MASM directives', () => {
  const render = (d: Parameters<typeof renderDirective>[0]) => renderDirective(d, win64);

  it('renders code and data segments', () => {
    expect(render(section(['.text']))).toBe('\t.CODE\n');
    expect(render(section(['.data']))).toBe('\t.DATA\n');
    expect(() => render(section(['.rodata'], 'a', ['@progbits']))).toThrow(
      UnrepresentableValueError,
    );
  });

  it('renders symbols and labels', () => {
    expect(render(global('caml_main'))).toBe('\tPUBLIC\tcaml_main\n');
    expect(render(external('caml_alloc', 'NEAR'))).toBe('\tEXTRN\tcaml_alloc: NEAR\n');
    expect(render(external('caml_young_ptr', 'QWORD'))).toBe('\tEXTRN\tcaml_young_ptr: QWORD\n');
    expect(render(label('L1'))).toBe('L1:\n');
    expect(render(label('caml_globals', 'QWORD'))).toBe('caml_globals LABEL QWORD\n');
  });

  it('renders data', () => {
    expect(render(bytes('AB'))).toBe('\tBYTE\t65,66\n');
    expect(render(bytes('abcdefghijklmnopq'))).toBe(
      '\tBYTE\t97,98,99,100,101,102,103,104,105,106,107,108,109,110,111,112\n\tBYTE\t113\n',
    );
    expect(render(space(8))).toBe('\tBYTE\t8 DUP (?)\n');
    expect(render(constant(constInt(7), 'B64'))).toBe('\tQWORD\t7\n');
    expect(render(constant(constLabel('caml_exn'), 'B32'))).toBe('\tDWORD\tcaml_exn\n');
    expect(render(setSymbol('x', constInt(3)))).toBe('x EQU 3\n');
    expect(render(comment('spill'))).toBe('\t\t\t\t; spill\n');
  });

  it('renders constant expressions', () => {
    expect(masmConstant(constSub(constLabel('a'), constLabel('b')))).toBe('a - b');
    expect(masmConstant(constAdd(constLabel('a'), constSub(constLabel('b'), constInt(1))))).toBe(
      'a + (b - 1)',
    );
    expect(masmConstant(constLabel('f', 'PLT'))).toBe('f');
  });

  it('renders alignment in bytes', () => {
    expect(render(align(16))).toBe('\tALIGN\t16\n');
    expect(render(align(3, true))).toBe('\tALIGN\t8\n');
  });

  it('renders mode, model and end', () => {
    expect(render(mode386())).toBe('\t.386\n');
    expect(render(model('FLAT'))).toBe('\t.MODEL FLAT\n');
    expect(render(end())).toBe('\tEND\n');
  });

  it('ignores GAS-only directives', () => {
    expect(render(file(1, 'a.ml'))).toBe('');
    expect(render(cfiStartProc())).toBe('');
    expect(render(privateExtern('f'))).toBe('');
  });

  it('renders a unit for win32 the same way', () => {
    const program = [
      mode386(),
      model('FLAT'),
      section(['.text']),
      global('_f'),
      label('_f'),
      ins(binary('mov', imm(1), reg32('RAX'))),
      ins(nullary('ret')),
      end(),
    ];
    const win32: RenderOptions = { system: 'win32', arch64: false };
    expect(renderProgram(program, win32)).toBe(
      '\t.386\n\t.MODEL FLAT\n\t.CODE\n\tPUBLIC\t_f\n_f:\n\tmov\teax, 1\n\tret\n\tEND\n',
    );
  });
});
