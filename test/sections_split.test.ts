import { describe, expect, it } from 'vitest';

import { splitSections } from '../src/emit/sections.js';
import {
  bytes,
  constInt,
  constant,
  ins,
  label,
  nullary,
  section,
} from '../src/x86/dsl.js';
import type { Program } from '../src/x86/types.js';

describe('section splitter', () => {
  const nop = ins(nullary('nop'));
  const ret = ins(nullary('ret'));
  const hlt = ins(nullary('hlt'));
  const word = constant(constInt(7), 'B64');
  const text = bytes('hi');

  const program: Program = [
    label('f'),
    nop,
    section(['.data']),
    word,
    section(['.text']),
    ret,
    section(['.rodata'], 'a', ['@progbits']),
    text,
    section(['.a', '.b']),
    hlt,
  ];

  it('groups directives under the section active when they were emitted', () => {
    const sections = splitSections(program);
    expect([...sections.keys()]).toEqual(['.text', '.data', '.rodata']);
    expect(sections.get('.text')?.directives).toEqual([label('f'), nop, ret]);
    expect(sections.get('.data')?.directives).toEqual([word]);
    expect(sections.get('.rodata')?.directives).toEqual([text, hlt]);
    expect(sections.get('.rodata')?.name).toBe('.rodata');
  });

  it('keeps every non-switch directive exactly once', () => {
    const sections = splitSections(program);
    const total = [...sections.values()].reduce((n, s) => n + s.directives.length, 0);
    const switches = program.filter((d) => d.kind === 'section').length;
    expect(total).toBe(program.length - switches);
  });

  it('treats a multi-target section directive as a marker only', () => {
    const sections = splitSections([section(['.a', '.b']), nop]);
    expect([...sections.keys()]).toEqual(['.text']);
    expect(sections.get('.text')?.directives).toEqual([nop]);
  });

  it('always has .text first, even when empty', () => {
    expect([...splitSections([]).entries()]).toEqual([['.text', { name: '.text', directives: [] }]]);
    const sections = splitSections([section(['.data']), word]);
    expect([...sections.keys()]).toEqual(['.text', '.data']);
    expect(sections.get('.text')?.directives).toEqual([]);
  });

  it('appends to a section re-entered later', () => {
    const sections = splitSections([
      section(['.data']),
      word,
      section(['.text']),
      nop,
      section(['.data']),
      text,
    ]);
    expect(sections.get('.data')?.directives).toEqual([word, text]);
    expect(sections.get('.text')?.directives).toEqual([nop]);
  });
});
