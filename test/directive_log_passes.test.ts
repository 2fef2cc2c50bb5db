import { describe, expect, it } from 'vitest';

import { EmissionContext } from '../src/emit/context.js';
import { DirectiveLog } from '../src/emit/log.js';
import type { AssemblerPass } from '../src/emit/passes.js';
import { PassPipeline } from '../src/emit/passes.js';
import { parseAsmFlags } from '../src/config/asmFlags.js';
import { renderProgram } from '../src/formats/index.js';
import { comment, global, ins, label, nullary } from '../src/x86/dsl.js';
import type { Program } from '../src/x86/types.js';

describe('directive log', () => {
  it('keeps emission order', () => {
    const log = new DirectiveLog();
    log.directive(global('f'));
    log.directive(label('f'));
    log.emit(nullary('ret'));
    expect(log.flush()).toEqual([global('f'), label('f'), ins(nullary('ret'))]);
    expect(log.length).toBe(3);
  });

  it('is empty after reset', () => {
    const log = new DirectiveLog();
    log.emit(nullary('nop'));
    log.emit(nullary('ret'));
    log.reset();
    expect(log.flush()).toEqual([]);
  });

  it('flush does not clear the log', () => {
    const log = new DirectiveLog();
    log.emit(nullary('nop'));
    expect(log.flush()).toEqual(log.flush());
    expect(log.length).toBe(1);
  });
});

describe('pass pipeline', () => {
  const appendRet: AssemblerPass = (p) => [...p, ins(nullary('ret'))];
  const dropComments: AssemblerPass = (p) => p.filter((d) => d.kind !== 'comment');
  const tagFirst: AssemblerPass = (p) => [comment(`len=${p.length}`), ...p];

  it('threads the program through passes in registration order', () => {
    const program: Program = [comment('a'), ins(nullary('nop'))];
    const pipeline = new PassPipeline();
    pipeline.registerPass(appendRet);
    pipeline.registerPass(tagFirst);
    expect(pipeline.run(program)).toEqual(tagFirst(appendRet(program)));
    expect(pipeline.run(program)).toEqual([
      comment('len=3'),
      comment('a'),
      ins(nullary('nop')),
      ins(nullary('ret')),
    ]);
  });

  it('each pass sees the previous pass output', () => {
    const program: Program = [comment('a'), ins(nullary('nop'))];
    const pipeline = new PassPipeline();
    pipeline.registerPass(dropComments);
    pipeline.registerPass(tagFirst);
    expect(pipeline.run(program)).toEqual([comment('len=1'), ins(nullary('nop'))]);
  });

  it('returns the input unchanged with no passes', () => {
    const program: Program = [ins(nullary('nop'))];
    const pipeline = new PassPipeline();
    expect(pipeline.size).toBe(0);
    expect(pipeline.run(program)).toBe(program);
  });

  it('leaves rendering byte-identical when no pass is registered', () => {
    const ctx = new EmissionContext({ flags: parseAsmFlags(undefined), system: 'linux' });
    ctx.directive(global('f'));
    ctx.directive(label('f'));
    ctx.emit(nullary('ret'));
    const res = ctx.generateCode();
    expect(res.status).toBe('fell-back');
    if (res.status === 'fatal') return;
    expect(res.asm?.text).toBe(renderProgram(ctx.flush(), { system: 'linux', arch64: true }));
    expect(res.asm?.text).toBe('\t.globl\tf\nf:\n\tret\n');
  });
});
