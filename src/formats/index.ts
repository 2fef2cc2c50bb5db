import { dialectOf } from '../config/system.js';
import { UnrepresentableValueError } from '../x86/names.js';
import type { Directive, Instruction, Operand, Program } from '../x86/types.js';
import { gasDirective } from './gas.js';
import { masmDirective } from './masm.js';
import type { AsmArtifact, RenderOptions } from './types.js';

export { escapeStringLiteral, mangleSymbol } from './strings.js';

function operandsOf(ins: Instruction): Operand[] {
  const out: Operand[] = [];
  if ('arg' in ins && ins.arg) out.push(ins.arg);
  if ('arg2' in ins && ins.arg2) out.push(ins.arg2);
  if ('src' in ins) out.push(ins.src);
  if ('dst' in ins && ins.dst) out.push(ins.dst);
  return out;
}

/**
 * 64-bit registers and 64-bit addressing have no encoding in 32-bit code.
 */
function assertEncodableIn32Bit(ins: Instruction): void {
  for (const op of operandsOf(ins)) {
    if (op.kind === 'reg64' || (op.kind === 'mem' && op.mem.width === 64)) {
      throw new UnrepresentableValueError(`64-bit operand in 32-bit code (${ins.op})`);
    }
  }
}

/**
 * Render one directive for the dialect of `opts.system`.
 *
 * The result is zero or more complete lines (each ending in `\n`); `''` means the dialect ignores
 * the directive. Systems without a known dialect render GAS syntax without system-specific forms.
 */
export function renderDirective(d: Directive, opts: RenderOptions): string {
  if (!opts.arch64 && d.kind === 'ins') assertEncodableIn32Bit(d.ins);
  switch (dialectOf(opts.system)) {
    case 'masm':
      return masmDirective(d);
    case 'gas':
    case 'unknown':
      return gasDirective(d, opts);
  }
}

export function renderProgram(program: Program, opts: RenderOptions): string {
  return program.map((d) => renderDirective(d, opts)).join('');
}

/**
 * Create an in-memory `.s`/`.asm` artifact for a whole program.
 */
export function writeAsm(program: Program, opts: RenderOptions): AsmArtifact {
  return { kind: 'asm', text: renderProgram(program, opts) };
}
