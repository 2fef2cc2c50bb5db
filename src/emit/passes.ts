import type { Program } from '../x86/types.js';

/**
 * Total rewrite of a whole program. A pass that has nothing to do returns its input.
 */
export type AssemblerPass = (program: Program) => Program;

export class PassPipeline {
  private readonly passes: AssemblerPass[] = [];

  registerPass(pass: AssemblerPass): void {
    this.passes.push(pass);
  }

  /** Thread `program` through every pass in registration order. */
  run(program: Program): Program {
    return this.passes.reduce((acc, pass) => pass(acc), program);
  }

  get size(): number {
    return this.passes.length;
  }
}
