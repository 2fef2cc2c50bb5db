import { writeFileSync } from 'node:fs';

import type { ExternalAssemblerCommand } from '../assembler/external.js';
import { defaultGnuAssembler, runExternalAssembler } from '../assembler/external.js';
import type { AsmFlags } from '../config/asmFlags.js';
import { readAsmFlags } from '../config/asmFlags.js';
import { readTargetSystem } from '../config/system.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { writeAsm } from '../formats/index.js';
import type { EmissionOptions, FinalAssembler, GenerateResult } from '../pipeline.js';
import { ASM_ABORTED, AsmAbortedError, alwaysAbort } from '../pipeline.js';
import type { Directive, Instruction, Program, TargetSystem } from '../x86/types.js';
import { DirectiveLog } from './log.js';
import type { AssemblerPass } from './passes.js';
import { PassPipeline } from './passes.js';
import { splitSections } from './sections.js';

/**
 * Sibling path the in-process object is written to under the `diff` keyword.
 */
export function diffOutputPath(outputPath: string): string {
  return `${outputPath}.diff.o`;
}

/**
 * Emission state for one compilation unit at a time: directive log, passes, the pending
 * in-process object, and the configuration read at construction.
 *
 * Call order per unit: `reset()`, `emit`/`directive` ..., `generateCode()`, `assembleFile()`.
 */
export class EmissionContext {
  readonly flags: AsmFlags;
  readonly system: TargetSystem;
  printAssembler: boolean;
  arch64: boolean;

  private readonly log = new DirectiveLog();
  private readonly passes = new PassPipeline();
  private readonly assembler: FinalAssembler;
  private readonly externalAssembler: ExternalAssemblerCommand;
  private binaryContent: Uint8Array | undefined;

  constructor(options: EmissionOptions = {}) {
    this.flags = options.flags ?? readAsmFlags();
    this.system = options.system ?? readTargetSystem();
    this.printAssembler = options.printAssembler ?? true;
    this.arch64 = options.arch64 ?? true;
    this.assembler = options.assembler ?? alwaysAbort;
    this.externalAssembler = options.externalAssembler ?? defaultGnuAssembler;
  }

  emit(ins: Instruction): void {
    this.log.emit(ins);
  }

  directive(d: Directive): void {
    this.log.directive(d);
  }

  /** Clear the directive log before generating the next unit. */
  reset(): void {
    this.log.reset();
  }

  /** Current log contents, before passes. */
  flush(): Program {
    return this.log.flush();
  }

  registerPass(pass: AssemblerPass): void {
    this.passes.registerPass(pass);
  }

  /** Object bytes produced by the last successful in-process assembly, awaiting `assembleFile`. */
  get pendingBinary(): Uint8Array | undefined {
    return this.binaryContent;
  }

  /**
   * Run the passes, attempt in-process assembly, and render text when printing is enabled
   * (always under `diff`).
   */
  generateCode(): GenerateResult {
    const diagnostics: Diagnostic[] = [];
    const program = this.passes.run(this.log.flush());
    this.binaryContent = undefined;

    const bin = this.tryAssemble(program, diagnostics);
    if (bin === undefined && this.flags.required) {
      diagnostics.push({
        id: DiagnosticIds.BinaryRequired,
        severity: 'error',
        message: 'Binary generation failed',
      });
      return { status: 'fatal', diagnostics, program };
    }
    if (bin !== undefined) this.binaryContent = bin;

    const status = bin !== undefined ? 'assembled' : 'fell-back';
    // `diff` compares against the external assembler, which needs the text.
    if (!this.printAssembler && !this.flags.diff) return { status, diagnostics, program };
    const asm = writeAsm(program, { system: this.system, arch64: this.arch64 });
    return { status, diagnostics, program, asm };
  }

  private tryAssemble(program: Program, diagnostics: Diagnostic[]): Uint8Array | undefined {
    if (this.flags.disabled) {
      diagnostics.push({
        id: DiagnosticIds.BinaryPrevented,
        severity: 'warning',
        message: 'Binary generation prevented by configuration',
      });
      return undefined;
    }

    let res: Uint8Array | typeof ASM_ABORTED;
    try {
      res = this.assembler.assemble(this.arch64 ? 'X64' : 'X86', splitSections(program));
    } catch (err) {
      if (!(err instanceof AsmAbortedError)) throw err;
      res = ASM_ABORTED;
    }
    if (res !== ASM_ABORTED) return res;

    if (!this.flags.required) {
      diagnostics.push({
        id: DiagnosticIds.BinaryFellBack,
        severity: 'info',
        message: 'In-process assembler aborted; falling back to the external assembler',
      });
    }
    return undefined;
  }

  /**
   * Produce `outputPath` from the pending in-process object, or from `inputPath` through the
   * external assembler. Returns 0 or the external assembler's exit status.
   *
   * Under `diff`, the pending object goes to `diffOutputPath(outputPath)` and the external
   * assembler still produces `outputPath`.
   */
  assembleFile(inputPath: string, outputPath: string): number {
    const content = this.binaryContent;
    if (content === undefined) {
      return runExternalAssembler(this.externalAssembler, inputPath, outputPath);
    }

    const target = this.flags.diff ? diffOutputPath(outputPath) : outputPath;
    writeFileSync(target, content);
    this.binaryContent = undefined;
    if (this.flags.diff) {
      return runExternalAssembler(this.externalAssembler, inputPath, outputPath);
    }
    return 0;
  }
}
