import type { ExternalAssemblerCommand } from './assembler/external.js';
import type { AsmFlags } from './config/asmFlags.js';
import type { Diagnostic } from './diagnostics/types.js';
import type { AsmArtifact } from './formats/types.js';
import type { Arch, Program, Section, TargetSystem } from './x86/types.js';

/**
 * Returned (or thrown as `AsmAbortedError`) by an in-process assembler that cannot produce a buffer.
 */
export const ASM_ABORTED: unique symbol = Symbol('ASM_ABORTED');
export type AsmAborted = typeof ASM_ABORTED;

export class AsmAbortedError extends Error {
  constructor(message = 'in-process assembly aborted') {
    super(message);
    this.name = 'AsmAbortedError';
  }
}

/**
 * In-process assembler capability: encode sections directly into object-file bytes.
 */
export interface FinalAssembler {
  assemble(arch: Arch, sections: ReadonlyMap<string, Section>): Uint8Array | AsmAborted;
}

/**
 * The assembler used when none is injected: every unit aborts.
 */
export const alwaysAbort: FinalAssembler = {
  assemble: () => ASM_ABORTED,
};

/**
 * Options for constructing an emission context.
 */
export interface EmissionOptions {
  /** In-process assembler; defaults to `alwaysAbort`. */
  assembler?: FinalAssembler;
  /** Keyword list; defaults to `readAsmFlags()` (read once, at construction). */
  flags?: AsmFlags;
  /** Target system selecting the dialect; defaults to `readTargetSystem()`. */
  system?: TargetSystem;
  /** Render textual assembly in `generateCode` (default: true). */
  printAssembler?: boolean;
  /** 64-bit target (default: true). */
  arch64?: boolean;
  /** External assembler used by `assembleFile` when no binary is pending, and under `diff`. */
  externalAssembler?: ExternalAssemblerCommand;
}

/**
 * Outcome of the binary attempt made by `generateCode`.
 *
 * - `assembled`: the in-process assembler produced bytes (pending in the context).
 * - `fell-back`: it aborted (or was disabled); `assembleFile` will run the external assembler.
 * - `fatal`: it aborted while the `yes` keyword demands success; nothing was rendered and the
 *   caller must abort the build.
 */
export type GenerateStatus = 'assembled' | 'fell-back' | 'fatal';

export type GenerateResult =
  | {
      status: Exclude<GenerateStatus, 'fatal'>;
      diagnostics: Diagnostic[];
      /** Program after all passes. */
      program: Program;
      /** Present when textual printing is enabled. */
      asm?: AsmArtifact;
    }
  | {
      status: 'fatal';
      diagnostics: Diagnostic[];
      program: Program;
    };
