import type { TargetSystem } from '../x86/types.js';

/**
 * Options shared by the dialect renderers.
 */
export interface RenderOptions {
  /** Target system; selects GAS or MASM syntax and system-specific forms. */
  system: TargetSystem;
  /** Render 64-bit code. */
  arch64: boolean;
}

/**
 * In-memory textual assembly artifact.
 */
export interface AsmArtifact {
  kind: 'asm';
  text: string;
}
