/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * An emission diagnostic (error/warning/info).
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `X86E201`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  /** Path the diagnostic refers to, when one is known (e.g. the unit's output object). */
  file?: string;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'X86E000',

  /** Binary generation was disabled by the `no` keyword. */
  BinaryPrevented: 'X86E200',

  /** The in-process assembler aborted while the `yes` keyword demands success. */
  BinaryRequired: 'X86E201',

  /** The in-process assembler aborted; the external assembler will be used. */
  BinaryFellBack: 'X86E202',

  /** `diff` mode: the in-process binary was kept beside the external assembler's output. */
  DiffOutput: 'X86E203',

  /** External assembler exited with a non-zero status. */
  ExternalAssemblerFailed: 'X86E300',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
