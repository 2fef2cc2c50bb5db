import { writeFileSync } from 'node:fs';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import type { EmissionContext } from './emit/context.js';
import { diffOutputPath } from './emit/context.js';

/**
 * Paths for one unit: the textual assembly file and the object file to produce.
 */
export interface UnitPaths {
  asmPath: string;
  objPath: string;
}

/**
 * Where diagnostics go; `process.stderr` by default.
 */
export interface DiagnosticSink {
  write(text: string): unknown;
}

/** Exit status of a unit whose in-process assembly was required but aborted. */
export const EXIT_BINARY_REQUIRED = 2;

function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export function formatDiagnostic(d: Diagnostic): string {
  return `${d.file ?? 'x86-emit'}: ${d.severity}: [${d.id}] ${d.message}`;
}

function report(diagnostics: Diagnostic[], sink: DiagnosticSink): void {
  for (const d of [...diagnostics].sort(compareDiagnostics)) {
    sink.write(`${formatDiagnostic(d)}\n`);
  }
}

/**
 * Drive one compilation unit: reset the log, let `generate` fill it, then generate and assemble.
 *
 * Returns the exit status the caller should use: 0, `EXIT_BINARY_REQUIRED` when the `yes`
 * keyword was violated (nothing is written), or the external assembler's status.
 */
export function runUnit(
  ctx: EmissionContext,
  generate: (ctx: EmissionContext) => void,
  paths: UnitPaths,
  sink: DiagnosticSink = process.stderr,
): number {
  ctx.reset();
  generate(ctx);
  const res = ctx.generateCode();
  const diagnostics = [...res.diagnostics];

  if (res.status === 'fatal') {
    report(diagnostics, sink);
    return EXIT_BINARY_REQUIRED;
  }

  // Truncated even when nothing was rendered, so the external assembler never sees a previous
  // unit's text.
  writeFileSync(paths.asmPath, res.asm?.text ?? '', 'utf8');

  const assembled = res.status === 'assembled';
  const code = ctx.assembleFile(paths.asmPath, paths.objPath);
  if (assembled && ctx.flags.diff) {
    diagnostics.push({
      id: DiagnosticIds.DiffOutput,
      severity: 'info',
      message: `In-process object written to ${diffOutputPath(paths.objPath)}`,
      file: paths.objPath,
    });
  }
  if (code !== 0) {
    diagnostics.push({
      id: DiagnosticIds.ExternalAssemblerFailed,
      severity: 'error',
      message: `External assembler exited with status ${code}`,
      file: paths.asmPath,
    });
  }

  report(diagnostics, sink);
  return code;
}
