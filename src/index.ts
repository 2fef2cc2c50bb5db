export * from './x86/types.js';
export * from './x86/names.js';
export * as x86 from './x86/dsl.js';
export * from './pipeline.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { DiagnosticIds } from './diagnostics/types.js';
export type { AsmFlags } from './config/asmFlags.js';
export { ASM_FLAGS_ENV, parseAsmFlags, readAsmFlags } from './config/asmFlags.js';
export type { DialectKind } from './config/system.js';
export { SYSTEM_ENV, dialectOf, readTargetSystem, systemFromName } from './config/system.js';
export type { AssemblerConvention, ExternalAssemblerCommand } from './assembler/external.js';
export {
  assemblerArgv,
  defaultGnuAssembler,
  runExternalAssembler,
} from './assembler/external.js';
export { DirectiveLog } from './emit/log.js';
export type { AssemblerPass } from './emit/passes.js';
export { PassPipeline } from './emit/passes.js';
export { DEFAULT_SECTION, splitSections } from './emit/sections.js';
export { EmissionContext, diffOutputPath } from './emit/context.js';
export type { AsmArtifact, RenderOptions } from './formats/types.js';
export {
  escapeStringLiteral,
  mangleSymbol,
  renderDirective,
  renderProgram,
  writeAsm,
} from './formats/index.js';
export type { DiagnosticSink, UnitPaths } from './driver.js';
export { EXIT_BINARY_REQUIRED, formatDiagnostic, runUnit } from './driver.js';
