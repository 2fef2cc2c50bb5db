/**
 * Environment variable holding the `:`-separated keyword list that steers binary generation.
 */
export const ASM_FLAGS_ENV = 'X86_EMIT_ASM';

/**
 * Parsed keyword list.
 *
 * - `no`: never call the in-process assembler.
 * - `yes`: an in-process assembler abort is fatal.
 * - `diff`: keep the in-process object beside the external assembler's output.
 *
 * Unknown keywords are kept in `keywords` (companion components read their own) and otherwise ignored.
 */
export interface AsmFlags {
  keywords: readonly string[];
  disabled: boolean;
  required: boolean;
  diff: boolean;
}

export function parseAsmFlags(value: string | undefined): AsmFlags {
  const keywords = value === undefined || value === '' ? [] : value.split(':');
  return {
    keywords,
    disabled: keywords.includes('no'),
    required: keywords.includes('yes'),
    diff: keywords.includes('diff'),
  };
}

/**
 * Read the keyword list once from the environment.
 */
export function readAsmFlags(env: NodeJS.ProcessEnv = process.env): AsmFlags {
  return parseAsmFlags(env[ASM_FLAGS_ENV]);
}
