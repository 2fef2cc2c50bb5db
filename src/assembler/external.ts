import { spawnSync } from 'node:child_process';

/**
 * Argument order expected by the external assembler.
 *
 * - `gnu`: `<command...> -o <output> <input>`
 * - `masm`: `<command...><output> <input>`; the output path is glued to the last command word
 *   (`/Fo`), as MASM tools expect.
 */
export type AssemblerConvention = 'gnu' | 'masm';

export interface ExternalAssemblerCommand {
  /** Program and leading arguments, e.g. `['as']` or `['ml64', '/nologo', '/Cp', '/c', '/Fo']`. */
  command: readonly string[];
  convention: AssemblerConvention;
  /** Keep the tool's stdout (MASM tools are silenced otherwise). */
  verbose?: boolean;
}

export const defaultGnuAssembler: ExternalAssemblerCommand = {
  command: ['as'],
  convention: 'gnu',
};

export function assemblerArgv(
  cmd: ExternalAssemblerCommand,
  inputPath: string,
  outputPath: string,
): string[] {
  if (cmd.convention === 'masm') {
    const head = cmd.command.slice(0, -1);
    const last = cmd.command[cmd.command.length - 1] ?? '';
    return [...head, `${last}${outputPath}`, inputPath];
  }
  return [...cmd.command, '-o', outputPath, inputPath];
}

/**
 * Run the external assembler synchronously and return its exit status verbatim.
 *
 * A command that cannot be started (e.g. `ENOENT`) throws. A tool killed by a signal reports 1.
 */
export function runExternalAssembler(
  cmd: ExternalAssemblerCommand,
  inputPath: string,
  outputPath: string,
): number {
  const [program, ...args] = assemblerArgv(cmd, inputPath, outputPath);
  if (program === undefined) {
    throw new Error('external assembler command is empty');
  }
  const silent = cmd.convention === 'masm' && !cmd.verbose;
  const res = spawnSync(program, args, {
    stdio: ['ignore', silent ? 'ignore' : 'inherit', 'inherit'],
  });
  if (res.error) throw res.error;
  return res.status ?? 1;
}
