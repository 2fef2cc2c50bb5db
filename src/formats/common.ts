import type { Directive } from '../x86/types.js';
import { byteAt } from './strings.js';

const BYTES_PER_LINE = 16;

/**
 * Bytes as decimal lists, 16 per line: `\t<directive>\t72,101,...`.
 */
export function byteDirectiveLines(directive: string, data: string): string {
  const lines: string[] = [];
  for (let start = 0; start < data.length; start += BYTES_PER_LINE) {
    const values: number[] = [];
    const stop = Math.min(start + BYTES_PER_LINE, data.length);
    for (let i = start; i < stop; i++) values.push(byteAt(data, i));
    lines.push(`\t${directive}\t${values.join(',')}\n`);
  }
  return lines.join('');
}

/**
 * Alignment of an `align` directive in bytes.
 */
export function alignmentBytes(d: Extract<Directive, { kind: 'align' }>): number {
  return d.powerOfTwo ? 2 ** d.value : d.value;
}
