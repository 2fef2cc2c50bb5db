import { UnrepresentableValueError } from '../x86/names.js';

/**
 * Byte value of character `i` of a byte string (one char per byte, codes 0..255).
 */
export function byteAt(s: string, i: number): number {
  const code = s.charCodeAt(i);
  if (code > 0xff) {
    throw new UnrepresentableValueError(
      `byte string contains U+${code.toString(16).toUpperCase().padStart(4, '0')}`,
    );
  }
  return code;
}

function isDigit(code: number): boolean {
  return code >= 0x30 && code <= 0x39;
}

/**
 * Escape a byte string for a double-quoted GAS literal.
 *
 * Bytes outside printable ASCII, `"` and `\` become `\` plus unpadded octal. Digits following an
 * escape are escaped too, otherwise the assembler would read them as more octal digits.
 */
export function escapeStringLiteral(s: string): string {
  let out = '';
  let lastWasEscape = false;
  for (let i = 0; i < s.length; i++) {
    const code = byteAt(s, i);
    if (isDigit(code)) {
      out += lastWasEscape ? `\\${code.toString(8)}` : String.fromCharCode(code);
    } else if (code >= 0x20 && code <= 0x7e && code !== 0x22 && code !== 0x5c) {
      out += String.fromCharCode(code);
      lastWasEscape = false;
    } else {
      out += `\\${code.toString(8)}`;
      lastWasEscape = true;
    }
  }
  return out;
}

function isSymbolChar(code: number): boolean {
  return (
    (code >= 0x41 && code <= 0x5a) ||
    (code >= 0x61 && code <= 0x7a) ||
    isDigit(code) ||
    code === 0x5f
  );
}

/**
 * Mangle a source-level name into an assembler-safe symbol: `prefix` + name, with every byte
 * outside `[A-Za-z0-9_]` written as `$` and two lowercase hex digits.
 */
export function mangleSymbol(prefix: string, name: string): string {
  let out = prefix;
  for (let i = 0; i < name.length; i++) {
    const code = byteAt(name, i);
    out += isSymbolChar(code)
      ? String.fromCharCode(code)
      : `$${code.toString(16).padStart(2, '0')}`;
  }
  return out;
}

const INT32_MIN = -0x8000_0000n;
const INT32_MAX = 0x7fff_ffffn;

export function fitsInt32(n: bigint): boolean {
  return n >= INT32_MIN && n <= INT32_MAX;
}

/**
 * Two's-complement 64-bit hex digits (lowercase, no prefix).
 */
export function hex64(n: bigint): string {
  return BigInt.asUintN(64, n).toString(16);
}
