import { describe, expect, it } from 'vitest';

import { escapeStringLiteral, fitsInt32, hex64, mangleSymbol } from '../src/formats/strings.js';
import { UnrepresentableValueError } from '../src/x86/names.js';

describe('string literal escaping', () => {
  it('escapes quotes, backslashes and control bytes in octal', () => {
    expect(escapeStringLiteral('He said "hi"\n')).toBe('He said \\42hi\\42\\12');
    expect(escapeStringLiteral('a\\b')).toBe('a\\134b');
    expect(escapeStringLiteral('\t')).toBe('\\11');
    expect(escapeStringLiteral('\x7f\xff\0')).toBe('\\177\\377\\0');
  });

  it('escapes digits that follow an escape', () => {
    expect(escapeStringLiteral('\n12')).toBe('\\12\\61\\62');
    expect(escapeStringLiteral('\nA1')).toBe('\\12A1');
    expect(escapeStringLiteral('a1')).toBe('a1');
  });

  it('rejects characters outside the byte range', () => {
    expect(() => escapeStringLiteral('Ā')).toThrow(UnrepresentableValueError);
  });
});

describe('symbol mangling', () => {
  it('hex-escapes bytes outside [A-Za-z0-9_]', () => {
    expect(mangleSymbol('_', 'foo.bar$1')).toBe('_foo$2ebar$241');
    expect(mangleSymbol('', 'a-b')).toBe('a$2db');
    expect(mangleSymbol('', 'x\ny')).toBe('x$0ay');
    expect(mangleSymbol('caml', 'Stdlib__List_map_123')).toBe('camlStdlib__List_map_123');
  });
});

describe('integer helpers', () => {
  it('checks the signed 32-bit range', () => {
    expect(fitsInt32(0x7fff_ffffn)).toBe(true);
    expect(fitsInt32(0x8000_0000n)).toBe(false);
    expect(fitsInt32(-0x8000_0000n)).toBe(true);
    expect(fitsInt32(-0x8000_0001n)).toBe(false);
  });

  it('prints 64-bit two-complement hex', () => {
    expect(hex64(0x1_0000_0000n)).toBe('100000000');
    expect(hex64(-1n)).toBe('ffffffffffffffff');
  });
});
