/**
 * pqcscan - Go String Literal Decoding
 *
 * Decodes interpreted ("...") and raw (`...`) string literals the way the
 * Go compiler does. Failures are reported as a reason string so the caller
 * can attach the literal's position.
 */

export type DecodeResult =
  | { ok: true; value: string }
  | { ok: false; reason: string };

const SIMPLE_ESCAPES: Record<string, number> = {
  a: 0x07,
  b: 0x08,
  f: 0x0c,
  n: 0x0a,
  r: 0x0d,
  t: 0x09,
  v: 0x0b,
  '\\': 0x5c,
  '"': 0x22,
};

function fail(reason: string): DecodeResult {
  return { ok: false, reason };
}

function decodeRaw(literal: string): DecodeResult {
  if (literal.length < 2 || !literal.endsWith('`')) {
    return fail('unterminated raw string');
  }
  const body = literal.slice(1, -1);
  if (body.includes('`')) {
    return fail('unexpected backquote');
  }
  // Carriage returns are discarded from raw strings
  return { ok: true, value: body.replace(/\r/g, '') };
}

function decodeInterpreted(literal: string): DecodeResult {
  if (literal.length < 2 || !literal.endsWith('"')) {
    return fail('unterminated string');
  }

  const body = literal.slice(1, -1);
  const bytes: number[] = [];
  let i = 0;

  while (i < body.length) {
    const ch = body[i];

    if (ch === '\n') return fail('newline in string');
    if (ch === '"') return fail('unescaped quote');

    if (ch !== '\\') {
      const codePoint = body.codePointAt(i) ?? 0;
      const text = String.fromCodePoint(codePoint);
      bytes.push(...Buffer.from(text, 'utf8'));
      i += text.length;
      continue;
    }

    const escape = body[i + 1];
    if (escape === undefined) return fail('incomplete escape sequence');

    const simple = SIMPLE_ESCAPES[escape];
    if (simple !== undefined) {
      bytes.push(simple);
      i += 2;
      continue;
    }

    if (/[0-7]/.test(escape)) {
      const digits = body.slice(i + 1, i + 4);
      if (!/^[0-7]{3}$/.test(digits)) return fail(`invalid octal escape \\${digits}`);
      const value = parseInt(digits, 8);
      if (value > 0xff) return fail(`octal escape value out of range \\${digits}`);
      bytes.push(value);
      i += 4;
      continue;
    }

    const hexLength = escape === 'x' ? 2 : escape === 'u' ? 4 : escape === 'U' ? 8 : 0;
    if (hexLength === 0) return fail(`unknown escape sequence \\${escape}`);

    const digits = body.slice(i + 2, i + 2 + hexLength);
    if (digits.length !== hexLength || !/^[0-9a-fA-F]+$/.test(digits)) {
      return fail(`invalid escape sequence \\${escape}${digits}`);
    }
    const value = parseInt(digits, 16);

    if (escape === 'x') {
      bytes.push(value);
    } else {
      if (value > 0x10ffff || (value >= 0xd800 && value <= 0xdfff)) {
        return fail(`escape sequence is invalid Unicode code point \\${escape}${digits}`);
      }
      bytes.push(...Buffer.from(String.fromCodePoint(value), 'utf8'));
    }
    i += 2 + hexLength;
  }

  return { ok: true, value: Buffer.from(bytes).toString('utf8') };
}

/**
 * Decode a Go string literal, quotes included
 */
export function decodeStringLiteral(literal: string): DecodeResult {
  if (literal.startsWith('`')) return decodeRaw(literal);
  if (literal.startsWith('"')) return decodeInterpreted(literal);
  return fail('not a string literal');
}
