/**
 * Tests for import and call matching
 */

import { describe, it, expect } from 'vitest';
import { analyzeFile, findCallReferences, asCallReference } from '../src/core/matcher.js';
import { MalformedLiteralError } from '../src/core/errors.js';
import { createTaxonomy } from '../src/core/taxonomy.js';
import { parseGoFile } from '../src/languages/go/parser.js';
import type { MatchOptions } from '../src/types.js';

function analyze(source: string, options?: MatchOptions) {
  return analyzeFile(parseGoFile(source, 'main.go'), options);
}

describe('analyzeFile', () => {
  it('should return nothing for a file without imports or calls', () => {
    expect(analyze('package main\n\nfunc main() {}\n')).toEqual([]);
  });

  it('should report a vulnerable import and a call through its default alias', () => {
    const diagnostics = analyze([
      'package main',
      '',
      'import "crypto/ecdsa"',
      '',
      'func sign() {',
      '\tecdsa.SignASN1(rand.Reader, key, hash)',
      '}',
    ].join('\n'));

    expect(diagnostics).toEqual([
      {
        kind: 'import',
        position: { file: 'main.go', line: 3, column: 8, offset: 21 },
        message: '"crypto/ecdsa" uses quantum-vulnerable elliptic curve cryptography',
        module: 'crypto/ecdsa',
        category: 'elliptic-curve',
      },
      {
        kind: 'call',
        position: { file: 'main.go', line: 6, column: 2, offset: 52 },
        message: 'function "ecdsa.SignASN1" implements quantum-vulnerable cryptography',
        module: 'crypto/ecdsa',
        qualifier: 'ecdsa',
        functionName: 'SignASN1',
      },
    ]);
  });

  it('should report calls through an explicit alias under the alias name', () => {
    const diagnostics = analyze([
      'package main',
      '',
      'import c "crypto/ecdsa"',
      '',
      'func sign() {',
      '\tc.SignASN1(rand.Reader, key, hash)',
      '}',
    ].join('\n'));

    expect(diagnostics.map(d => d.message)).toEqual([
      '"crypto/ecdsa" uses quantum-vulnerable elliptic curve cryptography',
      'function "c.SignASN1" implements quantum-vulnerable cryptography',
    ]);
    expect(diagnostics[0].position).toMatchObject({ line: 3, column: 8 });
    expect(diagnostics[1].position).toMatchObject({ line: 6, column: 2 });
  });

  it('should report one diagnostic per category at the same position', () => {
    const diagnostics = analyze('package main\n\nimport "crypto/ecdh"\n');

    expect(diagnostics.map(d => d.message)).toEqual([
      '"crypto/ecdh" uses quantum-vulnerable elliptic curve cryptography',
      '"crypto/ecdh" uses a quantum-vulnerable key exchange algorithm; consider "crypto/mlkem"',
    ]);
    expect(diagnostics[0].position).toEqual(diagnostics[1].position);
  });

  it('should report unlisted imports and functions as nothing', () => {
    const diagnostics = analyze([
      'package main',
      'import "crypto/sha256"',
      'func main() {',
      '\tsha256.Sum256(data)',
      '}',
    ].join('\n'));

    expect(diagnostics).toEqual([]);
  });

  it('should ignore qualifiers that are not import aliases', () => {
    const diagnostics = analyze([
      'package main',
      'import "crypto/rsa"',
      'func main() {',
      '\tkey.SignPSS(r, h, d, nil)',
      '\tsigner.SignASN1(r, k, h)',
      '}',
    ].join('\n'));

    expect(diagnostics.map(d => d.kind)).toEqual(['import']);
  });

  it('should require the function to belong to the aliased package', () => {
    const diagnostics = analyze([
      'package main',
      'import "crypto/ecdsa"',
      'func main() {',
      '\tecdsa.SignPSS(r, h, d, nil)',
      '}',
    ].join('\n'));

    expect(diagnostics.map(d => d.kind)).toEqual(['import']);
  });

  it('should flag calls into packages that are not themselves listed', () => {
    const diagnostics = analyze([
      'package main',
      'import "crypto/x509"',
      'func load() {',
      '\tkey, err := x509.ParsePKCS1PrivateKey(der)',
      '}',
    ].join('\n'));

    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      kind: 'call',
      module: 'crypto/x509',
      message: 'function "x509.ParsePKCS1PrivateKey" implements quantum-vulnerable cryptography',
    });
  });

  it('should not deduplicate repeated imports or calls', () => {
    const diagnostics = analyze([
      'package main',
      'import (',
      '\t"crypto/rsa"',
      '\t"crypto/rsa"',
      ')',
      'func main() {',
      '\trsa.SignPSS(r, k, h, d, nil)',
      '\trsa.SignPSS(r, k, h, d, nil)',
      '}',
    ].join('\n'));

    expect(diagnostics.map(d => `${d.kind}:${d.position.line}`)).toEqual([
      'import:3', 'import:4', 'call:7', 'call:8',
    ]);
  });

  it('should keep file order across declarations', () => {
    const diagnostics = analyze([
      'package main',
      'import "crypto/rsa"',
      'import "crypto/dsa"',
      'func a() {',
      '\tdsa.Sign(r, k, h)',
      '}',
      'var unused = 1',
      'func (s *Signer) b() {',
      '\tx := rsa.SignPKCS1v15(r, k, h, d)',
      '\trsa.VerifyPSS(pub, h, d, sig, nil)',
      '}',
    ].join('\n'));

    expect(diagnostics.map(d => d.message)).toEqual([
      '"crypto/rsa" uses quantum-vulnerable integer factorization cryptography',
      '"crypto/dsa" uses quantum-vulnerable integer factorization cryptography',
      'function "dsa.Sign" implements quantum-vulnerable cryptography',
      'function "rsa.SignPKCS1v15" implements quantum-vulnerable cryptography',
      'function "rsa.VerifyPSS" implements quantum-vulnerable cryptography',
    ]);
  });

  it('should skip functions without a body', () => {
    const diagnostics = analyze('package main\nimport "crypto/rsa"\nfunc external() int\n');
    expect(diagnostics.map(d => d.kind)).toEqual(['import']);
  });

  it('should classify the decoded path and quote the literal as written', () => {
    const diagnostics = analyze('package main\nimport "crypto\\x2frsa"\nimport `crypto/dsa`\n');

    expect(diagnostics.map(d => d.kind === 'import' ? d.module : '')).toEqual(['crypto/rsa', 'crypto/dsa']);
    expect(diagnostics.map(d => d.message)).toEqual([
      '"crypto\\x2frsa" uses quantum-vulnerable integer factorization cryptography',
      '`crypto/dsa` uses quantum-vulnerable integer factorization cryptography',
    ]);
  });

  it('should abort the file on a malformed import path', () => {
    const source = [
      'package main',
      'import "crypto/rsa"',
      'import "crypto\\q"',
      'func main() {',
      '\trsa.SignPSS(r, k, h, d, nil)',
      '}',
    ].join('\n');

    expect(() => analyze(source)).toThrow(MalformedLiteralError);
    expect(() => analyze(source)).toThrow('main.go:3:8: malformed import path "crypto\\q": unknown escape sequence \\q');
  });

  it('should use a custom taxonomy', () => {
    const taxonomy = createTaxonomy({
      modules: [{ path: 'example.com/legacy', category: 'key-exchange' }],
      functions: [{ module: 'example.com/legacy', name: 'Exchange' }],
    });
    const diagnostics = analyze([
      'package main',
      'import "example.com/legacy"',
      'import "crypto/rsa"',
      'func main() {',
      '\tlegacy.Exchange(a, b)',
      '}',
    ].join('\n'), { taxonomy });

    expect(diagnostics.map(d => d.message)).toEqual([
      '"example.com/legacy" uses a quantum-vulnerable key exchange algorithm; consider "crypto/mlkem"',
      'function "legacy.Exchange" implements quantum-vulnerable cryptography',
    ]);
  });

  describe('traversal', () => {
    const nested = [
      'package main',
      'import "crypto/rsa"',
      'func main() {',
      '\tif ok {',
      '\t\tif ready {',
      '\t\t\trsa.SignPSS(r, k, h, d, nil)',
      '\t\t}',
      '\t}',
      '\tdefer rsa.VerifyPSS(pub, h, d, sig, nil)',
      '\treturn rsa.EncryptOAEP(h, r, pub, msg, nil)',
      '}',
    ].join('\n');

    it('should only check top-level statements by default', () => {
      expect(analyze(nested).map(d => d.kind)).toEqual(['import']);
    });

    it('should check every call in deep mode', () => {
      const diagnostics = analyze(nested, { traversal: 'deep' });

      expect(diagnostics.map(d => d.kind === 'call' ? `${d.functionName}:${d.position.line}` : d.kind)).toEqual([
        'import', 'SignPSS:6', 'VerifyPSS:9', 'EncryptOAEP:10',
      ]);
    });

    it('should find calls in closures and arguments in deep mode', () => {
      const diagnostics = analyze([
        'package main',
        'import "crypto/rsa"',
        'func main() {',
        '\trun(func() {',
        '\t\trsa.SignPSS(r, k, h, d, nil)',
        '\t})',
        '\tlog(rsa.DecryptOAEP(h, r, k, c, nil))',
        '}',
      ].join('\n'), { traversal: 'deep' });

      expect(diagnostics.map(d => d.kind === 'call' ? d.functionName : d.kind)).toEqual([
        'import', 'SignPSS', 'DecryptOAEP',
      ]);
    });
  });
});

describe('findCallReferences', () => {
  it('should only pick up assignments and expression statements when shallow', () => {
    const file = parseGoFile([
      'package main',
      'func main() {',
      '\ta.One()',
      '\tx := b.Two()',
      '\tgo c.Three()',
      '\tfor {',
      '\t\td.Four()',
      '\t}',
      '}',
    ].join('\n'), 'main.go');
    const [fn] = file.declarations;
    if (fn.kind !== 'function' || !fn.body) throw new Error('no body');

    expect(findCallReferences(fn.body).map(r => r.member.name)).toEqual(['One', 'Two']);
    expect(findCallReferences(fn.body, 'deep').map(r => r.member.name)).toEqual(['One', 'Two', 'Three', 'Four']);
  });
});

describe('asCallReference', () => {
  it('should accept only qualified calls', () => {
    const file = parseGoFile('package main\nfunc main() {\n\tx := a.B()\n\ty := f()\n}\n', 'main.go');
    const [fn] = file.declarations;
    if (fn.kind !== 'function' || !fn.body) throw new Error('no body');
    const [first, second] = fn.body;
    if (first.kind !== 'assign' || second.kind !== 'assign') throw new Error('expected assignments');

    expect(asCallReference(first.rhs[0])?.member.name).toBe('B');
    expect(asCallReference(second.rhs[0])).toBeUndefined();
  });
});
