import { describe, it, expect } from 'vitest';
import {
  DEFAULT_IDENTIFIER_CONFIG,
  expandIdentifier,
  formatIdentifier,
  parseIdentifier,
  requirementKey,
  resolveTargets,
  type IdentifierConfig,
} from '../../src/ids/grammar.js';

function parsed(text: string, config?: IdentifierConfig) {
  const result = parseIdentifier(text, config);
  if (!result.ok) throw new Error(`expected ${text} to parse: ${result.failure.reason}`);
  return result.identifier;
}

function failure(text: string) {
  const result = parseIdentifier(text);
  if (result.ok) throw new Error(`expected ${text} to be rejected`);
  return result.failure;
}

describe('parseIdentifier', () => {
  it('should parse a qualified requirement identifier', () => {
    const id = parsed('REQ-p00001');
    expect(id).toEqual({
      prefix: 'REQ',
      namespace: undefined,
      level: 'product',
      levelCode: 'p',
      sequence: '00001',
      assertionLabels: [],
      form: 'qualified',
    });
  });

  it('should parse namespace and assertion labels', () => {
    const id = parsed('REQ-CAL-d00042-A-B');
    expect(id.namespace).toBe('CAL');
    expect(id.level).toBe('development');
    expect(id.assertionLabels).toEqual(['A', 'B']);
  });

  it('should distinguish bare from qualified identifiers', () => {
    expect(parsed('p00001').form).toBe('bare');
    expect(parsed('REQ-p00001').form).toBe('qualified');
    expect(parsed('CAL-o00003-C').form).toBe('bare');
  });

  it('should drop repeated assertion labels', () => {
    expect(parsed('REQ-p00001-A-A-B').assertionLabels).toEqual(['A', 'B']);
  });

  it('should round-trip canonical identifiers', () => {
    for (const text of ['REQ-p00001', 'REQ-CAL-o00010', 'REQ-d00042-A', 'REQ-p00001-A-B']) {
      expect(formatIdentifier(parsed(text))).toBe(text);
    }
  });

  it('should format bare identifiers in qualified form', () => {
    expect(formatIdentifier(parsed('p00001'))).toBe('REQ-p00001');
  });

  it('should honour a custom grammar', () => {
    const config: IdentifierConfig = { ...DEFAULT_IDENTIFIER_CONFIG, prefix: 'SPEC', digits: 3 };
    expect(parsed('SPEC-p001', config).sequence).toBe('001');
    expect(parseIdentifier('REQ-p00001', config).ok).toBe(false);
  });
});

describe('parseIdentifier failures', () => {
  it('should reject empty input', () => {
    expect(failure('   ').reason).toBe('empty identifier');
  });

  it('should suggest a fix for a wrong separator', () => {
    const f = failure('REQ_p00001');
    expect(f.corrections).toEqual(['wrong separator']);
    expect(f.suggestion).toBe('REQ-p00001');
    expect(f.reason).toBe("'REQ_p00001' is not a valid identifier (wrong separator)");
  });

  it('should suggest a fix for a miscased prefix', () => {
    const f = failure('req-p00001');
    expect(f.corrections).toEqual(['wrong case on prefix']);
    expect(f.suggestion).toBe('REQ-p00001');
  });

  it('should suggest a fix for a miscased level code', () => {
    const f = failure('REQ-P00001');
    expect(f.corrections).toEqual(['wrong case on level code']);
    expect(f.suggestion).toBe('REQ-p00001');
  });

  it('should pad short sequence numbers', () => {
    const f = failure('REQ-p1');
    expect(f.corrections).toEqual(['missing zero padding']);
    expect(f.suggestion).toBe('REQ-p00001');
  });

  it('should separate and uppercase a glued assertion label', () => {
    const f = failure('REQ-p00001a');
    expect(f.corrections).toEqual(['assertion label without separator', 'lowercase assertion label']);
    expect(f.suggestion).toBe('REQ-p00001-A');
  });

  it('should map a level name to its code', () => {
    expect(failure('REQ-prd-00001').suggestion).toBe('REQ-p00001');
  });

  it('should fall back to edit distance for a misspelled prefix', () => {
    const f = failure('REQQ-p00001');
    expect(f.corrections).toEqual(['misspelled prefix']);
    expect(f.suggestion).toBe('REQ-p00001');
  });

  it('should describe the expected shape when nothing can be fixed', () => {
    const f = failure('hello');
    expect(f.suggestion).toBeUndefined();
    expect(f.corrections).toEqual([]);
    expect(f.reason).toBe("'hello' does not match REQ-[NS-]{level}00000[-A]");
  });

  it('should never throw', () => {
    for (const text of ['-', '--', 'REQ-', 'REQ--p', '\u0000', 'REQ-x99999-', '((', 'REQ-p00001-']) {
      expect(() => parseIdentifier(text)).not.toThrow();
    }
  });
});

describe('identifier keys', () => {
  it('should expand assertion-scoped identifiers into one key per label', () => {
    expect(expandIdentifier(parsed('REQ-p00001-A-B'))).toEqual(['REQ-p00001-A', 'REQ-p00001-B']);
    expect(expandIdentifier(parsed('REQ-p00001'))).toEqual(['REQ-p00001']);
  });

  it('should strip labels for the requirement key', () => {
    expect(requirementKey(parsed('REQ-CAL-p00001-C'))).toBe('REQ-CAL-p00001');
  });

  it('should resolve references to canonical keys', () => {
    expect(resolveTargets('p00001')).toEqual(['REQ-p00001']);
    expect(resolveTargets(' REQ-o00002-A ')).toEqual(['REQ-o00002-A']);
    expect(resolveTargets(' JNY-Login-01 ')).toEqual(['JNY-Login-01']);
  });
});
