/**
 * Requirement identifier grammar.
 *
 * Qualified form: `{prefix}-[{NS}-]{levelCode}{sequence}[-{label}...]`,
 * e.g. `REQ-p00001`, `REQ-CAL-d00042`, `REQ-p00001-A-B`.
 * Bare form drops the prefix: `p00001`, `CAL-p00001-A`.
 */

import type { Level } from '../core/types.js';
import { lookup, nearest } from './suggest.js';

export interface IdentifierConfig {
  prefix: string;
  /** Width of the zero-padded sequence. */
  digits: number;
  /** Length of the uppercase cross-repository namespace. */
  namespaceLength: number;
  /** Level code (single lowercase letter) to level. */
  levels: Record<string, Level>;
}

export const DEFAULT_IDENTIFIER_CONFIG: IdentifierConfig = {
  prefix: 'REQ',
  digits: 5,
  namespaceLength: 3,
  levels: { p: 'product', o: 'operational', d: 'development' },
};

export interface Identifier {
  prefix: string;
  namespace?: string;
  level: Level;
  levelCode: string;
  sequence: string;
  /** Ordered, distinct assertion labels; empty for the whole requirement. */
  assertionLabels: string[];
  form: 'qualified' | 'bare';
}

export interface ParseFailure {
  input: string;
  reason: string;
  /** Names of the known mistakes found in the input. */
  corrections: string[];
  suggestion?: string;
}

export type IdentifierParseResult =
  | { ok: true; identifier: Identifier }
  | { ok: false; failure: ParseFailure };

interface CompiledGrammar {
  qualified: RegExp;
  bare: RegExp;
}

const grammarCache = new WeakMap<IdentifierConfig, CompiledGrammar>();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function levelCodes(config: IdentifierConfig): string {
  return Object.keys(config.levels).map(escapeRegExp).join('');
}

function compile(config: IdentifierConfig): CompiledGrammar {
  const cached = grammarCache.get(config);
  if (cached) return cached;

  const body =
    `(?:([A-Z]{${config.namespaceLength}})-)?` +
    `([${levelCodes(config)}])(\\d{${config.digits}})((?:-[A-Z])*)`;
  const grammar: CompiledGrammar = {
    qualified: new RegExp(`^${escapeRegExp(config.prefix)}-${body}$`),
    bare: new RegExp(`^${body}$`),
  };
  grammarCache.set(config, grammar);
  return grammar;
}

function matchStrict(text: string, config: IdentifierConfig): Identifier | null {
  const grammar = compile(config);
  let form: Identifier['form'] = 'qualified';
  let match = grammar.qualified.exec(text);
  if (!match) {
    form = 'bare';
    match = grammar.bare.exec(text);
  }
  if (!match) return null;

  const [, namespace, levelCode, sequence, labelText] = match;
  const level = lookup(config.levels, levelCode);
  if (!level) return null;

  const labels: string[] = [];
  for (const label of labelText.split('-')) {
    if (label && !labels.includes(label)) labels.push(label);
  }

  return {
    prefix: config.prefix,
    namespace: namespace || undefined,
    level,
    levelCode,
    sequence,
    assertionLabels: labels,
    form,
  };
}

/**
 * A known authoring mistake and how to correct it.
 */
interface Correction {
  name: string;
  apply(text: string, config: IdentifierConfig): string;
}

const LEVEL_NAMES: Record<string, Level> = {
  prd: 'product',
  product: 'product',
  ops: 'operational',
  operational: 'operational',
  dev: 'development',
  development: 'development',
};

function codeForLevel(level: Level, config: IdentifierConfig): string | undefined {
  return Object.keys(config.levels).find((code) => config.levels[code] === level);
}

const CORRECTIONS: readonly Correction[] = [
  {
    name: 'wrong separator',
    apply: (text) => text.replace(/[\s_.:/\\]+/g, '-').replace(/-{2,}/g, '-'),
  },
  {
    name: 'wrong case on prefix',
    apply: (text, config) =>
      text.replace(new RegExp(`^${escapeRegExp(config.prefix)}(?=-)`, 'i'), config.prefix),
  },
  {
    name: 'wrong case on namespace',
    apply: (text, config) =>
      text.replace(
        new RegExp(`^(${escapeRegExp(config.prefix)}-)([a-z]{${config.namespaceLength}})(?=-)`),
        (_m, head: string, ns: string) => head + ns.toUpperCase()
      ),
  },
  {
    name: 'level name instead of level code',
    apply: (text, config) =>
      text.replace(
        /(^|-)(prd|ops|dev|product|operational|development)-?(?=\d)/i,
        (m, lead: string, name: string) => {
          const code = codeForLevel(LEVEL_NAMES[name.toLowerCase()], config);
          return code ? lead + code : m;
        }
      ),
  },
  {
    name: 'wrong case on level code',
    apply: (text, config) =>
      text.replace(
        new RegExp(`(^|-)([${levelCodes(config).toUpperCase()}])(?=\\d)`),
        (_m, lead: string, code: string) => lead + code.toLowerCase()
      ),
  },
  {
    name: 'missing zero padding',
    apply: (text, config) =>
      text.replace(
        new RegExp(`(^|-)([${levelCodes(config)}])(\\d+)(?=$|-|[A-Za-z])`),
        (m, lead: string, code: string, digits: string) =>
          digits.length < config.digits ? lead + code + digits.padStart(config.digits, '0') : m
      ),
  },
  {
    name: 'assertion label without separator',
    apply: (text, config) =>
      text.replace(
        new RegExp(`([${levelCodes(config)}]\\d{${config.digits}})([A-Za-z])(?=$|-)`),
        '$1-$2'
      ),
  },
  {
    name: 'lowercase assertion label',
    apply: (text) => text.replace(/-([a-z])(?=$|-)/g, (_m, label: string) => '-' + label.toUpperCase()),
  },
];

function applyCorrections(
  text: string,
  config: IdentifierConfig
): { text: string; applied: string[] } {
  let current = text;
  const applied: string[] = [];
  for (const correction of CORRECTIONS) {
    const next = correction.apply(current, config);
    if (next !== current) {
      applied.push(correction.name);
      current = next;
    }
  }
  return { text: current, applied };
}

/**
 * Find a corrected spelling for an identifier that failed to parse.
 */
function suggest(
  text: string,
  config: IdentifierConfig
): { suggestion?: string; corrections: string[] } {
  const fixed = applyCorrections(text, config);
  const identifier = matchStrict(fixed.text, config);
  if (identifier) {
    return { suggestion: formatIdentifier(identifier), corrections: fixed.applied };
  }

  // Fallback: the head token may be a misspelled prefix.
  const [head, ...rest] = fixed.text.split('-');
  if (rest.length > 0 && head !== config.prefix && head.length >= 2) {
    const prefix = nearest(head, [config.prefix]);
    if (prefix) {
      const retry = applyCorrections([prefix, ...rest].join('-'), config);
      const retried = matchStrict(retry.text, config);
      if (retried) {
        return {
          suggestion: formatIdentifier(retried),
          corrections: [...fixed.applied, 'misspelled prefix', ...retry.applied],
        };
      }
    }
  }

  return { corrections: fixed.applied };
}

/**
 * Parse an identifier. Never throws; failures carry a suggestion when
 * the input looks like a known mistake.
 */
export function parseIdentifier(
  text: string,
  config: IdentifierConfig = DEFAULT_IDENTIFIER_CONFIG
): IdentifierParseResult {
  const input = text.trim();
  if (input === '') {
    return { ok: false, failure: { input, reason: 'empty identifier', corrections: [] } };
  }

  const identifier = matchStrict(input, config);
  if (identifier) return { ok: true, identifier };

  const { suggestion, corrections } = suggest(input, config);
  const expected = `${config.prefix}-[NS-]{level}${'0'.repeat(config.digits)}[-A]`;
  const reason =
    corrections.length > 0
      ? `'${input}' is not a valid identifier (${corrections.join(', ')})`
      : `'${input}' does not match ${expected}`;

  return { ok: false, failure: { input, reason, corrections, suggestion } };
}

/**
 * True when the identifier targets specific assertions.
 */
export function isAssertionScoped(identifier: Identifier): boolean {
  return identifier.assertionLabels.length > 0;
}

/**
 * Qualified text form of an identifier.
 */
export function formatIdentifier(identifier: Identifier): string {
  const namespace = identifier.namespace ? `${identifier.namespace}-` : '';
  const labels = identifier.assertionLabels.map((l) => `-${l}`).join('');
  return `${identifier.prefix}-${namespace}${identifier.levelCode}${identifier.sequence}${labels}`;
}

/**
 * Key of the whole requirement an identifier points into.
 */
export function requirementKey(identifier: Identifier): string {
  return formatIdentifier({ ...identifier, assertionLabels: [] });
}

/**
 * Key of one assertion of a requirement.
 */
export function assertionKey(requirementId: string, label: string): string {
  return `${requirementId}-${label}`;
}

/**
 * One index key per targeted assertion, or the requirement key.
 */
export function expandIdentifier(identifier: Identifier): string[] {
  const key = requirementKey(identifier);
  if (!isAssertionScoped(identifier)) return [key];
  return identifier.assertionLabels.map((label) => assertionKey(key, label));
}

/**
 * Normalize a raw reference into index keys. Text that is not an
 * identifier is kept as-is so the builder can report it.
 */
export function resolveTargets(
  raw: string,
  config: IdentifierConfig = DEFAULT_IDENTIFIER_CONFIG
): string[] {
  const result = parseIdentifier(raw, config);
  return result.ok ? expandIdentifier(result.identifier) : [raw.trim()];
}
