/**
 * Line-oriented parser for requirement documents.
 *
 * A requirement block looks like:
 *
 *   # REQ-p00001: User Authentication
 *
 *   **Level**: PRD | **Status**: Active | **Implements**: -
 *
 *   Body text.
 *
 *   ## Assertions
 *
 *   A. The system SHALL ...
 *
 *   *End* *User Authentication* | **Hash**: 1a2b3c4d
 *
 * Parsing recovers from malformed blocks: each problem becomes a
 * Diagnostic anchored to its line and the parser moves on.
 */

import { posix } from 'path';
import type {
  Assertion,
  Diagnostic,
  Journey,
  Level,
  Reference,
  ReferenceRelation,
  Requirement,
  RequirementStatus,
  SourceLocation,
} from '../core/types.js';
import { computeContentHash, HASH_VALUE_PATTERN, normalizeBody } from '../core/hash.js';
import type { IdentifierConfig } from '../ids/grammar.js';
import {
  DEFAULT_IDENTIFIER_CONFIG,
  assertionKey,
  expandIdentifier,
  parseIdentifier,
  requirementKey,
} from '../ids/grammar.js';
import { lookup, matchKeyword } from '../ids/suggest.js';

export interface ParseOptions {
  identifiers?: IdentifierConfig;
}

export interface DocumentParseResult {
  requirements: Requirement[];
  journeys: Journey[];
  diagnostics: Diagnostic[];
}

const HEADER_PATTERN = /^#{1,6}\s+([A-Za-z][\w.:-]*)\s*:\s*(.*)$/;
const SECTION_PATTERN = /^#{2,6}\s+(.+?)\s*$/;
const END_MARKER_PATTERN = /^\*End\*\s+\*([^*]+)\*\s*(?:\|\s*\*\*Hash\*\*\s*:\s*(\S+))?\s*$/;
const BOLD_FIELD_PATTERN = /^\s*\*\*([A-Za-z][A-Za-z ]*?)\*\*\s*:\s*(.*?)\s*$/;
const PLAIN_FIELD_PATTERN = /^\s*([A-Za-z]+)\s*:\s*(.*?)\s*$/;
const EXPECTED_BROKEN_PATTERN = /\s*<!--\s*expected-broken\s*-->\s*/i;

export const JOURNEY_ID_PATTERN = /^JNY-[A-Za-z0-9]+(?:-[A-Za-z0-9]+)*$/;

const LETTERED_ASSERTION = /^\s*(?:\(([A-Z])\)|([A-Z])[.)])\s+(.+)$/;
const NUMBERED_ASSERTION = /^\s*(\d+)[.)]\s+(.+)$/;
const BULLETED_ASSERTION = /^\s*[-*+]\s+(?:\*\*)?(?:([A-Z])[.):](?:\*\*)?\s+)?(.+)$/;

const FIELD_KEYWORDS = [
  'Level',
  'Status',
  'Implements',
  'Refines',
  'Addresses',
  'Tags',
  'Rationale',
  'Hash',
] as const;

type FieldKeyword = (typeof FIELD_KEYWORDS)[number];

const REFERENCE_KEYWORDS: readonly FieldKeyword[] = ['Implements', 'Refines', 'Addresses'];

const SECTION_KEYWORDS = ['Assertions', 'Rationale'];

const JOURNEY_KEYWORDS = ['Actor', 'Goal', 'Addresses'] as const;

/**
 * Misspellings seen often enough to map directly.
 */
const KNOWN_MISSPELLINGS: Record<string, string> = {
  implement: 'Implements',
  implementes: 'Implements',
  implemented: 'Implements',
  satisfies: 'Implements',
  refine: 'Refines',
  refined: 'Refines',
  address: 'Addresses',
  adresses: 'Addresses',
  adress: 'Addresses',
  tag: 'Tags',
  assertion: 'Assertions',
  rational: 'Rationale',
};

const NO_REFERENCE_VALUES = new Set(['-', 'none', 'null', 'x', 'n/a']);

const STATUSES: readonly RequirementStatus[] = ['active', 'draft', 'deprecated', 'superseded'];

const LEVEL_ALIASES: Record<string, Level> = {
  prd: 'product',
  product: 'product',
  ops: 'operational',
  operational: 'operational',
  dev: 'development',
  development: 'development',
};

function isFieldKeyword(word: string): word is FieldKeyword {
  return FIELD_KEYWORDS.some((keyword) => keyword === word);
}

type HeaderClass =
  | { kind: 'requirement'; id: string; level: Level; title: string }
  | { kind: 'journey'; id: string; title: string }
  | { kind: 'malformed'; message: string; suggestion?: string };

/**
 * Parser state for one document.
 */
class DocumentParser {
  private readonly lines: string[];
  private readonly config: IdentifierConfig;
  readonly requirements: Requirement[] = [];
  readonly journeys: Journey[] = [];
  readonly diagnostics: Diagnostic[] = [];

  constructor(
    text: string,
    private readonly path: string,
    options: ParseOptions
  ) {
    this.lines = text.replace(/\r\n?/g, '\n').split('\n');
    this.config = options.identifiers ?? DEFAULT_IDENTIFIER_CONFIG;
  }

  run(): void {
    let i = 0;
    while (i < this.lines.length) {
      const header = this.classifyHeader(this.lines[i]);
      if (!header) {
        i++;
        continue;
      }

      const { end, footer } = this.findBlockEnd(i);
      if (header.kind === 'requirement') {
        this.parseRequirement(header, i, end, footer);
      } else if (header.kind === 'journey') {
        this.parseJourney(header, i, end, footer);
      } else {
        this.report('error', 'malformed-block', header.message, i, {
          suggestion: header.suggestion,
        });
      }
      i = end + 1;
    }
  }

  private location(index: number, endIndex?: number): SourceLocation {
    const loc: SourceLocation = { path: this.path, line: index + 1 };
    if (endIndex !== undefined) loc.endLine = endIndex + 1;
    return loc;
  }

  private report(
    severity: Diagnostic['severity'],
    check: Diagnostic['check'],
    message: string,
    index: number,
    extra: { nodeId?: string; suggestion?: string } = {}
  ): void {
    const diagnostic: Diagnostic = {
      severity,
      check,
      message,
      location: this.location(index),
    };
    if (extra.nodeId) diagnostic.nodeId = extra.nodeId;
    if (extra.suggestion) diagnostic.suggestion = extra.suggestion;
    this.diagnostics.push(diagnostic);
  }

  /**
   * Decide whether a line opens a block. Headings whose first token is
   * not recognisably an identifier are ordinary headings.
   */
  private classifyHeader(line: string): HeaderClass | null {
    const match = HEADER_PATTERN.exec(line);
    if (!match) return null;

    const token = match[1];
    const title = match[2].trim();

    if (JOURNEY_ID_PATTERN.test(token)) {
      return title
        ? { kind: 'journey', id: token, title }
        : { kind: 'malformed', message: `Journey ${token} has no title` };
    }

    const parsed = parseIdentifier(token, this.config);
    if (!parsed.ok) {
      if (!parsed.failure.suggestion) return null;
      return {
        kind: 'malformed',
        message: `Invalid requirement identifier in header: ${parsed.failure.reason}`,
        suggestion: parsed.failure.suggestion,
      };
    }

    const identifier = parsed.identifier;
    const canonical = requirementKey(identifier);
    if (identifier.form === 'bare' || identifier.assertionLabels.length > 0) {
      return {
        kind: 'malformed',
        message: `Header identifier '${token}' must be a qualified requirement identifier`,
        suggestion: canonical,
      };
    }
    if (!title) {
      return { kind: 'malformed', message: `Requirement ${canonical} has no title` };
    }
    return { kind: 'requirement', id: canonical, level: identifier.level, title };
  }

  /**
   * Index of the last line of the block starting at `start`, and the
   * footer line index when the block is closed by one.
   */
  private findBlockEnd(start: number): { end: number; footer: number | null } {
    for (let j = start + 1; j < this.lines.length; j++) {
      const line = this.lines[j];
      if (/^\*End\*/.test(line)) {
        const next = this.lines[j + 1];
        const end = next !== undefined && next.trim() === '---' ? j + 1 : j;
        return { end, footer: j };
      }
      if (this.classifyHeader(line)) {
        return { end: j - 1, footer: null };
      }
    }
    return { end: this.lines.length - 1, footer: null };
  }

  private parseRequirement(
    header: Extract<HeaderClass, { kind: 'requirement' }>,
    start: number,
    end: number,
    footer: number | null
  ): void {
    const { id, title } = header;
    const contentEnd = footer ?? end + 1;

    let status: RequirementStatus | null = null;
    let storedHash: string | undefined;
    let rationale: string | undefined;
    const tags: string[] = [];
    const references: Reference[] = [];
    const bodyLines: string[] = [];
    const rationaleLines: string[] = [];
    const assertions = new AssertionCollector(this, id);

    let section: 'body' | 'assertions' | 'rationale' = 'body';

    for (let i = start + 1; i < contentEnd; i++) {
      const line = this.lines[i];

      const heading = SECTION_PATTERN.exec(line);
      if (heading) {
        section = this.sectionFor(heading[1], i, id);
        if (section === 'body') bodyLines.push(line);
        continue;
      }

      if (section === 'assertions') {
        assertions.accept(line, i);
        continue;
      }
      if (section === 'rationale') {
        rationaleLines.push(line);
        continue;
      }

      const fields = this.readFields(line, i, id);
      if (!fields) {
        bodyLines.push(line);
        continue;
      }

      for (const { keyword, value } of fields) {
        switch (keyword) {
          case 'Level':
            this.checkLevel(value, header.level, i, id);
            break;
          case 'Status':
            status = this.readStatus(value, i, id) ?? status;
            break;
          case 'Implements':
            references.push(...this.readReferences(value, 'implements', i, id));
            break;
          case 'Refines':
            references.push(...this.readReferences(value, 'refines', i, id));
            break;
          case 'Addresses':
            references.push(...this.readReferences(value, 'addresses', i, id));
            break;
          case 'Tags':
            tags.push(...splitList(value));
            break;
          case 'Rationale':
            rationale = value;
            break;
          case 'Hash':
            storedHash = this.readHash(value, i, id) ?? storedHash;
            break;
        }
      }
    }

    if (footer !== null) {
      const footerMatch = END_MARKER_PATTERN.exec(this.lines[footer]);
      if (!footerMatch) {
        this.report('warning', 'malformed-block', `Malformed *End* footer for ${id}`, footer, {
          nodeId: id,
        });
      } else if (footerMatch[2] !== undefined) {
        storedHash = this.readHash(footerMatch[2], footer, id) ?? storedHash;
      }
    } else {
      this.report('warning', 'malformed-block', `Requirement ${id} has no *End* footer`, end, {
        nodeId: id,
      });
    }

    if (status === null) {
      this.report('warning', 'metadata', `Requirement ${id} has no Status; assuming draft`, start, {
        nodeId: id,
      });
    }

    if (rationaleLines.length > 0) {
      const sectionText = normalizeBody(rationaleLines.join('\n'));
      if (sectionText) rationale = rationale ? `${rationale}\n${sectionText}` : sectionText;
    }

    const finished = assertions.finish();
    const body = normalizeBody(bodyLines.join('\n'));

    const requirement: Requirement = {
      id,
      title,
      level: header.level,
      status: status ?? 'draft',
      body,
      assertions: finished,
      references,
      computedHash: computeContentHash(title, body, finished),
      location: this.location(start, end),
      tags,
      subdirectory: subdirectoryOf(this.path),
      conflict: false,
    };
    if (rationale) requirement.rationale = rationale;
    if (storedHash) requirement.hash = storedHash;
    this.requirements.push(requirement);
  }

  private sectionFor(name: string, index: number, nodeId: string): 'body' | 'assertions' | 'rationale' {
    const match = matchKeyword(name, SECTION_KEYWORDS, KNOWN_MISSPELLINGS);
    if (!match) return 'body';
    if (match.kind === 'exact' || match.kind === 'case') {
      return match.keyword === 'Assertions' ? 'assertions' : 'rationale';
    }
    this.report(
      'warning',
      'metadata',
      `Section '${name}' looks like a misspelling of '${match.keyword}'`,
      index,
      { nodeId, suggestion: `## ${match.keyword}` }
    );
    return 'body';
  }

  /**
   * Recognise `**Key**: value` segments (several per line, split on `|`)
   * or a plain `Implements: ...` line. Returns null for body text.
   */
  private readFields(
    line: string,
    index: number,
    nodeId: string
  ): { keyword: FieldKeyword; value: string }[] | null {
    const segments = line.split('|');
    const fields: { keyword: FieldKeyword; value: string }[] = [];

    if (BOLD_FIELD_PATTERN.test(segments[0])) {
      let recognised = false;
      for (const segment of segments) {
        const match = BOLD_FIELD_PATTERN.exec(segment);
        if (!match) continue;
        const keyword = this.resolveKeyword(match[1], FIELD_KEYWORDS, index, nodeId, '**');
        if (keyword === undefined) continue;
        recognised = true;
        if (keyword !== null) fields.push({ keyword, value: match[2] });
      }
      return recognised ? fields : null;
    }

    const plain = PLAIN_FIELD_PATTERN.exec(line);
    if (plain && segments.length === 1) {
      const keyword = this.resolveKeyword(plain[1], REFERENCE_KEYWORDS, index, nodeId, '');
      if (keyword === undefined) return null;
      if (keyword !== null) fields.push({ keyword, value: plain[2] });
      return fields;
    }

    return null;
  }

  /**
   * Resolve a field name. Returns the keyword to apply, null when the
   * name was recognised as a misspelling (reported, value ignored), or
   * undefined when it is not a field at all.
   */
  private resolveKeyword(
    word: string,
    keywords: readonly FieldKeyword[],
    index: number,
    nodeId: string,
    marker: string
  ): FieldKeyword | null | undefined {
    const match = matchKeyword(word.trim(), keywords, KNOWN_MISSPELLINGS);
    if (!match || !isFieldKeyword(match.keyword) || !keywords.includes(match.keyword)) {
      return undefined;
    }

    const keyword = match.keyword;
    const suggestion = `${marker}${keyword}${marker}:`;
    switch (match.kind) {
      case 'exact':
        return keyword;
      case 'case':
        this.report('warning', 'malformed-reference', `Keyword '${word}' should be written '${keyword}'`, index, {
          nodeId,
          suggestion,
        });
        return keyword;
      case 'known':
      case 'distance':
        this.report(
          'warning',
          'malformed-reference',
          `Unknown keyword '${word}' ignored; did you mean '${keyword}'?`,
          index,
          { nodeId, suggestion }
        );
        return null;
    }
  }

  private checkLevel(value: string, expected: Level, index: number, nodeId: string): void {
    const raw = value.trim().toLowerCase();
    const level = lookup(this.config.levels, raw) ?? lookup(LEVEL_ALIASES, raw);
    if (!level) {
      this.report('warning', 'metadata', `Unknown level '${value}' on ${nodeId}`, index, { nodeId });
      return;
    }
    if (level !== expected) {
      this.report(
        'warning',
        'metadata',
        `Level '${value}' does not match the ${expected} level encoded in ${nodeId}`,
        index,
        { nodeId }
      );
    }
  }

  private readStatus(value: string, index: number, nodeId: string): RequirementStatus | null {
    const raw = value.trim().toLowerCase();
    const status = STATUSES.find((s) => s === raw);
    if (status) return status;
    this.report('warning', 'metadata', `Unknown status '${value}' on ${nodeId}`, index, { nodeId });
    return null;
  }

  private readHash(value: string, index: number, nodeId: string): string | null {
    const hash = value.trim();
    if (HASH_VALUE_PATTERN.test(hash)) return hash.toLowerCase();
    this.report('warning', 'metadata', `Malformed hash '${hash}' on ${nodeId}`, index, { nodeId });
    return null;
  }

  private readReferences(
    value: string,
    relation: ReferenceRelation,
    index: number,
    nodeId: string
  ): Reference[] {
    const references: Reference[] = [];
    if (NO_REFERENCE_VALUES.has(value.trim().toLowerCase())) return references;

    for (const part of splitList(value)) {
      if (NO_REFERENCE_VALUES.has(part.toLowerCase())) continue;

      if (relation === 'addresses') {
        if (JOURNEY_ID_PATTERN.test(part)) {
          references.push({ relation, target: part, line: index + 1 });
        } else {
          this.report('warning', 'malformed-reference', `Addresses target '${part}' is not a journey identifier`, index, {
            nodeId,
          });
        }
        continue;
      }

      const parsed = parseIdentifier(part, this.config);
      if (!parsed.ok) {
        this.report('warning', 'malformed-reference', parsed.failure.reason, index, {
          nodeId,
          suggestion: parsed.failure.suggestion,
        });
        continue;
      }
      for (const target of expandIdentifier(parsed.identifier)) {
        references.push({ relation, target, line: index + 1 });
      }
    }
    return references;
  }

  private parseJourney(
    header: Extract<HeaderClass, { kind: 'journey' }>,
    start: number,
    end: number,
    footer: number | null
  ): void {
    const journey: Journey = {
      id: header.id,
      title: header.title,
      steps: [],
      addresses: [],
      location: this.location(start, end),
    };
    let inSteps = false;

    for (let i = start + 1; i < (footer ?? end + 1); i++) {
      const line = this.lines[i];
      const heading = SECTION_PATTERN.exec(line);
      if (heading) {
        inSteps = heading[1].toLowerCase() === 'steps';
        continue;
      }
      if (inSteps) {
        const step = /^\s*(?:\d+[.)]|[-*+])\s+(.+)$/.exec(line);
        if (step) journey.steps.push(step[1].trim());
        continue;
      }

      const field = BOLD_FIELD_PATTERN.exec(line) ?? PLAIN_FIELD_PATTERN.exec(line);
      if (!field) continue;
      const match = matchKeyword(field[1], JOURNEY_KEYWORDS, KNOWN_MISSPELLINGS);
      if (!match || (match.kind !== 'exact' && match.kind !== 'case')) continue;

      if (match.keyword === 'Actor') journey.actor = field[2];
      else if (match.keyword === 'Goal') journey.goal = field[2];
      else {
        for (const part of splitList(field[2])) {
          if (NO_REFERENCE_VALUES.has(part.toLowerCase())) continue;
          const parsed = parseIdentifier(part, this.config);
          if (parsed.ok) {
            journey.addresses.push(...expandIdentifier(parsed.identifier));
          } else {
            this.report('warning', 'malformed-reference', parsed.failure.reason, i, {
              nodeId: header.id,
              suggestion: parsed.failure.suggestion,
            });
          }
        }
      }
    }

    this.journeys.push(journey);
  }

  /** Used by AssertionCollector. */
  reportAt(
    severity: Diagnostic['severity'],
    message: string,
    index: number,
    nodeId: string
  ): void {
    this.report(severity, 'malformed-assertion', message, index, { nodeId });
  }
}

interface PendingAssertion {
  label: string;
  parts: string[];
  index: number;
}

/**
 * Accumulates assertion lines in lettered, numbered or bulleted style.
 */
class AssertionCollector {
  private readonly pending: PendingAssertion[] = [];
  private current: PendingAssertion | null = null;

  constructor(
    private readonly parser: DocumentParser,
    private readonly requirementId: string
  ) {}

  accept(line: string, index: number): void {
    if (line.trim() === '') return;

    const lettered = LETTERED_ASSERTION.exec(line);
    if (lettered) {
      this.open(lettered[1] ?? lettered[2], lettered[3], index);
      return;
    }

    const numbered = NUMBERED_ASSERTION.exec(line);
    if (numbered) {
      const n = Number(numbered[1]);
      if (n < 1 || n > 26) {
        this.parser.reportAt('warning', `Assertion number ${n} cannot be mapped to a label`, index, this.requirementId);
        this.current = null;
        return;
      }
      const label = String.fromCharCode(64 + n);
      this.parser.reportAt('info', `Numbered assertion ${n} labelled ${label}`, index, this.requirementId);
      this.open(label, numbered[2], index);
      return;
    }

    const bulleted = BULLETED_ASSERTION.exec(line);
    if (bulleted) {
      let label = bulleted[1];
      if (label === undefined) {
        label = String.fromCharCode(65 + this.pending.length);
        this.parser.reportAt('info', `Bulleted assertion labelled ${label} by position`, index, this.requirementId);
      }
      this.open(label, bulleted[2], index);
      return;
    }

    if (/^\s/.test(line) && this.current) {
      this.current.parts.push(line.trim());
      return;
    }

    this.parser.reportAt('warning', `Unrecognised line in Assertions section`, index, this.requirementId);
    this.current = null;
  }

  private open(label: string, text: string, index: number): void {
    this.current = { label, parts: [text.trim()], index };
    this.pending.push(this.current);
  }

  finish(): Assertion[] {
    const assertions: Assertion[] = [];
    const seen = new Set<string>();

    for (const item of this.pending) {
      if (seen.has(item.label)) {
        this.parser.reportAt(
          'warning',
          `Duplicate assertion label ${assertionKey(this.requirementId, item.label)} ignored`,
          item.index,
          this.requirementId
        );
        continue;
      }
      seen.add(item.label);

      let text = item.parts.join(' ');
      const expectedBroken = EXPECTED_BROKEN_PATTERN.test(text);
      if (expectedBroken) text = text.replace(EXPECTED_BROKEN_PATTERN, ' ').trim();

      assertions.push({
        label: item.label,
        text: text.replace(/\s+/g, ' '),
        requirementId: this.requirementId,
        line: item.index + 1,
        expectedBroken,
      });
    }
    return assertions;
  }
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function subdirectoryOf(path: string): string {
  const dir = posix.dirname(path.replace(/\\/g, '/'));
  return dir === '.' ? '' : dir;
}

/**
 * Parse one document into requirements, journeys and diagnostics.
 *
 * @param path - document path relative to the corpus root; used for
 *   source locations and the subdirectory classification
 */
export function parseDocument(
  text: string,
  path: string,
  options: ParseOptions = {}
): DocumentParseResult {
  const parser = new DocumentParser(text, path, options);
  parser.run();
  return {
    requirements: parser.requirements,
    journeys: parser.journeys,
    diagnostics: parser.diagnostics,
  };
}
