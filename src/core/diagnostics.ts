/**
 * Graph-wide collection of diagnostics.
 */

import type { CheckName, Diagnostic, Severity } from './types.js';

export class ValidationResult {
  private readonly items: Diagnostic[] = [];

  constructor(initial: Iterable<Diagnostic> = []) {
    for (const diagnostic of initial) this.items.push(diagnostic);
  }

  add(diagnostic: Diagnostic): void {
    this.items.push(diagnostic);
  }

  addAll(diagnostics: Iterable<Diagnostic>): void {
    for (const diagnostic of diagnostics) this.items.push(diagnostic);
  }

  /** All diagnostics in the order they were reported. */
  get diagnostics(): readonly Diagnostic[] {
    return this.items;
  }

  get errors(): Diagnostic[] {
    return this.bySeverity('error');
  }

  get warnings(): Diagnostic[] {
    return this.bySeverity('warning');
  }

  bySeverity(severity: Severity): Diagnostic[] {
    return this.items.filter((d) => d.severity === severity);
  }

  byCheck(check: CheckName): Diagnostic[] {
    return this.items.filter((d) => d.check === check);
  }

  /** True when nothing of error severity was reported. */
  get isValid(): boolean {
    return !this.items.some((d) => d.severity === 'error');
  }
}
