import { describe, it, expect } from 'vitest';
import {
  aggregateDiagnostics,
  categoryOf,
  createDiagnostic,
  DIAGNOSTIC_CODES,
  hasErrors,
  isDiagnosticCode,
  partitionDiagnostics,
} from '../../src/diagnostics';

describe('createDiagnostic', () => {
  it('takes severity from the code table and freezes the result', () => {
    const diagnostic = createDiagnostic('IMP002', "Unused import 'z' from 'zod'", {
      line: 3,
      context: { symbol: 'z' },
    });
    expect(diagnostic).toEqual({
      code: 'IMP002',
      message: "Unused import 'z' from 'zod'",
      severity: 'warning',
      line: 3,
      context: { symbol: 'z' },
    });
    expect(Object.isFrozen(diagnostic)).toBe(true);
    expect(Object.isFrozen(diagnostic.context)).toBe(true);
  });

  it('omits the line when there is none', () => {
    expect('line' in createDiagnostic('CON004', 'x')).toBe(false);
  });
});

describe('code table', () => {
  it('recognises known codes only', () => {
    expect(isDiagnosticCode('CYC008')).toBe(true);
    expect(isDiagnosticCode('IMP005')).toBe(false);
    expect(isDiagnosticCode('toString')).toBe(false);
  });

  it('maps each code family to its category', () => {
    expect(categoryOf('PAR004')).toBe('parameter');
    expect(categoryOf('CON005')).toBe('connection');
    expect(categoryOf('CYC001')).toBe('cycle');
    expect(categoryOf('IMP008')).toBe('import');
    expect(categoryOf('GOLD002')).toBe('pattern');
    expect(categoryOf('SYN001')).toBe('syntax');
    expect(categoryOf('VAL001')).toBe('internal');
  });

  it('keeps the warning-level codes', () => {
    const warnings = Object.entries(DIAGNOSTIC_CODES)
      .filter(([, info]) => info.severity === 'warning')
      .map(([code]) => code);
    expect(warnings).toEqual(['CON006', 'CON007', 'CYC006', 'IMP002', 'IMP004', 'IMP006', 'IMP008', 'GOLD001']);
  });
});

describe('aggregateDiagnostics', () => {
  const unusedImport = createDiagnostic('IMP002', 'unused', { line: 2 });
  const missingParam = createDiagnostic('PAR004', 'missing', { line: 2 });
  const cycle = createDiagnostic('CYC002', 'no termination', { line: 2 });
  const early = createDiagnostic('CON001', 'bad call', { line: 1 });
  const lineless = createDiagnostic('CON004', 'ghost');

  it('orders by line, then severity, then code', () => {
    const result = aggregateDiagnostics([[unusedImport, missingParam], [cycle, early, lineless]]);
    expect(result.map((d) => d.code)).toEqual(['CON004', 'CON001', 'CYC002', 'PAR004', 'IMP002']);
  });

  it('keeps emission order on ties when asked', () => {
    const result = aggregateDiagnostics([[missingParam], [cycle]], { tieBreak: 'none' });
    expect(result.map((d) => d.code)).toEqual(['PAR004', 'CYC002']);
  });

  it('drops exact duplicates across groups', () => {
    const again = createDiagnostic('PAR004', 'missing', { line: 2 });
    const elsewhere = createDiagnostic('PAR004', 'missing', { line: 5 });
    expect(aggregateDiagnostics([[missingParam], [again, elsewhere]])).toHaveLength(2);
  });
});

describe('hasErrors / partitionDiagnostics', () => {
  it('splits errors from warnings', () => {
    const error = createDiagnostic('PAR001', 'e');
    const warning = createDiagnostic('CYC006', 'w');

    expect(hasErrors([warning])).toBe(false);
    expect(hasErrors([warning, error])).toBe(true);
    expect(partitionDiagnostics([warning, error])).toEqual({ errors: [error], warnings: [warning] });
  });
});
