/**
 * Diagnostic codes, construction and aggregation.
 *
 * Every code the validator can emit is listed in {@link DIAGNOSTIC_CODES}; the
 * code unions below are the closed set that the suggestion table is keyed on,
 * so adding a rule without a fix template fails to compile.
 */

import { getErrorMessage, NestingDepthError } from './utils/error-utils';
import { logger } from './utils/logger';

export type TParameterCode = 'PAR001' | 'PAR002' | 'PAR003' | 'PAR004';
export type TConnectionCode =
  | 'CON001'
  | 'CON002'
  | 'CON003'
  | 'CON004'
  | 'CON005'
  | 'CON006'
  | 'CON007';
export type TCycleCode =
  | 'CYC001'
  | 'CYC002'
  | 'CYC003'
  | 'CYC004'
  | 'CYC005'
  | 'CYC006'
  | 'CYC007'
  | 'CYC008';
export type TImportCode = 'IMP001' | 'IMP002' | 'IMP003' | 'IMP004' | 'IMP006' | 'IMP008';
export type TPatternCode = 'GOLD001' | 'GOLD002' | 'GOLD003';
export type TSyntaxCode = 'SYN001';
export type TInternalCode = 'VAL001';

export type TDiagnosticCode =
  | TParameterCode
  | TConnectionCode
  | TCycleCode
  | TImportCode
  | TPatternCode
  | TSyntaxCode
  | TInternalCode;

export type TSeverity = 'error' | 'warning' | 'info';

export type TDiagnosticCategory =
  | 'parameter'
  | 'connection'
  | 'cycle'
  | 'import'
  | 'pattern'
  | 'syntax'
  | 'internal';

export type TDiagnosticValue = string | number | boolean | string[];

export type TDiagnostic = {
  readonly code: TDiagnosticCode;
  readonly message: string;
  readonly severity: TSeverity;
  /** 1-based line, when the finding has a source position */
  readonly line?: number;
  readonly context: Readonly<Record<string, TDiagnosticValue>>;
};

type TDiagnosticCodeInfo = {
  category: TDiagnosticCategory;
  severity: TSeverity;
  title: string;
};

export const DIAGNOSTIC_CODES = {
  PAR001: { category: 'parameter', severity: 'error', title: 'Node class missing getParameters()' },
  PAR002: { category: 'parameter', severity: 'error', title: 'Undeclared parameter used' },
  PAR003: { category: 'parameter', severity: 'error', title: 'Parameter declaration missing type' },
  PAR004: { category: 'parameter', severity: 'error', title: 'Missing required parameter' },
  CON001: { category: 'connection', severity: 'error', title: 'Invalid connection arguments' },
  CON002: { category: 'connection', severity: 'error', title: 'Deprecated 2-argument connection' },
  CON003: { category: 'connection', severity: 'error', title: 'Connection from unknown node' },
  CON004: { category: 'connection', severity: 'error', title: 'Connection to unknown node' },
  CON005: { category: 'connection', severity: 'error', title: 'Circular dependency' },
  CON006: { category: 'connection', severity: 'warning', title: 'Suspicious output field' },
  CON007: { category: 'connection', severity: 'warning', title: 'Suspicious input field' },
  CYC001: { category: 'cycle', severity: 'error', title: 'Deprecated cycle flag' },
  CYC002: { category: 'cycle', severity: 'error', title: 'Cycle without termination' },
  CYC003: { category: 'cycle', severity: 'error', title: 'Invalid convergence condition' },
  CYC004: { category: 'cycle', severity: 'error', title: 'Cycle without connections' },
  CYC005: { category: 'cycle', severity: 'error', title: 'Invalid cycle mapping' },
  CYC006: { category: 'cycle', severity: 'warning', title: 'High iteration limit' },
  CYC007: { category: 'cycle', severity: 'error', title: 'Invalid cycle timeout' },
  CYC008: { category: 'cycle', severity: 'error', title: 'Cycle references unknown node' },
  IMP001: { category: 'import', severity: 'error', title: 'Missing import' },
  IMP002: { category: 'import', severity: 'warning', title: 'Unused import' },
  IMP003: { category: 'import', severity: 'error', title: 'Incorrect import path' },
  IMP004: { category: 'import', severity: 'warning', title: 'Relative SDK import' },
  IMP006: { category: 'import', severity: 'warning', title: 'Import order' },
  IMP008: { category: 'import', severity: 'warning', title: 'Unused heavy import' },
  GOLD001: { category: 'pattern', severity: 'warning', title: 'Relative import' },
  GOLD002: { category: 'pattern', severity: 'error', title: 'Inverted execution call' },
  GOLD003: { category: 'pattern', severity: 'error', title: 'Snake-case builder call' },
  SYN001: { category: 'syntax', severity: 'error', title: 'Syntax error' },
  VAL001: { category: 'internal', severity: 'error', title: 'Internal validator fault' },
} as const satisfies Record<TDiagnosticCode, TDiagnosticCodeInfo>;

export function isDiagnosticCode(code: string): code is TDiagnosticCode {
  return Object.prototype.hasOwnProperty.call(DIAGNOSTIC_CODES, code);
}

export function categoryOf(code: TDiagnosticCode): TDiagnosticCategory {
  return DIAGNOSTIC_CODES[code].category;
}

export function createDiagnostic(
  code: TDiagnosticCode,
  message: string,
  details: { line?: number; context?: Record<string, TDiagnosticValue> } = {}
): TDiagnostic {
  const diagnostic: TDiagnostic = {
    code,
    message,
    severity: DIAGNOSTIC_CODES[code].severity,
    ...(details.line !== undefined && { line: details.line }),
    context: Object.freeze({ ...(details.context ?? {}) }),
  };
  return Object.freeze(diagnostic);
}

/**
 * VAL001 for a fault inside one stage of the analyzer. The line is kept when
 * the fault is a nesting-depth overrun.
 */
export function createInternalFault(stage: string, error: unknown): TDiagnostic {
  logger.debug(`${stage} validator failed: ${getErrorMessage(error)}`);
  const line = error instanceof NestingDepthError ? error.line : undefined;
  return createDiagnostic('VAL001', `Validation error in ${stage} validator: ${getErrorMessage(error)}`, {
    ...(line !== undefined && { line }),
    context: { pass: stage },
  });
}

// ── Aggregation ─────────────────────────────────────────────────────────

const SEVERITY_RANK: Record<TSeverity, number> = {
  error: 0,
  warning: 1,
  info: 2,
};

export type TOrderingOptions = {
  /** `code` orders same-line, same-severity findings by code; `none` keeps emission order */
  tieBreak: 'code' | 'none';
};

function dedupeKey(d: TDiagnostic): string {
  return `${d.code}\u0000${d.line ?? 0}\u0000${d.message}`;
}

/**
 * Concatenate validator outputs, drop exact duplicates and order them by
 * line, then severity, then code. The sort is stable so emission order
 * settles anything left.
 */
export function aggregateDiagnostics(
  groups: readonly (readonly TDiagnostic[])[],
  options: TOrderingOptions = { tieBreak: 'code' }
): TDiagnostic[] {
  const seen = new Set<string>();
  const merged: TDiagnostic[] = [];
  for (const group of groups) {
    for (const diagnostic of group) {
      const key = dedupeKey(diagnostic);
      if (seen.has(key)) continue;
      seen.add(key);
      merged.push(diagnostic);
    }
  }

  return merged.sort((a, b) => {
    const byLine = (a.line ?? 0) - (b.line ?? 0);
    if (byLine !== 0) return byLine;
    const bySeverity = SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity];
    if (bySeverity !== 0) return bySeverity;
    if (options.tieBreak === 'code' && a.code !== b.code) {
      return a.code < b.code ? -1 : 1;
    }
    return 0;
  });
}

export function hasErrors(diagnostics: readonly TDiagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

/** Errors in one list; warnings and infos in the other */
export function partitionDiagnostics(diagnostics: readonly TDiagnostic[]): {
  errors: TDiagnostic[];
  warnings: TDiagnostic[];
} {
  const errors: TDiagnostic[] = [];
  const warnings: TDiagnostic[] = [];
  for (const diagnostic of diagnostics) {
    if (diagnostic.severity === 'error') {
      errors.push(diagnostic);
    } else {
      warnings.push(diagnostic);
    }
  }
  return { errors, warnings };
}
