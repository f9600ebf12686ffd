import { z } from 'zod';
import type { TDiagnostic, TDiagnosticValue, TSeverity } from '../diagnostics';
import type { TSuggestion, TSuggestionSource } from '../friendly-errors';

/**
 * Diagnostic as callers receive it. `node_type`, `node_id` and `parameter`
 * are lifted out of the context so tool hosts can read them directly.
 */
export interface TWireDiagnostic {
  code: string;
  message: string;
  severity: TSeverity;
  line?: number;
  node_type?: string;
  node_id?: string;
  parameter?: string;
  context?: Record<string, TDiagnosticValue>;
}

/**
 * Response shape shared by the validation operations
 */
export interface TValidationResponse {
  has_errors: boolean;
  errors: TWireDiagnostic[];
  warnings: TWireDiagnostic[];
  suggestions: TSuggestion[];
}

const LIFTED_KEYS = ['node_type', 'node_id', 'parameter'] as const;

export function toWire(diagnostic: TDiagnostic): TWireDiagnostic {
  const wire: TWireDiagnostic = {
    code: diagnostic.code,
    message: diagnostic.message,
    severity: diagnostic.severity,
  };
  if (diagnostic.line !== undefined) wire.line = diagnostic.line;

  for (const key of LIFTED_KEYS) {
    const value = diagnostic.context[key];
    if (typeof value === 'string') wire[key] = value;
  }

  if (Object.keys(diagnostic.context).length > 0) {
    wire.context = { ...diagnostic.context };
  }
  return wire;
}

// ── Input accepted by suggestFixes ──────────────────────────────────────

/**
 * A diagnostic handed back by a caller. Only `code` is required; unknown
 * top-level keys are kept and read like context entries.
 */
export const suggestionInputSchema = z
  .object({
    code: z.string().min(1),
    message: z.string().default(''),
    line: z.number().int().optional(),
    context: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

/**
 * Items that do not look like diagnostics are skipped.
 */
export function parseSuggestionInputs(items: readonly unknown[]): TSuggestionSource[] {
  const sources: TSuggestionSource[] = [];
  for (const item of items) {
    const parsed = suggestionInputSchema.safeParse(item);
    if (!parsed.success) continue;
    const { code, message, line, context, ...rest } = parsed.data;
    sources.push({
      code,
      message,
      ...(line !== undefined && { line }),
      context: { ...rest, ...context },
    });
  }
  return sources;
}
