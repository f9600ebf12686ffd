/**
 * Validator facade - the operations a tool host calls.
 *
 * Every operation takes source text (or connection data), runs the parts of
 * the pipeline it needs and answers with a plain JSON-safe object. Nothing
 * here throws for bad input: syntax errors come back as SYN001, parser and
 * analyzer faults as VAL001.
 */

import type { TWorkflowIR } from '../ast/types';
import { analyzeWorkflowComplexity, type TComplexityReport } from '../analysis/complexity';
import { resolveConfig } from '../config/loader';
import type { ValidatorConfig } from '../config/types';
import {
  aggregateDiagnostics,
  createInternalFault,
  hasErrors,
  partitionDiagnostics,
  type TDiagnostic,
  type TDiagnosticCode,
} from '../diagnostics';
import { extractWorkflow } from '../extractor';
import { getSuggestion, suggestFixes as suggestFixesFor, type TSuggestion } from '../friendly-errors';
import { buildWorkflowGraph } from '../graph-builder';
import { withSourceUnit } from '../parser';
import {
  extendNodeTypeRegistry,
  getDefaultNodeTypeRegistry,
  type TNodeTypeRegistry,
} from '../registry/node-registry';
import { Deadline } from '../utils/deadline';
import { getErrorMessage } from '../utils/error-utils';
import { logger } from '../utils/logger';
import { validateConnectionGraph, validateConnectionList } from '../validation/connection-rules';
import type { TAnalysisContext, TValidationPass } from '../validation/context';
import { validateCycles } from '../validation/cycle-rules';
import { analyzeImports, validateImports as importPass, type TImportOptimization } from '../validation/import-rules';
import { validateParameters } from '../validation/parameter-rules';
import { runGoldStandards, validatePatterns } from '../validation/pattern-rules';
import { toWire, parseSuggestionInputs, type TValidationResponse, type TWireDiagnostic } from './wire';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ValidateOptions {
  /** Defaults to the built-in configuration */
  config?: ValidatorConfig;
  /** Defaults to the built-in catalogue plus `config.registry.nodeTypes` */
  registry?: TNodeTypeRegistry;
}

export interface ValidateConnectionsOptions extends ValidateOptions {
  /** Declared node ids; enables the endpoint checks */
  nodes?: readonly string[];
}

export interface GoldStandardsResponse extends TValidationResponse {
  gold_standards_checked: string;
  /** 100, minus 10 per error and 5 per warning, floored at 0 */
  compliance_score: number;
}

export interface ImportsResponse extends TValidationResponse {
  suggested_imports: string[];
  optimization_suggestions: TImportOptimization[];
}

export interface ErrorPatternMatch {
  line?: number;
  /** `<code>: <message>` */
  pattern: string;
  suggestion: string;
}

export interface ErrorPatternResponse {
  pattern_type: string;
  has_pattern: boolean;
  matches: ErrorPatternMatch[];
  error?: string;
}

export type ComplexityResponse =
  | ({ has_analysis: true } & TComplexityReport)
  | { has_analysis: false; error: string };

// ─── Pipeline ────────────────────────────────────────────────────────────────

type TSession = {
  context: TAnalysisContext;
  /** Extractor and graph-builder findings */
  structural: TDiagnostic[];
};

type TSessionOutcome<T> = { ok: true; value: T } | { ok: false; diagnostics: TDiagnostic[] };

type TResolvedOptions = { config: ValidatorConfig; registry: TNodeTypeRegistry };

function resolveOptions(options: ValidateOptions): TResolvedOptions {
  const config = options.config ?? resolveConfig();
  if (options.registry) return { config, registry: options.registry };
  const extra = config.registry.nodeTypes;
  const registry =
    Object.keys(extra).length > 0
      ? extendNodeTypeRegistry(getDefaultNodeTypeRegistry(), extra)
      : getDefaultNodeTypeRegistry();
  return { config, registry };
}

/**
 * Run one pass. A thrown value, a tripped deadline included, becomes a
 * VAL001 and the other passes still run.
 */
export function runPass(name: string, pass: TValidationPass, context: TAnalysisContext): TDiagnostic[] {
  try {
    return pass(context);
  } catch (error) {
    return [createInternalFault(name, error)];
  }
}

/**
 * Parse, extract and build the graph, then hand the session to `fn`. A
 * syntax error or an extraction fault ends the request early.
 */
function withSession<T>(
  source: string,
  { config, registry }: TResolvedOptions,
  fn: (session: TSession) => T
): TSessionOutcome<T> {
  const deadline = new Deadline(config.limits.timeoutMs);

  const parsed = withSourceUnit(source, (unit): TSessionOutcome<T> => {
    let ir: TWorkflowIR;
    let extracted: TDiagnostic[];
    try {
      const result = extractWorkflow(unit.sourceFile, {
        deadline,
        maxNestingDepth: config.limits.maxNestingDepth,
      });
      ir = result.ir;
      extracted = result.diagnostics;
    } catch (error) {
      return { ok: false, diagnostics: [createInternalFault('extractor', error)] };
    }

    const { graph, diagnostics: graphDiagnostics } = buildWorkflowGraph(ir);
    const context: TAnalysisContext = { ir, graph, config, registry, deadline };
    return { ok: true, value: fn({ context, structural: [...extracted, ...graphDiagnostics] }) };
  });

  if (!parsed.ok) return { ok: false, diagnostics: [parsed.diagnostic] };
  return parsed.value;
}

function toResponse(diagnostics: readonly TDiagnostic[]): TValidationResponse {
  const { errors, warnings } = partitionDiagnostics(diagnostics);
  return {
    has_errors: hasErrors(diagnostics),
    errors: errors.map(toWire),
    warnings: warnings.map(toWire),
    suggestions: suggestFixesFor(diagnostics),
  };
}

function timed<T>(operation: string, fn: () => T): T {
  const startTime = Date.now();
  const result = fn();
  logger.debug(`${operation} finished in ${Date.now() - startTime}ms`);
  return result;
}

const WORKFLOW_PASSES: ReadonlyArray<[string, TValidationPass]> = [
  ['parameter', validateParameters],
  ['connection', validateConnectionGraph],
  ['cycle', validateCycles],
  ['import', importPass],
  ['pattern', validatePatterns],
];

function collectWorkflowDiagnostics(source: string, options: ValidateOptions): TDiagnostic[] {
  const resolved = resolveOptions(options);
  const outcome = withSession(source, resolved, ({ context, structural }) => [
    structural,
    ...WORKFLOW_PASSES.map(([name, pass]) => runPass(name, pass, context)),
  ]);
  const groups = outcome.ok ? outcome.value : [outcome.diagnostics];
  return aggregateDiagnostics(groups, resolved.config.ordering);
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Every rule over a workflow source.
 *
 * @example
 * ```typescript
 * const result = validateWorkflow(source);
 * if (result.has_errors) {
 *   for (const error of result.errors) console.log(error.code, error.message);
 * }
 * ```
 */
export function validateWorkflow(source: string, options: ValidateOptions = {}): TValidationResponse {
  return timed('validateWorkflow', () => toResponse(collectWorkflowDiagnostics(source, options)));
}

/** Parameter rules only */
export function checkNodeParameters(source: string, options: ValidateOptions = {}): TValidationResponse {
  return timed('checkNodeParameters', () => {
    const resolved = resolveOptions(options);
    const outcome = withSession(source, resolved, ({ context }) => runPass('parameter', validateParameters, context));
    const diagnostics = outcome.ok ? outcome.value : outcome.diagnostics;
    return toResponse(aggregateDiagnostics([diagnostics], resolved.config.ordering));
  });
}

/**
 * Connection rules over `{ source, output, target, input }` items rather
 * than source text.
 */
export function validateConnections(
  connections: readonly unknown[],
  options: ValidateConnectionsOptions = {}
): TValidationResponse {
  return timed('validateConnections', () => {
    const { config } = resolveOptions(options);
    let diagnostics: TDiagnostic[];
    try {
      diagnostics = validateConnectionList(connections, {
        ...(options.nodes && { nodes: options.nodes }),
        connections: config.connections,
      });
    } catch (error) {
      diagnostics = [createInternalFault('connection', error)];
    }
    return toResponse(aggregateDiagnostics([diagnostics], config.ordering));
  });
}

/** One suggestion per distinct code; items that are not diagnostics are skipped */
export function suggestFixes(errors: readonly unknown[]): TSuggestion[] {
  return suggestFixesFor(parseSuggestionInputs(errors));
}

/**
 * Gold-standard patterns. `checkType` is `all` or a category (`imports`,
 * `patterns`); any other value checks nothing.
 */
export function validateGoldStandards(
  source: string,
  checkType: string = 'all',
  options: ValidateOptions = {}
): GoldStandardsResponse {
  return timed('validateGoldStandards', () => {
    const resolved = resolveOptions(options);
    const outcome = withSession(source, resolved, ({ context }) =>
      runPass('pattern', (ctx) => runGoldStandards(ctx.ir, checkType), context)
    );
    const diagnostics = aggregateDiagnostics(
      [outcome.ok ? outcome.value : outcome.diagnostics],
      resolved.config.ordering
    );
    const response = toResponse(diagnostics);
    return {
      ...response,
      gold_standards_checked: checkType,
      compliance_score: Math.max(0, 100 - 10 * response.errors.length - 5 * response.warnings.length),
    };
  });
}

export { getValidationPatterns } from './patterns';

const ERROR_PATTERN_CODES: Readonly<Record<string, (code: TDiagnosticCode) => boolean>> = {
  connection_syntax: (code) => code === 'CON001' || code === 'CON002',
  parameter_declaration: (code) => code === 'PAR001' || code === 'PAR002' || code === 'PAR003',
  circular_deps: (code) => code === 'CON005',
  cycle_configuration: (code) => code.startsWith('CYC'),
  imports: (code) => code.startsWith('IMP'),
  execution_pattern: (code) => code === 'GOLD002',
};

/**
 * Look for one family of mistakes. Unknown pattern types match nothing.
 */
export function checkErrorPattern(
  source: string,
  patternType: string,
  options: ValidateOptions = {}
): ErrorPatternResponse {
  return timed('checkErrorPattern', () => {
    if (!Object.prototype.hasOwnProperty.call(ERROR_PATTERN_CODES, patternType)) {
      return { pattern_type: patternType, has_pattern: false, matches: [] };
    }
    const selects = ERROR_PATTERN_CODES[patternType];

    const diagnostics = collectWorkflowDiagnostics(source, options);
    const fatal = diagnostics.find((d) => d.code === 'SYN001');
    if (fatal) {
      return { pattern_type: patternType, has_pattern: false, matches: [], error: fatal.message };
    }

    const matches: ErrorPatternMatch[] = diagnostics
      .filter((d) => selects(d.code))
      .map((d) => ({
        ...(d.line !== undefined && { line: d.line }),
        pattern: `${d.code}: ${d.message}`,
        suggestion: getSuggestion(d).fix,
      }));
    return { pattern_type: patternType, has_pattern: matches.length > 0, matches };
  });
}

/**
 * Import rules, plus the import statements that would fix every missing
 * symbol and tidy-ups for the imports already there.
 */
export function validateImports(source: string, options: ValidateOptions = {}): ImportsResponse {
  return timed('validateImports', () => {
    const resolved = resolveOptions(options);
    const outcome = withSession(source, resolved, ({ context }) => {
      try {
        return analyzeImports(context.ir, context.config.imports);
      } catch (error) {
        return { diagnostics: [createInternalFault('import', error)], suggestedImports: [], optimizations: [] };
      }
    });

    if (!outcome.ok) {
      return { ...toResponse(outcome.diagnostics), suggested_imports: [], optimization_suggestions: [] };
    }
    const { diagnostics, suggestedImports, optimizations } = outcome.value;
    return {
      ...toResponse(aggregateDiagnostics([diagnostics], resolved.config.ordering)),
      suggested_imports: suggestedImports,
      optimization_suggestions: optimizations,
    };
  });
}

/** Structural metrics, bottlenecks and optimisation hints */
export function analyzeComplexity(source: string, options: ValidateOptions = {}): ComplexityResponse {
  return timed('analyzeComplexity', () => {
    const outcome = withSession(source, resolveOptions(options), ({ context }): ComplexityResponse => {
      try {
        return {
          has_analysis: true,
          ...analyzeWorkflowComplexity(context.ir, { registry: context.registry, deadline: context.deadline }),
        };
      } catch (error) {
        logger.debug(`complexity analysis failed: ${getErrorMessage(error)}`);
        return { has_analysis: false, error: `Complexity analysis error: ${getErrorMessage(error)}` };
      }
    });
    if (outcome.ok) return outcome.value;
    const [first] = outcome.diagnostics;
    return { has_analysis: false, error: `Complexity analysis error: ${first?.message ?? 'unknown failure'}` };
  });
}

export type { TWireDiagnostic, TValidationResponse };
