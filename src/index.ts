/**
 * Static validator for @nodeflow/sdk workflow source.
 *
 * @example
 * ```typescript
 * import { validateWorkflow } from 'nodeflow-validator';
 *
 * const result = validateWorkflow(source);
 * console.log(result.has_errors, result.errors.map((e) => e.code));
 * ```
 */

export * from './api';

export { analyzeWorkflowComplexity, classifyPattern, workflowDepth } from './analysis/complexity';
export type {
  TComplexityMetrics,
  TComplexityReport,
  TFinding,
  TOptimizationHint,
  TPatternType,
  TResourceAnalysis,
  TScalabilityAnalysis,
} from './analysis/complexity';

export { validateConditionSyntax } from './chevrotain-parser/condition-parser';
export type { TConditionCheck } from './chevrotain-parser/condition-parser';

export { CONFIG_FILE_NAMES, loadConfig, mergeConfig, resolveConfig } from './config/loader';
export { DEFAULT_CONFIG, getDefaultConfig } from './config/defaults';
export type { PartialValidatorConfig, ValidatorConfig } from './config/types';

export {
  aggregateDiagnostics,
  categoryOf,
  createDiagnostic,
  DIAGNOSTIC_CODES,
  hasErrors,
  isDiagnosticCode,
  partitionDiagnostics,
} from './diagnostics';
export type { TDiagnostic, TDiagnosticCode, TSeverity } from './diagnostics';

export { formatFriendlyDiagnostics, getSuggestion } from './friendly-errors';
export type { TSuggestion, TSuggestionSource } from './friendly-errors';

export {
  createNodeTypeRegistry,
  extendNodeTypeRegistry,
  getDefaultNodeTypeRegistry,
} from './registry/node-registry';
export type { TNodeTypeEntries, TNodeTypeRegistry } from './registry/node-registry';

export { createDefaultFieldNameCheck } from './validation/connection-rules';
export type { TFieldNameCheck, TFieldNameVerdict, TFieldRole } from './validation/connection-rules';
export { GOLD_STANDARDS } from './validation/pattern-rules';
export type { TGoldStandard } from './validation/pattern-rules';

export { ConfigError, DeadlineExceededError, NestingDepthError } from './utils/error-utils';
