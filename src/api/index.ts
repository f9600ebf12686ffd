export {
  analyzeComplexity,
  checkErrorPattern,
  checkNodeParameters,
  getValidationPatterns,
  runPass,
  suggestFixes,
  validateConnections,
  validateGoldStandards,
  validateImports,
  validateWorkflow,
} from './validate';
export type {
  ComplexityResponse,
  ErrorPatternMatch,
  ErrorPatternResponse,
  GoldStandardsResponse,
  ImportsResponse,
  ValidateConnectionsOptions,
  ValidateOptions,
} from './validate';
export type { ValidationPattern } from './patterns';
export { toWire, parseSuggestionInputs, suggestionInputSchema } from './wire';
export type { TValidationResponse, TWireDiagnostic } from './wire';
