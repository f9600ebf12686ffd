/**
 * Intermediate representation of an analysed workflow source.
 *
 * The extractor flattens a ts-morph AST into these records; every validator
 * reads them and nothing writes them after extraction.
 */

// ============================================================================
// Source positions
// ============================================================================

export type TSourceSpan = {
  /** 1-based start line */
  line: number;
  /** 1-based start column */
  column: number;
  /** 1-based end line */
  endLine: number;
};

// ============================================================================
// Values
// ============================================================================

/** A value the extractor could not evaluate statically */
export type TExpressionValue = {
  kind: 'expression';
  /** Source text of the expression */
  text: string;
};

export type TLiteralValue = string | number | boolean | null;

export type TConfigValue =
  | TLiteralValue
  | TExpressionValue
  | TConfigValue[]
  | { [key: string]: TConfigValue };

/** A builder setting such as `maxIterations(50)` */
export type TSettingValue =
  | { kind: 'literal'; value: TLiteralValue }
  | TExpressionValue;

export function isExpressionValue(value: unknown): value is TExpressionValue {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'expression'
  );
}

// ============================================================================
// Workflow declarations
// ============================================================================

export type TNodeDeclarationIR = {
  /** Node id, unique within the source */
  id: string;
  /** Node class name (string literal or identifier text) */
  className: string;
  /** How the class was referenced */
  classRef: 'string' | 'identifier';
  /** Configuration mapping, in source order */
  config: Record<string, TConfigValue>;
  /** Config was not an object literal, or spread another object into it */
  dynamicConfig: boolean;
  span: TSourceSpan;
};

export type TConnectionIR = {
  sourceNode: string;
  /** Output field on the source node; empty for endpoint-only edges */
  sourceOutput: string;
  targetNode: string;
  /** Input field on the target node; empty for endpoint-only edges */
  targetInput: string;
  /** Declared as part of a cycle, exempt from the acyclicity check */
  isCycleEdge: boolean;
  /** Absent for connections given as data rather than source */
  span?: TSourceSpan;
};

/** Resolved positional argument of an `addConnection` call */
export type TConnectionArgument =
  | { kind: 'string'; value: string }
  | { kind: 'dynamic'; text: string };

/** Raw `addConnection` call, before the graph builder resolves it */
export type TConnectionCallIR = {
  args: TConnectionArgument[];
  /** Options bag contained a `cycle` property */
  hasLegacyCycleFlag: boolean;
  span: TSourceSpan;
};

export type TCycleEdgeIR = {
  /** Undefined when the argument is not a static string */
  sourceNode?: string;
  targetNode?: string;
  /** Output field → input field */
  mapping?: Record<string, string>;
  /** False when a mapping was given but is not a key → key object */
  mappingValid: boolean;
  span: TSourceSpan;
};

export type TCycleDefinitionIR = {
  name: string;
  /** Variable the cycle builder was assigned to, if any */
  variable?: string;
  edges: TCycleEdgeIR[];
  maxIterations?: TSettingValue;
  convergeWhen?: TSettingValue;
  timeoutSeconds?: TSettingValue;
  hasBuild: boolean;
  span: TSourceSpan;
};

// ============================================================================
// Custom node classes
// ============================================================================

export type TParameterDeclarationIR = {
  /** Parameter name, or undefined when it is not a static string */
  name?: string;
  /** Type tag text (`'string'`, `String`, `'number'`, ...) */
  type?: string;
  required: boolean;
  default?: TConfigValue;
  span: TSourceSpan;
};

export type TParameterUsageIR = {
  name: string;
  span: TSourceSpan;
};

export type TNodeClassIR = {
  name: string;
  /** Name of the extended class, if any */
  extendsName?: string;
  hasParameterMethod: boolean;
  parameters: TParameterDeclarationIR[];
  /** `run` or `execute`, when present */
  runMethodName?: string;
  /** Parameter keys read inside the run method, in source order */
  usedParameters: TParameterUsageIR[];
  span: TSourceSpan;
};

// ============================================================================
// Imports
// ============================================================================

export type TImportIR = {
  /** Module specifier as written */
  module: string;
  /** Local binding name */
  name: string;
  /** Exported name (differs from `name` for `import { a as b }`) */
  importedName: string;
  kind: 'default' | 'named' | 'namespace';
  isRelative: boolean;
  isTypeOnly: boolean;
  /** Index of the import declaration among all import declarations */
  declarationIndex: number;
  span: TSourceSpan;
};

/** A module specifier with no bindings, e.g. `import './polyfill'` */
export type TImportDeclarationIR = {
  module: string;
  isRelative: boolean;
  bindingCount: number;
  span: TSourceSpan;
};

// ============================================================================
// Calls used by the pattern validator
// ============================================================================

export type TMethodCallIR = {
  /** Receiver text (`workflow` in `workflow.execute(runtime)`) */
  receiver: string;
  method: string;
  /** Argument texts */
  args: string[];
  span: TSourceSpan;
};

/** Variable initialised with `new X(...)` */
export type TConstructionIR = {
  variable: string;
  className: string;
  span: TSourceSpan;
};

// ============================================================================
// The whole unit
// ============================================================================

export type TWorkflowIR = {
  nodes: TNodeDeclarationIR[];
  connectionCalls: TConnectionCallIR[];
  cycles: TCycleDefinitionIR[];
  classes: TNodeClassIR[];
  imports: TImportIR[];
  importDeclarations: TImportDeclarationIR[];
  /** Identifiers in reference position */
  usedNames: Set<string>;
  /** Names declared in the source (variables, functions, classes, parameters) */
  declaredNames: Set<string>;
  /** First line each used name appears on */
  usedNameLines: Map<string, number>;
  methodCalls: TMethodCallIR[];
  constructions: TConstructionIR[];
};
