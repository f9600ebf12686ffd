/**
 * # Validator Constants
 *
 * Method names of the `@nodeflow/sdk` builder API that the extractor recognises,
 * plus the names the pattern validator treats as deprecated spellings.
 *
 * ```typescript
 * const workflow = new WorkflowBuilder();
 * workflow.addNode('HTTPRequest', 'fetch', { url: 'https://example.test' });
 * workflow.addConnection('fetch', 'response', 'parse', 'data');
 *
 * const loop = workflow.createCycle('retry');
 * loop.connect('parse', 'fetch', { mapping: { status: 'previous_status' } });
 * loop.maxIterations(5).build();
 * ```
 */

export const BUILDER_METHODS = {
  ADD_NODE: "addNode",
  ADD_CONNECTION: "addConnection",
  CREATE_CYCLE: "createCycle",
} as const;

export const CYCLE_METHODS = {
  CONNECT: "connect",
  MAX_ITERATIONS: "maxIterations",
  CONVERGE_WHEN: "convergeWhen",
  TIMEOUT: "timeout",
  BUILD: "build",
} as const;

export type TCycleMethod = (typeof CYCLE_METHODS)[keyof typeof CYCLE_METHODS];

const CYCLE_METHOD_NAMES: readonly string[] = Object.values(CYCLE_METHODS);

export function isCycleMethod(name: string): name is TCycleMethod {
  return CYCLE_METHOD_NAMES.includes(name);
}

/** Option key on `addConnection` that marks the old cycle-edge form */
export const LEGACY_CYCLE_OPTION = "cycle";

/** Option key on `connect()` holding the output → input field mapping */
export const CYCLE_MAPPING_OPTION = "mapping";

export const NODE_CLASS_METHODS = {
  PARAMETERS: "getParameters",
  RUN: ["run", "execute"],
} as const;

/** Parameter descriptor constructor recognised inside `getParameters()` */
export const NODE_PARAMETER_CLASS = "NodeParameter";

/**
 * snake_case spellings of builder methods. The SDK only exposes the
 * camelCase names, so these fail at runtime with "is not a function".
 */
export const SNAKE_CASE_BUILDER_METHODS: Record<string, string> = {
  add_node: "addNode",
  add_connection: "addConnection",
  create_cycle: "createCycle",
  max_iterations: "maxIterations",
  converge_when: "convergeWhen",
};

/** Substrings that mark a connection field name as a placeholder */
export const SUSPICIOUS_FIELD_MARKERS = ["nonexistent", "invalid", "fake", "undefined", "todo"] as const;
