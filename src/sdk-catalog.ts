/**
 * Symbols exported by the `@nodeflow/sdk` package and the subpath each one
 * lives under. The import validator resolves canonical paths against the
 * configured SDK root, so a fork published under another name only needs
 * `imports.sdkRoot` changed.
 */

export type TSdkSubpath = 'workflow' | 'runtime' | 'nodes';

export const SDK_SYMBOLS: Readonly<Record<string, TSdkSubpath>> = Object.freeze({
  WorkflowBuilder: 'workflow',
  Workflow: 'workflow',
  CycleBuilder: 'workflow',
  LocalRuntime: 'runtime',
  AsyncLocalRuntime: 'runtime',
  ParallelRuntime: 'runtime',
  DockerRuntime: 'runtime',
  Node: 'nodes',
  AsyncNode: 'nodes',
  BaseNode: 'nodes',
  NodeParameter: 'nodes',
  NodeRegistry: 'nodes',
});

/** Classes a custom node may extend */
export const SDK_NODE_BASES: ReadonlySet<string> = new Set(['Node', 'AsyncNode', 'BaseNode']);

export const SDK_RUNTIMES: ReadonlySet<string> = new Set(
  Object.entries(SDK_SYMBOLS)
    .filter(([, subpath]) => subpath === 'runtime')
    .map(([name]) => name)
);

export const SDK_BUILDER_CLASS = 'WorkflowBuilder';

export function isSdkSymbol(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(SDK_SYMBOLS, name);
}

export function canonicalModuleFor(name: string, sdkRoot: string): string | undefined {
  if (!isSdkSymbol(name)) return undefined;
  return `${sdkRoot}/${SDK_SYMBOLS[name]}`;
}

/** True for the SDK root itself or any of its subpaths */
export function isSdkModule(module: string, sdkRoot: string): boolean {
  return module === sdkRoot || module.startsWith(`${sdkRoot}/`);
}
