import { z } from 'zod';
import builtinNodes from './builtin-nodes.json';

/**
 * Read-only catalogue of known node types and their required parameters.
 *
 * The validator never hard-codes node types: callers inject a registry, and
 * new types are added by extending one rather than by editing validator code.
 */
export interface TNodeTypeRegistry {
  /** Registered name for `className`, accepting a trailing `Node` suffix */
  resolve(className: string): string | undefined;
  /** Required parameter names, or undefined when the type is unknown */
  getRequiredParameters(className: string): readonly string[] | undefined;
  names(): string[];
}

export const nodeTypeEntriesSchema = z.record(z.string(), z.array(z.string()));

export type TNodeTypeEntries = z.infer<typeof nodeTypeEntriesSchema>;

const NODE_SUFFIX = 'Node';

class StaticNodeTypeRegistry implements TNodeTypeRegistry {
  private readonly entries: ReadonlyMap<string, readonly string[]>;

  constructor(entries: TNodeTypeEntries) {
    const map = new Map<string, readonly string[]>();
    for (const [name, required] of Object.entries(entries)) {
      map.set(name, Object.freeze([...required]));
    }
    this.entries = map;
  }

  resolve(className: string): string | undefined {
    if (this.entries.has(className)) return className;
    if (className.endsWith(NODE_SUFFIX) && className.length > NODE_SUFFIX.length) {
      const stripped = className.slice(0, -NODE_SUFFIX.length);
      if (this.entries.has(stripped)) return stripped;
    }
    return undefined;
  }

  getRequiredParameters(className: string): readonly string[] | undefined {
    const name = this.resolve(className);
    return name === undefined ? undefined : this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }
}

export function createNodeTypeRegistry(entries: TNodeTypeEntries): TNodeTypeRegistry {
  return new StaticNodeTypeRegistry(nodeTypeEntriesSchema.parse(entries));
}

/**
 * New registry with `extra` layered over `base`. An entry in `extra` replaces
 * the base entry of the same name.
 */
export function extendNodeTypeRegistry(
  base: TNodeTypeRegistry,
  extra: TNodeTypeEntries
): TNodeTypeRegistry {
  const merged: TNodeTypeEntries = {};
  for (const name of base.names()) {
    merged[name] = [...(base.getRequiredParameters(name) ?? [])];
  }
  return createNodeTypeRegistry({ ...merged, ...extra });
}

let defaultRegistry: TNodeTypeRegistry | null = null;

/** Registry seeded from the bundled built-in node catalogue */
export function getDefaultNodeTypeRegistry(): TNodeTypeRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createNodeTypeRegistry(builtinNodes);
  }
  return defaultRegistry;
}
