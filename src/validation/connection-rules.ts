/**
 * Connection Validation Rules
 *
 * Rules:
 * 1. CON005 - Ordinary connections form a cycle
 * 2. CON006 - Output field name looks like a placeholder or a typo
 * 3. CON007 - Input field name looks like a placeholder or a typo
 *
 * CON001/CON002 come from the extractor and CON003/CON004 from the graph
 * builder when validating source; {@link validateConnectionList} produces all
 * of them for connections given as data.
 *
 * Field names are not typed, so the field check is a heuristic. It is
 * pluggable through {@link TFieldNameCheck}.
 */

import { z } from 'zod';
import type { TConnectionIR, TWorkflowIR } from '../ast/types';
import type { ConnectionRulesConfig } from '../config/types';
import { SUSPICIOUS_FIELD_MARKERS } from '../constants';
import { createDiagnostic, type TDiagnostic } from '../diagnostics';
import { checkConnectionEndpoints, findCircularDependencies, type TWorkflowGraph } from '../graph-builder';
import type { TNodeTypeRegistry } from '../registry/node-registry';
import { closestMatch } from '../utils/string-distance';
import type { TAnalysisContext } from './context';

// ---------------------------------------------------------------------------
// Field name check
// ---------------------------------------------------------------------------

export type TFieldRole = 'output' | 'input';

export type TFieldNameVerdict =
  | { suspicious: false }
  | { suspicious: true; reason: 'marker'; marker: string }
  | { suspicious: true; reason: 'typo'; closest: string };

/**
 * Decides whether a connection field name is worth a warning. `knownFields`
 * holds names the endpoint is known to accept (its declared parameters).
 */
export type TFieldNameCheck = (
  field: string,
  role: TFieldRole,
  knownFields: ReadonlySet<string>
) => TFieldNameVerdict;

/** Shorter names sit within one edit of too many real words */
const MIN_TYPO_LENGTH = 5;

function isPluralVariant(a: string, b: string): boolean {
  return a === `${b}s` || b === `${a}s` || a === `${b}es` || b === `${a}es`;
}

/**
 * Allow-list check: common names and the endpoint's own parameters pass;
 * anything else is suspicious when it carries a placeholder marker or sits
 * within `typoDistance` edits of a common name.
 */
export function createDefaultFieldNameCheck(config: ConnectionRulesConfig): TFieldNameCheck {
  const common = new Set(config.commonFieldNames.map((name) => name.toLowerCase()));

  return (field, role, knownFields) => {
    const head = field.split('.')[0];
    const lower = head.toLowerCase();
    if (common.has(lower)) return { suspicious: false };
    if (role === 'input' && knownFields.has(head)) return { suspicious: false };

    const marker = SUSPICIOUS_FIELD_MARKERS.find((m) => lower.includes(m));
    if (marker !== undefined) return { suspicious: true, reason: 'marker', marker };

    if (head.length >= MIN_TYPO_LENGTH) {
      const closest = closestMatch(head, config.commonFieldNames, config.typoDistance);
      if (closest !== undefined && !isPluralVariant(lower, closest.toLowerCase())) {
        return { suspicious: true, reason: 'typo', closest };
      }
    }
    return { suspicious: false };
  };
}

function describeVerdict(verdict: TFieldNameVerdict): string {
  if (!verdict.suspicious) return '';
  return verdict.reason === 'marker'
    ? `looks like a placeholder ('${verdict.marker}')`
    : `did you mean '${verdict.closest}'?`;
}

/**
 * CON006/CON007 for connections that name both fields. Cycle edges carry
 * their fields in a mapping and are left to the cycle rules.
 */
export function checkConnectionFields(
  connections: readonly TConnectionIR[],
  check: TFieldNameCheck,
  knownInputsOf: (targetNode: string) => ReadonlySet<string> = () => new Set()
): TDiagnostic[] {
  const diagnostics: TDiagnostic[] = [];
  const none: ReadonlySet<string> = new Set();

  for (const connection of connections) {
    if (connection.isCycleEdge || !connection.sourceOutput || !connection.targetInput) continue;
    const line = connection.span?.line;

    const output = check(connection.sourceOutput, 'output', none);
    if (output.suspicious) {
      diagnostics.push(
        createDiagnostic(
          'CON006',
          `Suspicious output field '${connection.sourceOutput}' on node '${connection.sourceNode}': ${describeVerdict(output)}`,
          {
            ...(line !== undefined && { line }),
            context: {
              node_id: connection.sourceNode,
              field: connection.sourceOutput,
              ...(output.reason === 'typo' && { suggestion: output.closest }),
            },
          }
        )
      );
    }

    const input = check(connection.targetInput, 'input', knownInputsOf(connection.targetNode));
    if (input.suspicious) {
      diagnostics.push(
        createDiagnostic(
          'CON007',
          `Suspicious input field '${connection.targetInput}' on node '${connection.targetNode}': ${describeVerdict(input)}`,
          {
            ...(line !== undefined && { line }),
            context: {
              node_id: connection.targetNode,
              field: connection.targetInput,
              ...(input.reason === 'typo' && { suggestion: input.closest }),
            },
          }
        )
      );
    }
  }
  return diagnostics;
}

/** Parameter names a node accepts: custom-class declarations or registry entries */
export function knownInputsResolver(
  ir: TWorkflowIR,
  graph: TWorkflowGraph,
  registry: TNodeTypeRegistry
): (targetNode: string) => ReadonlySet<string> {
  return (targetNode) => {
    const node = graph.nodes.get(targetNode);
    if (!node) return new Set();
    const cls = ir.classes.find((c) => c.name === node.className);
    if (cls) {
      const names = new Set<string>();
      for (const parameter of cls.parameters) {
        if (parameter.name !== undefined) names.add(parameter.name);
      }
      return names;
    }
    return new Set(registry.getRequiredParameters(node.className) ?? []);
  };
}

// ---------------------------------------------------------------------------
// Rule entry points
// ---------------------------------------------------------------------------

export function validateConnectionGraph(
  context: TAnalysisContext,
  check: TFieldNameCheck = createDefaultFieldNameCheck(context.config.connections)
): TDiagnostic[] {
  const { ir, graph, registry } = context;
  return [
    ...findCircularDependencies(graph.connections, new Set(graph.nodes.keys())),
    ...checkConnectionFields(graph.connections, check, knownInputsResolver(ir, graph, registry)),
  ];
}

// ---------------------------------------------------------------------------
// Connections given as data
// ---------------------------------------------------------------------------

const CONNECTION_FIELDS = ['source', 'output', 'target', 'input'] as const;

const connectionItemSchema = z.object({
  source: z.string().min(1),
  output: z.string().min(1),
  target: z.string().min(1),
  input: z.string().min(1),
});

export type TConnectionListOptions = {
  /** Declared node ids; enables CON003/CON004 */
  nodes?: readonly string[];
  connections: ConnectionRulesConfig;
  fieldCheck?: TFieldNameCheck;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate `{ source, output, target, input }` items. Items carrying only
 * `source` and `target` are the 2-argument form (CON002) and still take
 * part in the endpoint and cycle checks; any other gap is CON001.
 */
export function validateConnectionList(
  items: readonly unknown[],
  options: TConnectionListOptions
): TDiagnostic[] {
  const diagnostics: TDiagnostic[] = [];
  const connections: TConnectionIR[] = [];

  items.forEach((item, index) => {
    if (!isRecord(item)) {
      diagnostics.push(
        createDiagnostic('CON001', `Connection ${index} is not an object`, { context: { index } })
      );
      return;
    }

    const parsed = connectionItemSchema.safeParse(item);
    if (parsed.success) {
      const { source, output, target, input } = parsed.data;
      connections.push({
        sourceNode: source,
        sourceOutput: output,
        targetNode: target,
        targetInput: input,
        isCycleEdge: false,
      });
      return;
    }

    const invalid = new Set(parsed.error.issues.map((issue) => String(issue.path[0])));
    const missing = CONNECTION_FIELDS.filter((field) => invalid.has(field));
    const source = item.source;
    const target = item.target;
    if (
      missing.length === 2 &&
      missing[0] === 'output' &&
      missing[1] === 'input' &&
      typeof source === 'string' &&
      typeof target === 'string'
    ) {
      diagnostics.push(
        createDiagnostic(
          'CON002',
          `Connection ${index} uses the deprecated 2-argument form. Use: addConnection('${source}', 'result', '${target}', 'input')`,
          { context: { index, source, target } }
        )
      );
      connections.push({ sourceNode: source, sourceOutput: '', targetNode: target, targetInput: '', isCycleEdge: false });
      return;
    }

    diagnostics.push(
      createDiagnostic('CON001', `Connection ${index} missing required fields: ${missing.join(', ')}`, {
        context: { index, missing_fields: [...missing] },
      })
    );
  });

  const knownNodes = options.nodes ? new Set(options.nodes) : undefined;
  if (knownNodes) {
    diagnostics.push(...checkConnectionEndpoints(connections, knownNodes));
  }
  diagnostics.push(...findCircularDependencies(connections, knownNodes));
  diagnostics.push(
    ...checkConnectionFields(connections, options.fieldCheck ?? createDefaultFieldNameCheck(options.connections))
  );
  return diagnostics;
}
