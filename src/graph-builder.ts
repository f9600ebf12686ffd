import type {
  TConnectionCallIR,
  TConnectionIR,
  TCycleDefinitionIR,
  TNodeDeclarationIR,
  TWorkflowIR,
} from './ast/types';
import { createDiagnostic, type TDiagnostic } from './diagnostics';

export type TWorkflowGraph = {
  /** Node id → declaration, in declaration order */
  nodes: ReadonlyMap<string, TNodeDeclarationIR>;
  /** Every connection with static endpoints, cycle-builder edges included */
  connections: TConnectionIR[];
};

export type TGraphBuildResult = {
  graph: TWorkflowGraph;
  /** CON003 and CON004 */
  diagnostics: TDiagnostic[];
};

/**
 * Connections from `addConnection` calls. Only the 4-argument form and the
 * deprecated 2-argument form make it into the graph; calls whose endpoints
 * are not static strings are left out.
 */
export function connectionsFromCalls(calls: readonly TConnectionCallIR[]): TConnectionIR[] {
  const connections: TConnectionIR[] = [];
  for (const call of calls) {
    const { args } = call;
    if (args.length !== 2 && args.length !== 4) continue;

    const source = args[0];
    const target = args.length === 4 ? args[2] : args[1];
    if (source.kind !== 'string' || target.kind !== 'string') continue;

    const output = args.length === 4 && args[1].kind === 'string' ? args[1].value : '';
    const input = args.length === 4 && args[3].kind === 'string' ? args[3].value : '';
    connections.push({
      sourceNode: source.value,
      sourceOutput: output,
      targetNode: target.value,
      targetInput: input,
      isCycleEdge: call.hasLegacyCycleFlag,
      span: call.span,
    });
  }
  return connections;
}

/** Edges declared through cycle builders, tagged as cycle edges */
export function cycleEdgesOf(cycles: readonly TCycleDefinitionIR[]): TConnectionIR[] {
  const edges: TConnectionIR[] = [];
  for (const cycle of cycles) {
    for (const edge of cycle.edges) {
      if (edge.sourceNode === undefined || edge.targetNode === undefined) continue;
      const [firstField] = Object.entries(edge.mapping ?? {});
      edges.push({
        sourceNode: edge.sourceNode,
        sourceOutput: firstField?.[0] ?? '',
        targetNode: edge.targetNode,
        targetInput: firstField?.[1] ?? '',
        isCycleEdge: true,
        span: edge.span,
      });
    }
  }
  return edges;
}

/**
 * CON003/CON004 for connections whose endpoints are not declared nodes.
 * Cycle-builder edges are skipped; the cycle validator reports those.
 */
export function checkConnectionEndpoints(
  connections: readonly TConnectionIR[],
  knownNodes: ReadonlySet<string>,
  isBuilderEdge: (connection: TConnectionIR) => boolean = () => false
): TDiagnostic[] {
  const diagnostics: TDiagnostic[] = [];
  for (const connection of connections) {
    if (isBuilderEdge(connection)) continue;
    const line = connection.span?.line;
    if (!knownNodes.has(connection.sourceNode)) {
      diagnostics.push(
        createDiagnostic('CON003', `Connection references non-existent source node '${connection.sourceNode}'`, {
          ...(line !== undefined && { line }),
          context: { source: connection.sourceNode },
        })
      );
    }
    if (!knownNodes.has(connection.targetNode)) {
      diagnostics.push(
        createDiagnostic('CON004', `Connection references non-existent target node '${connection.targetNode}'`, {
          ...(line !== undefined && { line }),
          context: { target: connection.targetNode },
        })
      );
    }
  }
  return diagnostics;
}

/**
 * Assemble the node map and connection list, reporting connections that
 * point at undeclared nodes.
 */
export function buildWorkflowGraph(ir: TWorkflowIR): TGraphBuildResult {
  const nodes = new Map<string, TNodeDeclarationIR>();
  for (const node of ir.nodes) {
    if (!nodes.has(node.id)) nodes.set(node.id, node);
  }

  const declared = connectionsFromCalls(ir.connectionCalls);
  const builderEdges = new Set(cycleEdgesOf(ir.cycles));
  const connections = [...declared, ...builderEdges];

  const diagnostics = checkConnectionEndpoints(connections, new Set(nodes.keys()), (c) => builderEdges.has(c));

  return { graph: { nodes, connections }, diagnostics };
}

// ── Circular dependencies ───────────────────────────────────────────────

/**
 * Strongly connected components (Tarjan). Components come out in reverse
 * topological order; members keep discovery order.
 */
export function findStronglyConnectedComponents(
  nodeIds: readonly string[],
  adjacency: ReadonlyMap<string, readonly string[]>
): string[][] {
  let index = 0;
  const indices = new Map<string, number>();
  const lowLinks = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: string[][] = [];

  // Depth-first search on an explicit stack
  const frames: { nodeId: string; nextEdge: number }[] = [];
  const open = (nodeId: string): void => {
    indices.set(nodeId, index);
    lowLinks.set(nodeId, index);
    index += 1;
    stack.push(nodeId);
    onStack.add(nodeId);
    frames.push({ nodeId, nextEdge: 0 });
  };

  const strongConnect = (root: string): void => {
    open(root);
    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const successors = adjacency.get(frame.nodeId) ?? [];

      if (frame.nextEdge < successors.length) {
        const next = successors[frame.nextEdge];
        frame.nextEdge += 1;
        const nextIndex = indices.get(next);
        if (nextIndex === undefined) {
          open(next);
        } else if (onStack.has(next)) {
          lowLinks.set(frame.nodeId, Math.min(lowLinks.get(frame.nodeId) ?? 0, nextIndex));
        }
        continue;
      }

      frames.pop();
      const nodeId = frame.nodeId;
      if (lowLinks.get(nodeId) === indices.get(nodeId)) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== nodeId);
        components.push(component.reverse());
      }

      const parent = frames[frames.length - 1];
      if (parent) {
        lowLinks.set(parent.nodeId, Math.min(lowLinks.get(parent.nodeId) ?? 0, lowLinks.get(nodeId) ?? 0));
      }
    }
  };

  for (const nodeId of nodeIds) {
    if (!indices.has(nodeId)) strongConnect(nodeId);
  }
  return components;
}

/** Shortest path from `anchor` back to itself inside one component */
function cyclePathFrom(
  anchor: string,
  members: ReadonlySet<string>,
  adjacency: ReadonlyMap<string, readonly string[]>
): string[] {
  const previous = new Map<string, string>();
  const queue: string[] = [];
  for (const next of adjacency.get(anchor) ?? []) {
    if (next === anchor) return [anchor, anchor];
    if (members.has(next) && !previous.has(next)) {
      previous.set(next, anchor);
      queue.push(next);
    }
  }

  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    for (const next of adjacency.get(current) ?? []) {
      if (next === anchor) {
        const path = [anchor];
        for (let step: string | undefined = current; step !== undefined && step !== anchor; step = previous.get(step)) {
          path.splice(1, 0, step);
        }
        path.push(anchor);
        return path;
      }
      if (members.has(next) && !previous.has(next)) {
        previous.set(next, current);
        queue.push(next);
      }
    }
  }
  return [anchor, anchor];
}

/**
 * One CON005 per cycle among ordinary connections. Cycle edges are exempt;
 * endpoints outside `knownNodes` (when given) are left to CON003/CON004.
 * Each finding is anchored on the smallest node id of its cycle.
 */
export function findCircularDependencies(
  connections: readonly TConnectionIR[],
  knownNodes?: ReadonlySet<string>
): TDiagnostic[] {
  const edges = connections.filter(
    (c) =>
      !c.isCycleEdge &&
      (knownNodes === undefined || (knownNodes.has(c.sourceNode) && knownNodes.has(c.targetNode)))
  );

  const adjacency = new Map<string, string[]>();
  const nodeIds: string[] = [];
  const addNode = (id: string): void => {
    if (!adjacency.has(id)) {
      adjacency.set(id, []);
      nodeIds.push(id);
    }
  };
  for (const edge of edges) {
    addNode(edge.sourceNode);
    addNode(edge.targetNode);
    const targets = adjacency.get(edge.sourceNode);
    if (targets && !targets.includes(edge.targetNode)) targets.push(edge.targetNode);
  }

  const cycles = findStronglyConnectedComponents(nodeIds, adjacency).filter(
    (component) =>
      component.length > 1 || (adjacency.get(component[0]) ?? []).includes(component[0])
  );

  return cycles
    .map((component) => {
      const anchor = [...component].sort()[0];
      const path = cyclePathFrom(anchor, new Set(component), adjacency);
      const anchorEdge = edges.find((e) => e.sourceNode === anchor && e.targetNode === path[1]);
      const line = anchorEdge?.span?.line;
      return {
        anchor,
        diagnostic: createDiagnostic('CON005', `Circular dependency detected: ${path.join(' -> ')}`, {
          ...(line !== undefined && { line }),
          context: { nodes: [...component].sort(), cycle_path: path },
        }),
      };
    })
    .sort((a, b) => (a.anchor < b.anchor ? -1 : a.anchor > b.anchor ? 1 : 0))
    .map(({ diagnostic }) => diagnostic);
}
