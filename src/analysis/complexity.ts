/**
 * Workflow complexity analysis
 *
 * Structural metrics, likely bottlenecks and error risks, and optimisation
 * hints for a workflow, computed from its IR. Node classes are normalised
 * through the registry, so `LLMAgentNode` and `LLMAgent` count as one type.
 */

import type { TConfigValue, TConnectionIR, TNodeDeclarationIR, TWorkflowIR } from '../ast/types';
import { isExpressionValue } from '../ast/types';
import { connectionsFromCalls } from '../graph-builder';
import type { TNodeTypeRegistry } from '../registry/node-registry';
import { Deadline } from '../utils/deadline';

// ─── Types ───────────────────────────────────────────────────────────────────

export type TPatternType = 'empty' | 'single_node' | 'cyclic' | 'linear' | 'parallel' | 'complex';

export interface TComplexityMetrics {
  node_count: number;
  connection_count: number;
  cycle_count: number;
  workflow_depth: number;
  complexity_score: number;
  pattern_type: TPatternType;
  parallelism_score: number;
  node_types: Record<string, number>;
  has_cycles: boolean;
  max_cycle_depth: number;
  configuration_complexity: number;
  connection_complexity: number;
  maintenance_complexity_score: number;
}

export interface TFinding {
  type: string;
  severity: 'low' | 'medium' | 'high';
  description: string;
  suggestion: string;
  affected_nodes: string[];
}

export interface TOptimizationHint {
  type: 'parallelize_operations' | 'pipeline_optimization' | 'add_caching' | 'batch_processing';
  priority: 'low' | 'medium' | 'high';
  description: string;
  suggestion: string;
  potential_improvement: string;
}

export interface TResourceAnalysis {
  memory_intensive_nodes: number;
  cpu_intensive_nodes: number;
  /** Megabytes */
  estimated_memory_usage: number;
  estimated_cpu_cores: number;
  resource_efficiency_score: number;
}

export interface TScalabilityAnalysis {
  horizontal_scaling_potential: number;
  load_distribution_score: number;
  has_load_balancer: boolean;
  worker_node_count: number;
  bottleneck_count: number;
  scalability_score: number;
}

export interface TComplexityReport {
  metrics: TComplexityMetrics;
  bottlenecks: TFinding[];
  error_risks: TFinding[];
  optimization_suggestions: TOptimizationHint[];
  resource_analysis: TResourceAnalysis;
  scalability: TScalabilityAnalysis;
}

// ─── Node type groups ────────────────────────────────────────────────────────

const HIGH_LATENCY_TYPES: ReadonlySet<string> = new Set(['HTTPRequest', 'DatabaseQuery', 'LLMAgent']);
const EXTERNAL_TYPES: ReadonlySet<string> = new Set(['HTTPRequest', 'DatabaseQuery', 'ExternalAPI']);
const MEMORY_INTENSIVE_TYPES: ReadonlySet<string> = new Set([
  'LLMAgent',
  'EmbeddingGenerator',
  'VectorSearch',
  'MLModel',
]);
const CPU_INTENSIVE_TYPES: ReadonlySet<string> = new Set(['DataProcessor', 'MLModel', 'ImageProcessor', 'Compute']);

const RETRY_KEYS = ['retry', 'max_retries', 'retry_config', 'maxRetries', 'retryConfig'];
const TIMEOUT_KEYS = ['timeout', 'request_timeout', 'requestTimeout'];

const FAN_OUT_THRESHOLD = 3;
const SCALING_BOTTLENECK_FAN_OUT = 5;
const LONG_FIELD_NAME = 10;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// ─── Graph helpers ───────────────────────────────────────────────────────────

type TNodeTypeOf = (node: TNodeDeclarationIR) => string;

function countBy<T>(items: readonly T[], key: (item: T) => string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return counts;
}

/**
 * Longest simple path, counted in nodes, from nodes without incoming edges.
 * A graph where every node has an incoming edge reports its node count.
 */
export function workflowDepth(
  nodeIds: readonly string[],
  connections: readonly TConnectionIR[],
  deadline: Deadline = Deadline.unbounded()
): number {
  if (nodeIds.length === 0) return 0;
  if (connections.length === 0) return 1;

  const known = new Set(nodeIds);
  const adjacency = new Map<string, string[]>(nodeIds.map((id) => [id, []]));
  const incoming = new Map<string, number>(nodeIds.map((id) => [id, 0]));
  for (const c of connections) {
    if (known.has(c.sourceNode) && known.has(c.targetNode)) {
      adjacency.get(c.sourceNode)?.push(c.targetNode);
    }
    if (known.has(c.targetNode)) {
      incoming.set(c.targetNode, (incoming.get(c.targetNode) ?? 0) + 1);
    }
  }

  const starts = nodeIds.filter((id) => incoming.get(id) === 0);
  if (starts.length === 0) return nodeIds.length;

  let maxDepth = 0;
  const onPath = new Set<string>();
  const frames: { id: string; depth: number; nextEdge: number }[] = [];
  const enter = (id: string, depth: number): void => {
    deadline.check();
    onPath.add(id);
    maxDepth = Math.max(maxDepth, depth);
    frames.push({ id, depth, nextEdge: 0 });
  };

  for (const start of starts) {
    enter(start, 1);
    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const successors = adjacency.get(frame.id) ?? [];
      if (frame.nextEdge < successors.length) {
        const next = successors[frame.nextEdge];
        frame.nextEdge += 1;
        if (!onPath.has(next)) enter(next, frame.depth + 1);
        continue;
      }
      frames.pop();
      onPath.delete(frame.id);
    }
  }
  return maxDepth;
}

export function classifyPattern(ir: TWorkflowIR, connections: readonly TConnectionIR[]): TPatternType {
  if (ir.nodes.length === 0) return 'empty';
  if (ir.cycles.length > 0) return 'cyclic';
  if (ir.nodes.length === 1) return 'single_node';

  const ids = new Set(ir.nodes.map((n) => n.id));
  const outgoing = countBy(
    connections.filter((c) => ids.has(c.sourceNode)),
    (c) => c.sourceNode
  );
  const incoming = countBy(
    connections.filter((c) => ids.has(c.targetNode)),
    (c) => c.targetNode
  );
  const maxOut = Math.max(0, ...outgoing.values());
  const maxIn = Math.max(0, ...incoming.values());

  if (maxOut <= 1 && maxIn <= 1) return 'linear';
  if (maxOut > 1 || maxIn > 1) return 'parallel';
  return 'complex';
}

function parallelismScore(nodeCount: number, outgoing: ReadonlyMap<string, number>): number {
  if (nodeCount <= 1) return 0;
  let parallel = 0;
  for (const count of outgoing.values()) {
    if (count > 1) parallel += count - 1;
  }
  return parallel / (nodeCount - 1);
}

function isNested(value: TConfigValue): boolean {
  return typeof value === 'object' && value !== null && !isExpressionValue(value);
}

function configurationComplexity(nodes: readonly TNodeDeclarationIR[]): number {
  if (nodes.length === 0) return 0;
  let total = 0;
  for (const node of nodes) {
    const values = Object.values(node.config);
    total += values.length + values.filter(isNested).length * 2;
  }
  return total / nodes.length;
}

function connectionComplexity(connections: readonly TConnectionIR[]): number {
  if (connections.length === 0) return 0;
  let total = 0;
  for (const c of connections) {
    total += c.sourceOutput.length > LONG_FIELD_NAME || c.targetInput.length > LONG_FIELD_NAME ? 1.5 : 1;
  }
  return total / connections.length;
}

// ─── Findings ────────────────────────────────────────────────────────────────

function detectBottlenecks(
  nodes: readonly TNodeDeclarationIR[],
  connections: readonly TConnectionIR[],
  typeOf: TNodeTypeOf,
  outgoing: ReadonlyMap<string, number>
): TFinding[] {
  const findings: TFinding[] = [];

  const llmNodes = nodes.filter((n) => typeOf(n).includes('LLM'));
  if (llmNodes.length >= 3) {
    const llmIds = new Set(llmNodes.map((n) => n.id));
    const sequential = connections.filter((c) => llmIds.has(c.sourceNode) && llmIds.has(c.targetNode)).length;
    if (sequential >= 2) {
      findings.push({
        type: 'sequential_llm_calls',
        severity: 'high',
        description: `Found ${llmNodes.length} LLM nodes in sequence`,
        suggestion: 'Consider parallelising LLM calls or batching prompts',
        affected_nodes: llmNodes.map((n) => n.id),
      });
    }
  }

  const slowNodes = nodes.filter((n) => HIGH_LATENCY_TYPES.has(typeOf(n)));
  if (slowNodes.length >= 4) {
    findings.push({
      type: 'high_latency_chain',
      severity: 'medium',
      description: `Found ${slowNodes.length} high-latency operations`,
      suggestion: 'Consider caching, parallel execution or async processing',
      affected_nodes: slowNodes.map((n) => n.id),
    });
  }

  for (const [nodeId, count] of outgoing) {
    if (count < FAN_OUT_THRESHOLD) continue;
    findings.push({
      type: 'single_point_of_failure',
      severity: 'high',
      description: `Node '${nodeId}' feeds into ${count} other nodes`,
      suggestion: 'Add redundancy or split responsibilities',
      affected_nodes: [nodeId],
    });
  }

  return findings;
}

function detectErrorRisks(
  nodes: readonly TNodeDeclarationIR[],
  typeOf: TNodeTypeOf,
  outgoing: ReadonlyMap<string, number>
): TFinding[] {
  const risks: TFinding[] = [];

  for (const node of nodes) {
    if (!EXTERNAL_TYPES.has(typeOf(node))) continue;
    const keys = Object.keys(node.config);
    const guarded = keys.some((k) => RETRY_KEYS.includes(k) || TIMEOUT_KEYS.includes(k));
    if (guarded) continue;
    risks.push({
      type: 'no_error_handling',
      severity: 'medium',
      description: `External node '${node.id}' lacks error handling`,
      suggestion: 'Add retry and timeout configuration',
      affected_nodes: [node.id],
    });
  }

  for (const [nodeId, count] of outgoing) {
    if (count < FAN_OUT_THRESHOLD) continue;
    risks.push({
      type: 'single_point_of_failure',
      severity: 'high',
      description: `Critical dependency on node '${nodeId}'`,
      suggestion: 'Add backup nodes or a circuit breaker',
      affected_nodes: [nodeId],
    });
  }

  return risks;
}

function suggestOptimizations(metrics: TComplexityMetrics): TOptimizationHint[] {
  const hints: TOptimizationHint[] = [];

  if (metrics.pattern_type === 'linear' && metrics.node_count >= 4) {
    hints.push({
      type: 'parallelize_operations',
      priority: 'medium',
      description: 'Linear workflow could benefit from parallelisation',
      suggestion: 'Split independent operations into parallel branches',
      potential_improvement: '50-70% reduction in execution time',
    });
  }

  if (metrics.workflow_depth >= 5) {
    hints.push({
      type: 'pipeline_optimization',
      priority: 'high',
      description: 'Deep workflow may benefit from pipelining',
      suggestion: 'Stream results between stages to reduce latency',
      potential_improvement: '30-50% reduction in end-to-end latency',
    });
  }

  for (const [nodeType, count] of Object.entries(metrics.node_types)) {
    if (count < 3 || !HIGH_LATENCY_TYPES.has(nodeType)) continue;
    hints.push({
      type: 'add_caching',
      priority: 'medium',
      description: `Multiple ${nodeType} instances detected`,
      suggestion: `Add a caching layer for ${nodeType} to avoid redundant calls`,
      potential_improvement: '20-40% reduction in external calls',
    });
  }

  if (metrics.node_count >= 10) {
    hints.push({
      type: 'batch_processing',
      priority: 'low',
      description: 'Large workflow may benefit from batch processing',
      suggestion: 'Group similar operations into batches',
      potential_improvement: '10-25% improvement in resource utilisation',
    });
  }

  return hints;
}

function analyzeResources(nodes: readonly TNodeDeclarationIR[], typeOf: TNodeTypeOf): TResourceAnalysis {
  const memory = nodes.filter((n) => MEMORY_INTENSIVE_TYPES.has(typeOf(n))).length;
  const cpu = nodes.filter((n) => CPU_INTENSIVE_TYPES.has(typeOf(n))).length;
  return {
    memory_intensive_nodes: memory,
    cpu_intensive_nodes: cpu,
    estimated_memory_usage: memory * 500 + nodes.length * 50,
    estimated_cpu_cores: Math.max(1, Math.floor(cpu / 2) + 1),
    resource_efficiency_score: Math.min(1, nodes.length / Math.max(1, memory + cpu)),
  };
}

function analyzeScalability(
  nodes: readonly TNodeDeclarationIR[],
  typeOf: TNodeTypeOf,
  outgoing: ReadonlyMap<string, number>
): TScalabilityAnalysis {
  const counts = [...outgoing.values()];
  const maxOut = counts.length > 0 ? Math.max(...counts) : 1;
  const avgOut = counts.length > 0 ? counts.reduce((a, b) => a + b, 0) / counts.length : 1;
  const loadDistribution = Math.min(1, avgOut / maxOut);

  const fanOutNodes = counts.filter((c) => c > 1).length;
  const horizontal = Math.min(1, fanOutNodes / Math.max(1, Math.floor(nodes.length / 2)));

  return {
    horizontal_scaling_potential: round2(horizontal),
    load_distribution_score: round2(loadDistribution),
    has_load_balancer: nodes.some((n) => typeOf(n).includes('Balancer')),
    worker_node_count: nodes.filter((n) => /Worker|Processor/.test(typeOf(n))).length,
    bottleneck_count: counts.filter((c) => c > SCALING_BOTTLENECK_FAN_OUT).length,
    scalability_score: round2((horizontal + loadDistribution) / 2),
  };
}

// ─── Public API ──────────────────────────────────────────────────────────────

export interface AnalyzeComplexityOptions {
  registry: TNodeTypeRegistry;
  deadline?: Deadline;
}

/**
 * Complexity report for one workflow. Only `addConnection` edges count as
 * connections; cycle-builder edges show up in `max_cycle_depth`.
 */
export function analyzeWorkflowComplexity(ir: TWorkflowIR, options: AnalyzeComplexityOptions): TComplexityReport {
  const { registry } = options;
  const typeOf: TNodeTypeOf = (node) => registry.resolve(node.className) ?? node.className;

  const seen = new Set<string>();
  const nodes = ir.nodes.filter((n) => !seen.has(n.id) && Boolean(seen.add(n.id)));
  const connections = connectionsFromCalls(ir.connectionCalls);
  const outgoing = countBy(connections, (c) => c.sourceNode);

  const nodeTypes: Record<string, number> = {};
  for (const node of nodes) {
    const type = typeOf(node);
    nodeTypes[type] = (nodeTypes[type] ?? 0) + 1;
  }

  const depth = workflowDepth(
    nodes.map((n) => n.id),
    connections,
    options.deadline
  );
  const complexityScore =
    nodes.length * 2 +
    connections.length * 1.5 +
    ir.cycles.length * 10 +
    depth * 3 +
    Object.keys(nodeTypes).length * 2;
  const configComplexity = configurationComplexity(nodes);
  const connComplexity = connectionComplexity(connections);

  const metrics: TComplexityMetrics = {
    node_count: nodes.length,
    connection_count: connections.length,
    cycle_count: ir.cycles.length,
    workflow_depth: depth,
    complexity_score: round2(complexityScore),
    pattern_type: classifyPattern(ir, connections),
    parallelism_score: round2(parallelismScore(nodes.length, outgoing)),
    node_types: nodeTypes,
    has_cycles: ir.cycles.length > 0,
    max_cycle_depth: Math.max(0, ...ir.cycles.map((c) => c.edges.length)),
    configuration_complexity: round2(configComplexity),
    connection_complexity: round2(connComplexity),
    maintenance_complexity_score: round2(complexityScore * 0.5 + configComplexity * 20 + connComplexity * 15),
  };

  return {
    metrics,
    bottlenecks: detectBottlenecks(nodes, connections, typeOf, outgoing),
    error_risks: detectErrorRisks(nodes, typeOf, outgoing),
    optimization_suggestions: suggestOptimizations(metrics),
    resource_analysis: analyzeResources(nodes, typeOf),
    scalability: analyzeScalability(nodes, typeOf, outgoing),
  };
}
