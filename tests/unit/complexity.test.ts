import { describe, it, expect } from 'vitest';
import { analyzeWorkflowComplexity, classifyPattern, workflowDepth } from '../../src/analysis/complexity';
import type { TConnectionIR } from '../../src/ast/types';
import { getDefaultNodeTypeRegistry } from '../../src/registry/node-registry';
import { extract, source } from '../helpers/test-fixtures';

const registry = getDefaultNodeTypeRegistry();

function edge(sourceNode: string, targetNode: string): TConnectionIR {
  return { sourceNode, sourceOutput: 'result', targetNode, targetInput: 'input', isCycleEdge: false };
}

describe('workflowDepth', () => {
  it('counts nodes along the longest path', () => {
    expect(workflowDepth(['a', 'b', 'c', 'd'], [edge('a', 'b'), edge('b', 'c'), edge('a', 'd')])).toBe(3);
  });

  it('handles the degenerate graphs', () => {
    expect(workflowDepth([], [])).toBe(0);
    expect(workflowDepth(['a', 'b'], [])).toBe(1);
    expect(workflowDepth(['a', 'b'], [edge('a', 'b'), edge('b', 'a')])).toBe(2);
  });

  it('measures a long chain without exhausting the call stack', () => {
    const count = 50000;
    const ids = Array.from({ length: count }, (_, i) => `n${i}`);
    const chain = ids.slice(1).map((id, i) => edge(ids[i], id));
    expect(workflowDepth(ids, chain)).toBe(count);
  });
});

describe('classifyPattern', () => {
  it('names the overall shape', () => {
    expect(classifyPattern(extract('const x = 1;').ir, [])).toBe('empty');
    expect(classifyPattern(extract("workflow.addNode('Script', 'a', {});").ir, [])).toBe('single_node');

    const twoNodes = extract(source("workflow.addNode('Script', 'a', {});", "workflow.addNode('Script', 'b', {});")).ir;
    expect(classifyPattern(twoNodes, [edge('a', 'b')])).toBe('linear');
  });
});

describe('analyzeWorkflowComplexity', () => {
  it('scores a linear workflow', () => {
    const { ir } = extract(
      source(
        "workflow.addNode('HTTPRequest', 'fetch', { url: 'u' });",
        "workflow.addNode('LLMAgent', 'agent', { model: 'm', prompt: 'p', options: { temperature: 0 } });",
        "workflow.addNode('DataTransformerNode', 'shape', { operation: 'map' });",
        "workflow.addConnection('fetch', 'response', 'agent', 'prompt');",
        "workflow.addConnection('agent', 'result', 'shape', 'data');"
      )
    );
    const report = analyzeWorkflowComplexity(ir, { registry });

    expect(report.metrics).toEqual({
      node_count: 3,
      connection_count: 2,
      cycle_count: 0,
      workflow_depth: 3,
      complexity_score: 24,
      pattern_type: 'linear',
      parallelism_score: 0,
      node_types: { HTTPRequest: 1, LLMAgent: 1, DataTransformer: 1 },
      has_cycles: false,
      max_cycle_depth: 0,
      configuration_complexity: 2.33,
      connection_complexity: 1,
      maintenance_complexity_score: 73.67,
    });
    expect(report.bottlenecks).toEqual([]);
    expect(report.error_risks.map((r) => [r.type, r.description])).toEqual([
      ['no_error_handling', "External node 'fetch' lacks error handling"],
    ]);
    expect(report.optimization_suggestions).toEqual([]);
    expect(report.resource_analysis).toEqual({
      memory_intensive_nodes: 1,
      cpu_intensive_nodes: 0,
      estimated_memory_usage: 650,
      estimated_cpu_cores: 1,
      resource_efficiency_score: 1,
    });
    expect(report.scalability).toEqual({
      horizontal_scaling_potential: 0,
      load_distribution_score: 1,
      has_load_balancer: false,
      worker_node_count: 0,
      bottleneck_count: 0,
      scalability_score: 0.5,
    });
  });

  it('flags fan-out and chained LLM calls', () => {
    const { ir } = extract(
      source(
        "workflow.addNode('LLMAgent', 'a', { model: 'm', prompt: 'p' });",
        "workflow.addNode('LLMAgent', 'b', { model: 'm', prompt: 'p' });",
        "workflow.addNode('LLMAgent', 'c', { model: 'm', prompt: 'p' });",
        "workflow.addNode('DataProcessor', 'd', { operation: 'x' });",
        "workflow.addConnection('a', 'result', 'b', 'prompt');",
        "workflow.addConnection('a', 'result', 'c', 'prompt');",
        "workflow.addConnection('a', 'result', 'd', 'data');",
        "workflow.addConnection('b', 'result', 'c', 'context');"
      )
    );
    const report = analyzeWorkflowComplexity(ir, { registry });

    expect(report.metrics.pattern_type).toBe('parallel');
    expect(report.metrics.workflow_depth).toBe(3);
    expect(report.metrics.complexity_score).toBe(27);
    expect(report.metrics.parallelism_score).toBe(0.67);
    expect(report.metrics.configuration_complexity).toBe(1.75);
    expect(report.metrics.maintenance_complexity_score).toBe(63.5);

    expect(report.bottlenecks).toEqual([
      {
        type: 'sequential_llm_calls',
        severity: 'high',
        description: 'Found 3 LLM nodes in sequence',
        suggestion: 'Consider parallelising LLM calls or batching prompts',
        affected_nodes: ['a', 'b', 'c'],
      },
      {
        type: 'single_point_of_failure',
        severity: 'high',
        description: "Node 'a' feeds into 3 other nodes",
        suggestion: 'Add redundancy or split responsibilities',
        affected_nodes: ['a'],
      },
    ]);
    expect(report.error_risks.map((r) => r.description)).toEqual(["Critical dependency on node 'a'"]);
    expect(report.optimization_suggestions.map((h) => [h.type, h.description])).toEqual([
      ['add_caching', 'Multiple LLMAgent instances detected'],
    ]);
    expect(report.resource_analysis.estimated_memory_usage).toBe(1700);
    expect(report.scalability).toEqual({
      horizontal_scaling_potential: 0.5,
      load_distribution_score: 0.67,
      has_load_balancer: false,
      worker_node_count: 1,
      bottleneck_count: 0,
      scalability_score: 0.58,
    });
  });

  it('counts cycle-builder edges only in the cycle metrics', () => {
    const { ir } = extract(
      source(
        "workflow.addNode('Script', 'a', { code: '1' });",
        "workflow.addNode('Script', 'b', { code: '2' });",
        "workflow.createCycle('loop').connect('a', 'b').connect('b', 'a').maxIterations(3).build();"
      )
    );
    const { metrics } = analyzeWorkflowComplexity(ir, { registry });

    expect(metrics.pattern_type).toBe('cyclic');
    expect(metrics.connection_count).toBe(0);
    expect(metrics.max_cycle_depth).toBe(2);
    expect(metrics.complexity_score).toBe(19);
  });

  it('guards a retrying external node', () => {
    const { ir } = extract("workflow.addNode('HTTPRequest', 'fetch', { url: 'u', maxRetries: 3 });");
    expect(analyzeWorkflowComplexity(ir, { registry }).error_risks).toEqual([]);
  });
});
