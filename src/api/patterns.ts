/**
 * Reference patterns: the correct shape of each construct the validator
 * checks. Static data, no I/O.
 */

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ValidationPattern {
  name: string;
  description: string;
  code_example: string;
}

// ─── Data ────────────────────────────────────────────────────────────────────

const VALIDATION_PATTERNS: readonly Readonly<ValidationPattern>[] = Object.freeze([
  {
    name: 'node-parameters',
    description: 'Custom node classes declare every parameter they read, each with a type',
    code_example: `class SummariseNode extends Node {
  getParameters() {
    return [
      new NodeParameter({ name: 'text', type: 'string', required: true }),
      new NodeParameter({ name: 'maxWords', type: 'number', required: false, default: 100 }),
    ];
  }

  run({ text, maxWords }: { text: string; maxWords: number }) {
    return { result: text.split(' ').slice(0, maxWords).join(' ') };
  }
}`,
  },
  {
    name: 'required-parameters',
    description: 'Built-in nodes receive all of their required parameters in the config object',
    code_example: `workflow.addNode('LLMAgent', 'agent', { model: 'gpt-4', prompt: 'Summarise the input' });`,
  },
  {
    name: 'connection-syntax',
    description: 'Connections name the source node, its output field, the target node and its input field',
    code_example: `workflow.addConnection('reader', 'result', 'agent', 'input');`,
  },
  {
    name: 'cycle-definition',
    description: 'Cycles are declared through the cycle builder with a termination condition',
    code_example: `workflow
  .createCycle('refine')
  .connect('agent', 'evaluator', { mapping: { result: 'input' } })
  .connect('evaluator', 'agent', { mapping: { feedback: 'prompt' } })
  .maxIterations(10)
  .convergeWhen('score >= 0.9')
  .build();`,
  },
  {
    name: 'sdk-imports',
    description: 'SDK symbols are imported from their package subpath, grouped after third-party imports',
    code_example: `import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { WorkflowBuilder } from '@nodeflow/sdk/workflow';
import { LocalRuntime } from '@nodeflow/sdk/runtime';`,
  },
  {
    name: 'execution-pattern',
    description: 'Workflows are built first and executed by a runtime',
    code_example: `const runtime = new LocalRuntime();
const result = await runtime.execute(workflow.build());`,
  },
]);

// ─── Public API ──────────────────────────────────────────────────────────────

export function getValidationPatterns(): ValidationPattern[] {
  return VALIDATION_PATTERNS.map((pattern) => ({ ...pattern }));
}
