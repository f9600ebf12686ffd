/**
 * Fix suggestions for validator diagnostics.
 *
 * Maps every diagnostic code to a templated remediation with a code example,
 * filled in with node, parameter and module names taken from the diagnostic.
 */

import { isDiagnosticCode, type TDiagnosticCode, type TSeverity } from './diagnostics';

export interface TSuggestion {
  error_code: string;
  /** One-line summary of the fix */
  description: string;
  /** What to change */
  fix: string;
  code_example: string;
  /** Why the diagnostic matters */
  explanation: string;
}

/** The parts of a diagnostic the templates read */
export interface TSuggestionSource {
  code: string;
  message: string;
  line?: number;
  context?: Readonly<Record<string, unknown>>;
}

// ── Helpers to pull names out of a diagnostic ──────────────────────────

function contextString(source: TSuggestionSource, key: string, fallback: string): string {
  const value = source.context?.[key];
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number') return String(value);
  return fallback;
}

function extractCyclePath(message: string): string | null {
  const match = message.match(/:\s*(.+ -> .+)$/);
  return match ? match[1] : null;
}

// ── Suggestion templates ───────────────────────────────────────────────

type SuggestionBuilder = (source: TSuggestionSource) => Omit<TSuggestion, 'error_code'>;

const suggestionBuilders: Record<TDiagnosticCode, SuggestionBuilder> = {
  PAR001(source) {
    const nodeClass = contextString(source, 'node_class', 'YourNode');
    const exampleParam = nodeClass.toUpperCase().includes('LLM')
      ? "{ name: 'model', type: 'string', required: true, description: 'LLM model to use (e.g. gpt-4)' }"
      : "{ name: 'exampleParam', type: 'string', required: true, description: 'Example parameter' }";
    return {
      description: `Add getParameters() method to ${nodeClass}`,
      fix: `Add getParameters() method to ${nodeClass}`,
      code_example: `getParameters(): NodeParameter[] {
  return [
    ${exampleParam},
  ];
}`,
      explanation:
        'Every node must implement getParameters() to declare the parameters it accepts. The runtime passes only declared parameters to run().',
    };
  },

  PAR002(source) {
    const parameter = contextString(source, 'parameter', 'unknownParam');
    const nodeClass = contextString(source, 'node_class', 'the node');
    return {
      description: `Declare parameter '${parameter}' in getParameters()`,
      fix: `Declare parameter '${parameter}' in getParameters()`,
      code_example: `// Add to the array returned by getParameters():
{
  name: '${parameter}',
  type: 'string', // replace with the real type
  required: true, // false if optional
  description: 'Description of ${parameter}',
}`,
      explanation: `Parameter '${parameter}' is read in ${nodeClass} but not declared in getParameters(). Undeclared parameters are filtered out before run() is called, so the value is always undefined.`,
    };
  },

  PAR003(source) {
    const parameter = contextString(source, 'parameter', 'parameterName');
    return {
      description: 'Add type field to NodeParameter',
      fix: `Add a 'type' field to the declaration of '${parameter}'`,
      code_example: `{
  name: '${parameter}',
  type: 'string', // add this field
  required: true,
  description: 'Parameter description',
}`,
      explanation:
        "NodeParameter needs a 'type' field for runtime validation. Common types: 'string', 'number', 'boolean', 'object', 'array'.",
    };
  },

  PAR004(source) {
    const parameter = contextString(source, 'parameter', 'missingParam');
    const nodeId = contextString(source, 'node_id', 'node');
    const nodeType = contextString(source, 'node_type', 'NodeType');
    return {
      description: `Add required parameter '${parameter}' to node '${nodeId}'`,
      fix: `Add required parameter '${parameter}' to node '${nodeId}'`,
      code_example: `workflow.addNode('${nodeType}', '${nodeId}', {
  ${parameter}: 'your value here', // required
  // ...other parameters
});`,
      explanation: `Node '${nodeId}' requires parameter '${parameter}' but it is not provided. Supply it in the node config, through a connection, or as a runtime parameter.`,
    };
  },

  CON001(source) {
    const argCount = contextString(source, 'arg_count', '0');
    return {
      description: `Fix connection with ${argCount} arguments - need exactly 4`,
      fix: 'Use 4 arguments for addConnection()',
      code_example: `workflow.addConnection(
  'sourceNodeId', // source node id
  'result', // output field on the source
  'targetNodeId', // target node id
  'input' // input field on the target
);`,
      explanation: 'Connections take exactly 4 arguments: source node, output field, target node, input field.',
    };
  },

  CON002(source) {
    const from = contextString(source, 'source', 'sourceNode');
    const to = contextString(source, 'target', 'targetNode');
    return {
      description: 'Update to 4-argument connection syntax',
      fix: 'Update to 4-argument connection syntax',
      code_example: `// Before:
// workflow.addConnection('${from}', '${to}');

// After:
workflow.addConnection('${from}', 'result', '${to}', 'input');`,
      explanation:
        'The 2-argument connection form is deprecated. Name the fields: addConnection(source, output, target, input).',
    };
  },

  CON003(source) {
    const missing = contextString(source, 'source', 'missingNode');
    return {
      description: `Add missing source node '${missing}' or fix connection`,
      fix: `Add missing source node '${missing}'`,
      code_example: `// Option 1: declare the node
workflow.addNode('SomeNodeType', '${missing}', { param: 'value' });

// Option 2: connect from an existing node
workflow.addConnection('existingNode', 'result', 'targetNode', 'input');`,
      explanation: `The connection reads from node '${missing}', which is not declared in the workflow.`,
    };
  },

  CON004(source) {
    const missing = contextString(source, 'target', 'missingNode');
    return {
      description: `Add missing target node '${missing}' or fix connection`,
      fix: `Add missing target node '${missing}'`,
      code_example: `// Option 1: declare the node
workflow.addNode('SomeNodeType', '${missing}', { param: 'value' });

// Option 2: connect to an existing node
workflow.addConnection('sourceNode', 'result', 'existingNode', 'input');`,
      explanation: `The connection writes to node '${missing}', which is not declared in the workflow.`,
    };
  },

  CON005(source) {
    const path = extractCyclePath(source.message) ?? 'nodeA -> nodeB -> nodeC -> nodeA';
    return {
      description: 'Remove circular dependency in connections',
      fix: 'Remove circular dependency in connections',
      code_example: `// Cycle found: ${path}
// Break it by removing one connection, or declare the loop explicitly:
const loop = workflow.createCycle('refine');
loop.connect('nodeC', 'nodeA', { mapping: { result: 'feedback' } });
loop.maxIterations(10).build();`,
      explanation:
        'Ordinary connections must form a directed acyclic graph. Intentional loops belong in a cycle declared with createCycle().',
    };
  },

  CON006(source) {
    const field = contextString(source, 'field', 'output');
    const nodeId = contextString(source, 'node_id', 'sourceNode');
    const suggestion = contextString(source, 'suggestion', 'result');
    return {
      description: `Check output field '${field}' on node '${nodeId}'`,
      fix: `Use an output field that node '${nodeId}' actually produces`,
      code_example: `workflow.addConnection('${nodeId}', '${suggestion}', 'targetNode', 'input');`,
      explanation: `Output field '${field}' looks like a placeholder or a typo. A connection from a field the node never returns delivers undefined.`,
    };
  },

  CON007(source) {
    const field = contextString(source, 'field', 'input');
    const nodeId = contextString(source, 'node_id', 'targetNode');
    const suggestion = contextString(source, 'suggestion', 'data');
    return {
      description: `Check input field '${field}' on node '${nodeId}'`,
      fix: `Use an input field that node '${nodeId}' declares`,
      code_example: `workflow.addConnection('sourceNode', 'result', '${nodeId}', '${suggestion}');`,
      explanation: `Input field '${field}' looks like a placeholder or a typo. The node ignores inputs it does not declare.`,
    };
  },

  CYC001() {
    return {
      description: "Migrate from the deprecated 'cycle' option to createCycle()",
      fix: "Use workflow.createCycle() instead of the 'cycle' option on addConnection()",
      code_example: `// Deprecated:
// workflow.addConnection('node1', 'output', 'node2', 'input', { cycle: true });

const loop = workflow.createCycle('myCycle');
loop.connect('node1', 'node2', { mapping: { output: 'input' } });
loop.maxIterations(50);
loop.convergeWhen('quality > 0.95');
loop.build();`,
      explanation:
        "The 'cycle' option is deprecated. createCycle() gives control over convergence conditions, timeouts and iteration limits.",
    };
  },

  CYC002(source) {
    const cycleName = contextString(source, 'cycle_name', 'myCycle');
    return {
      description: 'Add required cycle configuration',
      fix: 'Add either maxIterations() or convergeWhen() to the cycle',
      code_example: `const loop = workflow.createCycle('${cycleName}');
loop.connect('node1', 'node2', { mapping: { output: 'input' } });

// Option 1: an iteration limit
loop.maxIterations(50);

// Option 2: a convergence condition
loop.convergeWhen('quality > 0.95');

// Optional: a timeout in seconds
loop.timeout(300);

loop.build();`,
      explanation: 'A cycle needs an iteration limit or a convergence condition, otherwise it never stops.',
    };
  },

  CYC003() {
    return {
      description: 'Fix invalid convergence condition syntax',
      fix: 'Use a valid boolean expression for the convergence condition',
      code_example: `// Valid conditions:
loop.convergeWhen('quality > 0.95');
loop.convergeWhen('error < 0.01');
loop.convergeWhen('quality > 0.95 && iterations < 100');
loop.convergeWhen('abs(current - previous) < threshold');

// Invalid:
// loop.convergeWhen('quality >');
// loop.convergeWhen('(quality > 0.9');`,
      explanation: 'Convergence conditions are boolean expressions evaluated after every iteration; they must parse.',
    };
  },

  CYC004(source) {
    const cycleName = contextString(source, 'cycle_name', 'myCycle');
    return {
      description: 'Add connections to cycle',
      fix: 'Add at least one connection to the cycle',
      code_example: `const loop = workflow.createCycle('${cycleName}');
loop.connect('sourceNode', 'targetNode', { mapping: { outputField: 'inputField' } });
loop.connect('targetNode', 'sourceNode', { mapping: { feedback: 'adjustment' } });
loop.maxIterations(50);
loop.build();`,
      explanation: 'A cycle needs at least one connection between nodes to define the loop.',
    };
  },

  CYC005() {
    return {
      description: 'Fix cycle connection mapping format',
      fix: 'Pass the mapping as an object of output field to input field',
      code_example: `loop.connect('node1', 'node2', {
  mapping: { outputField: 'inputField', result: 'data' },
});

// Invalid:
// loop.connect('node1', 'node2', { mapping: 'result' });
// loop.connect('node1', 'node2', { mapping: ['result', 'data'] });`,
      explanation: 'The mapping routes output fields of the source node to input fields of the target node.',
    };
  },

  CYC006(source) {
    const cycleName = contextString(source, 'cycle_name', 'myCycle');
    const threshold = contextString(source, 'threshold', '1000');
    return {
      description: `Lower the iteration limit of cycle '${cycleName}'`,
      fix: `Keep maxIterations() at or below ${threshold}, or add convergeWhen()`,
      code_example: `const loop = workflow.createCycle('${cycleName}');
loop.maxIterations(100);
loop.convergeWhen('quality > 0.95');
loop.build();`,
      explanation: 'A very high iteration limit usually means the loop has no real stop condition and can run for a long time.',
    };
  },

  CYC007() {
    return {
      description: 'Fix cycle timeout value',
      fix: 'Use a positive number of seconds for timeout()',
      code_example: `loop.timeout(300); // 5 minutes
loop.timeout(60); // 1 minute

// Invalid:
// loop.timeout(-1);
// loop.timeout(0);
// loop.timeout('5m');`,
      explanation: 'Timeouts are positive numbers of seconds; they keep a cycle from running indefinitely.',
    };
  },

  CYC008(source) {
    const nodeId = contextString(source, 'node_id', 'missingNode');
    return {
      description: 'Fix non-existent node reference in cycle',
      fix: `Add '${nodeId}' node or use an existing node id`,
      code_example: `// Option 1: declare the node
workflow.addNode('NodeType', '${nodeId}', { parameter: 'value' });

// Option 2: connect existing nodes
loop.connect('existingNode', 'otherExistingNode', { mapping: { output: 'input' } });`,
      explanation: `The cycle references node '${nodeId}', which is not declared in the workflow.`,
    };
  },

  IMP001(source) {
    const symbol = contextString(source, 'symbol', 'WorkflowBuilder');
    const module = contextString(source, 'module', '@nodeflow/sdk/workflow');
    return {
      description: `Add missing import for '${symbol}'`,
      fix: 'Add the import statement at the top of the file',
      code_example: `import { ${symbol} } from '${module}';`,
      explanation: `The code uses '${symbol}' but never imports it, so it fails with a ReferenceError at runtime.`,
    };
  },

  IMP002(source) {
    const symbol = contextString(source, 'symbol', 'unusedImport');
    const line = source.line ?? 0;
    return {
      description: `Remove unused import '${symbol}'`,
      fix: `Delete the unused import on line ${line}`,
      code_example: `// Only import what you use:
import { WorkflowBuilder } from '@nodeflow/sdk/workflow';
import { LocalRuntime } from '@nodeflow/sdk/runtime';`,
      explanation: `The import '${symbol}' is never used. Unused imports add load time and noise.`,
    };
  },

  IMP003(source) {
    const symbol = contextString(source, 'symbol', 'WorkflowBuilder');
    const current = contextString(source, 'module', '@nodeflow/sdk');
    const expected = contextString(source, 'expected', '@nodeflow/sdk/workflow');
    return {
      description: `Fix import path for '${symbol}'`,
      fix: `Import '${symbol}' from '${expected}'`,
      code_example: `// Wrong:
// import { ${symbol} } from '${current}';

import { ${symbol} } from '${expected}';`,
      explanation: `'${current}' does not export '${symbol}'. Use its canonical module '${expected}'.`,
    };
  },

  IMP004(source) {
    const symbol = contextString(source, 'symbol', 'module');
    const expected = contextString(source, 'expected', '@nodeflow/sdk/workflow');
    return {
      description: 'Convert relative import to package import',
      fix: `Import '${symbol}' from the SDK package instead of a relative path`,
      code_example: `// Wrong:
// import { ${symbol} } from '../sdk/workflow';

import { ${symbol} } from '${expected}';`,
      explanation: 'Relative paths into the SDK break as soon as the file moves. Import SDK symbols from the package.',
    };
  },

  IMP006() {
    return {
      description: 'Reorder imports by group',
      fix: 'Order imports: Node built-ins, third-party packages, the SDK, then relative modules',
      code_example: `import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { WorkflowBuilder } from '@nodeflow/sdk/workflow';
import { LocalRuntime } from '@nodeflow/sdk/runtime';

import { CustomNode } from './custom-node';`,
      explanation: 'Grouped imports make dependencies easy to scan.',
    };
  },

  IMP008(source) {
    const symbol = contextString(source, 'symbol', 'heavyModule');
    const module = contextString(source, 'module', 'heavy-module');
    return {
      description: `Remove heavy unused import '${symbol}'`,
      fix: `Remove or lazy-load the import from '${module}'`,
      code_example: `// Load it only where it is needed:
async function train(data: number[][]) {
  const tf = await import('${module}');
  // use tf here
}`,
      explanation: `'${module}' is expensive to load and '${symbol}' is never used. Remove it or import it lazily.`,
    };
  },

  GOLD001(source) {
    const module = contextString(source, 'module', './module');
    return {
      description: 'Use absolute imports',
      fix: `Replace the relative import '${module}' with a package path`,
      code_example: "import { WorkflowBuilder } from '@nodeflow/sdk/workflow';",
      explanation: 'Absolute imports stay valid when files move and read the same everywhere.',
    };
  },

  GOLD002() {
    return {
      description: 'Use correct execution pattern with runtime.execute()',
      fix: 'Use runtime.execute(workflow.build())',
      code_example: `import { WorkflowBuilder } from '@nodeflow/sdk/workflow';
import { LocalRuntime } from '@nodeflow/sdk/runtime';

const workflow = new WorkflowBuilder();
workflow.addNode('LLMAgent', 'agent', { model: 'gpt-4', prompt: 'Summarise' });

const runtime = new LocalRuntime();
const result = await runtime.execute(workflow.build());`,
      explanation:
        'Always call runtime.execute(workflow.build()), never workflow.execute(runtime). Building validates the graph first.',
    };
  },

  GOLD003(source) {
    const method = contextString(source, 'method', 'add_node');
    const replacement = contextString(source, 'replacement', 'addNode');
    return {
      description: `Rename ${method}() to ${replacement}()`,
      fix: `Call ${replacement}() instead of ${method}()`,
      code_example: `workflow.${replacement}(/* ... */);`,
      explanation: 'The builder API is camelCase. snake_case methods do not exist and fail with "is not a function".',
    };
  },

  SYN001(source) {
    const line = source.line ?? 0;
    return {
      description: `Fix syntax error on line ${line}`,
      fix: `Fix syntax error on line ${line}`,
      code_example: `// Common causes:
// - a missing comma between arguments or properties
// - unbalanced parentheses, brackets or braces
// - an unterminated string
workflow.addNode('LLMAgent', 'agent', { model: 'gpt-4', prompt: 'Summarise' });`,
      explanation: 'The workflow source does not parse, so nothing else could be checked.',
    };
  },

  VAL001(source) {
    return {
      description: 'Validator could not finish a check',
      fix: 'Simplify the construct reported in the message, or report it if the source is valid',
      code_example: `// ${source.message}`,
      explanation: 'One validator pass failed internally; the other passes still ran and their results are complete.',
    };
  },
};

function genericSuggestion(source: TSuggestionSource): TSuggestion {
  return {
    error_code: source.code,
    description: `Fix needed for: ${source.message || 'Unknown error'}`,
    fix: 'Manual fix required',
    code_example: '// Manual fix required',
    explanation: 'This error requires manual attention.',
  };
}

// ── Public API ──────────────────────────────────────────────────────────

export function getSuggestion(source: TSuggestionSource): TSuggestion {
  if (!isDiagnosticCode(source.code)) return genericSuggestion(source);
  return { error_code: source.code, ...suggestionBuilders[source.code](source) };
}

/**
 * One suggestion per distinct code, in first-seen order, built from the
 * first diagnostic carrying that code.
 */
export function suggestFixes(diagnostics: readonly TSuggestionSource[]): TSuggestion[] {
  const seen = new Set<string>();
  const suggestions: TSuggestion[] = [];
  for (const diagnostic of diagnostics) {
    if (seen.has(diagnostic.code)) continue;
    seen.add(diagnostic.code);
    suggestions.push(getSuggestion(diagnostic));
  }
  return suggestions;
}

/**
 * Format diagnostics with their suggestions for a terminal.
 */
export function formatFriendlyDiagnostics(
  diagnostics: ReadonlyArray<TSuggestionSource & { severity: TSeverity }>
): string {
  if (diagnostics.length === 0) return '';

  const lines: string[] = [];

  for (const diagnostic of diagnostics) {
    const suggestion = getSuggestion(diagnostic);
    const severity = diagnostic.severity.toUpperCase();
    const where = diagnostic.line !== undefined ? ` (line ${diagnostic.line})` : '';

    lines.push(`[${severity}] ${diagnostic.code}${where}`);
    lines.push(`  ${diagnostic.message}`);
    lines.push(`  How to fix: ${suggestion.fix}`);
    lines.push('');
  }

  return lines.join('\n');
}
