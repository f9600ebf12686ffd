import { describe, it, expect } from 'vitest';
import {
  analyzeComplexity,
  checkErrorPattern,
  checkNodeParameters,
  getValidationPatterns,
  runPass,
  suggestFixes,
  validateConnections,
  validateGoldStandards,
  validateImports,
  validateWorkflow,
} from '../../src/api/validate';
import { resolveConfig } from '../../src/config/loader';
import { createContext, source, SDK_IMPORTS } from '../helpers/test-fixtures';

const brokenAgentSource = source(
  "import { WorkflowBuilder } from '@nodeflow/sdk/workflow';",
  'const workflow = new WorkflowBuilder();',
  "workflow.addNode('LLMAgent', 'agent', { temperature: 0.5 });",
  "workflow.addConnection('agent', 'result', 'processor');"
);

const cleanSource = source(
  ...SDK_IMPORTS,
  'const workflow = new WorkflowBuilder();',
  "workflow.addNode('HTTPRequest', 'fetch', { url: 'https://example.test', timeout: 30 });",
  "workflow.addNode('LLMAgent', 'agent', { model: 'gpt-4', prompt: 'Summarise' });",
  "workflow.addConnection('fetch', 'response', 'agent', 'prompt');",
  "const loop = workflow.createCycle('refine');",
  "loop.connect('agent', 'fetch', { mapping: { result: 'url' } });",
  'loop.maxIterations(5).build();',
  'const runtime = new LocalRuntime();',
  'runtime.execute(workflow.build());'
);

const invertedSource = source(
  "import { WorkflowBuilder } from '../sdk';",
  'const workflow = new WorkflowBuilder();',
  'workflow.execute(runtime);'
);

describe('validateWorkflow', () => {
  it('reports missing parameters and a short connection call', () => {
    const result = validateWorkflow(brokenAgentSource);

    expect(result.has_errors).toBe(true);
    expect(result.warnings).toEqual([]);
    expect(result.errors.map((e) => [e.code, e.line])).toEqual([
      ['PAR004', 3],
      ['PAR004', 3],
      ['CON001', 4],
    ]);
    expect(result.errors[0]).toEqual({
      code: 'PAR004',
      message: "Node 'agent' missing required parameter 'model'",
      severity: 'error',
      line: 3,
      node_type: 'LLMAgent',
      node_id: 'agent',
      parameter: 'model',
      context: { node_type: 'LLMAgent', node_id: 'agent', parameter: 'model' },
    });
    expect(result.errors[1].parameter).toBe('prompt');
    expect(result.suggestions.map((s) => s.error_code)).toEqual(['PAR004', 'CON001']);
    expect(result.suggestions[1].description).toBe('Fix connection with 3 arguments - need exactly 4');
  });

  it('passes a well-formed workflow', () => {
    expect(validateWorkflow(cleanSource)).toEqual({ has_errors: false, errors: [], warnings: [], suggestions: [] });
  });

  it('reports the 2-argument form as CON002 alone', () => {
    const result = validateWorkflow(
      source(
        "workflow.addNode('Script', 'a', { code: '1' });",
        "workflow.addNode('Script', 'b', { code: '2' });",
        "workflow.addConnection('a', 'b');"
      )
    );
    expect(result.errors.map((e) => [e.code, e.line])).toEqual([['CON002', 3]]);
  });

  it('reports a connection cycle once', () => {
    const result = validateWorkflow(
      source(
        "workflow.addNode('Script', 'A', { code: '1' });",
        "workflow.addNode('Script', 'B', { code: '2' });",
        "workflow.addNode('Script', 'C', { code: '3' });",
        "workflow.addConnection('A', 'result', 'B', 'input');",
        "workflow.addConnection('B', 'result', 'C', 'input');",
        "workflow.addConnection('C', 'result', 'A', 'input');"
      )
    );
    expect(result.errors.map((e) => e.message)).toEqual(['Circular dependency detected: A -> B -> C -> A']);
    expect(result.warnings).toEqual([]);
  });

  it('reports a cycle without termination', () => {
    const result = validateWorkflow(
      source(
        "workflow.addNode('Script', 'a', { code: '1' });",
        "const loop = workflow.createCycle('loop');",
        "loop.connect('a', 'a');",
        'loop.build();'
      )
    );
    expect(result.errors.map((e) => [e.code, e.line])).toEqual([['CYC002', 2]]);
  });

  it('answers a syntax error with SYN001 only', () => {
    const result = validateWorkflow('const a = ;');
    expect(result.has_errors).toBe(true);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].code).toBe('SYN001');
    expect(result.errors[0].line).toBe(1);
    expect(result.suggestions.map((s) => s.description)).toEqual(['Fix syntax error on line 1']);
  });

  it('turns an extraction fault into VAL001', () => {
    const config = resolveConfig({ limits: { maxNestingDepth: 5 } });
    const result = validateWorkflow('const x = [[[[[[[[1]]]]]]]];', { config });

    expect(result.errors).toEqual([
      {
        code: 'VAL001',
        message: 'Validation error in extractor validator: Source nesting exceeds the maximum depth of 5',
        severity: 'error',
        line: 1,
        context: { pass: 'extractor' },
      },
    ]);
  });

  it('answers source too deeply nested for the compiler with VAL001', () => {
    const depth = 20000;
    const result = validateWorkflow(`const x = ${'('.repeat(depth)}1${')'.repeat(depth)};`);

    expect(result.has_errors).toBe(true);
    expect(result.warnings).toEqual([]);
    expect(result.errors).toEqual([
      {
        code: 'VAL001',
        message: 'Validation error in parser validator: Maximum call stack size exceeded',
        severity: 'error',
        context: { pass: 'parser' },
      },
    ]);
  });

  it('accepts execute() on ordinary objects', () => {
    const result = validateWorkflow(
      source('const db = { execute: (options: object) => options };', 'const runtimeOptions = {};', 'db.execute(runtimeOptions);')
    );
    expect(result).toEqual({ has_errors: false, errors: [], warnings: [], suggestions: [] });
  });

  it('uses registry entries from the configuration', () => {
    const config = resolveConfig({ registry: { nodeTypes: { Thing: ['alpha'] } } });
    const result = validateWorkflow("workflow.addNode('Thing', 't', {});", { config });
    expect(result.errors.map((e) => e.message)).toEqual(["Node 't' missing required parameter 'alpha'"]);
  });

  it('gives the same answer twice', () => {
    expect(validateWorkflow(brokenAgentSource)).toEqual(validateWorkflow(brokenAgentSource));
  });
});

describe('runPass', () => {
  it('converts a thrown error into VAL001', () => {
    const context = createContext('const a = 1;');
    const diagnostics = runPass(
      'broken',
      () => {
        throw new Error('kaput');
      },
      context
    );
    expect(diagnostics.map((d) => [d.code, d.message, d.line, d.context])).toEqual([
      ['VAL001', 'Validation error in broken validator: kaput', undefined, { pass: 'broken' }],
    ]);
  });
});

describe('checkNodeParameters', () => {
  it('runs the parameter rules only', () => {
    const result = checkNodeParameters(brokenAgentSource);
    expect(result.errors.map((e) => e.code)).toEqual(['PAR004', 'PAR004']);
  });
});

describe('validateConnections', () => {
  it('checks connections given as data', () => {
    const result = validateConnections([{ source: 'a', target: 'b' }]);

    expect(result.errors).toEqual([
      {
        code: 'CON002',
        message: "Connection 0 uses the deprecated 2-argument form. Use: addConnection('a', 'result', 'b', 'input')",
        severity: 'error',
        context: { index: 0, source: 'a', target: 'b' },
      },
    ]);
    expect(result.suggestions.map((s) => s.description)).toEqual(['Update to 4-argument connection syntax']);
  });

  it('accepts a long acyclic chain', () => {
    const connections = Array.from({ length: 20000 }, (_, i) => ({
      source: `n${i}`,
      output: 'result',
      target: `n${i + 1}`,
      input: 'data',
    }));
    expect(validateConnections(connections)).toEqual({ has_errors: false, errors: [], warnings: [], suggestions: [] });
  });

  it('checks endpoints against the given nodes', () => {
    const result = validateConnections([{ source: 'a', output: 'result', target: 'ghost', input: 'data' }], {
      nodes: ['a'],
    });
    expect(result.errors.map((e) => e.message)).toEqual(["Connection references non-existent target node 'ghost'"]);
  });
});

describe('suggestFixes', () => {
  it('dedupes by code and skips non-diagnostics', () => {
    const suggestions = suggestFixes([
      { code: 'PAR004', message: 'a', node_id: 'agent', parameter: 'model' },
      { code: 'PAR004', message: 'b', node_id: 'agent', parameter: 'prompt' },
      42,
      { message: 'no code' },
      { code: 'XYZ', message: 'odd' },
    ]);
    expect(suggestions.map((s) => [s.error_code, s.description])).toEqual([
      ['PAR004', "Add required parameter 'model' to node 'agent'"],
      ['XYZ', 'Fix needed for: odd'],
    ]);
  });
});

describe('validateGoldStandards', () => {
  it('scores compliance across every category', () => {
    const result = validateGoldStandards(invertedSource);

    expect(result.gold_standards_checked).toBe('all');
    expect(result.errors.map((e) => [e.code, e.line])).toEqual([['GOLD002', 3]]);
    expect(result.warnings.map((w) => [w.code, w.line])).toEqual([['GOLD001', 1]]);
    expect(result.compliance_score).toBe(85);
  });

  it('checks one category', () => {
    const result = validateGoldStandards(invertedSource, 'imports');
    expect(result.errors).toEqual([]);
    expect(result.compliance_score).toBe(95);
  });

  it('checks nothing for an unknown category', () => {
    const result = validateGoldStandards(invertedSource, 'bogus');
    expect(result.has_errors).toBe(false);
    expect(result.compliance_score).toBe(100);
  });
});

describe('checkErrorPattern', () => {
  it('lists matching diagnostics with their fix', () => {
    expect(checkErrorPattern(brokenAgentSource, 'connection_syntax')).toEqual({
      pattern_type: 'connection_syntax',
      has_pattern: true,
      matches: [
        {
          line: 4,
          pattern: 'CON001: Invalid connection: expected 4 arguments (source, output, target, input), got 3',
          suggestion: 'Use 4 arguments for addConnection()',
        },
      ],
    });
  });

  it('finds the inverted execution call', () => {
    const result = checkErrorPattern(invertedSource, 'execution_pattern');
    expect(result.matches).toEqual([
      {
        line: 3,
        pattern: "GOLD002: Use 'runtime.execute(workflow.build())' not 'workflow.execute(runtime)'",
        suggestion: 'Use runtime.execute(workflow.build())',
      },
    ]);
  });

  it('reports no match for a clean source or an unknown type', () => {
    expect(checkErrorPattern(cleanSource, 'circular_deps')).toEqual({
      pattern_type: 'circular_deps',
      has_pattern: false,
      matches: [],
    });
    expect(checkErrorPattern(brokenAgentSource, 'bogus')).toEqual({
      pattern_type: 'bogus',
      has_pattern: false,
      matches: [],
    });
  });

  it('passes a syntax error back as the error', () => {
    const result = checkErrorPattern('const a = ;', 'imports');
    expect(result.has_pattern).toBe(false);
    expect(result.error?.startsWith('Syntax error in workflow source: ')).toBe(true);
  });
});

describe('validateImports', () => {
  it('suggests the missing import statement', () => {
    const result = validateImports(
      source(
        "import { WorkflowBuilder } from '@nodeflow/sdk/workflow';",
        'const workflow = new WorkflowBuilder();',
        "workflow.addNode('Script', 's', { code: '1' });",
        'new LocalRuntime().execute(workflow.build());'
      )
    );

    expect(result.errors.map((e) => [e.code, e.line])).toEqual([['IMP001', 4]]);
    expect(result.suggested_imports).toEqual(["import { LocalRuntime } from '@nodeflow/sdk/runtime';"]);
    expect(result.optimization_suggestions).toEqual([]);
  });

  it('returns empty suggestions for a syntax error', () => {
    const result = validateImports('import {');
    expect(result.errors.map((e) => e.code)).toEqual(['SYN001']);
    expect(result.suggested_imports).toEqual([]);
  });
});

describe('analyzeComplexity', () => {
  it('returns the report for a valid source', () => {
    const result = analyzeComplexity(cleanSource);
    expect(result.has_analysis).toBe(true);
    if (result.has_analysis) {
      expect(result.metrics.node_count).toBe(2);
      expect(result.metrics.connection_count).toBe(1);
      expect(result.metrics.pattern_type).toBe('cyclic');
      expect(result.metrics.max_cycle_depth).toBe(1);
    }
  });

  it('explains why there is no report', () => {
    const result = analyzeComplexity('const a = ;');
    expect(result.has_analysis).toBe(false);
    if (!result.has_analysis) {
      expect(result.error.startsWith('Complexity analysis error: Syntax error in workflow source: ')).toBe(true);
    }
  });
});

describe('getValidationPatterns', () => {
  it('lists the reference patterns', () => {
    expect(getValidationPatterns().map((p) => p.name)).toEqual([
      'node-parameters',
      'required-parameters',
      'connection-syntax',
      'cycle-definition',
      'sdk-imports',
      'execution-pattern',
    ]);
  });

  it('hands out copies', () => {
    const [first] = getValidationPatterns();
    first.name = 'changed';
    expect(getValidationPatterns()[0].name).toBe('node-parameters');
  });
});
