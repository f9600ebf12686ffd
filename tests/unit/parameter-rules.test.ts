import { describe, it, expect } from 'vitest';
import { createNodeTypeRegistry } from '../../src/registry/node-registry';
import {
  customNodeClasses,
  validateNodeClasses,
  validateRequiredParameters,
} from '../../src/validation/parameter-rules';
import { createContext, extract, source } from '../helpers/test-fixtures';

describe('validateNodeClasses', () => {
  const classSource = source(
    'class SummaryNode extends Node {',
    '  getParameters() {',
    '    return [',
    "      { name: 'text', type: 'string', required: true },",
    "      { name: 'limit', required: false },",
    '    ];',
    '  }',
    '  run(params) {',
    '    return params.text + params.style + params.style;',
    '  }',
    '}',
    'class Bare extends BaseNode {',
    '  run(params) { return params.x; }',
    '}',
    'class Helper {',
    '  getParameters() { return []; }',
    '}'
  );

  it('only inspects classes that extend an SDK node base', () => {
    const { ir } = extract(classSource);
    expect(customNodeClasses(ir).map((cls) => cls.name)).toEqual(['SummaryNode', 'Bare']);
  });

  it('reports PAR002 once per key, then PAR003, then PAR001 for the next class', () => {
    const { ir } = extract(classSource);
    const diagnostics = validateNodeClasses(ir);

    expect(diagnostics.map((d) => [d.code, d.line, d.message])).toEqual([
      ['PAR002', 9, "Parameter 'style' is used in SummaryNode but not declared in getParameters()"],
      ['PAR003', 5, "NodeParameter 'limit' in SummaryNode is missing the required 'type' field"],
      ['PAR001', 12, "Node class 'Bare' is missing a getParameters() method"],
    ]);
    expect(diagnostics[0].context).toEqual({ node_class: 'SummaryNode', parameter: 'style' });
  });

  it('includes a class referenced by a node declaration even without an SDK base', () => {
    const { ir } = extract(
      source('class Local {', '  run(params) { return params.a; }', '}', "workflow.addNode(Local, 'local', {});")
    );
    expect(validateNodeClasses(ir).map((d) => d.code)).toEqual(['PAR001']);
  });

  it('skips PAR002 when a declaration has a computed name', () => {
    const { ir } = extract(
      source(
        'class Flexible extends Node {',
        '  getParameters() {',
        "    return [{ name: NAME_FROM_ENV, type: 'string' }];",
        '  }',
        '  run(params) { return params.anything; }',
        '}'
      )
    );
    expect(validateNodeClasses(ir)).toEqual([]);
  });
});

describe('validateRequiredParameters', () => {
  it('reports each missing required parameter of a built-in node', () => {
    const context = createContext(
      source(
        "workflow.addNode('LLMAgent', 'agent', { temperature: 0.5 });",
        "workflow.addNode('HTTPRequestNode', 'fetch', { url: 'https://example.test' });",
        "workflow.addNode('LLMAgent', 'spread', { ...shared });",
        "workflow.addNode('MyCustom', 'custom', {});"
      )
    );
    const diagnostics = validateRequiredParameters(context);

    expect(diagnostics.map((d) => [d.code, d.line, d.message])).toEqual([
      ['PAR004', 1, "Node 'agent' missing required parameter 'model'"],
      ['PAR004', 1, "Node 'agent' missing required parameter 'prompt'"],
    ]);
    expect(diagnostics[0].context).toEqual({ node_type: 'LLMAgent', node_id: 'agent', parameter: 'model' });
  });

  it('prefers a class declared in the source over the registry entry', () => {
    const context = createContext(
      source(
        'class LLMAgent extends Node {',
        "  getParameters() { return [{ name: 'model', type: 'string' }]; }",
        '}',
        "workflow.addNode('LLMAgent', 'a', {});"
      )
    );
    expect(validateRequiredParameters(context)).toEqual([]);
  });

  it('uses the injected registry', () => {
    const registry = createNodeTypeRegistry({ Thing: ['alpha'] });
    const context = createContext(
      source("workflow.addNode('Thing', 't', {});", "workflow.addNode('LLMAgent', 'agent', {});"),
      { registry }
    );
    expect(validateRequiredParameters(context).map((d) => d.message)).toEqual([
      "Node 't' missing required parameter 'alpha'",
    ]);
  });
});
