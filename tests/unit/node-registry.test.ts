import { describe, it, expect } from 'vitest';
import {
  createNodeTypeRegistry,
  extendNodeTypeRegistry,
  getDefaultNodeTypeRegistry,
} from '../../src/registry/node-registry';

describe('node type registry', () => {
  const registry = getDefaultNodeTypeRegistry();

  it('resolves names with or without the Node suffix', () => {
    expect(registry.resolve('LLMAgent')).toBe('LLMAgent');
    expect(registry.resolve('LLMAgentNode')).toBe('LLMAgent');
    expect(registry.resolve('Node')).toBeUndefined();
    expect(registry.resolve('Unknown')).toBeUndefined();
  });

  it('returns required parameters for known types only', () => {
    expect(registry.getRequiredParameters('HTTPRequestNode')).toEqual(['url']);
    expect(registry.getRequiredParameters('S3Upload')).toEqual(['bucket', 'key']);
    expect(registry.getRequiredParameters('Unknown')).toBeUndefined();
  });

  it('is shared between calls', () => {
    expect(getDefaultNodeTypeRegistry()).toBe(registry);
  });

  it('layers extra entries over a base without changing it', () => {
    const extended = extendNodeTypeRegistry(registry, { Custom: ['alpha'], HTTPRequest: ['url', 'method'] });

    expect(extended.getRequiredParameters('CustomNode')).toEqual(['alpha']);
    expect(extended.getRequiredParameters('HTTPRequest')).toEqual(['url', 'method']);
    expect(extended.getRequiredParameters('LLMAgent')).toEqual(['model', 'prompt']);
    expect(registry.getRequiredParameters('HTTPRequest')).toEqual(['url']);
    expect(registry.resolve('Custom')).toBeUndefined();
  });

  it('lists registered names in insertion order', () => {
    expect(createNodeTypeRegistry({ B: [], A: ['x'] }).names()).toEqual(['B', 'A']);
  });
});
