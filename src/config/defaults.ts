import type { ValidatorConfig } from './types';

/**
 * Field names that show up on most node outputs and inputs
 */
export const COMMON_FIELD_NAMES = [
  'result',
  'results',
  'data',
  'output',
  'input',
  'response',
  'content',
  'text',
  'value',
  'items',
  'item',
  'rows',
  'records',
  'status',
  'error',
  'errors',
  'messages',
  'message',
  'payload',
  'body',
  'headers',
  'metadata',
  'context',
  'query',
  'documents',
  'feedback',
  'score',
  'summary',
];

/**
 * Modules with a noticeable load cost
 */
export const HEAVY_MODULES = [
  '@tensorflow/tfjs',
  '@tensorflow/tfjs-node',
  'onnxruntime-node',
  'puppeteer',
  'playwright',
  'aws-sdk',
  'googleapis',
  'lodash',
  'moment',
  'rxjs',
  'typescript',
  'sharp',
  'pdfjs-dist',
  'xlsx',
];

export const DEFAULT_CONFIG: ValidatorConfig = {
  cycles: {
    maxIterationsThreshold: 1000,
  },
  connections: {
    commonFieldNames: COMMON_FIELD_NAMES,
    typoDistance: 1,
  },
  imports: {
    heavyModules: HEAVY_MODULES,
    sdkRoot: '@nodeflow/sdk',
  },
  ordering: {
    tieBreak: 'code',
  },
  limits: {
    timeoutMs: 10_000,
    maxNestingDepth: 1000,
  },
  registry: {
    nodeTypes: {},
  },
};

/**
 * Fresh copy of the defaults, safe to mutate
 */
export function getDefaultConfig(): ValidatorConfig {
  return {
    cycles: { ...DEFAULT_CONFIG.cycles },
    connections: {
      ...DEFAULT_CONFIG.connections,
      commonFieldNames: [...DEFAULT_CONFIG.connections.commonFieldNames],
    },
    imports: {
      ...DEFAULT_CONFIG.imports,
      heavyModules: [...DEFAULT_CONFIG.imports.heavyModules],
    },
    ordering: { ...DEFAULT_CONFIG.ordering },
    limits: { ...DEFAULT_CONFIG.limits },
    registry: { nodeTypes: { ...DEFAULT_CONFIG.registry.nodeTypes } },
  };
}
