import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../../src/config/loader';
import { analyzeImports, importGroupOf, validateImports } from '../../src/validation/import-rules';
import { createContext, extract, source, SDK_IMPORTS } from '../helpers/test-fixtures';

const config = resolveConfig();

const messySource = source(
  "import { readFile } from 'node:fs/promises';",
  "import { WorkflowBuilder } from '@nodeflow/sdk/workflow';",
  "import { z } from 'zod';",
  "import { LocalRuntime } from '@nodeflow/sdk/workflow';",
  "import _ from 'lodash';",
  "import { Node } from './sdk/nodes';",
  "import { helper } from './helper';",
  "import { CycleBuilder } from '@nodeflow/sdk/workflow';",
  'const workflow = new WorkflowBuilder();',
  'const runtime = new LocalRuntime();',
  "const data = readFile('x').then(print);",
  'class Custom extends Node {}',
  'helper(NodeParameter);'
);

describe('importGroupOf', () => {
  it.each([
    ['node:fs', 'builtin'],
    ['fs/promises', 'builtin'],
    ['path', 'builtin'],
    ['@nodeflow/sdk', 'sdk'],
    ['@nodeflow/sdk/runtime', 'sdk'],
    ['@nodeflow/sdkx', 'third-party'],
    ['zod', 'third-party'],
    ['../x', 'relative'],
  ])('%s is %s', (module, group) => {
    expect(importGroupOf(module, '@nodeflow/sdk')).toBe(group);
  });
});

describe('analyzeImports', () => {
  it('reports missing symbols, then per-binding problems, then ordering', () => {
    const { diagnostics } = analyzeImports(extract(messySource).ir, config.imports);

    expect(diagnostics.map((d) => [d.code, d.line])).toEqual([
      ['IMP001', 13],
      ['IMP002', 3],
      ['IMP003', 4],
      ['IMP008', 5],
      ['IMP004', 6],
      ['IMP002', 8],
      ['IMP006', 3],
      ['IMP006', 5],
      ['IMP006', 8],
    ]);
  });

  it('words each finding', () => {
    const messages = analyzeImports(extract(messySource).ir, config.imports).diagnostics.map((d) => d.message);

    expect(messages).toEqual([
      "Missing import for 'NodeParameter': add import { NodeParameter } from '@nodeflow/sdk/nodes'",
      "Unused import 'z' from 'zod'",
      "Incorrect import path for 'LocalRuntime': expected '@nodeflow/sdk/runtime', got '@nodeflow/sdk/workflow'",
      "Heavy import '_' from 'lodash' is unused and may slow startup",
      "Relative import of SDK symbol 'Node' from './sdk/nodes'; import it from '@nodeflow/sdk/nodes'",
      "Unused import 'CycleBuilder' from '@nodeflow/sdk/workflow'",
      "Import from 'zod' (third-party) should come before SDK imports",
      "Import from 'lodash' (third-party) should come before SDK imports",
      "Import from '@nodeflow/sdk/workflow' (SDK) should come before relative imports",
    ]);
  });

  it('suggests import statements and tidy-ups', () => {
    const { suggestedImports, optimizations } = analyzeImports(extract(messySource).ir, config.imports);

    expect(suggestedImports).toEqual(["import { NodeParameter } from '@nodeflow/sdk/nodes';"]);
    expect(optimizations).toEqual([
      {
        type: 'remove_unused',
        imports: ['z', '_', 'CycleBuilder'],
        description: 'Remove 3 unused imports: z, _, CycleBuilder',
      },
      {
        type: 'consolidate',
        module: '@nodeflow/sdk/workflow',
        description: "Merge 3 import statements from '@nodeflow/sdk/workflow' into one",
      },
    ]);
  });

  it('groups suggested imports by module', () => {
    const { suggestedImports } = analyzeImports(
      extract(source('const w = new WorkflowBuilder();', 'const r = new LocalRuntime();', 'new Workflow();')).ir,
      config.imports
    );
    expect(suggestedImports).toEqual([
      "import { WorkflowBuilder, Workflow } from '@nodeflow/sdk/workflow';",
      "import { LocalRuntime } from '@nodeflow/sdk/runtime';",
    ]);
  });

  it('does not ask for an import of a locally declared SDK name', () => {
    const { diagnostics } = analyzeImports(
      extract(source('class Node {}', 'const n = new Node();')).ir,
      config.imports
    );
    expect(diagnostics).toEqual([]);
  });

  it('follows a configured SDK root', () => {
    const { diagnostics } = analyzeImports(
      extract(source("import { WorkflowBuilder } from '@acme/flows/workflow';", 'new WorkflowBuilder();')).ir,
      { ...config.imports, sdkRoot: '@acme/flows' }
    );
    expect(diagnostics).toEqual([]);
  });
});

describe('validateImports', () => {
  it('is silent for correctly imported and used SDK symbols', () => {
    const context = createContext(
      source(...SDK_IMPORTS, 'const workflow = new WorkflowBuilder();', 'new LocalRuntime().execute(workflow.build());')
    );
    expect(validateImports(context)).toEqual([]);
  });
});
