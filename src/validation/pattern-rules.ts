/**
 * Gold-Standard Pattern Rules
 *
 * A table of structural matches over the extracted calls and imports. New
 * patterns are new table entries; nothing else needs to change.
 *
 * Rules:
 * 1. GOLD001 absolute-imports    - relative import (imports, warning)
 * 2. GOLD002 execution-pattern   - `workflow.execute(runtime)` (patterns, error)
 * 3. GOLD003 naming-convention   - snake_case builder call (patterns, error)
 */

import type { TWorkflowIR } from '../ast/types';
import { SNAKE_CASE_BUILDER_METHODS } from '../constants';
import { createDiagnostic, DIAGNOSTIC_CODES, type TDiagnostic, type TPatternCode, type TSeverity } from '../diagnostics';
import { SDK_BUILDER_CLASS, SDK_RUNTIMES } from '../sdk-catalog';
import type { TAnalysisContext } from './context';

export type TGoldStandardCategory = 'imports' | 'patterns';

export type TGoldStandard = {
  code: TPatternCode;
  name: string;
  category: TGoldStandardCategory;
  description: string;
  codeExample: string;
  severity: TSeverity;
  match: (ir: TWorkflowIR) => TDiagnostic[];
};

// ---------------------------------------------------------------------------
// Matchers
// ---------------------------------------------------------------------------

const NEW_EXPRESSION = /^new\s+([A-Za-z_$][\w$]*)/;

function matchRelativeImports(ir: TWorkflowIR): TDiagnostic[] {
  return ir.importDeclarations
    .filter((declaration) => declaration.isRelative)
    .map((declaration) =>
      createDiagnostic(
        'GOLD001',
        `Use absolute imports instead of relative imports ('${declaration.module}')`,
        { line: declaration.span.line, context: { module: declaration.module, gold_standard: 'absolute-imports' } }
      )
    );
}

function matchInvertedExecution(ir: TWorkflowIR): TDiagnostic[] {
  const builders = new Set<string>();
  const runtimes = new Set<string>();
  for (const construction of ir.constructions) {
    if (construction.className === SDK_BUILDER_CLASS) builders.add(construction.variable);
    if (SDK_RUNTIMES.has(construction.className)) runtimes.add(construction.variable);
  }

  const isRuntime = (text: string): boolean => {
    if (runtimes.has(text)) return true;
    const constructed = NEW_EXPRESSION.exec(text);
    return constructed !== null && SDK_RUNTIMES.has(constructed[1]);
  };

  const diagnostics: TDiagnostic[] = [];
  for (const call of ir.methodCalls) {
    if (call.method !== 'execute' || call.args.length === 0) continue;
    const [argument] = call.args;
    if (isRuntime(call.receiver)) continue;
    if (!builders.has(call.receiver) && !isRuntime(argument)) continue;

    diagnostics.push(
      createDiagnostic(
        'GOLD002',
        `Use '${argument}.execute(${call.receiver}.build())' not '${call.receiver}.execute(${argument})'`,
        { line: call.span.line, context: { receiver: call.receiver, gold_standard: 'execution-pattern' } }
      )
    );
  }
  return diagnostics;
}

function matchSnakeCaseBuilderCalls(ir: TWorkflowIR): TDiagnostic[] {
  const diagnostics: TDiagnostic[] = [];
  for (const call of ir.methodCalls) {
    if (!Object.prototype.hasOwnProperty.call(SNAKE_CASE_BUILDER_METHODS, call.method)) continue;
    const replacement = SNAKE_CASE_BUILDER_METHODS[call.method];
    diagnostics.push(
      createDiagnostic('GOLD003', `Use '${replacement}()' not '${call.method}()' (camelCase builder API)`, {
        line: call.span.line,
        context: { method: call.method, replacement, gold_standard: 'naming-convention' },
      })
    );
  }
  return diagnostics;
}

// ---------------------------------------------------------------------------
// Table
// ---------------------------------------------------------------------------

export const GOLD_STANDARDS: readonly TGoldStandard[] = [
  {
    code: 'GOLD001',
    name: 'absolute-imports',
    category: 'imports',
    description: 'Import SDK and project modules by package path, not relative path',
    codeExample: "import { WorkflowBuilder } from '@nodeflow/sdk/workflow';",
    severity: DIAGNOSTIC_CODES.GOLD001.severity,
    match: matchRelativeImports,
  },
  {
    code: 'GOLD002',
    name: 'execution-pattern',
    category: 'patterns',
    description: 'Execute workflows through a runtime: runtime.execute(workflow.build())',
    codeExample: 'const runtime = new LocalRuntime();\nconst result = await runtime.execute(workflow.build());',
    severity: DIAGNOSTIC_CODES.GOLD002.severity,
    match: matchInvertedExecution,
  },
  {
    code: 'GOLD003',
    name: 'naming-convention',
    category: 'patterns',
    description: 'Builder methods are camelCase: addNode, addConnection, createCycle',
    codeExample: "workflow.addNode('LLMAgent', 'agent', { model: 'gpt-4', prompt: 'Summarise' });",
    severity: DIAGNOSTIC_CODES.GOLD003.severity,
    match: matchSnakeCaseBuilderCalls,
  },
];

/**
 * Entries selected by `checkType`: `all`, a category, or nothing for an
 * unknown value.
 */
export function selectGoldStandards(checkType: string): TGoldStandard[] {
  if (checkType === 'all') return [...GOLD_STANDARDS];
  return GOLD_STANDARDS.filter((standard) => standard.category === checkType);
}

export function runGoldStandards(ir: TWorkflowIR, checkType: string = 'all'): TDiagnostic[] {
  return selectGoldStandards(checkType).flatMap((standard) => standard.match(ir));
}

/** The `patterns` category; import hygiene belongs to the import rules */
export function validatePatterns(context: TAnalysisContext): TDiagnostic[] {
  return runGoldStandards(context.ir, 'patterns');
}
