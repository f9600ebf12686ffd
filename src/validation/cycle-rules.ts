/**
 * Cycle Validation Rules
 *
 * Rules (CYC001 is reported by the extractor):
 * 1. CYC002 - Neither maxIterations() nor convergeWhen()
 * 2. CYC003 - convergeWhen() is not a string, or does not parse
 * 3. CYC004 - No connect() calls
 * 4. CYC005 - connect() mapping is not an object of field names
 * 5. CYC006 - maxIterations() above the configured threshold (warning)
 * 6. CYC007 - timeout() non-numeric or not positive
 * 7. CYC008 - connect() endpoint is not a declared node
 */

import type { TCycleDefinitionIR } from '../ast/types';
import { validateConditionSyntax } from '../chevrotain-parser/condition-parser';
import { createDiagnostic, type TDiagnostic } from '../diagnostics';
import type { TAnalysisContext } from './context';

function checkConvergence(cycle: TCycleDefinitionIR): TDiagnostic | undefined {
  const setting = cycle.convergeWhen;
  if (!setting) return undefined;
  const context = { cycle_name: cycle.name };

  if (setting.kind !== 'literal' || typeof setting.value !== 'string') {
    return createDiagnostic('CYC003', `Cycle '${cycle.name}' convergence condition must be a string expression`, {
      line: cycle.span.line,
      context,
    });
  }

  const check = validateConditionSyntax(setting.value);
  if (check.valid) return undefined;
  return createDiagnostic(
    'CYC003',
    `Cycle '${cycle.name}' has invalid convergence condition '${setting.value}': ${check.error}`,
    { line: cycle.span.line, context: { ...context, condition: setting.value } }
  );
}

/** Only literals are judged; an expression such as `5 * 60` may well be numeric */
function checkTimeout(cycle: TCycleDefinitionIR): TDiagnostic | undefined {
  const setting = cycle.timeoutSeconds;
  if (!setting || setting.kind !== 'literal') return undefined;
  const context = { cycle_name: cycle.name };

  if (typeof setting.value !== 'number') {
    return createDiagnostic('CYC007', `Cycle '${cycle.name}' has a non-numeric timeout`, {
      line: cycle.span.line,
      context,
    });
  }
  if (setting.value <= 0) {
    return createDiagnostic(
      'CYC007',
      `Cycle '${cycle.name}' has invalid timeout ${setting.value}: must be a positive number of seconds`,
      { line: cycle.span.line, context: { ...context, timeout: setting.value } }
    );
  }
  return undefined;
}

function checkCycle(cycle: TCycleDefinitionIR, knownNodes: ReadonlySet<string>, threshold: number): TDiagnostic[] {
  const diagnostics: TDiagnostic[] = [];
  const line = cycle.span.line;

  if (!cycle.maxIterations && !cycle.convergeWhen) {
    diagnostics.push(
      createDiagnostic('CYC002', `Cycle '${cycle.name}' has no termination: call maxIterations() or convergeWhen()`, {
        line,
        context: { cycle_name: cycle.name },
      })
    );
  }

  const convergence = checkConvergence(cycle);
  if (convergence) diagnostics.push(convergence);

  if (cycle.edges.length === 0) {
    diagnostics.push(
      createDiagnostic('CYC004', `Cycle '${cycle.name}' has no connections defined`, {
        line,
        context: { cycle_name: cycle.name },
      })
    );
  }

  const iterations = cycle.maxIterations;
  if (iterations?.kind === 'literal' && typeof iterations.value === 'number' && iterations.value > threshold) {
    diagnostics.push(
      createDiagnostic(
        'CYC006',
        `Cycle '${cycle.name}' has a high iteration limit (${iterations.value}); consider convergeWhen() to stop earlier`,
        { line, context: { cycle_name: cycle.name, max_iterations: iterations.value, threshold } }
      )
    );
  }

  const timeout = checkTimeout(cycle);
  if (timeout) diagnostics.push(timeout);

  for (const edge of cycle.edges) {
    if (!edge.mappingValid) {
      diagnostics.push(
        createDiagnostic(
          'CYC005',
          `Cycle '${cycle.name}' connection has an invalid mapping: expected an object of output field to input field names`,
          { line: edge.span.line, context: { cycle_name: cycle.name } }
        )
      );
    }
    for (const endpoint of [edge.sourceNode, edge.targetNode]) {
      if (endpoint === undefined || knownNodes.has(endpoint)) continue;
      diagnostics.push(
        createDiagnostic('CYC008', `Cycle '${cycle.name}' references unknown node '${endpoint}'`, {
          line: edge.span.line,
          context: { cycle_name: cycle.name, node_id: endpoint },
        })
      );
    }
  }

  return diagnostics;
}

export function validateCycles(context: TAnalysisContext): TDiagnostic[] {
  const knownNodes = new Set(context.graph.nodes.keys());
  const threshold = context.config.cycles.maxIterationsThreshold;
  return context.ir.cycles.flatMap((cycle) => checkCycle(cycle, knownNodes, threshold));
}
