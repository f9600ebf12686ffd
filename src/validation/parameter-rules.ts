/**
 * Parameter Validation Rules
 *
 * Rules:
 * 1. PAR001 - Custom node class has no getParameters() method
 * 2. PAR002 - run()/execute() reads a parameter getParameters() does not declare
 * 3. PAR003 - Parameter declaration without a `type`
 * 4. PAR004 - Built-in node declared without one of its required parameters
 *
 * Undeclared parameters are dropped by the runtime before run() sees them,
 * so PAR002 is an error, not a style hint.
 */

import type { TNodeClassIR, TWorkflowIR } from '../ast/types';
import { createDiagnostic, type TDiagnostic } from '../diagnostics';
import { SDK_NODE_BASES } from '../sdk-catalog';
import type { TAnalysisContext } from './context';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Classes treated as custom nodes: referenced by a node declaration, or
 * extending one of the SDK node bases.
 */
export function customNodeClasses(ir: TWorkflowIR): TNodeClassIR[] {
  const referenced = new Set(ir.nodes.map((node) => node.className));
  return ir.classes.filter(
    (cls) =>
      referenced.has(cls.name) ||
      (cls.extendsName !== undefined && SDK_NODE_BASES.has(cls.extendsName))
  );
}

function checkNodeClass(cls: TNodeClassIR): TDiagnostic[] {
  const diagnostics: TDiagnostic[] = [];

  if (!cls.hasParameterMethod) {
    diagnostics.push(
      createDiagnostic('PAR001', `Node class '${cls.name}' is missing a getParameters() method`, {
        line: cls.span.line,
        context: { node_class: cls.name },
      })
    );
  }

  // A declaration with a computed name could cover any key
  const declaresDynamically = cls.parameters.some((p) => p.name === undefined);
  if (cls.hasParameterMethod && !declaresDynamically) {
    const declared = new Set(cls.parameters.map((p) => p.name));
    const reported = new Set<string>();
    for (const usage of cls.usedParameters) {
      if (declared.has(usage.name) || reported.has(usage.name)) continue;
      reported.add(usage.name);
      diagnostics.push(
        createDiagnostic(
          'PAR002',
          `Parameter '${usage.name}' is used in ${cls.name} but not declared in getParameters()`,
          { line: usage.span.line, context: { node_class: cls.name, parameter: usage.name } }
        )
      );
    }
  }

  for (const parameter of cls.parameters) {
    if (parameter.type !== undefined) continue;
    const name = parameter.name ?? 'unknown';
    diagnostics.push(
      createDiagnostic('PAR003', `NodeParameter '${name}' in ${cls.name} is missing the required 'type' field`, {
        line: parameter.span.line,
        context: { node_class: cls.name, parameter: name },
      })
    );
  }

  return diagnostics;
}

// ---------------------------------------------------------------------------
// Rule entry points
// ---------------------------------------------------------------------------

/** PAR001-PAR003 over every custom node class, in source order */
export function validateNodeClasses(ir: TWorkflowIR): TDiagnostic[] {
  return customNodeClasses(ir).flatMap(checkNodeClass);
}

/**
 * PAR004 for node declarations whose class is in the registry. Classes
 * declared in the source are never looked up, and a config that spreads
 * another object may supply anything.
 */
export function validateRequiredParameters(context: TAnalysisContext): TDiagnostic[] {
  const { ir, registry } = context;
  const localClasses = new Set(ir.classes.map((cls) => cls.name));
  const diagnostics: TDiagnostic[] = [];

  for (const node of context.graph.nodes.values()) {
    if (localClasses.has(node.className) || node.dynamicConfig) continue;
    const required = registry.getRequiredParameters(node.className);
    if (!required) continue;

    for (const parameter of required) {
      if (Object.prototype.hasOwnProperty.call(node.config, parameter)) continue;
      diagnostics.push(
        createDiagnostic('PAR004', `Node '${node.id}' missing required parameter '${parameter}'`, {
          line: node.span.line,
          context: { node_type: node.className, node_id: node.id, parameter },
        })
      );
    }
  }
  return diagnostics;
}

export function validateParameters(context: TAnalysisContext): TDiagnostic[] {
  return [...validateNodeClasses(context.ir), ...validateRequiredParameters(context)];
}
