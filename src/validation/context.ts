import type { TWorkflowIR } from '../ast/types';
import type { ValidatorConfig } from '../config/types';
import type { TDiagnostic } from '../diagnostics';
import type { TWorkflowGraph } from '../graph-builder';
import type { TNodeTypeRegistry } from '../registry/node-registry';
import type { Deadline } from '../utils/deadline';

/**
 * Everything a rule pass may read. Passes run after the graph is built and
 * never write to any of it.
 */
export type TAnalysisContext = {
  ir: TWorkflowIR;
  graph: TWorkflowGraph;
  config: ValidatorConfig;
  registry: TNodeTypeRegistry;
  deadline: Deadline;
};

export type TValidationPass = (context: TAnalysisContext) => TDiagnostic[];
