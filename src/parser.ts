import { ts, type Diagnostic, type SourceFile } from 'ts-morph';
import { getSharedProject } from './shared-project';
import { createDiagnostic, createInternalFault, type TDiagnostic } from './diagnostics';

/**
 * Source text plus its parsed tree, owned by one validation request.
 * Call `release()` when the request is done so the shared project does not
 * keep the file around.
 */
export type SourceUnit = {
  text: string;
  sourceFile: SourceFile;
  release(): void;
};

export type ParseOutcome =
  | { ok: true; unit: SourceUnit }
  | { ok: false; diagnostic: TDiagnostic };

let virtualFileCounter = 0;

function nextVirtualPath(fileName: string): string {
  virtualFileCounter += 1;
  return `/virtual/${virtualFileCounter}/${fileName}`;
}

/**
 * Parse workflow source. A syntax error yields a single SYN001 and no unit:
 * nothing downstream can trust a tree the compiler had to recover. A fault
 * inside the compiler itself, such as a stack overflow on deeply nested
 * input, yields a VAL001.
 */
export function parseSource(text: string, fileName: string = 'workflow.ts'): ParseOutcome {
  const project = getSharedProject();
  const filePath = nextVirtualPath(fileName);

  let sourceFile: SourceFile;
  let syntactic: Diagnostic[];
  try {
    sourceFile = project.createSourceFile(filePath, text, { overwrite: true });
    syntactic = project.getProgram().getSyntacticDiagnostics(sourceFile);
  } catch (error) {
    const orphan = project.getSourceFile(filePath);
    if (orphan) project.removeSourceFile(orphan);
    return { ok: false, diagnostic: createInternalFault('parser', error) };
  }

  if (syntactic.length > 0) {
    const first = syntactic[0];
    const message = ts.flattenDiagnosticMessageText(first.compilerObject.messageText, '\n');
    const line = first.getLineNumber();
    project.removeSourceFile(sourceFile);
    return {
      ok: false,
      diagnostic: createDiagnostic('SYN001', `Syntax error in workflow source: ${message}`, {
        ...(line !== undefined && { line }),
      }),
    };
  }

  let released = false;
  return {
    ok: true,
    unit: {
      text,
      sourceFile,
      release() {
        if (released) return;
        released = true;
        project.removeSourceFile(sourceFile);
      },
    },
  };
}

/**
 * Run `fn` over the parsed unit and release it afterwards, or return the
 * SYN001 or VAL001 when the source does not parse.
 */
export function withSourceUnit<T>(
  text: string,
  fn: (unit: SourceUnit) => T
): { ok: true; value: T } | { ok: false; diagnostic: TDiagnostic } {
  const outcome = parseSource(text);
  if (!outcome.ok) return outcome;
  try {
    return { ok: true, value: fn(outcome.unit) };
  } finally {
    outcome.unit.release();
  }
}
