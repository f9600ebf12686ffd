/**
 * Import Validation Rules
 *
 * Rules:
 * 1. IMP001 - SDK symbol used without an import or local declaration
 * 2. IMP002 - Imported binding never referenced
 * 3. IMP003 - SDK symbol imported from the wrong SDK subpath
 * 4. IMP004 - SDK symbol imported through a relative path
 * 5. IMP006 - Import groups out of order (built-in, third-party, SDK, relative)
 * 6. IMP008 - Binding from a heavy module never referenced
 *
 * Besides diagnostics, {@link analyzeImports} proposes import statements for
 * the missing symbols and tidy-ups for the existing ones.
 */

import { builtinModules } from 'node:module';
import type { TImportIR, TWorkflowIR } from '../ast/types';
import type { ImportRulesConfig } from '../config/types';
import { createDiagnostic, type TDiagnostic } from '../diagnostics';
import { canonicalModuleFor, isSdkModule, isSdkSymbol } from '../sdk-catalog';
import type { TAnalysisContext } from './context';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TImportGroup = 'builtin' | 'third-party' | 'sdk' | 'relative';

export type TImportOptimization =
  | { type: 'remove_unused'; imports: string[]; description: string }
  | { type: 'consolidate'; module: string; description: string };

export type TImportAnalysis = {
  diagnostics: TDiagnostic[];
  /** Import statements that would satisfy every IMP001 */
  suggestedImports: string[];
  optimizations: TImportOptimization[];
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const GROUP_ORDER: readonly TImportGroup[] = ['builtin', 'third-party', 'sdk', 'relative'];

const GROUP_LABELS: Record<TImportGroup, string> = {
  builtin: 'Node built-in',
  'third-party': 'third-party',
  sdk: 'SDK',
  relative: 'relative',
};

const BUILTIN_MODULES: ReadonlySet<string> = new Set(builtinModules);

export function importGroupOf(module: string, sdkRoot: string): TImportGroup {
  if (module.startsWith('.')) return 'relative';
  if (module.startsWith('node:') || BUILTIN_MODULES.has(module) || BUILTIN_MODULES.has(module.split('/')[0])) {
    return 'builtin';
  }
  if (isSdkModule(module, sdkRoot)) return 'sdk';
  return 'third-party';
}

function isHeavyModule(module: string, heavyModules: readonly string[]): boolean {
  return heavyModules.some((heavy) => module === heavy || module.startsWith(`${heavy}/`));
}

/** Name the SDK would know the binding by */
function sdkNameOf(binding: TImportIR): string | undefined {
  if (binding.kind === 'namespace') return undefined;
  const name = binding.kind === 'named' ? binding.importedName : binding.name;
  return isSdkSymbol(name) ? name : undefined;
}

function checkMissing(ir: TWorkflowIR, config: ImportRulesConfig): { diagnostics: TDiagnostic[]; missing: string[] } {
  const imported = new Set(ir.imports.map((binding) => binding.name));
  const diagnostics: TDiagnostic[] = [];
  const missing: string[] = [];

  for (const name of ir.usedNames) {
    if (!isSdkSymbol(name) || imported.has(name) || ir.declaredNames.has(name)) continue;
    const canonical = canonicalModuleFor(name, config.sdkRoot) ?? config.sdkRoot;
    const line = ir.usedNameLines.get(name);
    missing.push(name);
    diagnostics.push(
      createDiagnostic('IMP001', `Missing import for '${name}': add import { ${name} } from '${canonical}'`, {
        ...(line !== undefined && { line }),
        context: { symbol: name, module: canonical },
      })
    );
  }
  return { diagnostics, missing };
}

function checkBindings(ir: TWorkflowIR, config: ImportRulesConfig): TDiagnostic[] {
  const diagnostics: TDiagnostic[] = [];

  for (const binding of ir.imports) {
    const line = binding.span.line;

    if (!ir.usedNames.has(binding.name)) {
      if (isHeavyModule(binding.module, config.heavyModules)) {
        diagnostics.push(
          createDiagnostic(
            'IMP008',
            `Heavy import '${binding.name}' from '${binding.module}' is unused and may slow startup`,
            { line, context: { symbol: binding.name, module: binding.module } }
          )
        );
      } else {
        diagnostics.push(
          createDiagnostic('IMP002', `Unused import '${binding.name}' from '${binding.module}'`, {
            line,
            context: { symbol: binding.name, module: binding.module },
          })
        );
      }
    }

    const sdkName = sdkNameOf(binding);
    if (sdkName === undefined) continue;
    const canonical = canonicalModuleFor(sdkName, config.sdkRoot) ?? config.sdkRoot;

    if (binding.isRelative) {
      diagnostics.push(
        createDiagnostic(
          'IMP004',
          `Relative import of SDK symbol '${sdkName}' from '${binding.module}'; import it from '${canonical}'`,
          { line, context: { symbol: sdkName, module: binding.module, expected: canonical } }
        )
      );
    } else if (
      binding.kind === 'named' &&
      isSdkModule(binding.module, config.sdkRoot) &&
      binding.module !== canonical
    ) {
      diagnostics.push(
        createDiagnostic(
          'IMP003',
          `Incorrect import path for '${sdkName}': expected '${canonical}', got '${binding.module}'`,
          { line, context: { symbol: sdkName, module: binding.module, expected: canonical } }
        )
      );
    }
  }
  return diagnostics;
}

/** One IMP006 per declaration that appears after a declaration of a later group */
function checkOrder(ir: TWorkflowIR, config: ImportRulesConfig): TDiagnostic[] {
  const diagnostics: TDiagnostic[] = [];
  let latest: TImportGroup = 'builtin';

  for (const declaration of ir.importDeclarations) {
    const group = importGroupOf(declaration.module, config.sdkRoot);
    if (GROUP_ORDER.indexOf(group) < GROUP_ORDER.indexOf(latest)) {
      diagnostics.push(
        createDiagnostic(
          'IMP006',
          `Import from '${declaration.module}' (${GROUP_LABELS[group]}) should come before ${GROUP_LABELS[latest]} imports`,
          { line: declaration.span.line, context: { module: declaration.module, group } }
        )
      );
    } else {
      latest = group;
    }
  }
  return diagnostics;
}

function suggestImports(missing: readonly string[], sdkRoot: string): string[] {
  const byModule = new Map<string, string[]>();
  for (const name of missing) {
    const module = canonicalModuleFor(name, sdkRoot) ?? sdkRoot;
    const names = byModule.get(module) ?? [];
    names.push(name);
    byModule.set(module, names);
  }
  return [...byModule].map(([module, names]) => `import { ${names.join(', ')} } from '${module}';`);
}

function suggestOptimizations(ir: TWorkflowIR): TImportOptimization[] {
  const optimizations: TImportOptimization[] = [];

  const unused = ir.imports.filter((binding) => !ir.usedNames.has(binding.name)).map((binding) => binding.name);
  if (unused.length > 0) {
    optimizations.push({
      type: 'remove_unused',
      imports: unused,
      description: `Remove ${unused.length} unused import${unused.length === 1 ? '' : 's'}: ${unused.join(', ')}`,
    });
  }

  const declarationsPerModule = new Map<string, number>();
  for (const declaration of ir.importDeclarations) {
    if (declaration.bindingCount === 0) continue;
    declarationsPerModule.set(declaration.module, (declarationsPerModule.get(declaration.module) ?? 0) + 1);
  }
  for (const [module, count] of declarationsPerModule) {
    if (count < 2) continue;
    optimizations.push({
      type: 'consolidate',
      module,
      description: `Merge ${count} import statements from '${module}' into one`,
    });
  }

  return optimizations;
}

// ---------------------------------------------------------------------------
// Rule entry points
// ---------------------------------------------------------------------------

export function analyzeImports(ir: TWorkflowIR, config: ImportRulesConfig): TImportAnalysis {
  const { diagnostics: missingDiagnostics, missing } = checkMissing(ir, config);
  return {
    diagnostics: [...missingDiagnostics, ...checkBindings(ir, config), ...checkOrder(ir, config)],
    suggestedImports: suggestImports(missing, config.sdkRoot),
    optimizations: suggestOptimizations(ir),
  };
}

export function validateImports(context: TAnalysisContext): TDiagnostic[] {
  return analyzeImports(context.ir, context.config.imports).diagnostics;
}
