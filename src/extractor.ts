import {
  Node,
  SyntaxKind,
  VariableDeclarationKind,
  type CallExpression,
  type ClassDeclaration,
  type Identifier,
  type ImportDeclaration,
  type MethodDeclaration,
  type ObjectLiteralExpression,
  type SourceFile,
  type VariableDeclaration,
} from 'ts-morph';
import type {
  TConfigValue,
  TConnectionArgument,
  TCycleDefinitionIR,
  TCycleEdgeIR,
  TLiteralValue,
  TNodeClassIR,
  TParameterDeclarationIR,
  TParameterUsageIR,
  TSettingValue,
  TSourceSpan,
  TWorkflowIR,
} from './ast/types';
import {
  BUILDER_METHODS,
  CYCLE_MAPPING_OPTION,
  CYCLE_METHODS,
  LEGACY_CYCLE_OPTION,
  NODE_CLASS_METHODS,
  NODE_PARAMETER_CLASS,
  isCycleMethod,
} from './constants';
import { createDiagnostic, type TDiagnostic } from './diagnostics';
import { Deadline } from './utils/deadline';
import { NestingDepthError } from './utils/error-utils';

export type TExtractOptions = {
  deadline?: Deadline;
  maxNestingDepth?: number;
};

export type TExtractionResult = {
  ir: TWorkflowIR;
  /** CON001, CON002 and CYC001: malformed shapes found while extracting */
  diagnostics: TDiagnostic[];
};

/** Nodes visited between deadline checks */
const DEADLINE_CHECK_INTERVAL = 256;

const DEFAULT_MAX_NESTING_DEPTH = 1000;

/**
 * Line and column from the compiler's cached line map. ts-morph's
 * `getStartLineNumber` rescans the text on every call.
 */
function positionOf(node: Node, pos: number): { line: number; column: number } {
  const { line, character } = node.getSourceFile().compilerNode.getLineAndCharacterOfPosition(pos);
  return { line: line + 1, column: character + 1 };
}

function lineOf(node: Node): number {
  return positionOf(node, node.getStart()).line;
}

export function spanOf(node: Node): TSourceSpan {
  const { line, column } = positionOf(node, node.getStart());
  return {
    line,
    column,
    endLine: positionOf(node, node.getEnd()).line,
  };
}

function calleeName(call: CallExpression): string | undefined {
  const callee = call.getExpression();
  return Node.isPropertyAccessExpression(callee) ? callee.getName() : undefined;
}

/** Identifier at the bottom of `a.b().c().d`, if any */
function rootIdentifierOf(call: CallExpression): string | undefined {
  let current: Node = call.getExpression();
  for (;;) {
    if (Node.isPropertyAccessExpression(current) || Node.isCallExpression(current)) {
      current = current.getExpression();
    } else if (Node.isIdentifier(current)) {
      return current.getText();
    } else {
      return undefined;
    }
  }
}

type TIdentifierRole = 'reference' | 'declaration' | 'other';

/**
 * Whether an identifier reads a binding, introduces one, or is only a name
 * (property key, member name, label).
 */
function classifyIdentifier(id: Identifier): TIdentifierRole {
  const parent = id.getParent();
  if (!parent) return 'reference';

  if (Node.isPropertyAccessExpression(parent)) {
    return parent.getNameNode() === id ? 'other' : 'reference';
  }
  if (Node.isQualifiedName(parent)) {
    return parent.getRight() === id ? 'other' : 'reference';
  }
  if (Node.isShorthandPropertyAssignment(parent)) return 'reference';
  if (Node.isExportSpecifier(parent)) {
    return parent.getNameNode() === id ? 'reference' : 'other';
  }
  if (
    Node.isImportSpecifier(parent) ||
    Node.isImportClause(parent) ||
    Node.isNamespaceImport(parent) ||
    Node.isLabeledStatement(parent) ||
    Node.isBreakStatement(parent) ||
    Node.isContinueStatement(parent)
  ) {
    return 'other';
  }
  if (Node.isBindingElement(parent)) {
    if (parent.getPropertyNameNode() === id) return 'other';
    return parent.getNameNode() === id ? 'declaration' : 'reference';
  }
  if (
    Node.isPropertyAssignment(parent) ||
    Node.isPropertyDeclaration(parent) ||
    Node.isMethodDeclaration(parent) ||
    Node.isPropertySignature(parent) ||
    Node.isMethodSignature(parent) ||
    Node.isGetAccessorDeclaration(parent) ||
    Node.isSetAccessorDeclaration(parent) ||
    Node.isEnumMember(parent)
  ) {
    return parent.getNameNode() === id ? 'other' : 'reference';
  }
  if (Node.isVariableDeclaration(parent) || Node.isParameterDeclaration(parent)) {
    return parent.getNameNode() === id ? 'declaration' : 'reference';
  }
  if (
    Node.isFunctionDeclaration(parent) ||
    Node.isClassDeclaration(parent) ||
    Node.isFunctionExpression(parent) ||
    Node.isClassExpression(parent)
  ) {
    return parent.getNameNode() === id ? 'declaration' : 'reference';
  }
  if (
    Node.isInterfaceDeclaration(parent) ||
    Node.isTypeAliasDeclaration(parent) ||
    Node.isEnumDeclaration(parent) ||
    Node.isTypeParameterDeclaration(parent)
  ) {
    return parent.getNameNode() === id ? 'declaration' : 'reference';
  }
  return 'reference';
}

/**
 * Walks a parsed workflow source once and flattens the shapes the validator
 * understands into a {@link TWorkflowIR}. Anything it does not recognise is
 * skipped.
 */
class WorkflowExtractor {
  private readonly deadline: Deadline;
  private readonly maxDepth: number;
  private visited = 0;

  /** `const NAME = <literal>` bindings, for resolving arguments */
  private readonly constValues = new Map<string, TLiteralValue>();
  /** Call expressions in post-order: inner calls of a chain come first */
  private readonly calls: CallExpression[] = [];
  private readonly classDeclarations: ClassDeclaration[] = [];

  private readonly ir: TWorkflowIR = {
    nodes: [],
    connectionCalls: [],
    cycles: [],
    classes: [],
    imports: [],
    importDeclarations: [],
    usedNames: new Set(),
    declaredNames: new Set(),
    usedNameLines: new Map(),
    methodCalls: [],
    constructions: [],
  };
  private readonly diagnostics: TDiagnostic[] = [];

  constructor(
    private readonly sourceFile: SourceFile,
    options: TExtractOptions
  ) {
    this.deadline = options.deadline ?? Deadline.unbounded();
    this.maxDepth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
  }

  extract(): TExtractionResult {
    this.walk(this.sourceFile, 0);

    for (const call of this.calls) {
      this.tick();
      this.recordMethodCall(call);
    }
    this.extractNodeDeclarations();
    this.extractConnectionCalls();
    this.extractCycles();
    for (const declaration of this.classDeclarations) {
      this.tick();
      const nodeClass = this.extractClass(declaration);
      if (nodeClass) this.ir.classes.push(nodeClass);
    }

    return { ir: this.ir, diagnostics: this.diagnostics };
  }

  private tick(): void {
    this.visited += 1;
    if (this.visited % DEADLINE_CHECK_INTERVAL === 0) {
      this.deadline.check();
    }
  }

  // ── Collection walk ─────────────────────────────────────────────────────

  private walk(node: Node, depth: number): void {
    if (depth > this.maxDepth) {
      throw new NestingDepthError(this.maxDepth, lineOf(node));
    }
    this.tick();

    if (Node.isImportDeclaration(node)) {
      this.collectImport(node);
      return;
    }
    if (Node.isIdentifier(node)) {
      this.collectIdentifier(node);
    } else if (Node.isVariableDeclaration(node)) {
      this.collectVariable(node);
    } else if (Node.isClassDeclaration(node)) {
      this.classDeclarations.push(node);
    }

    node.forEachChild((child) => {
      this.walk(child, depth + 1);
    });

    if (Node.isCallExpression(node)) {
      this.calls.push(node);
    }
  }

  private collectImport(declaration: ImportDeclaration): void {
    const module = declaration.getModuleSpecifierValue();
    const isRelative = module.startsWith('.');
    const declarationIndex = this.ir.importDeclarations.length;
    const span = spanOf(declaration);
    const declarationTypeOnly = declaration.isTypeOnly();
    let bindingCount = 0;

    const defaultImport = declaration.getDefaultImport();
    if (defaultImport) {
      bindingCount += 1;
      this.ir.imports.push({
        module,
        name: defaultImport.getText(),
        importedName: 'default',
        kind: 'default',
        isRelative,
        isTypeOnly: declarationTypeOnly,
        declarationIndex,
        span,
      });
    }

    const namespaceImport = declaration.getNamespaceImport();
    if (namespaceImport) {
      bindingCount += 1;
      this.ir.imports.push({
        module,
        name: namespaceImport.getText(),
        importedName: '*',
        kind: 'namespace',
        isRelative,
        isTypeOnly: declarationTypeOnly,
        declarationIndex,
        span,
      });
    }

    for (const specifier of declaration.getNamedImports()) {
      bindingCount += 1;
      const importedName = specifier.getName();
      this.ir.imports.push({
        module,
        name: specifier.getAliasNode()?.getText() ?? importedName,
        importedName,
        kind: 'named',
        isRelative,
        isTypeOnly: declarationTypeOnly || specifier.isTypeOnly(),
        declarationIndex,
        span: spanOf(specifier),
      });
    }

    this.ir.importDeclarations.push({ module, isRelative, bindingCount, span });
  }

  private collectIdentifier(id: Identifier): void {
    const role = classifyIdentifier(id);
    const name = id.getText();
    if (role === 'reference') {
      this.ir.usedNames.add(name);
      if (!this.ir.usedNameLines.has(name)) {
        this.ir.usedNameLines.set(name, lineOf(id));
      }
    } else if (role === 'declaration') {
      this.ir.declaredNames.add(name);
    }
  }

  private collectVariable(declaration: VariableDeclaration): void {
    const nameNode = declaration.getNameNode();
    if (!Node.isIdentifier(nameNode)) return;
    const initializer = declaration.getInitializer();
    if (!initializer) return;

    const list = declaration.getParent();
    const isConst =
      Node.isVariableDeclarationList(list) &&
      list.getDeclarationKind() === VariableDeclarationKind.Const;
    if (isConst) {
      const literal = this.literalOf(initializer);
      if (literal !== undefined) {
        this.constValues.set(nameNode.getText(), literal);
      }
    }

    if (Node.isNewExpression(initializer)) {
      this.ir.constructions.push({
        variable: nameNode.getText(),
        className: initializer.getExpression().getText(),
        span: spanOf(declaration),
      });
    }
  }

  // ── Value resolution ────────────────────────────────────────────────────

  /** Statically known literal value of an expression, or undefined */
  private literalOf(node: Node): TLiteralValue | undefined {
    if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
      return node.getLiteralValue();
    }
    if (Node.isNumericLiteral(node)) return node.getLiteralValue();
    if (Node.isTrueLiteral(node)) return true;
    if (Node.isFalseLiteral(node)) return false;
    if (Node.isNullLiteral(node)) return null;
    if (Node.isPrefixUnaryExpression(node)) {
      const operand = node.getOperand();
      if (Node.isNumericLiteral(operand)) {
        const value = operand.getLiteralValue();
        if (node.getOperatorToken() === SyntaxKind.MinusToken) return -value;
        if (node.getOperatorToken() === SyntaxKind.PlusToken) return value;
      }
      return undefined;
    }
    if (Node.isParenthesizedExpression(node)) return this.literalOf(node.getExpression());
    if (Node.isIdentifier(node)) return this.constValues.get(node.getText());
    return undefined;
  }

  private stringOf(node: Node | undefined): string | undefined {
    if (!node) return undefined;
    const value = this.literalOf(node);
    return typeof value === 'string' ? value : undefined;
  }

  private settingOf(node: Node | undefined): TSettingValue {
    if (!node) return { kind: 'expression', text: '' };
    const value = this.literalOf(node);
    return value === undefined ? { kind: 'expression', text: node.getText() } : { kind: 'literal', value };
  }

  private propertyKey(nameNode: Node): string | undefined {
    if (Node.isIdentifier(nameNode) || Node.isPrivateIdentifier(nameNode)) return nameNode.getText();
    if (Node.isStringLiteral(nameNode) || Node.isNoSubstitutionTemplateLiteral(nameNode)) {
      return nameNode.getLiteralValue();
    }
    if (Node.isNumericLiteral(nameNode)) return String(nameNode.getLiteralValue());
    return undefined;
  }

  private configValueOf(node: Node): TConfigValue {
    const literal = this.literalOf(node);
    if (literal !== undefined) return literal;
    if (Node.isArrayLiteralExpression(node)) {
      return node.getElements().map((element) => this.configValueOf(element));
    }
    if (Node.isObjectLiteralExpression(node)) {
      return this.objectConfigOf(node).config;
    }
    return { kind: 'expression', text: node.getText() };
  }

  private objectConfigOf(node: ObjectLiteralExpression): {
    config: Record<string, TConfigValue>;
    dynamic: boolean;
  } {
    const config: Record<string, TConfigValue> = {};
    let dynamic = false;
    for (const property of node.getProperties()) {
      if (Node.isPropertyAssignment(property)) {
        const key = this.propertyKey(property.getNameNode());
        const initializer = property.getInitializer();
        if (key === undefined) {
          dynamic = true;
        } else if (initializer) {
          config[key] = this.configValueOf(initializer);
        }
      } else if (Node.isShorthandPropertyAssignment(property)) {
        config[property.getName()] = this.configValueOf(property.getNameNode());
      } else if (Node.isSpreadAssignment(property)) {
        dynamic = true;
      } else {
        const key = this.propertyKey(property.getNameNode());
        if (key !== undefined) {
          config[key] = { kind: 'expression', text: property.getText() };
        }
      }
    }
    return { config, dynamic };
  }

  private findProperty(node: ObjectLiteralExpression, name: string): Node | undefined {
    for (const property of node.getProperties()) {
      if (Node.isPropertyAssignment(property) && this.propertyKey(property.getNameNode()) === name) {
        return property.getInitializer() ?? property;
      }
      if (Node.isShorthandPropertyAssignment(property) && property.getName() === name) {
        return property.getNameNode();
      }
    }
    return undefined;
  }

  private hasProperty(node: ObjectLiteralExpression, name: string): boolean {
    return this.findProperty(node, name) !== undefined;
  }

  // ── Builder calls ───────────────────────────────────────────────────────

  private recordMethodCall(call: CallExpression): void {
    const callee = call.getExpression();
    if (!Node.isPropertyAccessExpression(callee)) return;
    this.ir.methodCalls.push({
      receiver: callee.getExpression().getText(),
      method: callee.getName(),
      args: call.getArguments().map((arg) => arg.getText()),
      span: spanOf(call),
    });
  }

  private extractNodeDeclarations(): void {
    const seen = new Set<string>();
    for (const call of this.calls) {
      if (calleeName(call) !== BUILDER_METHODS.ADD_NODE) continue;
      const [classArg, idArg, configArg] = call.getArguments();
      if (!classArg || !idArg) continue;

      let className = this.stringOf(classArg);
      let classRef: 'string' | 'identifier' = 'string';
      if (className === undefined) {
        if (Node.isIdentifier(classArg)) {
          className = classArg.getText();
        } else if (Node.isPropertyAccessExpression(classArg)) {
          className = classArg.getName();
        } else {
          continue;
        }
        classRef = 'identifier';
      }

      const id = this.stringOf(idArg);
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);

      let config: Record<string, TConfigValue> = {};
      let dynamicConfig = false;
      if (configArg && Node.isObjectLiteralExpression(configArg)) {
        ({ config, dynamic: dynamicConfig } = this.objectConfigOf(configArg));
      } else if (configArg) {
        dynamicConfig = true;
      }

      this.ir.nodes.push({ id, className, classRef, config, dynamicConfig, span: spanOf(call) });
    }
  }

  private extractConnectionCalls(): void {
    for (const call of this.calls) {
      if (calleeName(call) !== BUILDER_METHODS.ADD_CONNECTION) continue;
      const args = call.getArguments();
      // Argument count is unknowable through a spread
      if (args.some((arg) => Node.isSpreadElement(arg))) continue;

      const last = args[args.length - 1];
      const options = last && Node.isObjectLiteralExpression(last) ? last : undefined;
      const positional = options ? args.slice(0, -1) : args;
      const hasLegacyCycleFlag = options ? this.hasProperty(options, LEGACY_CYCLE_OPTION) : false;
      const span = spanOf(call);

      const resolved: TConnectionArgument[] = positional.map((arg) => {
        const value = this.stringOf(arg);
        return value === undefined ? { kind: 'dynamic', text: arg.getText() } : { kind: 'string', value };
      });
      this.ir.connectionCalls.push({ args: resolved, hasLegacyCycleFlag, span });

      if (hasLegacyCycleFlag) {
        this.diagnostics.push(
          createDiagnostic(
            'CYC001',
            `Deprecated '${LEGACY_CYCLE_OPTION}' option on addConnection(). Use workflow.createCycle() instead`,
            { line: span.line }
          )
        );
      }

      const count = positional.length;
      if (count === 2) {
        const [source, target] = resolved.map(argumentText);
        this.diagnostics.push(
          createDiagnostic(
            'CON002',
            `Connection uses the deprecated 2-argument form. Use: addConnection('${source}', 'result', '${target}', 'input')`,
            { line: span.line, context: { source, target } }
          )
        );
      } else if (count !== 4) {
        this.diagnostics.push(
          createDiagnostic(
            'CON001',
            `Invalid connection: expected 4 arguments (source, output, target, input), got ${count}`,
            { line: span.line, context: { arg_count: count } }
          )
        );
      }
    }
  }

  // ── Cycles ──────────────────────────────────────────────────────────────

  private extractCycles(): void {
    const chained = new Set<CallExpression>();
    const byVariable = new Map<string, TCycleDefinitionIR>();

    for (const call of this.calls) {
      const method = calleeName(call);
      if (method === BUILDER_METHODS.CREATE_CYCLE) {
        const nameArg = call.getArguments()[0];
        const cycle: TCycleDefinitionIR = {
          name: this.stringOf(nameArg) ?? nameArg?.getText() ?? '<unnamed>',
          edges: [],
          hasBuild: false,
          span: spanOf(call),
        };

        // Follow `createCycle(...).a(...).b(...)` outwards
        let current: CallExpression = call;
        for (;;) {
          const access = current.getParentIfKind(SyntaxKind.PropertyAccessExpression);
          if (!access || access.getExpression() !== current) break;
          const outer = access.getParentIfKind(SyntaxKind.CallExpression);
          if (!outer || outer.getExpression() !== access) break;
          this.applyCycleMethod(cycle, access.getName(), outer);
          chained.add(outer);
          current = outer;
        }

        const declaration = current.getParentIfKind(SyntaxKind.VariableDeclaration);
        if (declaration && declaration.getInitializer() === current) {
          const nameNode = declaration.getNameNode();
          if (Node.isIdentifier(nameNode)) {
            cycle.variable = nameNode.getText();
            byVariable.set(cycle.variable, cycle);
          }
        }

        this.ir.cycles.push(cycle);
      } else if (method !== undefined && isCycleMethod(method) && !chained.has(call)) {
        const root = rootIdentifierOf(call);
        const cycle = root === undefined ? undefined : byVariable.get(root);
        if (cycle) this.applyCycleMethod(cycle, method, call);
      }
    }
  }

  private applyCycleMethod(cycle: TCycleDefinitionIR, method: string, call: CallExpression): void {
    const args = call.getArguments();
    switch (method) {
      case CYCLE_METHODS.CONNECT:
        cycle.edges.push(this.extractCycleEdge(call));
        break;
      case CYCLE_METHODS.MAX_ITERATIONS:
        cycle.maxIterations = this.settingOf(args[0]);
        break;
      case CYCLE_METHODS.CONVERGE_WHEN:
        cycle.convergeWhen = this.settingOf(args[0]);
        break;
      case CYCLE_METHODS.TIMEOUT:
        cycle.timeoutSeconds = this.settingOf(args[0]);
        break;
      case CYCLE_METHODS.BUILD:
        cycle.hasBuild = true;
        break;
      default:
        break;
    }
  }

  private extractCycleEdge(call: CallExpression): TCycleEdgeIR {
    const [sourceArg, targetArg, optionsArg] = call.getArguments();
    const edge: TCycleEdgeIR = {
      sourceNode: this.stringOf(sourceArg),
      targetNode: this.stringOf(targetArg),
      mappingValid: true,
      span: spanOf(call),
    };

    if (!optionsArg || !Node.isObjectLiteralExpression(optionsArg)) return edge;
    const mappingNode = this.findProperty(optionsArg, CYCLE_MAPPING_OPTION);
    if (!mappingNode) return edge;

    if (!Node.isObjectLiteralExpression(mappingNode)) {
      edge.mappingValid = false;
      return edge;
    }

    const mapping: Record<string, string> = {};
    for (const property of mappingNode.getProperties()) {
      if (!Node.isPropertyAssignment(property)) {
        edge.mappingValid = false;
        return edge;
      }
      const key = this.propertyKey(property.getNameNode());
      const value = this.stringOf(property.getInitializer());
      if (key === undefined || value === undefined) {
        edge.mappingValid = false;
        return edge;
      }
      mapping[key] = value;
    }
    edge.mapping = mapping;
    return edge;
  }

  // ── Node classes ────────────────────────────────────────────────────────

  private extractClass(declaration: ClassDeclaration): TNodeClassIR | undefined {
    const name = declaration.getName();
    if (!name) return undefined;

    const heritage = declaration.getExtends();
    const extendsText = heritage?.getExpression().getText();
    const extendsName = extendsText === undefined ? undefined : extendsText.split('.').pop();

    const parameterMethod =
      declaration.getMethod(NODE_CLASS_METHODS.PARAMETERS) ??
      declaration.getStaticMethod(NODE_CLASS_METHODS.PARAMETERS);

    let runMethod: MethodDeclaration | undefined;
    for (const candidate of NODE_CLASS_METHODS.RUN) {
      runMethod = declaration.getMethod(candidate);
      if (runMethod) break;
    }

    return {
      name,
      ...(extendsName !== undefined && { extendsName }),
      hasParameterMethod: parameterMethod !== undefined,
      parameters: parameterMethod ? this.extractParameterDeclarations(parameterMethod) : [],
      ...(runMethod && { runMethodName: runMethod.getName() }),
      usedParameters: runMethod ? this.extractParameterUsages(runMethod) : [],
      span: spanOf(declaration),
    };
  }

  private extractParameterDeclarations(method: MethodDeclaration): TParameterDeclarationIR[] {
    const declarations: TParameterDeclarationIR[] = [];

    const visit = (node: Node): void => {
      if (Node.isObjectLiteralExpression(node) && this.hasProperty(node, 'name')) {
        declarations.push(this.parameterFromObject(node));
        return;
      }
      if (Node.isNewExpression(node) && node.getExpression().getText() === NODE_PARAMETER_CLASS) {
        const args = node.getArguments();
        const first = args[0];
        if (first && !Node.isObjectLiteralExpression(first)) {
          declarations.push(this.parameterFromPositional(node, args));
          return;
        }
      }
      node.forEachChild(visit);
    };

    const body = method.getBody();
    if (body) visit(body);
    return declarations;
  }

  private parameterFromObject(node: ObjectLiteralExpression): TParameterDeclarationIR {
    const nameNode = this.findProperty(node, 'name');
    const typeNode = this.findProperty(node, 'type');
    const requiredNode = this.findProperty(node, 'required');
    const defaultNode = this.findProperty(node, 'default');
    const name = this.stringOf(nameNode);
    const type = typeNode === undefined ? undefined : this.stringOf(typeNode) ?? typeNode.getText();

    return {
      ...(name !== undefined && { name }),
      ...(type !== undefined && { type }),
      required: requiredNode !== undefined && this.literalOf(requiredNode) === true,
      ...(defaultNode !== undefined && { default: this.configValueOf(defaultNode) }),
      span: spanOf(node),
    };
  }

  private parameterFromPositional(node: Node, args: Node[]): TParameterDeclarationIR {
    const [nameArg, typeArg, requiredArg, defaultArg] = args;
    const name = this.stringOf(nameArg);
    const type = typeArg === undefined ? undefined : this.stringOf(typeArg) ?? typeArg.getText();

    return {
      ...(name !== undefined && { name }),
      ...(type !== undefined && { type }),
      required: requiredArg !== undefined && this.literalOf(requiredArg) === true,
      ...(defaultArg !== undefined && { default: this.configValueOf(defaultArg) }),
      span: spanOf(node),
    };
  }

  /**
   * Parameter keys read inside the run method: `p.key`, `p['key']`,
   * `p.get('key')`, `const { key } = p`, or a destructured first parameter.
   */
  private extractParameterUsages(method: MethodDeclaration): TParameterUsageIR[] {
    const usages: TParameterUsageIR[] = [];
    const first = method.getParameters()[0];
    if (!first) return usages;

    const nameNode = first.getNameNode();
    if (Node.isObjectBindingPattern(nameNode)) {
      for (const element of nameNode.getElements()) {
        if (element.getDotDotDotToken()) continue;
        const keyNode = element.getPropertyNameNode() ?? element.getNameNode();
        const key = this.propertyKey(keyNode);
        if (key !== undefined) usages.push({ name: key, span: spanOf(element) });
      }
      return usages;
    }
    if (!Node.isIdentifier(nameNode)) return usages;

    const paramsName = nameNode.getText();
    const isParams = (node: Node): boolean => Node.isIdentifier(node) && node.getText() === paramsName;

    const body = method.getBody();
    body?.forEachDescendant((node) => {
      if (Node.isPropertyAccessExpression(node) && isParams(node.getExpression())) {
        const parent = node.getParent();
        const isCallee = parent !== undefined && Node.isCallExpression(parent) && parent.getExpression() === node;
        if (!isCallee) {
          usages.push({ name: node.getName(), span: spanOf(node) });
        } else if (node.getName() === 'get' && Node.isCallExpression(parent)) {
          const key = this.stringOf(parent.getArguments()[0]);
          if (key !== undefined) usages.push({ name: key, span: spanOf(parent) });
        }
      } else if (Node.isElementAccessExpression(node) && isParams(node.getExpression())) {
        const key = this.stringOf(node.getArgumentExpression());
        if (key !== undefined) usages.push({ name: key, span: spanOf(node) });
      } else if (Node.isVariableDeclaration(node)) {
        const pattern = node.getNameNode();
        const initializer = node.getInitializer();
        if (Node.isObjectBindingPattern(pattern) && initializer && isParams(initializer)) {
          for (const element of pattern.getElements()) {
            if (element.getDotDotDotToken()) continue;
            const keyNode = element.getPropertyNameNode() ?? element.getNameNode();
            const key = this.propertyKey(keyNode);
            if (key !== undefined) usages.push({ name: key, span: spanOf(element) });
          }
        }
      }
    });
    return usages;
  }
}

function argumentText(arg: TConnectionArgument): string {
  return arg.kind === 'string' ? arg.value : arg.text;
}

/**
 * Extract the workflow IR from a parsed source file. Throws
 * `DeadlineExceededError` or `NestingDepthError` when a guard trips.
 */
export function extractWorkflow(sourceFile: SourceFile, options: TExtractOptions = {}): TExtractionResult {
  return new WorkflowExtractor(sourceFile, options).extract();
}
