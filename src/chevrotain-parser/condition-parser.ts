/**
 * @module chevrotain-parser/condition-parser
 *
 * Parser for cycle convergence conditions using Chevrotain.
 *
 * Syntax:
 *   quality > 0.95 && iterations < 100
 *   not converged or abs(delta) <= tolerance
 *
 * Logical operators (`&&`, `||`, `!`, `and`, `or`, `not`), comparisons,
 * arithmetic, dotted paths and function calls. The whole input must parse.
 */

import { CstParser, type CstElement, type CstNode, type IToken } from 'chevrotain';
import {
  ConditionLexer,
  conditionTokens,
  AndKeyword,
  AndSymbol,
  Bang,
  Comma,
  Dot,
  Equals,
  FalseKeyword,
  Greater,
  GreaterOrEqual,
  Identifier,
  LParen,
  Less,
  LessOrEqual,
  Minus,
  NotEquals,
  NotKeyword,
  NullKeyword,
  NumberLiteral,
  OrKeyword,
  OrSymbol,
  Percent,
  Plus,
  RParen,
  Slash,
  Star,
  StrictEquals,
  StrictNotEquals,
  StringLiteral,
  TrueKeyword,
} from './condition-tokens';

// =============================================================================
// Parser Result Types
// =============================================================================

export type TConditionCheck =
  | {
      valid: true;
      /** Dotted paths the condition reads, in order of first use */
      variables: string[];
    }
  | {
      valid: false;
      error: string;
    };

// =============================================================================
// Parser Definition
// =============================================================================

class ConditionParser extends CstParser {
  constructor() {
    super(conditionTokens, { nodeLocationTracking: 'onlyOffset' });
    this.performSelfAnalysis();
  }

  // Entry rule: andExpression (('||' | 'or') andExpression)*
  public orExpression: () => CstNode = this.RULE('orExpression', () => {
    this.SUBRULE(this.andExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.OR([{ ALT: () => this.CONSUME(OrSymbol) }, { ALT: () => this.CONSUME(OrKeyword) }]);
      this.SUBRULE2(this.andExpression, { LABEL: 'rhs' });
    });
  });

  // andExpression: notExpression (('&&' | 'and') notExpression)*
  public andExpression: () => CstNode = this.RULE('andExpression', () => {
    this.SUBRULE(this.notExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.OR([{ ALT: () => this.CONSUME(AndSymbol) }, { ALT: () => this.CONSUME(AndKeyword) }]);
      this.SUBRULE2(this.notExpression, { LABEL: 'rhs' });
    });
  });

  // notExpression: ('!' | 'not') notExpression | comparison
  public notExpression: () => CstNode = this.RULE('notExpression', () => {
    this.OR([
      {
        ALT: () => {
          this.OR2([{ ALT: () => this.CONSUME(Bang) }, { ALT: () => this.CONSUME(NotKeyword) }]);
          this.SUBRULE(this.notExpression);
        },
      },
      { ALT: () => this.SUBRULE(this.comparison) },
    ]);
  });

  // comparison: additive (compareOp additive)?
  public comparison: () => CstNode = this.RULE('comparison', () => {
    this.SUBRULE(this.additive, { LABEL: 'lhs' });
    this.OPTION(() => {
      this.OR([
        { ALT: () => this.CONSUME(StrictEquals) },
        { ALT: () => this.CONSUME(StrictNotEquals) },
        { ALT: () => this.CONSUME(Equals) },
        { ALT: () => this.CONSUME(NotEquals) },
        { ALT: () => this.CONSUME(LessOrEqual) },
        { ALT: () => this.CONSUME(GreaterOrEqual) },
        { ALT: () => this.CONSUME(Less) },
        { ALT: () => this.CONSUME(Greater) },
      ]);
      this.SUBRULE2(this.additive, { LABEL: 'rhs' });
    });
  });

  // additive: multiplicative (('+' | '-') multiplicative)*
  public additive: () => CstNode = this.RULE('additive', () => {
    this.SUBRULE(this.multiplicative, { LABEL: 'lhs' });
    this.MANY(() => {
      this.OR([{ ALT: () => this.CONSUME(Plus) }, { ALT: () => this.CONSUME(Minus) }]);
      this.SUBRULE2(this.multiplicative, { LABEL: 'rhs' });
    });
  });

  // multiplicative: unary (('*' | '/' | '%') unary)*
  public multiplicative: () => CstNode = this.RULE('multiplicative', () => {
    this.SUBRULE(this.unary, { LABEL: 'lhs' });
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Star) },
        { ALT: () => this.CONSUME(Slash) },
        { ALT: () => this.CONSUME(Percent) },
      ]);
      this.SUBRULE2(this.unary, { LABEL: 'rhs' });
    });
  });

  // unary: '-' unary | primary
  public unary: () => CstNode = this.RULE('unary', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Minus);
          this.SUBRULE(this.unary);
        },
      },
      { ALT: () => this.SUBRULE(this.primary) },
    ]);
  });

  // primary: literal | path call? | '(' orExpression ')'
  public primary: () => CstNode = this.RULE('primary', () => {
    this.OR([
      { ALT: () => this.CONSUME(NumberLiteral) },
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.CONSUME(TrueKeyword) },
      { ALT: () => this.CONSUME(FalseKeyword) },
      { ALT: () => this.CONSUME(NullKeyword) },
      {
        ALT: () => {
          this.SUBRULE(this.path);
          this.OPTION(() => this.SUBRULE(this.callArguments));
        },
      },
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.orExpression);
          this.CONSUME(RParen);
        },
      },
    ]);
  });

  // path: Identifier ('.' Identifier)*
  public path: () => CstNode = this.RULE('path', () => {
    this.CONSUME(Identifier, { LABEL: 'segment' });
    this.MANY(() => {
      this.CONSUME(Dot);
      this.CONSUME2(Identifier, { LABEL: 'segment' });
    });
  });

  // callArguments: '(' (orExpression (',' orExpression)*)? ')'
  public callArguments: () => CstNode = this.RULE('callArguments', () => {
    this.CONSUME(LParen);
    this.MANY_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.orExpression),
    });
    this.CONSUME(RParen);
  });
}

// =============================================================================
// Parser Instance (singleton)
// =============================================================================

const parserInstance = new ConditionParser();

// =============================================================================
// CST Walk
// =============================================================================

function isCstNode(element: CstElement): element is CstNode {
  return 'children' in element;
}

/** Dotted paths in reading order; called paths (functions) are left out */
function collectVariables(node: CstNode, into: string[]): void {
  if (node.name === 'path') {
    const segments: IToken[] = [];
    for (const element of node.children.segment ?? []) {
      if (!isCstNode(element)) segments.push(element);
    }
    const name = segments.map((token) => token.image).join('.');
    if (name && !into.includes(name)) into.push(name);
    return;
  }

  const elements = Object.values(node.children)
    .flat()
    .filter(isCstNode)
    .sort((a, b) => (a.location?.startOffset ?? 0) - (b.location?.startOffset ?? 0));

  for (const child of elements) {
    if (child.name === 'primary' && child.children.callArguments) {
      // Function name is not a variable; its arguments may hold some
      for (const argumentNode of child.children.callArguments.filter(isCstNode)) {
        collectVariables(argumentNode, into);
      }
      continue;
    }
    collectVariables(child, into);
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Check a convergence condition against the expression grammar.
 */
export function validateConditionSyntax(input: string): TConditionCheck {
  if (input.trim().length === 0) {
    return { valid: false, error: 'condition is empty' };
  }

  const lexResult = ConditionLexer.tokenize(input);
  if (lexResult.errors.length > 0) {
    const firstError = lexResult.errors[0];
    return {
      valid: false,
      error: `unexpected character at offset ${firstError.offset}: ${firstError.message}`,
    };
  }

  parserInstance.input = lexResult.tokens;
  const cst = parserInstance.orExpression();

  if (parserInstance.errors.length > 0) {
    return { valid: false, error: parserInstance.errors[0].message };
  }

  const variables: string[] = [];
  collectVariables(cst, variables);
  return { valid: true, variables };
}
