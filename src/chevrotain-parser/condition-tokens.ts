/**
 * @module chevrotain-parser/condition-tokens
 *
 * Token definitions for cycle convergence conditions, the boolean expressions
 * passed to `convergeWhen()`.
 */

import { createToken, Lexer } from 'chevrotain';

// =============================================================================
// Whitespace
// =============================================================================

export const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /\s+/,
  group: Lexer.SKIPPED,
});

// =============================================================================
// Identifiers & Keywords
// =============================================================================

export const Identifier = createToken({
  name: 'Identifier',
  pattern: /[A-Za-z_$][\w$]*/,
});

export const TrueKeyword = createToken({
  name: 'TrueKeyword',
  pattern: /true/,
  longer_alt: Identifier,
});

export const FalseKeyword = createToken({
  name: 'FalseKeyword',
  pattern: /false/,
  longer_alt: Identifier,
});

export const NullKeyword = createToken({
  name: 'NullKeyword',
  pattern: /null/,
  longer_alt: Identifier,
});

export const AndKeyword = createToken({
  name: 'AndKeyword',
  pattern: /and/,
  longer_alt: Identifier,
});

export const OrKeyword = createToken({
  name: 'OrKeyword',
  pattern: /or/,
  longer_alt: Identifier,
});

export const NotKeyword = createToken({
  name: 'NotKeyword',
  pattern: /not/,
  longer_alt: Identifier,
});

// =============================================================================
// Literals
// =============================================================================

export const NumberLiteral = createToken({
  name: 'NumberLiteral',
  pattern: /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/,
});

export const StringLiteral = createToken({
  name: 'StringLiteral',
  pattern: /'(?:[^'\\\n]|\\.)*'|"(?:[^"\\\n]|\\.)*"/,
});

// =============================================================================
// Operators (longest first)
// =============================================================================

export const StrictEquals = createToken({ name: 'StrictEquals', pattern: /===/ });
export const StrictNotEquals = createToken({ name: 'StrictNotEquals', pattern: /!==/ });
export const Equals = createToken({ name: 'Equals', pattern: /==/ });
export const NotEquals = createToken({ name: 'NotEquals', pattern: /!=/ });
export const LessOrEqual = createToken({ name: 'LessOrEqual', pattern: /<=/ });
export const GreaterOrEqual = createToken({ name: 'GreaterOrEqual', pattern: />=/ });
export const Less = createToken({ name: 'Less', pattern: /</ });
export const Greater = createToken({ name: 'Greater', pattern: />/ });
export const AndSymbol = createToken({ name: 'AndSymbol', pattern: /&&/ });
export const OrSymbol = createToken({ name: 'OrSymbol', pattern: /\|\|/ });
export const Bang = createToken({ name: 'Bang', pattern: /!/ });
export const Plus = createToken({ name: 'Plus', pattern: /\+/ });
export const Minus = createToken({ name: 'Minus', pattern: /-/ });
export const Star = createToken({ name: 'Star', pattern: /\*/ });
export const Slash = createToken({ name: 'Slash', pattern: /\// });
export const Percent = createToken({ name: 'Percent', pattern: /%/ });

// =============================================================================
// Punctuation
// =============================================================================

export const LParen = createToken({ name: 'LParen', pattern: /\(/ });
export const RParen = createToken({ name: 'RParen', pattern: /\)/ });
export const Comma = createToken({ name: 'Comma', pattern: /,/ });
export const Dot = createToken({ name: 'Dot', pattern: /\./ });

// =============================================================================
// Token Order (keywords before Identifier, longer operators first)
// =============================================================================

export const conditionTokens = [
  WhiteSpace,
  TrueKeyword,
  FalseKeyword,
  NullKeyword,
  AndKeyword,
  OrKeyword,
  NotKeyword,
  Identifier,
  NumberLiteral,
  StringLiteral,
  StrictEquals,
  StrictNotEquals,
  Equals,
  NotEquals,
  LessOrEqual,
  GreaterOrEqual,
  Less,
  Greater,
  AndSymbol,
  OrSymbol,
  Bang,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  LParen,
  RParen,
  Comma,
  Dot,
];

export const ConditionLexer = new Lexer(conditionTokens);
