/**
 * Parameter and signature extraction for traced callables.
 *
 * Works on TypeScript compiler nodes (through ts-morph's bundled compiler)
 * so the same code serves the source instrumenter and the explicit
 * `trace()` API, which re-parses `fn.toString()`.
 */

import { ts } from 'ts-morph';

export type LiteralValue = string | number | boolean | null;

export interface ParamSpec {
  name: string;
  rest?: boolean;
  /** Source text of the default initializer */
  default?: string;
  /** Value of the default initializer, when it is a literal */
  defaultValue?: LiteralValue;
}

export interface SignatureInfo {
  signature: string;
  params: ParamSpec[];
  annotations: Record<string, string> | null;
  defaults: Record<string, string> | null;
  isAsync: boolean;
}

/**
 * Member lookup key for class members: `name` for prototype
 * methods, `static name` for static ones.
 */
export function memberKey(name: string, isStatic: boolean): string {
  return isStatic ? `static ${name}` : name;
}

function squash(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  return ts.canHaveModifiers(node) && (ts.getModifiers(node) ?? []).some((m) => m.kind === kind);
}

function numericValue(node: ts.NumericLiteral): number {
  return Number(node.text.replace(/_/g, ''));
}

/**
 * Value of an initializer that needs no evaluation: numbers (optionally
 * negated), strings, templates without substitutions, booleans and null.
 */
function literalValue(node: ts.Expression): LiteralValue | undefined {
  if (ts.isParenthesizedExpression(node)) {
    return literalValue(node.expression);
  }
  if (ts.isNumericLiteral(node)) {
    return numericValue(node);
  }
  if (
    ts.isPrefixUnaryExpression(node) &&
    node.operator === ts.SyntaxKind.MinusToken &&
    ts.isNumericLiteral(node.operand)
  ) {
    return -numericValue(node.operand);
  }
  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
    return node.text;
  }
  switch (node.kind) {
    case ts.SyntaxKind.TrueKeyword:
      return true;
    case ts.SyntaxKind.FalseKeyword:
      return false;
    case ts.SyntaxKind.NullKeyword:
      return null;
    default:
      return undefined;
  }
}

export function describeSignature(node: ts.SignatureDeclaration, sf: ts.SourceFile): SignatureInfo {
  const params: ParamSpec[] = [];
  const annotations: Record<string, string> = {};
  const defaults: Record<string, string> = {};
  const texts: string[] = [];

  for (const p of node.parameters) {
    const name = ts.isIdentifier(p.name) ? p.name.text : squash(p.name.getText(sf));
    if (name === 'this') {
      continue;
    }
    texts.push(squash(p.getText(sf)));
    const spec: ParamSpec = { name };
    if (p.dotDotDotToken) {
      spec.rest = true;
    }
    if (p.initializer) {
      spec.default = squash(p.initializer.getText(sf));
      defaults[name] = spec.default;
      const value = literalValue(p.initializer);
      if (value !== undefined) {
        spec.defaultValue = value;
      }
    }
    if (p.type) {
      annotations[name] = squash(p.type.getText(sf));
    }
    params.push(spec);
  }

  let signature = `(${texts.join(', ')})`;
  if (node.type) {
    annotations.return = squash(node.type.getText(sf));
    signature += `: ${annotations.return}`;
  }

  return {
    signature,
    params,
    annotations: Object.keys(annotations).length > 0 ? annotations : null,
    defaults: Object.keys(defaults).length > 0 ? defaults : null,
    isAsync: hasModifier(node, ts.SyntaxKind.AsyncKeyword),
  };
}

function unwrapExpression(sf: ts.SourceFile): ts.Expression | null {
  const statement = sf.statements.length === 1 ? sf.statements[0] : undefined;
  if (!statement || !ts.isExpressionStatement(statement)) {
    return null;
  }
  const expr = statement.expression;
  return ts.isParenthesizedExpression(expr) ? expr.expression : null;
}

// Function expressions and arrows parse as an expression, method
// shorthand (what `toString()` gives for class members) as an object member.
const PARSERS: Array<{ wrap: (source: string) => string; pick: (expr: ts.Expression) => ts.SignatureDeclaration | null }> = [
  {
    wrap: (s) => `(${s})`,
    pick: (expr) => (ts.isFunctionExpression(expr) || ts.isArrowFunction(expr) ? expr : null),
  },
  {
    wrap: (s) => `({${s}})`,
    pick: (expr) => {
      if (!ts.isObjectLiteralExpression(expr) || expr.properties.length !== 1) {
        return null;
      }
      const member = expr.properties[0];
      return ts.isMethodDeclaration(member) ? member : null;
    },
  },
];

/**
 * Describe a function from its source text, as returned by
 * `Function.prototype.toString`. Returns null for text that does not parse
 * as a single function (native code, classes).
 */
export function describeFunctionSource(source: string): SignatureInfo | null {
  for (const { wrap, pick } of PARSERS) {
    const sf = ts.createSourceFile('fn.ts', wrap(source), ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
    const expr = unwrapExpression(sf);
    const fn = expr ? pick(expr) : null;
    if (fn) {
      return describeSignature(fn, sf);
    }
  }
  return null;
}
