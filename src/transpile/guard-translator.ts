import * as ts from 'typescript';
import { UnsupportedExpressionError } from '../errors';
import type { ComparisonOperator, GuardExpr, GuardOperand } from '../types/ir';
import { renderPart } from './placeholders';
import { ParsedScript, locationOf, readLiteral, unwrapParentheses } from './source';
import type { ValueResolver } from './value-resolver';

const COMPARISONS = new Map<ts.SyntaxKind, ComparisonOperator>([
  [ts.SyntaxKind.EqualsEqualsEqualsToken, '=='],
  [ts.SyntaxKind.EqualsEqualsToken, '=='],
  [ts.SyntaxKind.ExclamationEqualsEqualsToken, '!='],
  [ts.SyntaxKind.ExclamationEqualsToken, '!='],
  [ts.SyntaxKind.LessThanToken, '<'],
  [ts.SyntaxKind.LessThanEqualsToken, '<='],
  [ts.SyntaxKind.GreaterThanToken, '>'],
  [ts.SyntaxKind.GreaterThanEqualsToken, '>='],
]);

const STRICT = new Set([
  ts.SyntaxKind.EqualsEqualsEqualsToken,
  ts.SyntaxKind.ExclamationEqualsEqualsToken,
]);

const RELATIONAL = new Set<ComparisonOperator>(['<', '<=', '>', '>=']);

/**
 * Translates `if` conditions of the entry function into guard expressions
 */
export class GuardTranslator {
  constructor(
    private readonly script: ParsedScript,
    private readonly resolver: ValueResolver
  ) {}

  translate(expression: ts.Expression): GuardExpr {
    const node = unwrapParentheses(expression);

    if (ts.isBinaryExpression(node)) {
      const operator = node.operatorToken.kind;
      if (operator === ts.SyntaxKind.AmpersandAmpersandToken) {
        return { kind: 'and', left: this.translate(node.left), right: this.translate(node.right) };
      }
      if (operator === ts.SyntaxKind.BarBarToken) {
        return { kind: 'or', left: this.translate(node.left), right: this.translate(node.right) };
      }
      const comparison = COMPARISONS.get(operator);
      if (comparison) {
        return this.compare(node, comparison, STRICT.has(operator));
      }
      throw this.unsupported(
        node,
        `operator '${node.operatorToken.getText(this.script.sourceFile)}'`
      );
    }

    if (ts.isPrefixUnaryExpression(node) && node.operator === ts.SyntaxKind.ExclamationToken) {
      return { kind: 'not', operand: this.translate(node.operand) };
    }

    if (readLiteral(node) !== undefined) {
      throw this.unsupported(node, 'constant condition');
    }

    return { kind: 'truthy', operand: this.operand(node) };
  }

  private compare(
    node: ts.BinaryExpression,
    operator: ComparisonOperator,
    strict: boolean
  ): GuardExpr {
    const left = this.operand(node.left);
    const right = this.operand(node.right);

    if (left.kind === 'literal' && right.kind === 'literal') {
      throw this.unsupported(node, 'comparison of two constants');
    }

    const literalTypes = [left, right].flatMap(operand =>
      operand.kind === 'literal' ? [typeof operand.value] : []
    );
    const references = [left, right].filter(
      (operand): operand is Extract<GuardOperand, { kind: 'reference' }> =>
        operand.kind === 'reference'
    );
    const referenceTypes = references.map(reference => reference.type);
    const countIndex = references.some(reference => reference.part.kind === 'loop-item');
    const hasBoolean = literalTypes.includes('boolean') || referenceTypes.includes('boolean');

    if (RELATIONAL.has(operator) && literalTypes.includes('string')) {
      throw this.unsupported(node, 'ordering comparison with a string literal');
    }
    if (RELATIONAL.has(operator) && hasBoolean) {
      throw this.unsupported(node, 'ordering comparison of a boolean');
    }
    if (countIndex && (literalTypes.includes('string') || references.length > 1)) {
      throw this.unsupported(node, 'a loop index can only be compared with a number literal');
    }
    if (hasBoolean && [...literalTypes, ...referenceTypes].some(type => type !== 'boolean')) {
      throw this.unsupported(node, 'a boolean can only be compared with a boolean');
    }
    if (references.length > 1 && referenceTypes[0] !== referenceTypes[1]) {
      throw this.unsupported(node, 'comparison of values of different types');
    }
    if (strict && literalTypes.includes('number') && referenceTypes.includes('string')) {
      throw this.unsupported(
        node,
        'strict comparison of a string value with a number; use == or != instead'
      );
    }
    if (strict && literalTypes.includes('string') && referenceTypes.includes('number')) {
      throw this.unsupported(
        node,
        'strict comparison of a number value with a string; use == or != instead'
      );
    }

    return { kind: 'compare', operator, left, right };
  }

  private operand(expression: ts.Expression): GuardOperand {
    const node = unwrapParentheses(expression);
    const literal = readLiteral(node);

    if (typeof literal === 'string' && literal.includes("'")) {
      throw this.unsupported(node, 'string literal containing a single quote');
    }
    if (literal !== undefined) {
      return { kind: 'literal', value: literal };
    }

    const { part, type } = this.resolver.resolveGuardReference(node);
    return { kind: 'reference', part, type };
  }

  private unsupported(node: ts.Node, what: string): UnsupportedExpressionError {
    return new UnsupportedExpressionError(
      `Unsupported condition: ${what} in '${node.getText(this.script.sourceFile)}'`,
      locationOf(this.script, node)
    );
  }
}

/**
 * Conjunction of the given guards, left to right; undefined when there are none
 */
export function conjoin(...guards: Array<GuardExpr | undefined>): GuardExpr | undefined {
  let result: GuardExpr | undefined;
  for (const guard of guards) {
    if (!guard) continue;
    result = result ? { kind: 'and', left: result, right: guard } : guard;
  }
  return result;
}

export function negate(guard: GuardExpr): GuardExpr {
  return { kind: 'not', operand: guard };
}

/**
 * Argo `when` text of a guard
 */
export function renderGuard(guard: GuardExpr): string {
  switch (guard.kind) {
    case 'compare': {
      const numeric = comparesNumbers(guard.left, guard.right);
      return `${renderOperand(guard.left, numeric)} ${guard.operator} ${renderOperand(guard.right, numeric)}`;
    }
    case 'truthy':
      return renderTruthy(guard.operand);
    case 'not':
      return `!(${renderGuard(guard.operand)})`;
    case 'and':
    case 'or': {
      const symbol = guard.kind === 'and' ? '&&' : '||';
      return `${renderJunctionChild(guard.left, guard.kind)} ${symbol} ${renderJunctionChild(guard.right, guard.kind)}`;
    }
  }
}

function renderJunctionChild(child: GuardExpr, parent: 'and' | 'or'): string {
  const text = renderGuard(child);
  return (child.kind === 'and' || child.kind === 'or') && child.kind !== parent
    ? `(${text})`
    : text;
}

/**
 * Argo passes every value as text: numbers are compared bare, booleans by their spelling
 */
function renderTruthy(operand: GuardOperand): string {
  if (operand.kind === 'literal') {
    throw new Error('Constant conditions have no guard rendering');
  }
  switch (operand.type) {
    case 'number':
      return `${renderOperand(operand, true)} != 0`;
    case 'boolean':
      return `${renderOperand(operand, false)} == 'true'`;
    case 'string':
      return `${renderOperand(operand, false)} != ''`;
  }
}

function comparesNumbers(left: GuardOperand, right: GuardOperand): boolean {
  const operands = [left, right];
  if (operands.some(operand => operand.kind === 'literal' && typeof operand.value === 'number')) {
    return true;
  }
  return operands.every(operand =>
    operand.kind === 'reference' ? operand.type === 'number' : false
  );
}

function renderOperand(operand: GuardOperand, numeric: boolean): string {
  if (operand.kind === 'literal') {
    return typeof operand.value === 'number' ? String(operand.value) : `'${String(operand.value)}'`;
  }
  const placeholder = renderPart(operand.part);
  return numeric ? placeholder : `'${placeholder}'`;
}

/**
 * Step ids a guard reads from
 */
export function guardProducers(guard: GuardExpr | undefined): string[] {
  const ids: string[] = [];
  const visitOperand = (operand: GuardOperand): void => {
    if (
      operand.kind === 'reference' &&
      operand.part.kind === 'step-output' &&
      !ids.includes(operand.part.stepId)
    ) {
      ids.push(operand.part.stepId);
    }
  };
  const visit = (expr: GuardExpr): void => {
    switch (expr.kind) {
      case 'compare':
        visitOperand(expr.left);
        visitOperand(expr.right);
        return;
      case 'truthy':
        visitOperand(expr.operand);
        return;
      case 'not':
        visit(expr.operand);
        return;
      case 'and':
      case 'or':
        visit(expr.left);
        visit(expr.right);
        return;
    }
  };
  if (guard) visit(guard);
  return ids;
}
