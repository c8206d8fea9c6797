import * as ts from 'typescript';
import type { SourceLocation } from '../errors';
import type { LiteralValue } from '../types/ir';

/**
 * A workflow script parsed once and shared by every pipeline stage
 */
export interface ParsedScript {
  /** File name used in diagnostics */
  fileName: string;
  text: string;
  sourceFile: ts.SourceFile;
  checker: ts.TypeChecker;
}

const VIRTUAL_FILE = '/__stagecraft__/workflow.ts';

/**
 * Parse a workflow script and bind its symbols. Imports are not resolved and no lib is
 * loaded: only local scopes are needed to tell references apart.
 */
export function parseScript(text: string, fileName: string = 'workflow.ts'): ParsedScript {
  const options: ts.CompilerOptions = {
    noLib: true,
    noResolve: true,
    types: [],
    target: ts.ScriptTarget.ES2020,
  };
  const sourceFile = ts.createSourceFile(
    VIRTUAL_FILE,
    text,
    ts.ScriptTarget.ES2020,
    true,
    ts.ScriptKind.TS
  );

  const host = ts.createCompilerHost(options, true);
  host.getSourceFile = name => (name === VIRTUAL_FILE ? sourceFile : undefined);
  host.fileExists = name => name === VIRTUAL_FILE;
  host.readFile = name => (name === VIRTUAL_FILE ? text : undefined);
  host.writeFile = () => undefined;

  const program = ts.createProgram({ rootNames: [VIRTUAL_FILE], options, host });
  return { fileName, text, sourceFile, checker: program.getTypeChecker() };
}

export function locationOf(script: ParsedScript, node: ts.Node): SourceLocation {
  const { line, character } = script.sourceFile.getLineAndCharacterOfPosition(
    node.getStart(script.sourceFile)
  );
  return { file: script.fileName, line: line + 1, column: character + 1 };
}

/**
 * `addAlpha` -> `add-alpha`, `input_val` -> `input-val`, `splitCSVRows` -> `split-csv-rows`
 */
export function toKebabCase(identifier: string): string {
  return identifier
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1-$2')
    .replace(/[^A-Za-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .toLowerCase();
}

export function unwrapParentheses(expression: ts.Expression): ts.Expression {
  let current = expression;
  while (ts.isParenthesizedExpression(current)) {
    current = current.expression;
  }
  return current;
}

/**
 * Constant value of a literal expression, or undefined when it is not a literal
 */
export function readLiteral(expression: ts.Expression): LiteralValue | undefined {
  const node = unwrapParentheses(expression);
  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
    return node.text;
  }
  if (ts.isNumericLiteral(node)) {
    return Number(node.text);
  }
  if (
    ts.isPrefixUnaryExpression(node) &&
    node.operator === ts.SyntaxKind.MinusToken &&
    ts.isNumericLiteral(node.operand)
  ) {
    return -Number(node.operand.text);
  }
  if (node.kind === ts.SyntaxKind.TrueKeyword) return true;
  if (node.kind === ts.SyntaxKind.FalseKeyword) return false;
  return undefined;
}

/**
 * Key of `obj['key']` or `obj.key`, when it is written as a literal
 */
export function readAccessKey(
  node: ts.ElementAccessExpression | ts.PropertyAccessExpression
): string | undefined {
  if (ts.isPropertyAccessExpression(node)) {
    return ts.isIdentifier(node.name) ? node.name.text : undefined;
  }
  const arg = unwrapParentheses(node.argumentExpression);
  if (ts.isStringLiteral(arg) || ts.isNoSubstitutionTemplateLiteral(arg)) {
    return arg.text;
  }
  return undefined;
}

export function propertyNameText(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  if (ts.isNoSubstitutionTemplateLiteral(name)) {
    return name.text;
  }
  return undefined;
}

/**
 * JSDoc tag of the given name on a declaration, with its comment text
 */
export function findJSDocTag(
  node: ts.Node,
  tagName: string
): { tag: ts.JSDocTag; comment: string } | undefined {
  for (const tag of ts.getJSDocTags(node)) {
    if (tag.tagName.text === tagName) {
      return { tag, comment: ts.getTextOfJSDocComment(tag.comment) ?? '' };
    }
  }
  return undefined;
}

/**
 * Callee name of a plain `name(...)` or `new Name(...)` expression
 */
export function calleeName(node: ts.Expression): string | undefined {
  const unwrapped = unwrapParentheses(node);
  if (ts.isCallExpression(unwrapped) || ts.isNewExpression(unwrapped)) {
    return ts.isIdentifier(unwrapped.expression) ? unwrapped.expression.text : undefined;
  }
  return undefined;
}

/**
 * Symbol an identifier refers to; a shorthand property (`{ name }`) resolves to the variable
 * it copies rather than to the property it creates
 */
export function symbolOfReference(script: ParsedScript, id: ts.Identifier): ts.Symbol | undefined {
  if (ts.isShorthandPropertyAssignment(id.parent) && id.parent.name === id) {
    return script.checker.getShorthandAssignmentValueSymbol(id.parent);
  }
  return script.checker.getSymbolAtLocation(id);
}

/**
 * Call `visit` for every identifier below `root`, in source order
 */
export function forEachIdentifier(root: ts.Node, visit: (id: ts.Identifier) => void): void {
  const walk = (node: ts.Node): void => {
    if (ts.isIdentifier(node)) {
      visit(node);
      return;
    }
    ts.forEachChild(node, walk);
  };
  walk(root);
}
