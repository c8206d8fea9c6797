import * as ts from 'typescript';
import { SignatureError, UnsupportedConstructError, formatLocation } from '../errors';
import { logger } from '../logger';
import type { DeclarationSet, EntryFunction, StepRegistry } from '../types/ir';
import { DependencyResolver } from './dependency-resolver';
import { ENTRY_TAG } from './step-registry';
import { ParsedScript, findJSDocTag, locationOf, propertyNameText } from './source';

/**
 * Locate the single `@entrypoint` function and bind its parameter to the declarations.
 *
 * The entry takes one object binding pattern that names every declaration exactly once
 * (`{ root, inputVal: value }`); binding is by declared name, never by position.
 */
export function resolveEntry(
  script: ParsedScript,
  declarations: DeclarationSet,
  registry: StepRegistry
): EntryFunction {
  const candidates = [...registry.functions.values()].filter(
    fn => findJSDocTag(fn, ENTRY_TAG) !== undefined
  );

  if (candidates.length === 0) {
    throw new UnsupportedConstructError(
      `No function is marked @${ENTRY_TAG}`,
      locationOf(script, script.sourceFile)
    );
  }
  if (candidates.length > 1) {
    const [first, second] = candidates;
    throw new UnsupportedConstructError(
      `Only one function may be marked @${ENTRY_TAG}; '${first.name?.text}' is already marked at ${formatLocation(locationOf(script, first))}`,
      locationOf(script, second.name ?? second)
    );
  }

  const node = candidates[0];
  const nameNode = node.name;
  if (!nameNode) {
    throw new SignatureError('The entry function must be named', locationOf(script, node));
  }
  const name = nameNode.text;
  const location = locationOf(script, nameNode);

  if (node.asteriskToken) {
    throw new SignatureError(`Entry function '${name}' cannot be a generator`, location);
  }

  const bindings = bindDeclarations(script, node, name, declarations);
  assertNoRecursion(script, registry, name);

  logger.debug(`Entry function '${name}' binds ${bindings.size} declaration(s)`);
  return { name, node, bindings, location };
}

function bindDeclarations(
  script: ParsedScript,
  node: ts.FunctionDeclaration,
  name: string,
  declarations: DeclarationSet
): Map<string, ts.Identifier> {
  const bindings = new Map<string, ts.Identifier>();
  const declared = new Set(declarations.all.map(d => d.identifier));
  const expected = declarations.all.map(d => d.identifier).join(', ');

  if (node.parameters.length === 0) {
    if (declarations.all.length > 0) {
      throw new SignatureError(
        `Entry function '${name}' must accept the declarations { ${expected} }`,
        locationOf(script, node.name ?? node)
      );
    }
    return bindings;
  }

  const [parameter, ...rest] = node.parameters;
  if (rest.length > 0 || !ts.isObjectBindingPattern(parameter.name)) {
    throw new SignatureError(
      `Entry function '${name}' must take a single destructured parameter { ${expected} }; binding declarations by position is not supported`,
      locationOf(script, parameter)
    );
  }
  if (parameter.initializer || parameter.dotDotDotToken) {
    throw new SignatureError(
      `The parameter of entry function '${name}' cannot have a default or be a rest parameter`,
      locationOf(script, parameter)
    );
  }

  for (const element of parameter.name.elements) {
    const key = element.propertyName
      ? propertyNameText(element.propertyName)
      : ts.isIdentifier(element.name)
        ? element.name.text
        : undefined;

    if (element.dotDotDotToken || element.initializer || !ts.isIdentifier(element.name)) {
      throw new SignatureError(
        `Entry function '${name}' binds declarations by name only; defaults, rest elements and nested patterns are not supported`,
        locationOf(script, element)
      );
    }
    if (key === undefined || !declared.has(key)) {
      throw new SignatureError(
        `Entry function '${name}' binds '${key ?? element.getText(script.sourceFile)}', which is not a declared mount point or parameter`,
        locationOf(script, element)
      );
    }
    if (bindings.has(key)) {
      throw new SignatureError(
        `Entry function '${name}' binds '${key}' more than once`,
        locationOf(script, element)
      );
    }
    bindings.set(key, element.name);
  }

  const missing = declarations.all.filter(d => !bindings.has(d.identifier));
  if (missing.length > 0) {
    throw new SignatureError(
      `Entry function '${name}' does not accept ${missing.map(d => `'${d.identifier}'`).join(', ')}`,
      locationOf(script, parameter)
    );
  }

  return bindings;
}

/**
 * The emitted document is a finite sequence of stages, so neither the entry nor a step
 * function may reach itself through calls
 */
function assertNoRecursion(script: ParsedScript, registry: StepRegistry, entryName: string): void {
  for (const name of [entryName, ...registry.steps.keys()]) {
    const cycle = DependencyResolver.findCycleThrough(registry.callGraph, name);
    if (cycle) {
      const fn = registry.functions.get(name);
      throw new UnsupportedConstructError(
        `Recursion is not supported: ${cycle.join(' -> ')}`,
        fn ? locationOf(script, fn.name ?? fn) : undefined
      );
    }
  }
}
