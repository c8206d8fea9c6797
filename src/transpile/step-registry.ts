import * as ts from 'typescript';
import {
  DuplicateDeclarationError,
  SignatureError,
  SlotContractError,
  UnsupportedAccessPatternError,
  UnsupportedConstructError,
  formatLocation,
} from '../errors';
import { logger } from '../logger';
import type {
  AccessorUse,
  DeclarationSet,
  Declaration,
  InputSlot,
  OutputSlot,
  ParameterReference,
  SlotDirection,
  SlotKind,
  StepContract,
  StepFunction,
  StepOptions,
  StepRegistry,
} from '../types/ir';
import {
  ParsedScript,
  findJSDocTag,
  forEachIdentifier,
  locationOf,
  readAccessKey,
  symbolOfReference,
  toKebabCase,
} from './source';

export const STEP_TAG = 'step';
export const ENTRY_TAG = 'entrypoint';
export const RUNTIME_MODULE = 'stagecraft';
export const STEP_INPUT_TYPE = 'StepInput';
export const STEP_OUTPUT_TYPE = 'StepOutput';

/** Slot names end up in Argo names and file paths */
export const SLOT_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

const STEP_OPTION_KEYS: ReadonlyArray<keyof StepOptions> = ['image', 'cpu', 'memory'];

/**
 * Top-level symbols of a script, sorted by what they are
 */
interface TopLevelIndex {
  functions: Map<string, ts.FunctionDeclaration>;
  /** Statement that declares each top-level value other than workflow declarations */
  statements: Map<ts.Symbol, ts.Statement>;
  declarations: Map<ts.Symbol, Declaration>;
  runtimeImports: Set<ts.Symbol>;
  stepSymbols: Map<ts.Symbol, string>;
  entrySymbols: Map<ts.Symbol, string>;
  functionSymbols: Map<ts.Symbol, string>;
}

/**
 * Index every function tagged `@step`, validate its signature and record the slots its body
 * reads and writes.
 */
export function buildStepRegistry(
  script: ParsedScript,
  declarations: DeclarationSet
): StepRegistry {
  const index = indexTopLevel(script, declarations);
  const steps = new Map<string, StepFunction>();
  const templateOwners = new Map<string, StepFunction>();

  for (const fn of index.functions.values()) {
    const tag = findJSDocTag(fn, STEP_TAG);
    if (!tag) continue;

    const step = readStepFunction(script, fn, tag.comment, index);
    const owner = templateOwners.get(step.templateName);
    if (owner) {
      throw new DuplicateDeclarationError(
        `Step function '${step.name}' maps to template '${step.templateName}', already used by '${owner.name}' at ${formatLocation(owner.location)}`,
        step.location
      );
    }
    templateOwners.set(step.templateName, step);
    steps.set(step.name, step);
    logger.debug(
      `Registered step '${step.name}': in [${step.contract.inputs.map(s => s.name).join(', ')}] out [${step.contract.outputs.map(s => s.name).join(', ')}]`
    );
  }

  return { steps, functions: index.functions, callGraph: buildCallGraph(script, index) };
}

function indexTopLevel(script: ParsedScript, declarationSet: DeclarationSet): TopLevelIndex {
  const { checker } = script;
  const index: TopLevelIndex = {
    functions: new Map(),
    statements: new Map(),
    declarations: new Map(),
    runtimeImports: new Set(),
    stepSymbols: new Map(),
    entrySymbols: new Map(),
    functionSymbols: new Map(),
  };

  for (const declaration of declarationSet.all) {
    const symbol = checker.getSymbolAtLocation(declaration.declarationName);
    if (symbol) index.declarations.set(symbol, declaration);
  }

  const register = (name: ts.Identifier, statement: ts.Statement): void => {
    const symbol = checker.getSymbolAtLocation(name);
    if (symbol && !index.declarations.has(symbol)) {
      index.statements.set(symbol, statement);
    }
  };

  for (const statement of script.sourceFile.statements) {
    if (ts.isFunctionDeclaration(statement) && statement.name) {
      if (!statement.body) continue; // overload signature
      const name = statement.name.text;
      const previous = index.functions.get(name);
      if (previous) {
        throw new DuplicateDeclarationError(
          `Function '${name}' is already defined at ${formatLocation(locationOf(script, previous))}`,
          locationOf(script, statement.name)
        );
      }
      index.functions.set(name, statement);
      register(statement.name, statement);

      const symbol = checker.getSymbolAtLocation(statement.name);
      if (symbol) {
        index.functionSymbols.set(symbol, name);
        const isStep = findJSDocTag(statement, STEP_TAG) !== undefined;
        const isEntry = findJSDocTag(statement, ENTRY_TAG) !== undefined;
        if (isStep && isEntry) {
          throw new SignatureError(
            `Function '${name}' cannot be both a step and the entry point`,
            locationOf(script, statement.name)
          );
        }
        if (isStep) index.stepSymbols.set(symbol, name);
        if (isEntry) index.entrySymbols.set(symbol, name);
      }
    } else if (
      (ts.isClassDeclaration(statement) || ts.isEnumDeclaration(statement)) &&
      statement.name
    ) {
      register(statement.name, statement);
    } else if (ts.isVariableStatement(statement)) {
      for (const declaration of statement.declarationList.declarations) {
        for (const name of bindingIdentifiers(declaration.name)) {
          register(name, statement);
        }
      }
    } else if (ts.isImportDeclaration(statement) && statement.importClause) {
      const isRuntime =
        ts.isStringLiteral(statement.moduleSpecifier) &&
        statement.moduleSpecifier.text === RUNTIME_MODULE;
      for (const name of importedIdentifiers(statement.importClause)) {
        if (isRuntime) {
          const symbol = checker.getSymbolAtLocation(name);
          if (symbol) index.runtimeImports.add(symbol);
        } else {
          register(name, statement);
        }
      }
    }
  }

  return index;
}

function bindingIdentifiers(name: ts.BindingName): ts.Identifier[] {
  if (ts.isIdentifier(name)) return [name];
  const result: ts.Identifier[] = [];
  for (const element of name.elements) {
    if (ts.isBindingElement(element)) {
      result.push(...bindingIdentifiers(element.name));
    }
  }
  return result;
}

function importedIdentifiers(clause: ts.ImportClause): ts.Identifier[] {
  const names: ts.Identifier[] = [];
  if (clause.name) names.push(clause.name);
  const bindings = clause.namedBindings;
  if (bindings && ts.isNamespaceImport(bindings)) {
    names.push(bindings.name);
  } else if (bindings) {
    names.push(...bindings.elements.map(element => element.name));
  }
  return names;
}

function readStepFunction(
  script: ParsedScript,
  fn: ts.FunctionDeclaration,
  tagComment: string,
  index: TopLevelIndex
): StepFunction {
  const nameNode = fn.name;
  const body = fn.body;
  if (!nameNode || !body) {
    throw new SignatureError('Step functions must be named and have a body', locationOf(script, fn));
  }
  const name = nameNode.text;
  const location = locationOf(script, nameNode);

  if (fn.asteriskToken) {
    throw new SignatureError(`Step function '${name}' cannot be a generator`, location);
  }

  const accessors = readAccessorParameters(script, fn, name);
  const options = parseStepOptions(tagComment, name, location);

  const scan = scanBody(script, fn, body, name, accessors, index);
  return {
    name,
    templateName: `exec-${toKebabCase(name)}`,
    inputParam: accessors.input.text,
    outputParam: accessors.output.text,
    inputIndex: accessors.inputIndex,
    contract: buildContract(scan.uses, name, location),
    options,
    isAsync: (ts.getCombinedModifierFlags(fn) & ts.ModifierFlags.Async) !== 0,
    accessorUses: scan.uses,
    parameterReferences: scan.parameterReferences,
    support: scan.support,
    node: fn,
    location,
  };
}

function readAccessorParameters(
  script: ParsedScript,
  fn: ts.FunctionDeclaration,
  name: string
): { input: ts.Identifier; output: ts.Identifier; inputIndex: 0 | 1 } {
  const expected = `Step function '${name}' must take exactly one ${STEP_INPUT_TYPE} and one ${STEP_OUTPUT_TYPE} parameter`;
  const location = locationOf(script, fn.name ?? fn);

  if (fn.parameters.length !== 2) {
    throw new SignatureError(`${expected}, got ${fn.parameters.length} parameters`, location);
  }

  const types = fn.parameters.map(parameter => {
    if (
      !ts.isIdentifier(parameter.name) ||
      parameter.dotDotDotToken ||
      parameter.initializer ||
      parameter.questionToken
    ) {
      throw new SignatureError(
        `${expected}; parameters must be plain identifiers without defaults`,
        locationOf(script, parameter)
      );
    }
    return accessorTypeOf(parameter);
  });

  const inputIndex = types.indexOf(STEP_INPUT_TYPE);
  const outputIndex = types.indexOf(STEP_OUTPUT_TYPE);
  if (inputIndex === -1 || outputIndex === -1) {
    throw new SignatureError(expected, location);
  }

  const [first, second] = fn.parameters;
  if (!ts.isIdentifier(first.name) || !ts.isIdentifier(second.name)) {
    throw new SignatureError(expected, location);
  }
  return inputIndex === 0
    ? { input: first.name, output: second.name, inputIndex: 0 }
    : { input: second.name, output: first.name, inputIndex: 1 };
}

function accessorTypeOf(parameter: ts.ParameterDeclaration): string | undefined {
  const type = parameter.type;
  if (type && ts.isTypeReferenceNode(type) && ts.isIdentifier(type.typeName)) {
    const text = type.typeName.text;
    if (text === STEP_INPUT_TYPE || text === STEP_OUTPUT_TYPE) return text;
  }
  return undefined;
}

/**
 * `@step image=node:20-alpine cpu=100m memory=64Mi`
 */
export function parseStepOptions(
  comment: string,
  stepName: string,
  location?: StepFunction['location']
): StepOptions {
  const options: StepOptions = {};
  for (const token of comment.split(/\s+/).filter(Boolean)) {
    const eq = token.indexOf('=');
    const key = eq > 0 ? token.slice(0, eq) : token;
    const value = eq > 0 ? token.slice(eq + 1) : '';
    const optionKey = STEP_OPTION_KEYS.find(k => k === key);
    if (!optionKey) {
      throw new SignatureError(
        `Unknown @step option '${key}' on '${stepName}' (expected ${STEP_OPTION_KEYS.join(', ')})`,
        location
      );
    }
    if (!value) {
      throw new SignatureError(
        `@step option '${key}' on '${stepName}' needs a value (${key}=...)`,
        location
      );
    }
    options[optionKey] = value;
  }
  return options;
}

interface BodyScan {
  uses: AccessorUse[];
  parameterReferences: ParameterReference[];
  support: ts.Statement[];
}

function scanBody(
  script: ParsedScript,
  fn: ts.FunctionDeclaration,
  body: ts.Block,
  stepName: string,
  accessors: { input: ts.Identifier; output: ts.Identifier },
  index: TopLevelIndex
): BodyScan {
  const inputSymbol = script.checker.getSymbolAtLocation(accessors.input);
  const outputSymbol = script.checker.getSymbolAtLocation(accessors.output);
  const uses: AccessorUse[] = [];
  const parameterReferences: ParameterReference[] = [];
  const support = new Set<ts.Statement>();
  const pending: ts.Statement[] = [];

  const visitShared = (id: ts.Identifier, symbol: ts.Symbol, scope: ts.Node): void => {
    const declaration = index.declarations.get(symbol);
    if (declaration?.kind === 'mount-point') {
      throw new UnsupportedConstructError(
        `Step function '${stepName}' refers to mount point '${id.text}'; pass files in through ${STEP_INPUT_TYPE} artifacts`,
        locationOf(script, id)
      );
    }
    if (declaration?.kind === 'parameter') {
      parameterReferences.push({ node: id, parameter: declaration });
      return;
    }

    const calledStep = index.stepSymbols.get(symbol) ?? index.entrySymbols.get(symbol);
    if (calledStep !== undefined) {
      const what = index.stepSymbols.has(symbol) ? 'step function' : 'entry function';
      throw new UnsupportedConstructError(
        `Step function '${stepName}' refers to ${what} '${calledStep}'; steps can only be called from the entry function`,
        locationOf(script, id)
      );
    }

    if (index.runtimeImports.has(symbol) && !isInTypePosition(id, scope)) {
      throw new UnsupportedConstructError(
        `'${id.text}' from ${RUNTIME_MODULE} cannot be used inside step function '${stepName}'`,
        locationOf(script, id)
      );
    }

    const statement = index.statements.get(symbol);
    if (statement && statement !== fn && !support.has(statement)) {
      support.add(statement);
      pending.push(statement);
    }
  };

  forEachIdentifier(body, id => {
    const symbol = symbolOfReference(script, id);
    if (!symbol) return;
    if (symbol === inputSymbol) {
      uses.push(classifyAccessorUse(script, id, 'input', stepName));
    } else if (symbol === outputSymbol) {
      uses.push(classifyAccessorUse(script, id, 'output', stepName));
    } else {
      visitShared(id, symbol, body);
    }
  });

  // Carry helpers, constants and imports the body depends on, transitively
  while (pending.length > 0) {
    const statement = pending.shift();
    if (!statement) break;
    forEachIdentifier(statement, id => {
      const symbol = symbolOfReference(script, id);
      if (symbol && index.statements.get(symbol) !== statement) {
        visitShared(id, symbol, statement);
      }
    });
  }

  return {
    uses,
    parameterReferences,
    support: [...support].sort((a, b) => a.pos - b.pos),
  };
}

function isInTypePosition(node: ts.Node, scope: ts.Node): boolean {
  let current: ts.Node = node;
  while (current !== scope && current.parent) {
    if (ts.isTypeNode(current.parent) || ts.isInterfaceDeclaration(current.parent)) return true;
    if (ts.isTypeAliasDeclaration(current.parent)) return true;
    current = current.parent;
  }
  return false;
}

type WriteContext = 'read' | 'assign' | 'compound';

function writeContextOf(node: ts.Expression): WriteContext {
  const parent = node.parent;
  if (ts.isBinaryExpression(parent) && parent.left === node) {
    const op = parent.operatorToken.kind;
    if (op === ts.SyntaxKind.EqualsToken) return 'assign';
    if (op >= ts.SyntaxKind.FirstCompoundAssignment && op <= ts.SyntaxKind.LastCompoundAssignment) {
      return 'compound';
    }
  }
  if (
    (ts.isPrefixUnaryExpression(parent) || ts.isPostfixUnaryExpression(parent)) &&
    (parent.operator === ts.SyntaxKind.PlusPlusToken ||
      parent.operator === ts.SyntaxKind.MinusMinusToken)
  ) {
    return 'compound';
  }
  if (ts.isDeleteExpression(parent)) return 'compound';
  return 'read';
}

/**
 * Match `param.parameters[key]` / `param.artifacts[key]` around a reference to an accessor
 * parameter. Anything else is an access pattern the transformer cannot rewrite.
 */
function classifyAccessorUse(
  script: ParsedScript,
  id: ts.Identifier,
  direction: SlotDirection,
  stepName: string
): AccessorUse {
  const unsupported = (message: string, node: ts.Node = id): UnsupportedAccessPatternError =>
    new UnsupportedAccessPatternError(
      `${message} in step function '${stepName}'`,
      locationOf(script, node)
    );

  const member = id.parent;
  if (
    !ts.isPropertyAccessExpression(member) ||
    member.expression !== id ||
    (member.name.text !== 'parameters' && member.name.text !== 'artifacts')
  ) {
    throw unsupported(
      `'${id.text}' can only be used as ${id.text}.parameters[...] or ${id.text}.artifacts[...]`
    );
  }
  const kind: SlotKind = member.name.text === 'parameters' ? 'parameter' : 'artifact';

  const access = member.parent;
  if (
    !(ts.isElementAccessExpression(access) || ts.isPropertyAccessExpression(access)) ||
    access.expression !== member
  ) {
    throw unsupported(`'${id.text}.${member.name.text}' must be indexed directly by a slot name`);
  }
  const slot = readAccessKey(access);
  if (slot === undefined) {
    throw unsupported(`Slot keys of '${id.text}.${member.name.text}' must be string literals`, access);
  }
  if (!SLOT_NAME_PATTERN.test(slot)) {
    throw new SlotContractError(
      `Slot name '${slot}' in step function '${stepName}' must match ${SLOT_NAME_PATTERN.source}`,
      locationOf(script, access)
    );
  }

  const context = writeContextOf(access);
  const location = locationOf(script, access);

  if (direction === 'input') {
    if (context !== 'read') {
      throw new SlotContractError(
        `Step function '${stepName}' writes to input ${kind} '${slot}'`,
        location
      );
    }
    return { node: access, direction, kind, slot };
  }

  if (kind === 'artifact') {
    if (context !== 'read') {
      throw new SlotContractError(
        `Step function '${stepName}' reassigns output artifact '${slot}'; write through its handle instead`,
        location
      );
    }
    return { node: access, direction, kind, slot };
  }

  if (context === 'compound') {
    throw unsupported(`Output parameter '${slot}' can only be set with '='`, access);
  }
  if (context === 'read') {
    throw new SlotContractError(
      `Step function '${stepName}' reads output parameter '${slot}'; output parameters are write-only`,
      location
    );
  }
  const assignment = access.parent;
  if (!ts.isBinaryExpression(assignment)) {
    throw unsupported(`Unexpected write to output parameter '${slot}'`, access);
  }
  return { node: access, direction, kind, slot, assignment };
}

function buildContract(
  uses: AccessorUse[],
  stepName: string,
  location: StepFunction['location']
): StepContract {
  const inputs: InputSlot[] = [];
  const outputs: OutputSlot[] = [];
  const kinds = new Map<string, SlotKind>();

  for (const use of uses) {
    const key = `${use.direction}:${use.slot}`;
    const known = kinds.get(key);
    if (known && known !== use.kind) {
      throw new SlotContractError(
        `Step function '${stepName}' uses ${use.direction} slot '${use.slot}' both as a parameter and as an artifact`,
        location
      );
    }
    if (known) continue;
    kinds.set(key, use.kind);
    if (use.direction === 'input') {
      inputs.push({ name: use.slot, kind: use.kind, direction: 'input' });
    } else {
      outputs.push({ name: use.slot, kind: use.kind, direction: 'output' });
    }
  }

  return { inputs, outputs };
}

/**
 * For every top-level function, the other top-level functions it refers to
 */
function buildCallGraph(script: ParsedScript, index: TopLevelIndex): Map<string, string[]> {
  const graph = new Map<string, string[]>();
  for (const [name, fn] of index.functions) {
    const callees: string[] = [];
    forEachIdentifier(fn, id => {
      if (id === fn.name) return;
      const symbol = symbolOfReference(script, id);
      const callee = symbol ? index.functionSymbols.get(symbol) : undefined;
      if (callee !== undefined && !callees.includes(callee)) {
        callees.push(callee);
      }
    });
    graph.set(name, callees);
  }
  return graph;
}
