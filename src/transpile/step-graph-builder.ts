import * as ts from 'typescript';
import {
  SignatureError,
  SlotContractError,
  UnsupportedConstructError,
  formatLocation,
} from '../errors';
import { logger } from '../logger';
import type {
  ArtifactSource,
  CollectionFormat,
  DeclarationSet,
  EntryFunction,
  GuardExpr,
  InputBinding,
  IterationSpec,
  OutputBinding,
  SourceLocation,
  Stage,
  StageGraph,
  StepFunction,
  StepRegistry,
  WorkflowStep,
} from '../types/ir';
import { DependencyResolver } from './dependency-resolver';
import { GuardTranslator, conjoin, guardProducers, negate } from './guard-translator';
import { producersOf } from './placeholders';
import {
  ParsedScript,
  calleeName,
  locationOf,
  readLiteral,
  toKebabCase,
  unwrapParentheses,
} from './source';
import { InputAccessor, OutputAccessor, ValueResolver } from './value-resolver';

export const ITERATE_FUNCTION = 'iterate';
export const SPLIT_TEMPLATE = 'split-items';

interface LoopContext {
  iteration: IterationSpec;
  /** Producers the iteration itself depends on */
  dependencies: string[];
}

interface WalkContext {
  guard?: GuardExpr;
  loop?: LoopContext;
}

/**
 * Turns the body of the entry function into workflow steps with their bindings, guards and
 * iteration specs, then groups them into stages.
 */
export class StepGraphBuilder {
  private readonly resolver: ValueResolver;
  private readonly guards: GuardTranslator;
  private readonly steps: WorkflowStep[] = [];
  private readonly usedIds = new Set<string>();

  constructor(
    private readonly script: ParsedScript,
    private readonly declarations: DeclarationSet,
    private readonly registry: StepRegistry,
    private readonly entry: EntryFunction
  ) {
    this.resolver = new ValueResolver(script);
    this.guards = new GuardTranslator(script, this.resolver);
  }

  build(): StageGraph {
    for (const declaration of this.declarations.all) {
      this.resolver.bind(declaration.declarationName, { kind: 'declaration', declaration });
      const local = this.entry.bindings.get(declaration.identifier);
      if (local) this.resolver.bind(local, { kind: 'declaration', declaration });
    }

    const body = this.entry.node.body;
    if (!body) {
      throw new SignatureError(
        `Entry function '${this.entry.name}' has no body`,
        this.entry.location
      );
    }
    this.walk(body.statements, {});

    if (this.steps.length === 0) {
      throw new UnsupportedConstructError(
        `Entry function '${this.entry.name}' does not call any step`,
        this.entry.location
      );
    }

    return this.assignStages();
  }

  private walk(statements: readonly ts.Statement[], context: WalkContext): void {
    for (const statement of statements) {
      if (ts.isEmptyStatement(statement)) continue;

      if (ts.isBlock(statement)) {
        this.walk(statement.statements, context);
      } else if (ts.isVariableStatement(statement)) {
        this.declareAccessors(statement);
      } else if (ts.isExpressionStatement(statement)) {
        this.handleCall(statement.expression, context);
      } else if (ts.isIfStatement(statement)) {
        this.handleIf(statement, context);
      } else if (ts.isForOfStatement(statement)) {
        this.handleLoop(statement, context);
      } else {
        throw new UnsupportedConstructError(
          `Unsupported statement in entry function: '${firstLine(statement, this.script)}'`,
          this.loc(statement)
        );
      }
    }
  }

  private declareAccessors(statement: ts.VariableStatement): void {
    if (!(statement.declarationList.flags & ts.NodeFlags.Const)) {
      throw new UnsupportedConstructError(
        'Accessors in the entry function must be declared with const',
        this.loc(statement)
      );
    }
    for (const declaration of statement.declarationList.declarations) {
      const init = declaration.initializer && unwrapParentheses(declaration.initializer);
      if (!ts.isIdentifier(declaration.name) || !init || !ts.isNewExpression(init)) {
        throw new UnsupportedConstructError(
          'The entry function can only declare StepInput and StepOutput accessors',
          this.loc(declaration)
        );
      }
      const accessor = this.resolver.buildAccessor(init, declaration.name.text);
      this.resolver.bind(declaration.name, { kind: 'accessor', accessor });
      logger.debug(`Declared ${accessor.kind} accessor '${accessor.label}'`);
    }
  }

  private handleIf(statement: ts.IfStatement, context: WalkContext): void {
    const earlier: GuardExpr[] = [];
    let current: ts.IfStatement | undefined = statement;

    while (current) {
      const condition = this.guards.translate(current.expression);
      this.walk([current.thenStatement], {
        ...context,
        guard: conjoin(context.guard, ...earlier.map(negate), condition),
      });
      earlier.push(condition);

      const otherwise: ts.Statement | undefined = current.elseStatement;
      if (otherwise && ts.isIfStatement(otherwise)) {
        current = otherwise;
        continue;
      }
      if (otherwise) {
        this.walk([otherwise], {
          ...context,
          guard: conjoin(context.guard, ...earlier.map(negate)),
        });
      }
      current = undefined;
    }
  }

  private handleLoop(statement: ts.ForOfStatement, context: WalkContext): void {
    if (context.loop) {
      throw new UnsupportedConstructError('Loops cannot be nested', this.loc(statement));
    }
    if (statement.awaitModifier) {
      throw new UnsupportedConstructError(
        'for await loops are not supported',
        this.loc(statement)
      );
    }

    const initializer = statement.initializer;
    const variable =
      ts.isVariableDeclarationList(initializer) &&
      initializer.flags & ts.NodeFlags.Const &&
      initializer.declarations.length === 1
        ? initializer.declarations[0].name
        : undefined;
    if (!variable || !ts.isIdentifier(variable)) {
      throw new UnsupportedConstructError(
        'Loops must declare a single const variable: for (const item of iterate(...))',
        this.loc(initializer)
      );
    }

    const source = unwrapParentheses(statement.expression);
    if (!ts.isCallExpression(source) || calleeName(source) !== ITERATE_FUNCTION) {
      throw new UnsupportedConstructError(
        `Loops can only run over ${ITERATE_FUNCTION}(...)`,
        this.loc(statement.expression)
      );
    }
    const [target, fileNameArg, ...extra] = source.arguments;
    if (!target || extra.length > 0) {
      throw new SignatureError(
        `${ITERATE_FUNCTION}() takes a source and an optional file name`,
        this.loc(source)
      );
    }

    const resolved = this.resolver.resolveIterationSource(target);
    let loop: LoopContext;

    if (resolved.kind === 'count') {
      if (fileNameArg) {
        throw new SignatureError(
          `${ITERATE_FUNCTION}() only takes a file name when iterating over an artifact`,
          this.loc(fileNameArg)
        );
      }
      loop = {
        iteration: { kind: 'count', count: resolved.part },
        dependencies: producersOf([resolved.part]),
      };
    } else {
      const format = this.collectionFormat(resolved.source, fileNameArg);
      const split = this.addSplitStep(variable, resolved.source, format, context, source);
      loop = { iteration: { kind: 'collection', splitStepId: split.id }, dependencies: [split.id] };
    }

    this.resolver.bind(variable, {
      kind: 'loop-variable',
      loop: { name: variable.text, form: resolved.kind },
    });
    this.walk([statement.statement], { ...context, loop });
  }

  private collectionFormat(
    source: ArtifactSource,
    fileNameArg: ts.Expression | undefined
  ): CollectionFormat {
    if (fileNameArg) {
      const fileName = readLiteral(fileNameArg);
      if (typeof fileName !== 'string') {
        throw new SignatureError(
          `The file name given to ${ITERATE_FUNCTION}() must be a string literal`,
          this.loc(fileNameArg)
        );
      }
      return formatOfFileName(fileName);
    }
    if (source.kind === 's3') {
      const last = source.key[source.key.length - 1];
      if (last && last.kind === 'literal') return formatOfFileName(last.value);
    }
    return 'json';
  }

  private addSplitStep(
    variable: ts.Identifier,
    source: ArtifactSource,
    format: CollectionFormat,
    context: WalkContext,
    node: ts.Node
  ): WorkflowStep {
    const step: WorkflowStep = {
      id: this.uniqueId(`split-${toKebabCase(variable.text)}`),
      templateName: SPLIT_TEMPLATE,
      inputBindings: [
        { slot: 'source', kind: 'artifact', source },
        { slot: 'format', kind: 'parameter', value: [{ kind: 'literal', value: format }] },
      ],
      outputBindings: [
        { slot: 'count', kind: 'parameter' },
        { slot: 'items', kind: 'artifact', destination: { kind: 'temporary' } },
      ],
      guard: context.guard,
      splitFormat: format,
      dependencies: unique([...sourceProducers(source), ...guardProducers(context.guard)]),
      stageIndex: 0,
      location: this.loc(node),
    };
    this.steps.push(step);
    logger.debug(`Added split step '${step.id}' (${format})`);
    return step;
  }

  private handleCall(expression: ts.Expression, context: WalkContext): void {
    let node = unwrapParentheses(expression);
    if (ts.isAwaitExpression(node)) {
      node = unwrapParentheses(node.expression);
    }

    const name = ts.isCallExpression(node) ? calleeName(node) : undefined;
    const step = name === undefined ? undefined : this.registry.steps.get(name);
    if (!ts.isCallExpression(node) || !step) {
      throw new UnsupportedConstructError(
        name !== undefined && this.registry.functions.has(name)
          ? `'${name}' is not a step function and cannot be called from the entry function`
          : `Only step function calls are supported in the entry function: '${firstLine(node, this.script)}'`,
        this.loc(node)
      );
    }

    const { input, output } = this.readCallArguments(node, step);
    const inputBindings = this.bindInputs(step, input, node);
    const outputBindings = this.bindOutputs(step, output, node);

    const dependencies = unique([
      ...inputBindings.flatMap(binding =>
        binding.kind === 'parameter' ? producersOf(binding.value) : sourceProducers(binding.source)
      ),
      ...outputBindings.flatMap(binding =>
        binding.kind === 'artifact' && binding.destination.kind === 's3'
          ? producersOf(binding.destination.key)
          : []
      ),
      ...guardProducers(context.guard),
      ...(context.loop?.dependencies ?? []),
    ]);

    const workflowStep: WorkflowStep = {
      id: this.uniqueId(toKebabCase(step.name)),
      templateName: step.templateName,
      functionName: step.name,
      inputBindings,
      outputBindings,
      guard: context.guard,
      iteration: context.loop?.iteration,
      dependencies,
      stageIndex: 0,
      location: this.loc(node),
    };
    this.steps.push(workflowStep);
    output.producers.push({ step: workflowStep, iterated: context.loop !== undefined });
    logger.debug(
      `Step '${workflowStep.id}' calls ${step.name}` +
        (dependencies.length > 0 ? ` after ${dependencies.join(', ')}` : '')
    );
  }

  private readCallArguments(
    call: ts.CallExpression,
    step: StepFunction
  ): { input: InputAccessor; output: OutputAccessor } {
    const expected =
      step.inputIndex === 0
        ? `${step.name}(${step.inputParam}: StepInput, ${step.outputParam}: StepOutput)`
        : `${step.name}(${step.outputParam}: StepOutput, ${step.inputParam}: StepInput)`;

    if (call.arguments.length !== 2) {
      throw new SignatureError(
        `${step.name} takes 2 arguments, got ${call.arguments.length}; expected ${expected}`,
        this.loc(call)
      );
    }

    const accessors = call.arguments.map((arg, index) => {
      const node = unwrapParentheses(arg);
      if (ts.isNewExpression(node)) {
        return this.resolver.buildAccessor(node, `${step.name} argument ${index + 1}`);
      }
      const binding = ts.isIdentifier(node) ? this.resolver.lookup(node) : undefined;
      return binding?.kind === 'accessor' ? binding.accessor : undefined;
    });
    const input = accessors[step.inputIndex];
    const output = accessors[1 - step.inputIndex];

    if (input?.kind !== 'input' || output?.kind !== 'output') {
      throw new SignatureError(
        `Arguments of ${step.name} must be StepInput and StepOutput accessors declared in the entry function; expected ${expected}`,
        this.loc(call)
      );
    }
    return { input, output };
  }

  private bindInputs(step: StepFunction, input: InputAccessor, call: ts.Node): InputBinding[] {
    const bindings: InputBinding[] = [];
    const used = new Set<string>();

    for (const slot of step.contract.inputs) {
      const key = `${slot.kind}:${slot.name}`;
      used.add(key);
      if (slot.kind === 'parameter') {
        const value = input.parameters.get(slot.name);
        if (!value) throw this.missingInput(step, input, slot.kind, slot.name, call);
        bindings.push({ slot: slot.name, kind: 'parameter', value });
      } else {
        const source = input.artifacts.get(slot.name);
        if (!source) throw this.missingInput(step, input, slot.kind, slot.name, call);
        bindings.push({ slot: slot.name, kind: 'artifact', source });
      }
    }

    const provided = [
      ...[...input.parameters.keys()].map(name => ({ kind: 'parameter', name })),
      ...[...input.artifacts.keys()].map(name => ({ kind: 'artifact', name })),
    ];
    for (const { kind, name } of provided) {
      if (!used.has(`${kind}:${name}`)) {
        logger.warn(
          `⚠️  ${step.name} does not read input ${kind} '${name}' of '${input.label}'; it is not passed (${this.where(call)})`
        );
      }
    }
    return bindings;
  }

  private bindOutputs(step: StepFunction, output: OutputAccessor, call: ts.Node): OutputBinding[] {
    const bindings: OutputBinding[] = [];
    const written = new Set<string>();

    for (const slot of step.contract.outputs) {
      written.add(`${slot.kind}:${slot.name}`);
      if (slot.kind === 'parameter') {
        if (!output.parameters.has(slot.name)) {
          throw this.undeclaredOutput(step, output, slot.kind, slot.name, call);
        }
        bindings.push({ slot: slot.name, kind: 'parameter' });
      } else {
        const destination = output.artifacts.get(slot.name);
        if (!destination) throw this.undeclaredOutput(step, output, slot.kind, slot.name, call);
        bindings.push({ slot: slot.name, kind: 'artifact', destination });
      }
    }

    const declared = [
      ...[...output.parameters].map(name => ({ kind: 'parameter', name })),
      ...[...output.artifacts.keys()].map(name => ({ kind: 'artifact', name })),
    ];
    for (const { kind, name } of declared) {
      if (!written.has(`${kind}:${name}`)) {
        logger.warn(
          `⚠️  ${step.name} does not write output ${kind} '${name}' of '${output.label}'; it is not produced (${this.where(call)})`
        );
      }
    }
    return bindings;
  }

  private missingInput(
    step: StepFunction,
    input: InputAccessor,
    kind: string,
    slot: string,
    call: ts.Node
  ): SlotContractError {
    return new SlotContractError(
      `${step.name} reads input ${kind} '${slot}' but '${input.label}' does not provide it`,
      this.loc(call)
    );
  }

  private undeclaredOutput(
    step: StepFunction,
    output: OutputAccessor,
    kind: string,
    slot: string,
    call: ts.Node
  ): SlotContractError {
    return new SlotContractError(
      `${step.name} writes output ${kind} '${slot}' but '${output.label}' does not declare it`,
      this.loc(call)
    );
  }

  /**
   * `base`, then `base-2`, `base-3`, ... for repeated calls
   */
  private uniqueId(base: string): string {
    let id = base;
    for (let n = 2; this.usedIds.has(id); n++) {
      id = `${base}-${n}`;
    }
    this.usedIds.add(id);
    return id;
  }

  /**
   * Every step lands one stage after its latest producer; steps of a stage keep source order
   */
  private assignStages(): StageGraph {
    const graph = DependencyResolver.buildDependencyGraph(
      new Map(this.steps.map(step => [step.id, step.dependencies]))
    );
    if (graph.hasCycles) {
      throw new Error(`Circular step dependency: ${(graph.cycleNodes ?? []).join(' -> ')}`);
    }

    const levels = DependencyResolver.levelsOf(graph);
    const stages: Stage[] = [];
    for (const step of this.steps) {
      step.stageIndex = levels.get(step.id) ?? 0;
      let stage = stages[step.stageIndex];
      if (!stage) {
        stage = { index: step.stageIndex, steps: [] };
        stages[step.stageIndex] = stage;
      }
      stage.steps.push(step);
    }

    const stats = DependencyResolver.getExecutionStats(graph);
    logger.verbose(
      `Scheduled ${stats.totalSteps} step(s) in ${stats.stages} stage(s), up to ${stats.maxParallelism} in parallel`
    );
    return { stages, steps: [...this.steps] };
  }

  private where(node: ts.Node): string {
    return formatLocation(this.loc(node));
  }

  private loc(node: ts.Node): SourceLocation {
    return locationOf(this.script, node);
  }
}

/**
 * Build the stage graph of the entry function
 */
export function buildStageGraph(
  script: ParsedScript,
  declarations: DeclarationSet,
  registry: StepRegistry,
  entry: EntryFunction
): StageGraph {
  return new StepGraphBuilder(script, declarations, registry, entry).build();
}

function formatOfFileName(fileName: string): CollectionFormat {
  return fileName.toLowerCase().endsWith('.csv') ? 'csv' : 'json';
}

function sourceProducers(source: ArtifactSource): string[] {
  return source.kind === 'step-output' ? [source.stepId] : producersOf(source.key);
}

function unique(ids: string[]): string[] {
  return [...new Set(ids)];
}

function firstLine(node: ts.Node, script: ParsedScript): string {
  return node.getText(script.sourceFile).split('\n')[0];
}
