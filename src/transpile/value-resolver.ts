import * as ts from 'typescript';
import {
  SlotContractError,
  UnboundReferenceError,
  UnsupportedConstructError,
  UnsupportedExpressionError,
  formatLocation,
} from '../errors';
import type {
  ArtifactDestination,
  ArtifactSource,
  BindingValue,
  Declaration,
  GuardValueType,
  MountPoint,
  SlotKind,
  SourceLocation,
  ValuePart,
  WorkflowStep,
} from '../types/ir';
import { normalizeValue } from './placeholders';
import { SLOT_NAME_PATTERN, STEP_INPUT_TYPE, STEP_OUTPUT_TYPE } from './step-registry';
import {
  ParsedScript,
  calleeName,
  locationOf,
  propertyNameText,
  readAccessKey,
  readLiteral,
  symbolOfReference,
  unwrapParentheses,
} from './source';

export const FILE_INPUT_TYPE = 'FileInput';
export const FILE_OUTPUT_TYPE = 'FileOutput';

/**
 * A `new StepInput({...})` whose values were resolved where it was constructed
 */
export interface InputAccessor {
  kind: 'input';
  label: string;
  parameters: Map<string, BindingValue>;
  artifacts: Map<string, ArtifactSource>;
  location: SourceLocation;
}

export interface Producer {
  step: WorkflowStep;
  /** The producing call sits inside an iterate loop */
  iterated: boolean;
}

/**
 * A `new StepOutput({...})` and the step calls it has been passed to so far
 */
export interface OutputAccessor {
  kind: 'output';
  label: string;
  parameters: Set<string>;
  artifacts: Map<string, ArtifactDestination>;
  producers: Producer[];
  location: SourceLocation;
}

export type Accessor = InputAccessor | OutputAccessor;

export interface LoopScope {
  name: string;
  /** Counted loops yield indices, collection loops yield records */
  form: 'count' | 'collection';
}

export type LocalBinding =
  | { kind: 'declaration'; declaration: Declaration }
  | { kind: 'accessor'; accessor: Accessor }
  | { kind: 'loop-variable'; loop: LoopScope };

export type IterationSource =
  | { kind: 'count'; part: ValuePart }
  | { kind: 'collection'; source: ArtifactSource };

export type GuardReference = {
  part: Exclude<ValuePart, { kind: 'literal' }>;
  type: GuardValueType;
};

interface SlotReference {
  accessor: Accessor;
  kind: SlotKind;
  slot: string;
}

/**
 * Resolves expressions of the entry function to binding values.
 *
 * Names resolve through their symbols, so lexical scoping comes for free: prior step outputs
 * first, then workflow parameters, then mount-point locators.
 */
export class ValueResolver {
  private bindings = new Map<ts.Symbol, LocalBinding>();

  constructor(private readonly script: ParsedScript) {}

  bind(name: ts.Identifier, binding: LocalBinding): void {
    const symbol = this.script.checker.getSymbolAtLocation(name);
    if (symbol) this.bindings.set(symbol, binding);
  }

  lookup(node: ts.Identifier): LocalBinding | undefined {
    const symbol = symbolOfReference(this.script, node);
    return symbol ? this.bindings.get(symbol) : undefined;
  }

  /**
   * `new StepInput({ parameters: {...}, artifacts: {...} })` or the StepOutput equivalent
   */
  buildAccessor(expression: ts.NewExpression, label: string): Accessor {
    const type = calleeName(expression);
    const location = this.loc(expression);
    const groups = this.readAccessorGroups(expression, type ?? 'accessor');

    if (type === STEP_INPUT_TYPE) {
      const parameters = new Map<string, BindingValue>();
      const artifacts = new Map<string, ArtifactSource>();
      for (const [slot, value] of groups.parameters) {
        parameters.set(slot, this.resolveParameterValue(value));
      }
      for (const [slot, value] of groups.artifacts) {
        artifacts.set(slot, this.resolveArtifactSource(value));
      }
      return { kind: 'input', label, parameters, artifacts, location };
    }

    if (type === STEP_OUTPUT_TYPE) {
      const parameters = new Set<string>();
      const artifacts = new Map<string, ArtifactDestination>();
      for (const [slot, value] of groups.parameters) {
        if (unwrapParentheses(value).kind !== ts.SyntaxKind.NullKeyword) {
          throw new UnsupportedExpressionError(
            `Output parameter '${slot}' must be declared with null`,
            this.loc(value)
          );
        }
        parameters.add(slot);
      }
      for (const [slot, value] of groups.artifacts) {
        artifacts.set(slot, this.resolveArtifactDestination(value));
      }
      return { kind: 'output', label, parameters, artifacts, producers: [], location };
    }

    throw new UnsupportedConstructError(
      `Expected new ${STEP_INPUT_TYPE}(...) or new ${STEP_OUTPUT_TYPE}(...)`,
      location
    );
  }

  private readAccessorGroups(
    expression: ts.NewExpression,
    type: string
  ): { parameters: Array<[string, ts.Expression]>; artifacts: Array<[string, ts.Expression]> } {
    const groups = {
      parameters: new Array<[string, ts.Expression]>(),
      artifacts: new Array<[string, ts.Expression]>(),
    };
    const args = expression.arguments ?? ts.factory.createNodeArray<ts.Expression>();
    if (args.length === 0) return groups;

    const init = unwrapParentheses(args[0]);
    if (args.length > 1 || !ts.isObjectLiteralExpression(init)) {
      throw new UnsupportedConstructError(
        `${type} takes a single object literal { parameters, artifacts }`,
        this.loc(expression)
      );
    }

    for (const property of init.properties) {
      const key = property.name ? propertyNameText(property.name) : undefined;
      if (
        !ts.isPropertyAssignment(property) ||
        (key !== 'parameters' && key !== 'artifacts') ||
        !ts.isObjectLiteralExpression(unwrapParentheses(property.initializer))
      ) {
        throw new UnsupportedConstructError(
          `${type} only accepts 'parameters' and 'artifacts' object literals`,
          this.loc(property)
        );
      }
      const slots = unwrapParentheses(property.initializer);
      if (!ts.isObjectLiteralExpression(slots)) continue;

      for (const slotProperty of slots.properties) {
        const slot = slotProperty.name ? propertyNameText(slotProperty.name) : undefined;
        const value = ts.isPropertyAssignment(slotProperty)
          ? slotProperty.initializer
          : ts.isShorthandPropertyAssignment(slotProperty)
            ? slotProperty.name
            : undefined;
        if (!value || slot === undefined) {
          throw new UnsupportedConstructError(
            `Slots of ${type} must be written as 'name': value`,
            this.loc(slotProperty)
          );
        }
        if (!SLOT_NAME_PATTERN.test(slot)) {
          throw new SlotContractError(
            `Slot name '${slot}' must match ${SLOT_NAME_PATTERN.source}`,
            this.loc(slotProperty)
          );
        }
        groups[key].push([slot, value]);
      }
    }
    return groups;
  }

  /**
   * Value of a parameter slot: literals, workflow parameters, prior step outputs, the loop
   * variable, and template literals composed of those
   */
  resolveParameterValue(expression: ts.Expression): BindingValue {
    const node = unwrapParentheses(expression);

    const literal = readLiteral(node);
    if (literal !== undefined) {
      return normalizeValue([{ kind: 'literal', value: String(literal) }]);
    }

    if (ts.isTemplateExpression(node)) {
      const parts: BindingValue = [{ kind: 'literal', value: node.head.text }];
      for (const span of node.templateSpans) {
        parts.push(...this.resolveParameterValue(span.expression));
        parts.push({ kind: 'literal', value: span.literal.text });
      }
      const value = normalizeValue(parts);
      const resolvedByArgo = value.some(
        part => part.kind === 'workflow-parameter' || part.kind === 'step-output'
      );
      if (resolvedByArgo && value.some(isLoopField)) {
        throw new UnsupportedExpressionError(
          'Loop item fields can only be combined with literal text; pass the other value as its own parameter',
          this.loc(node)
        );
      }
      return value;
    }

    if (ts.isIdentifier(node)) {
      const binding = this.lookup(node);
      if (binding?.kind === 'declaration' && binding.declaration.kind === 'parameter') {
        return [{ kind: 'workflow-parameter', name: binding.declaration.name }];
      }
      if (binding?.kind === 'declaration') {
        throw new UnsupportedConstructError(
          `Mount point '${node.text}' can only be used in new ${FILE_INPUT_TYPE}(...) or new ${FILE_OUTPUT_TYPE}(...)`,
          this.loc(node)
        );
      }
      if (binding?.kind === 'loop-variable' && binding.loop.form === 'collection') {
        throw new UnsupportedExpressionError(
          `'${node.text}' is a record; use one of its fields, e.g. ${node.text}.name`,
          this.loc(node)
        );
      }
      if (binding?.kind === 'loop-variable') {
        return [{ kind: 'loop-item' }];
      }
      if (binding?.kind === 'accessor') {
        throw new UnsupportedExpressionError(
          `Accessor '${node.text}' cannot be used as a value; index one of its slots`,
          this.loc(node)
        );
      }
      throw this.unbound(node);
    }

    if (ts.isPropertyAccessExpression(node) || ts.isElementAccessExpression(node)) {
      const item = this.resolveLoopField(node);
      if (item) return [item];

      const reference = this.resolveSlotReference(node);
      if (reference.kind !== 'parameter') {
        throw new UnsupportedExpressionError(
          `Artifact '${reference.slot}' cannot be used as a parameter value`,
          this.loc(node)
        );
      }
      return this.parameterOf(reference, node);
    }

    throw new UnsupportedExpressionError(
      `Unsupported value expression '${node.getText(this.script.sourceFile)}'`,
      this.loc(node)
    );
  }

  /**
   * Source of an input artifact: a mount-point file or a prior step's output artifact
   */
  resolveArtifactSource(expression: ts.Expression): ArtifactSource {
    const node = unwrapParentheses(expression);

    if (ts.isNewExpression(node) && calleeName(node) === FILE_INPUT_TYPE) {
      const { mountPoint, key } = this.readFileLocator(node, FILE_INPUT_TYPE);
      return { kind: 's3', mountPoint: mountPoint.name, bucket: mountPoint.bucket, key };
    }

    if (ts.isPropertyAccessExpression(node) || ts.isElementAccessExpression(node)) {
      const reference = this.resolveSlotReference(node);
      if (reference.kind !== 'artifact') {
        throw new UnsupportedExpressionError(
          `Parameter '${reference.slot}' cannot be used as an artifact`,
          this.loc(node)
        );
      }
      if (reference.accessor.kind === 'input') {
        const source = reference.accessor.artifacts.get(reference.slot);
        if (!source) throw this.undeclaredSlot(reference, node);
        return source;
      }
      const step = this.producerOf(reference.accessor, 'artifact', reference.slot, node);
      return { kind: 'step-output', stepId: step.id, slot: reference.slot };
    }

    if (ts.isIdentifier(node) && !this.lookup(node)) {
      throw this.unbound(node);
    }

    throw new UnsupportedExpressionError(
      `Input artifacts must be new ${FILE_INPUT_TYPE}(mountPoint, path) or another step's output artifact`,
      this.loc(node)
    );
  }

  /**
   * `null` for a temporary artifact, or `new FileOutput(mountPoint, path)`
   */
  resolveArtifactDestination(expression: ts.Expression): ArtifactDestination {
    const node = unwrapParentheses(expression);
    if (node.kind === ts.SyntaxKind.NullKeyword) {
      return { kind: 'temporary' };
    }
    if (ts.isNewExpression(node) && calleeName(node) === FILE_OUTPUT_TYPE) {
      const { mountPoint, key } = this.readFileLocator(node, FILE_OUTPUT_TYPE);
      return { kind: 's3', mountPoint: mountPoint.name, bucket: mountPoint.bucket, key };
    }
    throw new UnsupportedExpressionError(
      `Output artifacts must be null or new ${FILE_OUTPUT_TYPE}(mountPoint, path)`,
      this.loc(node)
    );
  }

  /**
   * Operand of a guard that is not a literal
   */
  resolveGuardReference(expression: ts.Expression): GuardReference {
    const node = unwrapParentheses(expression);
    if (ts.isIdentifier(node)) {
      const binding = this.lookup(node);
      if (binding?.kind === 'loop-variable' && binding.loop.form === 'count') {
        return { part: { kind: 'loop-item' }, type: 'number' };
      }
    }
    if (ts.isTemplateExpression(node)) {
      throw new UnsupportedExpressionError(
        'Template literals are not supported in conditions',
        this.loc(node)
      );
    }
    const parts = this.resolveParameterValue(node);
    const [part] = parts;
    if (part !== undefined && isLoopField(part)) {
      throw new UnsupportedExpressionError(
        `Loop item fields are read inside the step container and cannot be used in conditions: '${node.getText(this.script.sourceFile)}'`,
        this.loc(node)
      );
    }
    if (parts.length !== 1 || part.kind === 'literal') {
      throw new UnsupportedExpressionError(
        `Unsupported condition operand '${node.getText(this.script.sourceFile)}'`,
        this.loc(node)
      );
    }
    const type = part.kind === 'workflow-parameter' ? this.parameterType(part.name) : 'string';
    return { part, type };
  }

  /**
   * Run-time type of a workflow parameter, taken from its default
   */
  parameterType(name: string): GuardValueType {
    for (const binding of this.bindings.values()) {
      if (
        binding.kind === 'declaration' &&
        binding.declaration.kind === 'parameter' &&
        binding.declaration.name === name
      ) {
        const { defaultValue } = binding.declaration;
        return typeof defaultValue === 'number'
          ? 'number'
          : typeof defaultValue === 'boolean'
            ? 'boolean'
            : 'string';
      }
    }
    return 'string';
  }

  /**
   * Argument of `iterate(...)`: a count (number, parameter, output parameter) or a
   * collection artifact
   */
  resolveIterationSource(expression: ts.Expression): IterationSource {
    const node = unwrapParentheses(expression);

    const literal = readLiteral(node);
    if (literal !== undefined) {
      const count = typeof literal === 'number' ? literal : Number(literal);
      if (typeof literal === 'boolean' || !Number.isInteger(count) || count < 0) {
        throw new UnsupportedExpressionError(
          'iterate() needs a non-negative integer count',
          this.loc(node)
        );
      }
      return { kind: 'count', part: { kind: 'literal', value: String(count) } };
    }

    if (ts.isNewExpression(node)) {
      return { kind: 'collection', source: this.resolveArtifactSource(node) };
    }

    if (ts.isPropertyAccessExpression(node) || ts.isElementAccessExpression(node)) {
      const reference = this.resolveSlotReference(node);
      if (reference.kind === 'artifact') {
        return { kind: 'collection', source: this.resolveArtifactSource(node) };
      }
    }

    const parts = this.resolveParameterValue(node);
    const [part] = parts;
    if (parts.length !== 1 || part.kind === 'loop-item') {
      throw new UnsupportedExpressionError(
        'iterate() takes a count or a collection artifact',
        this.loc(node)
      );
    }
    return { kind: 'count', part };
  }

  private resolveLoopField(
    node: ts.PropertyAccessExpression | ts.ElementAccessExpression
  ): ValuePart | undefined {
    const target = unwrapParentheses(node.expression);
    if (!ts.isIdentifier(target)) return undefined;
    const binding = this.lookup(target);
    if (binding?.kind !== 'loop-variable') return undefined;

    if (binding.loop.form === 'count') {
      throw new UnsupportedExpressionError(
        `'${target.text}' is a loop index and has no fields`,
        this.loc(node)
      );
    }
    const field = readAccessKey(node);
    if (field === undefined || !/^[A-Za-z0-9_-]+$/.test(field)) {
      throw new UnsupportedExpressionError(
        `Fields of '${target.text}' must be accessed with a literal name`,
        this.loc(node)
      );
    }
    return { kind: 'loop-item', field };
  }

  /**
   * `accessor.parameters[slot]` or `accessor.artifacts[slot]` on a local accessor
   */
  private resolveSlotReference(
    node: ts.PropertyAccessExpression | ts.ElementAccessExpression
  ): SlotReference {
    const group = unwrapParentheses(node.expression);
    if (ts.isPropertyAccessExpression(group)) {
      const target = unwrapParentheses(group.expression);
      const groupName = group.name.text;
      if (ts.isIdentifier(target) && (groupName === 'parameters' || groupName === 'artifacts')) {
        const binding = this.lookup(target);
        if (!binding) throw this.unbound(target);
        if (binding.kind === 'accessor') {
          const slot = readAccessKey(node);
          if (slot === undefined) {
            throw new UnsupportedExpressionError(
              `Slots of '${target.text}' must be indexed with a literal name`,
              this.loc(node)
            );
          }
          return {
            accessor: binding.accessor,
            kind: groupName === 'parameters' ? 'parameter' : 'artifact',
            slot,
          };
        }
      }
    }
    throw new UnsupportedExpressionError(
      `Unsupported reference '${node.getText(this.script.sourceFile)}'`,
      this.loc(node)
    );
  }

  private parameterOf(reference: SlotReference, node: ts.Node): BindingValue {
    if (reference.accessor.kind === 'input') {
      const value = reference.accessor.parameters.get(reference.slot);
      if (!value) throw this.undeclaredSlot(reference, node);
      return value;
    }
    const step = this.producerOf(reference.accessor, 'parameter', reference.slot, node);
    return [{ kind: 'step-output', stepId: step.id, slot: reference.slot }];
  }

  /**
   * The single earlier step that writes `slot` into this output accessor
   */
  private producerOf(
    accessor: OutputAccessor,
    kind: SlotKind,
    slot: string,
    node: ts.Node
  ): WorkflowStep {
    const declared =
      kind === 'parameter' ? accessor.parameters.has(slot) : accessor.artifacts.has(slot);
    if (!declared) {
      throw new UnboundReferenceError(
        `'${accessor.label}' declares no output ${kind} '${slot}'`,
        this.loc(node)
      );
    }
    if (accessor.producers.length === 0) {
      throw new UnboundReferenceError(
        `'${accessor.label}.${kind === 'parameter' ? 'parameters' : 'artifacts'}['${slot}']' is used before '${accessor.label}' is passed to a step`,
        this.loc(node)
      );
    }

    const writers = accessor.producers.filter(producer =>
      producer.step.outputBindings.some(binding => binding.slot === slot && binding.kind === kind)
    );
    if (writers.length === 0) {
      throw new UnboundReferenceError(
        `No step writes output ${kind} '${slot}' of '${accessor.label}'`,
        this.loc(node)
      );
    }
    if (writers.length > 1) {
      throw new UnboundReferenceError(
        `Output ${kind} '${slot}' of '${accessor.label}' is written by more than one step (${writers.map(w => w.step.id).join(', ')})`,
        this.loc(node)
      );
    }

    const [writer] = writers;
    if (writer.iterated) {
      throw new UnsupportedConstructError(
        `Output ${kind} '${slot}' of '${accessor.label}' comes from iterated step '${writer.step.id}' and cannot be consumed`,
        this.loc(node)
      );
    }
    return writer.step;
  }

  private readFileLocator(
    node: ts.NewExpression,
    type: string
  ): { mountPoint: MountPoint; key: BindingValue } {
    const args = node.arguments ?? ts.factory.createNodeArray<ts.Expression>();
    if (args.length !== 2) {
      throw new UnsupportedConstructError(
        `${type} takes (mountPoint, path), got ${args.length} argument(s)`,
        this.loc(node)
      );
    }
    const [rootArg, pathArg] = args;
    const root = unwrapParentheses(rootArg);
    const binding = ts.isIdentifier(root) ? this.lookup(root) : undefined;
    if (ts.isIdentifier(root) && !binding) {
      throw this.unbound(root);
    }
    if (binding?.kind !== 'declaration' || binding.declaration.kind !== 'mount-point') {
      throw new UnsupportedExpressionError(
        `The first argument of ${type} must be a declared mount point`,
        this.loc(rootArg)
      );
    }

    const mountPoint = binding.declaration;
    const relative = this.resolveParameterValue(pathArg);
    if (relative.some(isLoopField)) {
      throw new UnsupportedExpressionError(
        `Loop item fields are read inside the step container and cannot name a ${type} path`,
        this.loc(pathArg)
      );
    }
    const first = relative[0];
    const trimmed: BindingValue =
      first && first.kind === 'literal'
        ? [{ kind: 'literal', value: first.value.replace(/^\/+/, '') }, ...relative.slice(1)]
        : relative;
    const key = mountPoint.prefix
      ? normalizeValue([{ kind: 'literal', value: `${mountPoint.prefix}/` }, ...trimmed])
      : normalizeValue(trimmed);
    return { mountPoint, key };
  }

  private undeclaredSlot(reference: SlotReference, node: ts.Node): UnboundReferenceError {
    return new UnboundReferenceError(
      `'${reference.accessor.label}' has no ${reference.kind} '${reference.slot}' (declared at ${formatLocation(reference.accessor.location)})`,
      this.loc(node)
    );
  }

  private unbound(node: ts.Identifier): UnboundReferenceError {
    return new UnboundReferenceError(
      `'${node.text}' is not a declared parameter, mount point, accessor or loop variable`,
      this.loc(node)
    );
  }

  private loc(node: ts.Node): SourceLocation {
    return locationOf(this.script, node);
  }
}

function isLoopField(part: ValuePart): boolean {
  return part.kind === 'loop-item' && part.field !== undefined;
}
