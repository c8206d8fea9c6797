/**
 * Intermediate representation built by the transpiler pipeline.
 *
 * Values that end up in the emitted document are kept as closed variants
 * ({@link ValuePart}, {@link GuardExpr}) and only turned into placeholder text by the emitter.
 */

import type * as ts from 'typescript';
import type { SourceLocation } from '../errors';

export type { SourceLocation };

export type LiteralValue = string | number | boolean;

/**
 * A declared mapping between a local filesystem root and an S3 root
 */
export interface MountPoint {
  kind: 'mount-point';
  /** Identifier in the workflow script */
  identifier: string;
  /** Kebab-case name */
  name: string;
  localRoot: string;
  remoteRoot: string;
  bucket: string;
  /** Key prefix inside the bucket, without leading or trailing slash */
  prefix: string;
  location: SourceLocation;
  /** Name node of the declaration, used for symbol resolution */
  declarationName: ts.Identifier;
}

/**
 * Workflow-scoped named value, overridable when the workflow is submitted
 */
export interface WorkflowParameter {
  kind: 'parameter';
  identifier: string;
  name: string;
  defaultValue: LiteralValue;
  location: SourceLocation;
  declarationName: ts.Identifier;
}

export type Declaration = MountPoint | WorkflowParameter;

export interface DeclarationSet {
  /** All declarations in source order */
  all: Declaration[];
  mountPoints: MountPoint[];
  parameters: WorkflowParameter[];
}

export type SlotKind = 'parameter' | 'artifact';
export type SlotDirection = 'input' | 'output';

export interface IOSlot {
  name: string;
  kind: SlotKind;
}

export interface InputSlot extends IOSlot {
  direction: 'input';
}

export interface OutputSlot extends IOSlot {
  direction: 'output';
}

/**
 * Slots a step function body actually touches
 */
export interface StepContract {
  inputs: InputSlot[];
  outputs: OutputSlot[];
}

/** Options given in the `@step` tag */
export interface StepOptions {
  image?: string;
  cpu?: string;
  memory?: string;
}

/**
 * One direct `param.parameters[key]` / `param.artifacts[key]` chain inside a step body
 */
export interface AccessorUse {
  /** The whole access expression, replaced by the embedded rendering */
  node: ts.ElementAccessExpression | ts.PropertyAccessExpression;
  direction: SlotDirection;
  kind: SlotKind;
  slot: string;
  /** Set for output parameter writes (`out.parameters[key] = value`) */
  assignment?: ts.BinaryExpression;
}

export interface ParameterReference {
  node: ts.Identifier;
  parameter: WorkflowParameter;
}

export interface StepFunction {
  /** Function identifier */
  name: string;
  templateName: string;
  /** Parameter names of the input and output accessors */
  inputParam: string;
  outputParam: string;
  /** Index of the input accessor in the parameter list */
  inputIndex: 0 | 1;
  contract: StepContract;
  options: StepOptions;
  isAsync: boolean;
  accessorUses: AccessorUse[];
  /** References to top-level workflow parameters inside the body */
  parameterReferences: ParameterReference[];
  /**
   * Top-level statements the body depends on, transitively, in source order: helper
   * functions, constants and imports
   */
  support: ts.Statement[];
  node: ts.FunctionDeclaration;
  location: SourceLocation;
}

export interface StepRegistry {
  steps: Map<string, StepFunction>;
  /** Every top-level function with a body, by name */
  functions: Map<string, ts.FunctionDeclaration>;
  /** Top-level functions each function refers to */
  callGraph: Map<string, string[]>;
}

/**
 * The entry function and how its parameter binds declarations
 */
export interface EntryFunction {
  name: string;
  node: ts.FunctionDeclaration;
  /** Local binding name node for each declaration identifier */
  bindings: Map<string, ts.Identifier>;
  location: SourceLocation;
}

export type ValuePart =
  | { kind: 'literal'; value: string }
  | { kind: 'workflow-parameter'; name: string }
  | { kind: 'step-output'; stepId: string; slot: string }
  | { kind: 'loop-item'; field?: string };

/** Ordered parts, concatenated at emission */
export type BindingValue = ValuePart[];

export type ArtifactSource =
  | { kind: 's3'; mountPoint: string; bucket: string; key: BindingValue }
  | { kind: 'step-output'; stepId: string; slot: string };

export type InputBinding =
  | { slot: string; kind: 'parameter'; value: BindingValue }
  | { slot: string; kind: 'artifact'; source: ArtifactSource };

export type ArtifactDestination =
  | { kind: 'temporary' }
  | { kind: 's3'; mountPoint: string; bucket: string; key: BindingValue };

export type OutputBinding =
  | { slot: string; kind: 'parameter' }
  | { slot: string; kind: 'artifact'; destination: ArtifactDestination };

/** What a guard operand holds at run time: parameter defaults decide for workflow parameters */
export type GuardValueType = 'string' | 'number' | 'boolean';

export type GuardOperand =
  | { kind: 'literal'; value: string | number | boolean }
  | {
      kind: 'reference';
      part: Exclude<ValuePart, { kind: 'literal' }>;
      type: GuardValueType;
    };

export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

export type GuardExpr =
  | { kind: 'compare'; operator: ComparisonOperator; left: GuardOperand; right: GuardOperand }
  | { kind: 'truthy'; operand: GuardOperand }
  | { kind: 'and'; left: GuardExpr; right: GuardExpr }
  | { kind: 'or'; left: GuardExpr; right: GuardExpr }
  | { kind: 'not'; operand: GuardExpr };

export type IterationSpec =
  | { kind: 'count'; count: ValuePart }
  | { kind: 'collection'; splitStepId: string };

export type CollectionFormat = 'json' | 'csv';

export interface WorkflowStep {
  id: string;
  templateName: string;
  /** Step function name; absent for synthesized split steps */
  functionName?: string;
  inputBindings: InputBinding[];
  outputBindings: OutputBinding[];
  guard?: GuardExpr;
  iteration?: IterationSpec;
  /** Set for split steps */
  splitFormat?: CollectionFormat;
  /** Ids of the steps this one consumes */
  dependencies: string[];
  stageIndex: number;
  location: SourceLocation;
}

export interface Stage {
  index: number;
  steps: WorkflowStep[];
}

export interface StageGraph {
  stages: Stage[];
  /** Every step in source order */
  steps: WorkflowStep[];
}

/**
 * The compilation result, before serialisation
 */
export interface Workflow {
  /** Kebab-case script name, used for `generateName` and output file names */
  name: string;
  entrypoint: string;
  parameters: WorkflowParameter[];
  mountPoints: MountPoint[];
  stageGraph: StageGraph;
  /** Invoked step functions, in order of first invocation */
  templates: StepTemplate[];
  usesSplit: boolean;
}

/**
 * A step function as it appears in the document: one per function, shared by every call site
 */
export interface StepTemplate {
  name: string;
  step: StepFunction;
  /** Output artifacts written to S3 (their bucket/key arrive as hidden input parameters) */
  remoteOutputs: string[];
  /** Some call site runs once per item of a split collection */
  loopItems: boolean;
  embeddedSource: string;
}
