/*
 Public entry point.
 - Runtime: what workflow scripts import to run locally.
 - Compiler: turns a script into an Argo Workflow document.
*/

export * from './runtime';

export { transpileSource, transpileFile, loadConfigFor, workflowNameOf } from './transpiler';
export type {
  TranspileOptions,
  TranspileResult,
  TranspileFileOptions,
  TranspileFileResult,
} from './transpiler';
export { ConfigManager, createDefaultConfig } from './config';
export type { StagecraftConfig, StagecraftConfigFile } from './types/config';
export type { WorkflowDocument } from './types/argo';
export type { Workflow, WorkflowStep, StageGraph } from './types/ir';
export {
  TranspileError,
  SignatureError,
  SlotContractError,
  UnboundReferenceError,
  UnsupportedExpressionError,
  UnsupportedConstructError,
  UnsupportedAccessPatternError,
  DuplicateDeclarationError,
  formatDiagnostic,
} from './errors';
export type { SourceLocation, TranspileErrorKind } from './errors';
