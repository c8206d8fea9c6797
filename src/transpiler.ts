import * as path from 'path';
import * as fs from 'fs';
import { ConfigManager } from './config';
import { logger } from './logger';
import type { WorkflowDocument } from './types/argo';
import type { StagecraftConfig } from './types/config';
import type { Workflow } from './types/ir';
import { scanDeclarations } from './transpile/declaration-scanner';
import { dumpParametersYaml, dumpWorkflowYaml, emitWorkflow } from './transpile/emitter';
import { resolveEntry } from './transpile/entry-resolver';
import { parseScript, toKebabCase } from './transpile/source';
import { buildStageGraph, SPLIT_TEMPLATE } from './transpile/step-graph-builder';
import { buildStepRegistry } from './transpile/step-registry';
import { buildStepTemplates } from './transpile/template-builder';
import { FileWrite, writeFilesAtomic } from './utils/atomic-write';

export interface TranspileOptions {
  /** File name shown in diagnostics; its base name also names the workflow */
  fileName?: string;
  /** Workflow name override (kebab-case) */
  name?: string;
  /** Resolved configuration; defaults apply when omitted */
  config?: StagecraftConfig;
}

export interface TranspileResult {
  workflow: Workflow;
  document: WorkflowDocument;
  yaml: string;
  /** Parameter defaults for `argo submit --parameter-file` */
  parametersYaml: string;
}

export interface TranspileFileOptions {
  /** Workflow output path; defaults to `<script dir>/<script name>.yaml` */
  outputPath?: string;
  /** Write `<script name>-parameters.yaml` next to the workflow (default: true) */
  writeParametersFile?: boolean;
  /** Explicit configuration file; otherwise one is looked up beside the script and in cwd */
  configPath?: string;
  config?: StagecraftConfig;
}

export interface TranspileFileResult extends TranspileResult {
  outputPath: string;
  parametersPath?: string;
}

/**
 * Compile workflow script source to an Argo Workflow. Throws a `TranspileError` on the first
 * problem found; nothing is produced in that case.
 */
export function transpileSource(source: string, options: TranspileOptions = {}): TranspileResult {
  const fileName = options.fileName ?? 'workflow.ts';
  const config = options.config ?? new ConfigManager().getDefaultConfig();
  const name = options.name ?? workflowNameOf(fileName);

  const script = parseScript(source, fileName);
  const declarations = scanDeclarations(script);
  const registry = buildStepRegistry(script, declarations);
  const entry = resolveEntry(script, declarations, registry);
  const stageGraph = buildStageGraph(script, declarations, registry, entry);
  const templates = buildStepTemplates(script, registry, stageGraph, config.workdir);

  const workflow: Workflow = {
    name,
    entrypoint: toKebabCase(entry.name),
    parameters: declarations.parameters,
    mountPoints: declarations.mountPoints,
    stageGraph,
    templates,
    usesSplit: stageGraph.steps.some(step => step.templateName === SPLIT_TEMPLATE),
  };

  const document = emitWorkflow(workflow, config);
  logger.verbose(
    `Compiled '${name}': ${stageGraph.steps.length} step(s), ${stageGraph.stages.length} stage(s), ${templates.length} template(s)`
  );
  return {
    workflow,
    document,
    yaml: dumpWorkflowYaml(document),
    parametersYaml: dumpParametersYaml(workflow),
  };
}

/**
 * Compile a script file and write the workflow (and its parameters file). Files are only
 * written once compilation has succeeded.
 */
export async function transpileFile(
  sourcePath: string,
  options: TranspileFileOptions = {}
): Promise<TranspileFileResult> {
  const resolved = path.resolve(sourcePath);
  const source = await fs.promises.readFile(resolved, 'utf8');
  const config = options.config ?? (await loadConfigFor(resolved, options.configPath));

  const result = transpileSource(source, {
    fileName: path.relative(process.cwd(), resolved) || resolved,
    name: workflowNameOf(resolved),
    config,
  });

  const outputPath = path.resolve(
    options.outputPath ?? path.join(path.dirname(resolved), `${result.workflow.name}.yaml`)
  );
  const parametersPath =
    options.writeParametersFile === false
      ? undefined
      : path.join(path.dirname(outputPath), `${result.workflow.name}-parameters.yaml`);

  const files: FileWrite[] = [{ path: outputPath, content: result.yaml }];
  if (parametersPath) {
    files.push({ path: parametersPath, content: result.parametersYaml });
  }
  await writeFilesAtomic(files);
  logger.info(`Wrote workflow to ${outputPath}`);
  if (parametersPath) {
    logger.info(`Wrote parameters to ${parametersPath}`);
  }

  return { ...result, outputPath, parametersPath };
}

/**
 * Load the configuration that applies to a script
 */
export async function loadConfigFor(
  sourcePath: string,
  configPath?: string
): Promise<StagecraftConfig> {
  const manager = new ConfigManager();
  if (configPath) {
    return manager.loadConfig(configPath);
  }
  return manager.findAndLoadConfig([path.dirname(sourcePath), process.cwd()]);
}

/**
 * `examples/multi_step.ts` -> `multi-step`
 */
export function workflowNameOf(fileName: string): string {
  const base = path.basename(fileName).replace(/\.(m|c)?[jt]sx?$/, '');
  return toKebabCase(base) || 'workflow';
}
