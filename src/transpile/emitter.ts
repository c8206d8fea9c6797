import * as yaml from 'js-yaml';
import type {
  ArtifactArgument,
  EnvVar,
  InitContainer,
  InputArtifactDecl,
  NamedParameter,
  ResourceRequirements,
  ScriptTemplate,
  StepInvocation,
  StepsTemplate,
  WorkflowDocument,
} from '../types/argo';
import type { StagecraftConfig } from '../types/config';
import type {
  ArtifactSource,
  BindingValue,
  StepTemplate,
  Workflow,
  WorkflowStep,
} from '../types/ir';
import { renderGuard } from './guard-translator';
import {
  inputParameterRef,
  renderPart,
  renderValue,
  stepOutputArtifactRef,
} from './placeholders';
import { renderSplitScript } from './script-templates';
import { SPLIT_TEMPLATE } from './step-graph-builder';
import { remoteBucketParameter, remoteKeyParameter } from './template-builder';
import {
  LOOP_FIELDS_ENV,
  LOOP_FIELDS_PARAMETER,
  LOOP_INDEX_ENV,
  LOOP_INDEX_PARAMETER,
  LOOP_ITEMS_ARTIFACT,
  inputArtifactPath,
  inputParameterEnv,
  outputArtifactPath,
  outputParameterPath,
  workflowParameterEnv,
} from './workdir';

export const WORKDIR_VOLUME = 'workdir';
const INIT_IMAGE = 'alpine:latest';

/**
 * Build the Argo Workflow document. Arrays keep the order of the IR, so the same workflow
 * always produces the same document.
 */
export function emitWorkflow(workflow: Workflow, config: StagecraftConfig): WorkflowDocument {
  const root: StepsTemplate = {
    name: workflow.entrypoint,
    steps: workflow.stageGraph.stages.map(stage =>
      stage.steps.map(step => emitInvocation(step, workflow, config))
    ),
  };

  const templates: WorkflowDocument['spec']['templates'] = [
    root,
    ...workflow.templates.map(template => emitStepTemplate(template, config)),
  ];
  if (workflow.usesSplit) {
    templates.push(emitSplitTemplate(config));
  }

  const document: WorkflowDocument = {
    apiVersion: 'argoproj.io/v1alpha1',
    kind: 'Workflow',
    metadata: { generateName: `${config.generateNamePrefix}${workflow.name}-` },
    spec: {
      entrypoint: workflow.entrypoint,
      ...(workflow.parameters.length > 0
        ? { arguments: { parameters: workflow.parameters.map(p => ({ name: p.name })) } }
        : {}),
      volumes: [{ name: WORKDIR_VOLUME, emptyDir: {} }],
      templates,
    },
  };
  return document;
}

function emitInvocation(
  step: WorkflowStep,
  workflow: Workflow,
  config: StagecraftConfig
): StepInvocation {
  const parameters: NamedParameter[] = [];
  const artifacts: ArtifactArgument[] = [];

  const loopFields: string[] = [];
  for (const binding of step.inputBindings) {
    if (binding.kind === 'artifact') {
      artifacts.push(emitArtifactArgument(binding.slot, binding.source, config));
    } else if (usesLoopFields(binding.value)) {
      loopFields.push(binding.slot);
      parameters.push({ name: binding.slot, value: renderLoopFieldValue(binding.value) });
    } else {
      parameters.push({ name: binding.slot, value: renderValue(binding.value) });
    }
  }

  const template = workflow.templates.find(t => t.name === step.templateName);
  for (const binding of step.outputBindings) {
    if (
      binding.kind === 'artifact' &&
      binding.destination.kind === 's3' &&
      template?.remoteOutputs.includes(binding.slot)
    ) {
      parameters.push(
        { name: remoteBucketParameter(binding.slot), value: binding.destination.bucket },
        { name: remoteKeyParameter(binding.slot), value: renderValue(binding.destination.key) }
      );
    }
  }

  if (step.iteration?.kind === 'collection') {
    const split = step.iteration.splitStepId;
    parameters.push({ name: LOOP_INDEX_PARAMETER, value: '{{item}}' });
    if (loopFields.length > 0) {
      parameters.push({ name: LOOP_FIELDS_PARAMETER, value: JSON.stringify(loopFields) });
    }
    artifacts.push({ name: LOOP_ITEMS_ARTIFACT, from: stepOutputArtifactRef(split, 'items') });
  }

  const invocation: StepInvocation = { name: step.id, template: step.templateName };
  if (parameters.length > 0 || artifacts.length > 0) {
    invocation.arguments = {};
    if (parameters.length > 0) invocation.arguments.parameters = parameters;
    if (artifacts.length > 0) invocation.arguments.artifacts = artifacts;
  }
  if (step.guard) {
    invocation.when = renderGuard(step.guard);
  }
  if (step.iteration?.kind === 'count') {
    invocation.withSequence = { count: renderPart(step.iteration.count) };
  } else if (step.iteration?.kind === 'collection') {
    const count = { kind: 'step-output', stepId: step.iteration.splitStepId, slot: 'count' } as const;
    invocation.withSequence = { count: renderPart(count) };
  }
  return invocation;
}

function usesLoopFields(value: BindingValue): boolean {
  return value.some(part => part.kind === 'loop-item' && part.field !== undefined);
}

/**
 * Values built from loop item fields are resolved in the container, which reads the item
 * from the split artifact; the argument carries the recipe as a JSON array of text and
 * `{ field }` segments
 */
function renderLoopFieldValue(value: BindingValue): string {
  const segments = value.map(part => {
    if (part.kind === 'literal') return part.value;
    if (part.kind === 'loop-item' && part.field !== undefined) return { field: part.field };
    throw new Error(`Unexpected ${part.kind} part in a loop item value`);
  });
  return JSON.stringify(segments);
}

function emitArtifactArgument(
  slot: string,
  source: ArtifactSource,
  config: StagecraftConfig
): ArtifactArgument {
  if (source.kind === 'step-output') {
    return { name: slot, from: stepOutputArtifactRef(source.stepId, source.slot) };
  }
  return {
    name: slot,
    s3: { endpoint: config.s3.endpoint, bucket: source.bucket, key: renderValue(source.key) },
  };
}

function emitStepTemplate(template: StepTemplate, config: StagecraftConfig): ScriptTemplate {
  const { step } = template;
  const { workdir } = config;

  const inputParameters: NamedParameter[] = step.contract.inputs
    .filter(slot => slot.kind === 'parameter')
    .map(slot => ({ name: slot.name }));
  for (const slot of template.remoteOutputs) {
    inputParameters.push({ name: remoteBucketParameter(slot) }, { name: remoteKeyParameter(slot) });
  }
  const inputArtifacts: InputArtifactDecl[] = step.contract.inputs
    .filter(slot => slot.kind === 'artifact')
    .map(slot => ({ name: slot.name, path: inputArtifactPath(workdir, slot.name) }));
  if (template.loopItems) {
    inputParameters.push(
      { name: LOOP_INDEX_PARAMETER, value: '' },
      { name: LOOP_FIELDS_PARAMETER, value: '[]' }
    );
    inputArtifacts.push({
      name: LOOP_ITEMS_ARTIFACT,
      path: inputArtifactPath(workdir, LOOP_ITEMS_ARTIFACT),
      optional: true,
    });
  }

  const outputParameters = step.contract.outputs
    .filter(slot => slot.kind === 'parameter')
    .map(slot => ({
      name: slot.name,
      valueFrom: { path: outputParameterPath(workdir, slot.name) },
    }));
  const outputArtifacts = step.contract.outputs
    .filter(slot => slot.kind === 'artifact')
    .map(slot => ({
      name: slot.name,
      path: outputArtifactPath(workdir, slot.name),
      archive: { none: {} },
      ...(template.remoteOutputs.includes(slot.name)
        ? {
            s3: {
              endpoint: config.s3.endpoint,
              bucket: `{{inputs.parameters.${remoteBucketParameter(slot.name)}}}`,
              key: `{{inputs.parameters.${remoteKeyParameter(slot.name)}}}`,
            },
          }
        : {}),
    }));

  const resources: ResourceRequirements = {
    requests: {
      cpu: step.options.cpu ?? config.resources.requests.cpu,
      memory: step.options.memory ?? config.resources.requests.memory,
    },
    limits: {
      cpu: step.options.cpu ?? config.resources.limits.cpu,
      memory: step.options.memory ?? config.resources.limits.memory,
    },
  };

  const env = containerEnv(template);

  return {
    name: template.name,
    inputs: {
      ...(inputParameters.length > 0 ? { parameters: inputParameters } : {}),
      ...(inputArtifacts.length > 0 ? { artifacts: inputArtifacts } : {}),
    },
    outputs: {
      ...(outputParameters.length > 0 ? { parameters: outputParameters } : {}),
      ...(outputArtifacts.length > 0 ? { artifacts: outputArtifacts } : {}),
    },
    initContainers: initContainers(workdir),
    script: {
      image: step.options.image ?? config.image,
      command: [...config.command],
      ...(env.length > 0 ? { env } : {}),
      source: template.embeddedSource,
      resources,
      volumeMounts: [{ name: WORKDIR_VOLUME, mountPath: workdir }],
    },
  };
}

/**
 * Parameters reach the step script through its environment, so their text is never parsed
 * as part of the script
 */
function containerEnv(template: StepTemplate): EnvVar[] {
  const { step } = template;
  const env: EnvVar[] = step.contract.inputs
    .filter(slot => slot.kind === 'parameter')
    .map(slot => ({ name: inputParameterEnv(slot.name), value: inputParameterRef(slot.name) }));

  const referenced = new Set(step.parameterReferences.map(reference => reference.parameter.name));
  for (const name of referenced) {
    env.push({
      name: workflowParameterEnv(name),
      value: renderPart({ kind: 'workflow-parameter', name }),
    });
  }

  if (template.loopItems) {
    env.push(
      { name: LOOP_INDEX_ENV, value: inputParameterRef(LOOP_INDEX_PARAMETER) },
      { name: LOOP_FIELDS_ENV, value: inputParameterRef(LOOP_FIELDS_PARAMETER) }
    );
  }
  return env;
}

function emitSplitTemplate(config: StagecraftConfig): ScriptTemplate {
  const { workdir } = config;
  return {
    name: SPLIT_TEMPLATE,
    inputs: {
      parameters: [{ name: 'format' }],
      artifacts: [{ name: 'source', path: inputArtifactPath(workdir, 'source') }],
    },
    outputs: {
      parameters: [
        { name: 'count', valueFrom: { path: outputParameterPath(workdir, 'count') } },
      ],
      artifacts: [
        { name: 'items', path: outputArtifactPath(workdir, 'items'), archive: { none: {} } },
      ],
    },
    initContainers: initContainers(workdir),
    script: {
      image: config.image,
      command: [...config.command],
      source: renderSplitScript(SPLIT_TEMPLATE, workdir),
      resources: {
        requests: { ...config.resources.requests },
        limits: { ...config.resources.limits },
      },
      volumeMounts: [{ name: WORKDIR_VOLUME, mountPath: workdir }],
    },
  };
}

function initContainers(workdir: string): InitContainer[] {
  return [
    {
      name: 'mkdir',
      image: INIT_IMAGE,
      command: ['mkdir', '-p', `${workdir}/in`, `${workdir}/out`],
      mirrorVolumeMounts: true,
    },
    {
      name: 'chmod',
      image: INIT_IMAGE,
      command: ['chmod', '-R', 'a+rwX', workdir],
      mirrorVolumeMounts: true,
    },
  ];
}

/**
 * Serialise a document: no anchors, no line folding, key order as built
 */
export function dumpWorkflowYaml(document: WorkflowDocument): string {
  return yaml.dump(document, { noRefs: true, lineWidth: -1 });
}

/**
 * `argo submit --parameter-file` input: each workflow parameter with its default
 */
export function dumpParametersYaml(workflow: Workflow): string {
  const values: Record<string, string | number | boolean> = {};
  for (const parameter of workflow.parameters) {
    values[parameter.name] = parameter.defaultValue;
  }
  return yaml.dump(values, { noRefs: true, lineWidth: -1 });
}
