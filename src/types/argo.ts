/**
 * Shape of the emitted Argo Workflow document. Only the fields the transpiler writes are
 * modelled; property order here is the order they are serialised in.
 */

export interface NamedParameter {
  name: string;
  value?: string;
}

export interface S3Location {
  endpoint: string;
  bucket: string;
  key: string;
}

export interface ArtifactArgument {
  name: string;
  from?: string;
  s3?: S3Location;
}

export interface StepInvocation {
  name: string;
  template: string;
  arguments?: {
    parameters?: NamedParameter[];
    artifacts?: ArtifactArgument[];
  };
  when?: string;
  withSequence?: { count: string };
}

export interface InputArtifactDecl {
  name: string;
  path: string;
  optional?: boolean;
}

export interface OutputParameterDecl {
  name: string;
  valueFrom: { path: string };
}

export interface OutputArtifactDecl {
  name: string;
  path: string;
  archive: { none: Record<string, never> };
  s3?: S3Location;
}

export interface ResourceRequirements {
  requests: { cpu: string; memory: string };
  limits: { cpu: string; memory: string };
}

export interface VolumeMount {
  name: string;
  mountPath: string;
}

export interface InitContainer {
  name: string;
  image: string;
  command: string[];
  mirrorVolumeMounts: boolean;
}

export interface EnvVar {
  name: string;
  value: string;
}

export interface ScriptTemplate {
  name: string;
  inputs: {
    parameters?: NamedParameter[];
    artifacts?: InputArtifactDecl[];
  };
  outputs: {
    parameters?: OutputParameterDecl[];
    artifacts?: OutputArtifactDecl[];
  };
  initContainers: InitContainer[];
  script: {
    image: string;
    command: string[];
    env?: EnvVar[];
    source: string;
    resources: ResourceRequirements;
    volumeMounts: VolumeMount[];
  };
}

export interface StepsTemplate {
  name: string;
  steps: StepInvocation[][];
}

export type Template = StepsTemplate | ScriptTemplate;

export interface WorkflowDocument {
  apiVersion: 'argoproj.io/v1alpha1';
  kind: 'Workflow';
  metadata: { generateName: string };
  spec: {
    entrypoint: string;
    arguments?: { parameters: NamedParameter[] };
    volumes: Array<{ name: string; emptyDir: Record<string, never> }>;
    templates: Template[];
  };
}
