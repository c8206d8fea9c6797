/**
 * Where step containers find their inputs and leave their outputs: files under the shared
 * emptyDir volume, parameters in the environment
 */

export function inputArtifactPath(workdir: string, slot: string): string {
  return `${joinRoot(workdir)}/in/${slot}`;
}

export function outputParameterPath(workdir: string, slot: string): string {
  return `${joinRoot(workdir)}/out/parameters/${slot}`;
}

export function outputArtifactPath(workdir: string, slot: string): string {
  return `${joinRoot(workdir)}/out/artifacts/${slot}`;
}

function joinRoot(workdir: string): string {
  return workdir === '/' ? '' : workdir;
}

/** Hidden inputs of a step that runs once per item of a split collection */
export const LOOP_INDEX_PARAMETER = 'loop-index';
export const LOOP_FIELDS_PARAMETER = 'loop-fields';
export const LOOP_ITEMS_ARTIFACT = 'loop-items';

/** Environment of the step container: input and workflow parameters arrive as variables */
export const LOOP_INDEX_ENV = 'LOOP_INDEX';
export const LOOP_FIELDS_ENV = 'LOOP_FIELDS';

export function inputParameterEnv(slot: string): string {
  return `INPUT_${slot}`;
}

export function workflowParameterEnv(name: string): string {
  return `WORKFLOW_${name}`;
}
