/**
 * One step, one workflow parameter.
 *
 *   npx ts-node examples/single-step.ts                      # run locally
 *   stagecraft transpile examples/single-step.ts --stdout    # print the Argo workflow
 */
import { mountPoint, param, StepInput, StepOutput } from 'stagecraft';
import type { MountPoint } from 'stagecraft';

const root = mountPoint('/tmp/stagecraft-data', 's3://example-bucket/runs');
const inputVal = param('1');

/**
 * Appends a letter to its input
 * @step
 */
export function addAlpha(input: StepInput, output: StepOutput): void {
  const value = `${input.parameters['init-value']}a`;
  console.log(`add-alpha: ${value}`);
  output.parameters['out-value'] = value;
}

/** @entrypoint */
export function main({ root, inputVal }: { root: MountPoint; inputVal: string }): void {
  const alphaIn = new StepInput({ parameters: { 'init-value': inputVal } });
  const alphaOut = new StepOutput({ parameters: { 'out-value': null } });
  addAlpha(alphaIn, alphaOut);
}

if (require.main === module) {
  main({ root, inputVal });
}
