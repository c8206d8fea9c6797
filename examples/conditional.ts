/**
 * Sibling branches guarded by a workflow parameter. Both steps sit in the first stage; Argo
 * skips the one whose `when` is false.
 */
import { param, StepInput, StepOutput } from 'stagecraft';

const mode = param('alpha');
const inputVal = param('1');

/** @step */
export function addAlpha(input: StepInput, output: StepOutput): void {
  output.parameters['out-value'] = `${input.parameters['init-value']}a`;
}

/** @step */
export function addBeta(input: StepInput, output: StepOutput): void {
  output.parameters['out-value'] = `${input.parameters['init-value']}b`;
}

/** @entrypoint */
export function main({ mode, inputVal }: { mode: string; inputVal: string }): void {
  const valueIn = new StepInput({ parameters: { 'init-value': inputVal } });
  const alphaOut = new StepOutput({ parameters: { 'out-value': null } });
  const betaOut = new StepOutput({ parameters: { 'out-value': null } });

  if (mode === 'alpha') {
    addAlpha(valueIn, alphaOut);
  } else {
    addBeta(valueIn, betaOut);
  }
}

if (require.main === module) {
  main({ mode, inputVal });
}
