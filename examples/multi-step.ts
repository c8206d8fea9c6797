/**
 * Two steps in sequence: the second consumes the output of the first, so they land in
 * consecutive stages.
 */
import { param, StepInput, StepOutput } from 'stagecraft';

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
export function main({ inputVal }: { inputVal: string }): void {
  const alphaIn = new StepInput({ parameters: { 'init-value': inputVal } });
  const alphaOut = new StepOutput({ parameters: { 'out-value': null } });
  addAlpha(alphaIn, alphaOut);

  const betaIn = new StepInput({ parameters: { 'init-value': alphaOut.parameters['out-value'] } });
  const betaOut = new StepOutput({ parameters: { 'out-value': null } });
  addBeta(betaIn, betaOut);
}

if (require.main === module) {
  main({ inputVal });
}
