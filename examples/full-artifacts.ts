/**
 * Remote inputs and outputs, an async step with a helper, a guard on a step output and a
 * counted loop whose output locations depend on the loop index.
 */
import {
  FileInput,
  FileOutput,
  iterate,
  mountPoint,
  param,
  StepInput,
  StepOutput,
} from 'stagecraft';
import type { ArtifactHandle, MountPoint } from 'stagecraft';

const data = mountPoint('examples/data', 's3://example-bucket/reports');
const label = param('nightly');
const shards = param(2);

async function readNumbers(file: ArtifactHandle): Promise<number[]> {
  const text = await Promise.resolve(file.read());
  return text
    .split(/\s+/)
    .filter(Boolean)
    .map(Number);
}

/** @step image=node:20-alpine cpu=100m memory=64Mi */
export async function measure(input: StepInput, output: StepOutput): Promise<void> {
  const values = await readNumbers(input.artifacts['source']);
  const total = values.reduce((sum, value) => sum + value, 0);
  output.parameters['total'] = total;
  output.artifacts['summary'].write(JSON.stringify({ label, total, count: values.length }));
}

/** @step */
export function publish(input: StepInput, output: StepOutput): void {
  const summary: unknown = JSON.parse(input.artifacts['summary'].read());
  const report = { shard: Number(input.parameters['shard']), summary };
  output.artifacts['report'].write(JSON.stringify(report, null, 2));
}

/** @entrypoint */
export async function main({
  data,
  label,
  shards,
}: {
  data: MountPoint;
  label: string;
  shards: number;
}): Promise<void> {
  const measureIn = new StepInput({ artifacts: { source: new FileInput(data, 'numbers.txt') } });
  const measureOut = new StepOutput({
    parameters: { total: null },
    artifacts: { summary: new FileOutput(data, `summaries/${label}.json`) },
  });
  await measure(measureIn, measureOut);

  if (label !== 'dry-run' && measureOut.parameters['total'] != '0') {
    for (const shard of iterate(shards)) {
      const publishIn = new StepInput({
        parameters: { shard },
        artifacts: { summary: measureOut.artifacts['summary'] },
      });
      const publishOut = new StepOutput({
        artifacts: { report: new FileOutput(data, `published/${label}/shard-${shard}.json`) },
      });
      publish(publishIn, publishOut);
    }
  }
}

if (require.main === module) {
  main({ data, label, shards }).catch(error => {
    console.error(error);
    process.exit(1);
  });
}
