/**
 * Fan-out over the rows of a CSV file: a split step turns the selected rows into loop items
 * and `greet` runs once per row.
 */
import { FileInput, iterate, mountPoint, param, StepInput, StepOutput } from 'stagecraft';
import type { MountPoint } from 'stagecraft';

const data = mountPoint('examples/data', 's3://example-bucket/people');
const limit = param(2);

/** @step */
export function selectRows(input: StepInput, output: StepOutput): void {
  const lines = input.artifacts['source']
    .read()
    .split('\n')
    .filter(line => line.trim() !== '');
  const [header, ...rows] = lines;
  const selected = rows.slice(0, Number(input.parameters['limit']));
  output.artifacts['rows'].write([header, ...selected].join('\n') + '\n');
}

/** @step */
export function greet(input: StepInput, output: StepOutput): void {
  const greeting = `Hello, ${input.parameters['name']} from ${input.parameters['city']}`;
  console.log(greeting);
  output.parameters['greeting'] = greeting;
}

/** @entrypoint */
export function main({ data, limit }: { data: MountPoint; limit: number }): void {
  const selectIn = new StepInput({
    parameters: { limit },
    artifacts: { source: new FileInput(data, 'people.csv') },
  });
  const selectOut = new StepOutput({ artifacts: { rows: null } });
  selectRows(selectIn, selectOut);

  for (const person of iterate(selectOut.artifacts['rows'], 'rows.csv')) {
    const greetIn = new StepInput({ parameters: { name: person.name, city: person.city } });
    const greetOut = new StepOutput({ parameters: { greeting: null } });
    greet(greetIn, greetOut);
  }
}

if (require.main === module) {
  main({ data, limit });
}
