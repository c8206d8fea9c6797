import * as fs from 'fs';
import * as path from 'path';
import { renderGuard } from '../../src/transpile/guard-translator';
import { transpileSource, workflowNameOf } from '../../src/transpiler';
import type { TranspileResult } from '../../src/transpiler';
import type { StepsTemplate } from '../../src/types/argo';
import { stageIds, stepById } from '../helpers/pipeline';

const EXAMPLES_DIR = path.join(__dirname, '..', '..', 'examples');

function compileExample(file: string): TranspileResult {
  const source = fs.readFileSync(path.join(EXAMPLES_DIR, file), 'utf8');
  return transpileSource(source, { fileName: `examples/${file}`, name: workflowNameOf(file) });
}

function entryTemplate(result: TranspileResult): StepsTemplate {
  const [first] = result.document.spec.templates;
  if (!first || !('steps' in first)) {
    throw new Error('expected the entry steps template first');
  }
  return first;
}

describe('example workflows', () => {
  it('should compile a single step', () => {
    const result = compileExample('single-step.ts');

    expect(result.workflow.name).toBe('single-step');
    expect(stageIds(result.workflow.stageGraph)).toEqual([['add-alpha']]);
    expect(result.document.spec.templates.map(t => t.name)).toEqual(['main', 'exec-add-alpha']);
    expect(entryTemplate(result).steps).toEqual([
      [
        {
          name: 'add-alpha',
          template: 'exec-add-alpha',
          arguments: {
            parameters: [{ name: 'init-value', value: '{{workflow.parameters.input-val}}' }],
          },
        },
      ],
    ]);
  });

  it('should chain dependent steps into consecutive stages', () => {
    const { workflow, parametersYaml } = compileExample('multi-step.ts');

    expect(stageIds(workflow.stageGraph)).toEqual([['add-alpha'], ['add-beta']]);
    expect(stepById(workflow.stageGraph, 'add-beta').dependencies).toEqual(['add-alpha']);
    expect(parametersYaml).toBe("input-val: '1'\n");
  });

  it('should guard sibling branches', () => {
    const { workflow } = compileExample('conditional.ts');
    const alpha = "'{{workflow.parameters.mode}}' == 'alpha'";

    expect(stageIds(workflow.stageGraph)).toEqual([['add-alpha', 'add-beta']]);
    const alphaGuard = stepById(workflow.stageGraph, 'add-alpha').guard;
    const betaGuard = stepById(workflow.stageGraph, 'add-beta').guard;
    expect(alphaGuard && renderGuard(alphaGuard)).toBe(alpha);
    expect(betaGuard && renderGuard(betaGuard)).toBe(`!(${alpha})`);
  });

  it('should split a CSV artifact into loop items', () => {
    const result = compileExample('csv-iter.ts');
    const { workflow } = result;

    expect(stageIds(workflow.stageGraph)).toEqual([['select-rows'], ['split-person'], ['greet']]);
    const split = stepById(workflow.stageGraph, 'split-person');
    expect(split.splitFormat).toBe('csv');
    expect(split.outputBindings).toEqual([
      { slot: 'count', kind: 'parameter' },
      { slot: 'items', kind: 'artifact', destination: { kind: 'temporary' } },
    ]);
    expect(stepById(workflow.stageGraph, 'greet').iteration).toEqual({
      kind: 'collection',
      splitStepId: 'split-person',
    });
    expect(workflow.usesSplit).toBe(true);
    expect(result.document.spec.templates.map(t => t.name)).toEqual([
      'main',
      'exec-select-rows',
      'exec-greet',
      'split-items',
    ]);
    expect(result.parametersYaml).toBe('limit: 2\n');
  });

  it('should guard and repeat a step that reads a remote artifact', () => {
    const { workflow } = compileExample('full-artifacts.ts');
    const publish = stepById(workflow.stageGraph, 'publish');

    expect(stageIds(workflow.stageGraph)).toEqual([['measure'], ['publish']]);
    expect(publish.dependencies).toEqual(['measure']);
    expect(publish.iteration).toEqual({
      kind: 'count',
      count: { kind: 'workflow-parameter', name: 'shards' },
    });
    expect(publish.guard && renderGuard(publish.guard)).toBe(
      "'{{workflow.parameters.label}}' != 'dry-run' && '{{steps.measure.outputs.parameters.total}}' != '0'"
    );
  });
});
