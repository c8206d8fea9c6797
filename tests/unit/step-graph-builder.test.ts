import {
  SignatureError,
  SlotContractError,
  UnboundReferenceError,
  UnsupportedConstructError,
  UnsupportedExpressionError,
} from '../../src/errors';
import { renderGuard } from '../../src/transpile/guard-translator';
import type { GuardExpr } from '../../src/types/ir';
import {
  DEFAULT_DECLARATIONS,
  graphOf,
  scriptWithEntry,
  stageIds,
  stepById,
} from '../helpers/pipeline';

const LOAD_STEP = `/** @step */
function load(input: StepInput, output: StepOutput): void {
  output.artifacts['rows'].write(input.artifacts['data'].read());
}`;

const WITH_LOAD = `${DEFAULT_DECLARATIONS}\n\n${LOAD_STEP}`;

function lines(...body: string[]): string {
  return body.map(line => `  ${line}`).join('\n');
}

function when(guard: GuardExpr | undefined): string | undefined {
  return guard && renderGuard(guard);
}

describe('buildStageGraph', () => {
  describe('stages', () => {
    it('should put a consumer one stage after its producer', () => {
      const graph = graphOf(
        scriptWithEntry(
          lines(
            "const aIn = new StepInput({ parameters: { 'init-value': inputVal } });",
            "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
            'addAlpha(aIn, aOut);',
            "const bIn = new StepInput({ parameters: { 'init-value': aOut.parameters['out-value'] } });",
            "const bOut = new StepOutput({ parameters: { 'out-value': null } });",
            'addBeta(bIn, bOut);'
          )
        )
      );

      expect(stageIds(graph)).toEqual([['add-alpha'], ['add-beta']]);
      expect(stepById(graph, 'add-alpha').inputBindings).toEqual([
        { slot: 'init-value', kind: 'parameter', value: [{ kind: 'workflow-parameter', name: 'input-val' }] },
      ]);
      expect(stepById(graph, 'add-beta').inputBindings).toEqual([
        {
          slot: 'init-value',
          kind: 'parameter',
          value: [{ kind: 'step-output', stepId: 'add-alpha', slot: 'out-value' }],
        },
      ]);
      expect(stepById(graph, 'add-beta').dependencies).toEqual(['add-alpha']);
      expect(stepById(graph, 'add-beta').stageIndex).toBe(1);
      expect(stepById(graph, 'add-alpha').outputBindings).toEqual([
        { slot: 'out-value', kind: 'parameter' },
      ]);
    });

    it('should run independent calls in the same stage, in source order', () => {
      const graph = graphOf(
        scriptWithEntry(
          lines(
            "const sharedIn = new StepInput({ parameters: { 'init-value': '7' } });",
            "const bOut = new StepOutput({ parameters: { 'out-value': null } });",
            "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
            'addBeta(sharedIn, bOut);',
            'addAlpha(sharedIn, aOut);'
          )
        )
      );
      expect(stageIds(graph)).toEqual([['add-beta', 'add-alpha']]);
      expect(stepById(graph, 'add-beta').inputBindings).toEqual([
        { slot: 'init-value', kind: 'parameter', value: [{ kind: 'literal', value: '7' }] },
      ]);
    });

    it('should place a join after the latest of its producers', () => {
      const graph = graphOf(
        scriptWithEntry(
          lines(
            "const aIn = new StepInput({ parameters: { 'init-value': inputVal } });",
            "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
            'addAlpha(aIn, aOut);',
            "const fromAlpha = new StepInput({ parameters: { 'init-value': aOut.parameters['out-value'] } });",
            "const bOut = new StepOutput({ parameters: { 'out-value': null } });",
            "const cOut = new StepOutput({ parameters: { 'out-value': null } });",
            'addBeta(fromAlpha, bOut);',
            'addGamma(fromAlpha, cOut);',
            'const joinIn = new StepInput({',
            "  parameters: { 'init-value': `${bOut.parameters['out-value']}+${cOut.parameters['out-value']}` },",
            '});',
            "const joinOut = new StepOutput({ parameters: { 'out-value': null } });",
            'addAlpha(joinIn, joinOut);'
          )
        )
      );

      expect(stageIds(graph)).toEqual([['add-alpha'], ['add-beta', 'add-gamma'], ['add-alpha-2']]);
      const join = stepById(graph, 'add-alpha-2');
      expect(join.dependencies).toEqual(['add-beta', 'add-gamma']);
      expect(join.inputBindings).toEqual([
        {
          slot: 'init-value',
          kind: 'parameter',
          value: [
            { kind: 'step-output', stepId: 'add-beta', slot: 'out-value' },
            { kind: 'literal', value: '+' },
            { kind: 'step-output', stepId: 'add-gamma', slot: 'out-value' },
          ],
        },
      ]);
    });

    it('should number repeated calls of the same step', () => {
      const graph = graphOf(
        scriptWithEntry(
          lines(
            "const aIn = new StepInput({ parameters: { 'init-value': 'x' } });",
            "const o1 = new StepOutput({ parameters: { 'out-value': null } });",
            "const o2 = new StepOutput({ parameters: { 'out-value': null } });",
            "const o3 = new StepOutput({ parameters: { 'out-value': null } });",
            'addAlpha(aIn, o1);',
            'addAlpha(aIn, o2);',
            'addAlpha(aIn, o3);'
          )
        )
      );
      expect(graph.steps.map(step => step.id)).toEqual(['add-alpha', 'add-alpha-2', 'add-alpha-3']);
      expect(graph.steps.map(step => step.templateName)).toEqual([
        'exec-add-alpha',
        'exec-add-alpha',
        'exec-add-alpha',
      ]);
    });

    it('should accept accessors constructed in the call and awaited calls', () => {
      const graph = graphOf(
        scriptWithEntry(
          lines(
            "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
            "await addAlpha(new StepInput({ parameters: { 'init-value': `run-${mode}` } }), aOut);"
          )
        ).replace('export function main', 'export async function main')
      );
      expect(stepById(graph, 'add-alpha').inputBindings).toEqual([
        {
          slot: 'init-value',
          kind: 'parameter',
          value: [
            { kind: 'literal', value: 'run-' },
            { kind: 'workflow-parameter', name: 'mode' },
          ],
        },
      ]);
    });
  });

  describe('artifacts', () => {
    it('should prefix mount-point keys and follow artifacts between steps', () => {
      const graph = graphOf(
        scriptWithEntry(
          lines(
            "const loadIn = new StepInput({ artifacts: { data: new FileInput(root, '/in/data.json') } });",
            'const loadOut = new StepOutput({ artifacts: { rows: null } });',
            'load(loadIn, loadOut);',
            "const again = new StepInput({ artifacts: { data: loadOut.artifacts['rows'] } });",
            'const saved = new StepOutput({ artifacts: { rows: new FileOutput(root, `out/${inputVal}.json`) } });',
            'load(again, saved);'
          ),
          WITH_LOAD
        )
      );

      expect(stepById(graph, 'load').inputBindings).toEqual([
        {
          slot: 'data',
          kind: 'artifact',
          source: {
            kind: 's3',
            mountPoint: 'root',
            bucket: 'example-bucket',
            key: [{ kind: 'literal', value: 'runs/in/data.json' }],
          },
        },
      ]);
      expect(stepById(graph, 'load').outputBindings).toEqual([
        { slot: 'rows', kind: 'artifact', destination: { kind: 'temporary' } },
      ]);
      const second = stepById(graph, 'load-2');
      expect(second.inputBindings).toEqual([
        { slot: 'data', kind: 'artifact', source: { kind: 'step-output', stepId: 'load', slot: 'rows' } },
      ]);
      expect(second.outputBindings).toEqual([
        {
          slot: 'rows',
          kind: 'artifact',
          destination: {
            kind: 's3',
            mountPoint: 'root',
            bucket: 'example-bucket',
            key: [
              { kind: 'literal', value: 'runs/out/' },
              { kind: 'workflow-parameter', name: 'input-val' },
              { kind: 'literal', value: '.json' },
            ],
          },
        },
      ]);
      expect(stageIds(graph)).toEqual([['load'], ['load-2']]);
    });

    it('should reject an artifact used as a parameter value', () => {
      expect(() =>
        graphOf(
          scriptWithEntry(
            lines(
              "const loadIn = new StepInput({ artifacts: { data: new FileInput(root, 'a.json') } });",
              'const loadOut = new StepOutput({ artifacts: { rows: null } });',
              'load(loadIn, loadOut);',
              "const aIn = new StepInput({ parameters: { 'init-value': loadOut.artifacts['rows'] } });",
              "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
              'addAlpha(aIn, aOut);'
            ),
            WITH_LOAD
          )
        )
      ).toThrow("Artifact 'rows' cannot be used as a parameter value");
    });

    it('should only take mount points as file roots', () => {
      expect(() =>
        graphOf(
          scriptWithEntry(
            lines(
              "const loadIn = new StepInput({ artifacts: { data: new FileInput(mode, 'a.json') } });",
              'const loadOut = new StepOutput({ artifacts: { rows: null } });',
              'load(loadIn, loadOut);'
            ),
            WITH_LOAD
          )
        )
      ).toThrow('The first argument of FileInput must be a declared mount point');
    });
  });

  describe('references', () => {
    it('should reject a reference to an output before its step runs', () => {
      const source = scriptWithEntry(
        lines(
          "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
          "const bIn = new StepInput({ parameters: { 'init-value': aOut.parameters['out-value'] } });",
          'addBeta(bIn, aOut);'
        )
      );
      expect(() => graphOf(source)).toThrow(UnboundReferenceError);
      expect(() => graphOf(source)).toThrow(
        "'aOut.parameters['out-value']' is used before 'aOut' is passed to a step"
      );
    });

    it('should reject an output written by two steps', () => {
      expect(() =>
        graphOf(
          scriptWithEntry(
            lines(
              "const aIn = new StepInput({ parameters: { 'init-value': 'x' } });",
              "const shared = new StepOutput({ parameters: { 'out-value': null } });",
              'addAlpha(aIn, shared);',
              'addBeta(aIn, shared);',
              "const cIn = new StepInput({ parameters: { 'init-value': shared.parameters['out-value'] } });",
              "const cOut = new StepOutput({ parameters: { 'out-value': null } });",
              'addGamma(cIn, cOut);'
            )
          )
        )
      ).toThrow(
        "Output parameter 'out-value' of 'shared' is written by more than one step (add-alpha, add-beta)"
      );
    });

    it('should reject names that are not declared', () => {
      const source = scriptWithEntry(
        lines(
          "const aIn = new StepInput({ parameters: { 'init-value': missing } });",
          "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
          'addAlpha(aIn, aOut);'
        )
      );
      expect(() => graphOf(source)).toThrow(UnboundReferenceError);
      expect(() => graphOf(source)).toThrow(
        "'missing' is not a declared parameter, mount point, accessor or loop variable"
      );
    });

    it('should reject an undeclared output slot', () => {
      expect(() =>
        graphOf(
          scriptWithEntry(
            lines(
              "const aIn = new StepInput({ parameters: { 'init-value': 'x' } });",
              "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
              'addAlpha(aIn, aOut);',
              "const bIn = new StepInput({ parameters: { 'init-value': aOut.parameters['other'] } });",
              "const bOut = new StepOutput({ parameters: { 'out-value': null } });",
              'addBeta(bIn, bOut);'
            )
          )
        )
      ).toThrow("'aOut' declares no output parameter 'other'");
    });
  });

  describe('slot contracts at call sites', () => {
    it('should reject a call missing an input the step reads', () => {
      const source = scriptWithEntry(
        lines(
          'const aIn = new StepInput({});',
          "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
          'addAlpha(aIn, aOut);'
        )
      );
      expect(() => graphOf(source)).toThrow(SlotContractError);
      expect(() => graphOf(source)).toThrow(
        "addAlpha reads input parameter 'init-value' but 'aIn' does not provide it"
      );
    });

    it('should reject a call whose output accessor lacks a written slot', () => {
      expect(() =>
        graphOf(
          scriptWithEntry(
            lines(
              "const aIn = new StepInput({ parameters: { 'init-value': 'x' } });",
              'const aOut = new StepOutput({});',
              'addAlpha(aIn, aOut);'
            )
          )
        )
      ).toThrow("addAlpha writes output parameter 'out-value' but 'aOut' does not declare it");
    });

    it('should reject output parameters declared with a value', () => {
      expect(() =>
        graphOf(
          scriptWithEntry(
            lines("const aOut = new StepOutput({ parameters: { 'out-value': 'x' } });")
          )
        )
      ).toThrow("Output parameter 'out-value' must be declared with null");
    });

    it('should check the number of call arguments', () => {
      const source = scriptWithEntry(
        lines("const aIn = new StepInput({ parameters: { 'init-value': 'x' } });", 'addAlpha(aIn);')
      );
      expect(() => graphOf(source)).toThrow(SignatureError);
      expect(() => graphOf(source)).toThrow(
        'addAlpha takes 2 arguments, got 1; expected addAlpha(input: StepInput, output: StepOutput)'
      );
    });

    it('should reject swapped accessors', () => {
      expect(() =>
        graphOf(
          scriptWithEntry(
            lines(
              "const aIn = new StepInput({ parameters: { 'init-value': 'x' } });",
              "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
              'addAlpha(aOut, aIn);'
            )
          )
        )
      ).toThrow('Arguments of addAlpha must be StepInput and StepOutput accessors');
    });
  });

  describe('entry statements', () => {
    it('should require at least one step call', () => {
      expect(() => graphOf(scriptWithEntry(''))).toThrow(
        "Entry function 'main' does not call any step"
      );
    });

    it('should reject statements other than accessors, calls, conditionals and loops', () => {
      const source = scriptWithEntry(lines('while (mode) {}'));
      try {
        graphOf(source);
        throw new Error('expected an error');
      } catch (error: unknown) {
        expect(error).toBeInstanceOf(UnsupportedConstructError);
        if (error instanceof UnsupportedConstructError) {
          expect(error.message).toBe("Unsupported statement in entry function: 'while (mode) {}'");
          expect(error.location).toEqual({ file: 'workflow.ts', line: 24, column: 3 });
        }
      }
    });

    it('should reject let declarations', () => {
      expect(() =>
        graphOf(scriptWithEntry(lines("let aIn = new StepInput({ parameters: { 'init-value': 'x' } });")))
      ).toThrow('Accessors in the entry function must be declared with const');
    });

    it('should reject calls to anything but step functions', () => {
      expect(() => graphOf(scriptWithEntry(lines("console.log('hi');")))).toThrow(
        "Only step function calls are supported in the entry function: 'console.log('hi')'"
      );
      expect(() =>
        graphOf(
          scriptWithEntry(lines('helper();'), `${DEFAULT_DECLARATIONS}\nfunction helper(): void {}`)
        )
      ).toThrow("'helper' is not a step function and cannot be called from the entry function");
    });
  });

  describe('guards', () => {
    const branches = lines(
      "const aIn = new StepInput({ parameters: { 'init-value': inputVal } });",
      "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
      "const bOut = new StepOutput({ parameters: { 'out-value': null } });",
      "const cOut = new StepOutput({ parameters: { 'out-value': null } });",
      "if (mode === 'alpha') {",
      '  addAlpha(aIn, aOut);',
      "} else if (mode === 'beta') {",
      '  addBeta(aIn, bOut);',
      '} else {',
      '  addGamma(aIn, cOut);',
      '}'
    );

    it('should guard every branch with the negation of the earlier ones', () => {
      const graph = graphOf(scriptWithEntry(branches));
      const alpha = "'{{workflow.parameters.mode}}' == 'alpha'";
      const beta = "'{{workflow.parameters.mode}}' == 'beta'";

      expect(when(stepById(graph, 'add-alpha').guard)).toBe(alpha);
      expect(when(stepById(graph, 'add-beta').guard)).toBe(`!(${alpha}) && ${beta}`);
      expect(when(stepById(graph, 'add-gamma').guard)).toBe(`!(${alpha}) && !(${beta})`);
      expect(stageIds(graph)).toEqual([['add-alpha', 'add-beta', 'add-gamma']]);
    });

    it('should depend on the step whose output a guard reads', () => {
      const graph = graphOf(
        scriptWithEntry(
          lines(
            "const aIn = new StepInput({ parameters: { 'init-value': 'x' } });",
            "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
            'addAlpha(aIn, aOut);',
            "const bOut = new StepOutput({ parameters: { 'out-value': null } });",
            "if (aOut.parameters['out-value'] != 'x-addAlpha' || !mode) addBeta(aIn, bOut);"
          )
        )
      );
      const beta = stepById(graph, 'add-beta');
      expect(beta.dependencies).toEqual(['add-alpha']);
      expect(when(beta.guard)).toBe(
        "'{{steps.add-alpha.outputs.parameters.out-value}}' != 'x-addAlpha' || !('{{workflow.parameters.mode}}' != '')"
      );
      expect(stageIds(graph)).toEqual([['add-alpha'], ['add-beta']]);
    });

    it('should nest conditions with and', () => {
      const graph = graphOf(
        scriptWithEntry(
          lines(
            "const aIn = new StepInput({ parameters: { 'init-value': 'x' } });",
            "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
            'if (inputVal > 1) {',
            "  if (mode == 'beta' || mode == 'gamma') addAlpha(aIn, aOut);",
            '}'
          )
        )
      );
      expect(when(stepById(graph, 'add-alpha').guard)).toBe(
        "{{workflow.parameters.input-val}} > 1 && ('{{workflow.parameters.mode}}' == 'beta' || '{{workflow.parameters.mode}}' == 'gamma')"
      );
    });

    it('should reject conditions it cannot express', () => {
      const guarded = (condition: string): string =>
        scriptWithEntry(
          lines(
            "const aIn = new StepInput({ parameters: { 'init-value': 'x' } });",
            "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
            `if (${condition}) addAlpha(aIn, aOut);`
          )
        );
      expect(() => graphOf(guarded('true'))).toThrow(UnsupportedExpressionError);
      expect(() => graphOf(guarded("mode < 'b'"))).toThrow(
        "Unsupported condition: ordering comparison with a string literal in 'mode < 'b''"
      );
      expect(() => graphOf(guarded('inputVal === 1'))).toThrow(
        'strict comparison of a string value with a number'
      );
      expect(() => graphOf(guarded('mode + inputVal'))).toThrow(
        "Unsupported condition: operator '+' in 'mode + inputVal'"
      );
    });

    describe('with number and boolean parameters', () => {
      const typed = `${DEFAULT_DECLARATIONS}\nconst flag = param(false);\nconst shards = param(3);`;
      const guardOf = (condition: string): string | undefined =>
        when(
          stepById(
            graphOf(
              scriptWithEntry(
                lines(
                  "const aIn = new StepInput({ parameters: { 'init-value': 'x' } });",
                  "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
                  `if (${condition}) addAlpha(aIn, aOut);`
                ),
                typed
              )
            ),
            'add-alpha'
          ).guard
        );

      it('should test truthiness by the type of the default', () => {
        expect(guardOf('flag')).toBe("'{{workflow.parameters.flag}}' == 'true'");
        expect(guardOf('!flag')).toBe("!('{{workflow.parameters.flag}}' == 'true')");
        expect(guardOf('shards')).toBe('{{workflow.parameters.shards}} != 0');
        expect(guardOf('mode')).toBe("'{{workflow.parameters.mode}}' != ''");
      });

      it('should compare numbers bare and booleans by their spelling', () => {
        expect(guardOf('shards === 3')).toBe('{{workflow.parameters.shards}} == 3');
        expect(guardOf('shards >= 2')).toBe('{{workflow.parameters.shards}} >= 2');
        expect(guardOf('flag === true')).toBe("'{{workflow.parameters.flag}}' == 'true'");
        expect(guardOf('flag !== false')).toBe("'{{workflow.parameters.flag}}' != 'false'");
      });

      it('should reject comparisons across types', () => {
        expect(() => guardOf('flag > true')).toThrow('ordering comparison of a boolean');
        expect(() => guardOf('flag == 1')).toThrow('a boolean can only be compared with a boolean');
        expect(() => guardOf("shards === '3'")).toThrow(
          'strict comparison of a number value with a string'
        );
        expect(() => guardOf('shards == mode')).toThrow('comparison of values of different types');
      });
    });
  });

  describe('loops', () => {
    it('should repeat a step over a count', () => {
      const graph = graphOf(
        scriptWithEntry(
          lines(
            "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
            'for (const i of iterate(inputVal)) {',
            "  const aIn = new StepInput({ parameters: { 'init-value': i } });",
            '  if (i > 0) addAlpha(aIn, aOut);',
            '}'
          )
        )
      );
      const alpha = stepById(graph, 'add-alpha');
      expect(alpha.iteration).toEqual({
        kind: 'count',
        count: { kind: 'workflow-parameter', name: 'input-val' },
      });
      expect(alpha.inputBindings).toEqual([
        { slot: 'init-value', kind: 'parameter', value: [{ kind: 'loop-item' }] },
      ]);
      expect(when(alpha.guard)).toBe('{{item}} > 0');
    });

    it('should split a collection before iterating over it', () => {
      const graph = graphOf(
        scriptWithEntry(
          lines(
            "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
            "for (const row of iterate(new FileInput(root, 'rows.csv'))) {",
            "  const aIn = new StepInput({ parameters: { 'init-value': row.name } });",
            '  addAlpha(aIn, aOut);',
            '}'
          )
        )
      );

      expect(stageIds(graph)).toEqual([['split-row'], ['add-alpha']]);
      const split = stepById(graph, 'split-row');
      expect(split.templateName).toBe('split-items');
      expect(split.splitFormat).toBe('csv');
      expect(split.inputBindings).toEqual([
        {
          slot: 'source',
          kind: 'artifact',
          source: {
            kind: 's3',
            mountPoint: 'root',
            bucket: 'example-bucket',
            key: [{ kind: 'literal', value: 'runs/rows.csv' }],
          },
        },
        { slot: 'format', kind: 'parameter', value: [{ kind: 'literal', value: 'csv' }] },
      ]);
      const alpha = stepById(graph, 'add-alpha');
      expect(alpha.iteration).toEqual({ kind: 'collection', splitStepId: 'split-row' });
      expect(alpha.dependencies).toEqual(['split-row']);
      expect(alpha.inputBindings).toEqual([
        { slot: 'init-value', kind: 'parameter', value: [{ kind: 'loop-item', field: 'name' }] },
      ]);
      expect(split.outputBindings).toEqual([
        { slot: 'count', kind: 'parameter' },
        { slot: 'items', kind: 'artifact', destination: { kind: 'temporary' } },
      ]);
    });

    describe('loop item fields', () => {
      const inLoop = (...body: string[]): string =>
        scriptWithEntry(
          lines(
            "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
            "for (const row of iterate(new FileInput(root, 'rows.csv'))) {",
            ...body.map(line => `  ${line}`),
            '}'
          )
        );

      it('should combine fields with literal text', () => {
        const graph = graphOf(
          inLoop("addAlpha(new StepInput({ parameters: { 'init-value': `${row.name}-${row.city}.txt` } }), aOut);")
        );
        expect(stepById(graph, 'add-alpha').inputBindings).toEqual([
          {
            slot: 'init-value',
            kind: 'parameter',
            value: [
              { kind: 'loop-item', field: 'name' },
              { kind: 'literal', value: '-' },
              { kind: 'loop-item', field: 'city' },
              { kind: 'literal', value: '.txt' },
            ],
          },
        ]);
      });

      it('should reject fields where the workflow engine would have to read them', () => {
        expect(() =>
          graphOf(inLoop("if (row.name == 'x') addAlpha(new StepInput({ parameters: { 'init-value': 'x' } }), aOut);"))
        ).toThrow('Loop item fields are read inside the step container and cannot be used in conditions');
        expect(() =>
          graphOf(
            inLoop(
              "const fIn = new StepInput({ artifacts: { data: new FileInput(root, `${row.name}.csv`) } });"
            )
          )
        ).toThrow('Loop item fields are read inside the step container and cannot name a FileInput path');
        expect(() =>
          graphOf(inLoop("addAlpha(new StepInput({ parameters: { 'init-value': `${mode}-${row.name}` } }), aOut);"))
        ).toThrow('Loop item fields can only be combined with literal text');
      });
    });

    it('should take the collection format from the file name argument', () => {
      const graph = graphOf(
        scriptWithEntry(
          lines(
            "const loadIn = new StepInput({ artifacts: { data: new FileInput(root, 'in.csv') } });",
            'const loadOut = new StepOutput({ artifacts: { rows: null } });',
            'load(loadIn, loadOut);',
            "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
            "for (const row of iterate(loadOut.artifacts['rows'], 'rows.csv')) {",
            "  addAlpha(new StepInput({ parameters: { 'init-value': row['city'] } }), aOut);",
            '}',
            "for (const entry of iterate(loadOut.artifacts['rows'])) {",
            "  addBeta(new StepInput({ parameters: { 'init-value': entry.id } }), aOut);",
            '}'
          ),
          WITH_LOAD
        )
      );
      expect(stepById(graph, 'split-row').splitFormat).toBe('csv');
      expect(stepById(graph, 'split-entry').splitFormat).toBe('json');
      expect(stepById(graph, 'split-row').dependencies).toEqual(['load']);
      expect(stageIds(graph)).toEqual([['load'], ['split-row', 'split-entry'], ['add-alpha', 'add-beta']]);
    });

    it('should reject nested loops', () => {
      expect(() =>
        graphOf(
          scriptWithEntry(
            lines(
              'for (const i of iterate(2)) {',
              '  for (const j of iterate(2)) {}',
              '}'
            )
          )
        )
      ).toThrow('Loops cannot be nested');
    });

    it('should reject loops over anything but iterate()', () => {
      expect(() => graphOf(scriptWithEntry(lines('for (const i of [1, 2]) {}')))).toThrow(
        'Loops can only run over iterate(...)'
      );
    });

    it('should reject a whole record used as a value', () => {
      expect(() =>
        graphOf(
          scriptWithEntry(
            lines(
              "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
              "for (const row of iterate(new FileInput(root, 'rows.json'))) {",
              "  addAlpha(new StepInput({ parameters: { 'init-value': row } }), aOut);",
              '}'
            )
          )
        )
      ).toThrow("'row' is a record; use one of its fields, e.g. row.name");
    });

    it('should reject consuming the output of an iterated step', () => {
      const source = scriptWithEntry(
        lines(
          "const aIn = new StepInput({ parameters: { 'init-value': 'x' } });",
          "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
          'for (const i of iterate(3)) {',
          '  addAlpha(aIn, aOut);',
          '}',
          "const bIn = new StepInput({ parameters: { 'init-value': aOut.parameters['out-value'] } });",
          "const bOut = new StepOutput({ parameters: { 'out-value': null } });",
          'addBeta(bIn, bOut);'
        )
      );
      expect(() => graphOf(source)).toThrow(UnsupportedConstructError);
      expect(() => graphOf(source)).toThrow(
        "Output parameter 'out-value' of 'aOut' comes from iterated step 'add-alpha' and cannot be consumed"
      );
    });

    it('should reject a negative count', () => {
      expect(() =>
        graphOf(scriptWithEntry(lines('for (const i of iterate(-1)) {}')))
      ).toThrow('iterate() needs a non-negative integer count');
    });
  });
});
