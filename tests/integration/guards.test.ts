import { renderGuard } from '../../src/transpile/guard-translator';
import { evaluateCondition, evaluateWhen } from '../helpers/guard-eval';
import { graphOf, scriptWithEntry, stepById } from '../helpers/pipeline';

const CONDITIONS = [
  "mode === 'alpha'",
  "mode !== 'alpha' && inputVal == '1'",
  "mode == 'beta' || inputVal > 1",
  "!(mode === 'alpha' || inputVal < 2)",
  'mode && inputVal != 0',
  "(mode === 'alpha' || mode === 'beta') && !(inputVal >= 2)",
  '!mode',
];

const MODES = ['alpha', 'beta', ''];
const INPUT_VALUES = ['0', '1', '2'];

const TYPED_CONDITIONS = [
  'flag',
  '!flag && shards',
  'shards > 2 || flag',
  'shards === 3',
  'flag === true',
  'flag !== false && shards != 0',
];

const FLAGS = [true, false];
const SHARDS = [0, 3, 5];

const TYPED_DECLARATIONS = [
  "const root = mountPoint('/tmp/data', 's3://example-bucket/runs');",
  'const flag = param(false);',
  'const shards = param(3);',
].join('\n');

function branchScript(condition: string, declarations?: string): string {
  return scriptWithEntry(
    [
      "const aIn = new StepInput({ parameters: { 'init-value': 'x' } });",
      "const aOut = new StepOutput({ parameters: { 'out-value': null } });",
      "const bOut = new StepOutput({ parameters: { 'out-value': null } });",
      `if (${condition}) {`,
      '  addAlpha(aIn, aOut);',
      '} else {',
      '  addBeta(aIn, bOut);',
      '}',
    ].join('\n'),
    declarations
  );
}

describe('guard translation', () => {
  describe.each(CONDITIONS)('if (%s)', condition => {
    const graph = graphOf(branchScript(condition));
    const thenGuard = stepById(graph, 'add-alpha').guard;
    const elseGuard = stepById(graph, 'add-beta').guard;

    it('should guard both branches', () => {
      expect(thenGuard).toBeDefined();
      expect(elseGuard).toBeDefined();
    });

    for (const mode of MODES) {
      for (const inputVal of INPUT_VALUES) {
        it(`should pick the same branch for mode='${mode}' inputVal='${inputVal}'`, () => {
          if (!thenGuard || !elseGuard) throw new Error('missing guard');
          const expected = evaluateCondition(condition, { mode, inputVal });
          const parameters = { mode, 'input-val': inputVal };

          expect(evaluateWhen(renderGuard(thenGuard), parameters)).toBe(expected);
          expect(evaluateWhen(renderGuard(elseGuard), parameters)).toBe(!expected);
        });
      }
    }
  });

  describe.each(TYPED_CONDITIONS)('with typed parameters, if (%s)', condition => {
    const graph = graphOf(branchScript(condition, TYPED_DECLARATIONS));
    const thenGuard = stepById(graph, 'add-alpha').guard;
    const elseGuard = stepById(graph, 'add-beta').guard;

    for (const flag of FLAGS) {
      for (const shards of SHARDS) {
        it(`should pick the same branch for flag=${flag} shards=${shards}`, () => {
          if (!thenGuard || !elseGuard) throw new Error('missing guard');
          const expected = evaluateCondition(condition, { flag, shards });
          const parameters = { flag: String(flag), shards: String(shards) };

          expect(evaluateWhen(renderGuard(thenGuard), parameters)).toBe(expected);
          expect(evaluateWhen(renderGuard(elseGuard), parameters)).toBe(!expected);
        });
      }
    }
  });
});
