import * as ts from 'typescript';
import type { StepFunction } from '../types/ir';
import { renderPrelude } from './script-templates';
import { ParsedScript } from './source';
import { inputArtifactPath, outputArtifactPath, outputParameterPath } from './workdir';

export interface StepRendering {
  /** The step function as written, run locally against the runtime accessors */
  standalone: string;
  /** Self-contained CommonJS script for the step container */
  embedded: string;
}

export interface EmbedOptions {
  workdir: string;
}

type Substitution =
  | { kind: 'text'; text: string }
  | { kind: 'write-parameter'; path: string; value: ts.Expression };

/**
 * Both renderings of a step function. They come from the same tree walk; the standalone one
 * simply has nothing to substitute.
 */
export function renderStepBodies(
  script: ParsedScript,
  step: StepFunction,
  options: EmbedOptions
): StepRendering {
  return {
    standalone: splice(script, step.node, new Map()),
    embedded: renderEmbedded(script, step, options),
  };
}

export function renderEmbedded(
  script: ParsedScript,
  step: StepFunction,
  options: EmbedOptions
): string {
  const substitutions = collectSubstitutions(step, options.workdir);
  const body = step.node.body;
  if (!body) {
    throw new Error(`Step function '${step.name}' has no body`);
  }

  const support = step.support.map(statement => splice(script, statement, substitutions));
  const invocation = step.isAsync
    ? `${step.name}().catch(error => {\n  console.error(error);\n  process.exit(1);\n});`
    : `${step.name}();`;
  const source = [
    ...support,
    `${step.isAsync ? 'async ' : ''}function ${step.name}() ${splice(script, body, substitutions)}`,
    invocation,
  ].join('\n\n');

  const { outputText } = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.CommonJS,
      target: ts.ScriptTarget.ES2020,
      esModuleInterop: true,
    },
    fileName: `${step.name}.ts`,
  });

  return (
    renderPrelude({ template: step.templateName, step: step.name, workdir: options.workdir }) +
    outputText
  );
}

function collectSubstitutions(step: StepFunction, workdir: string): Map<ts.Node, Substitution> {
  const substitutions = new Map<ts.Node, Substitution>();

  for (const use of step.accessorUses) {
    if (use.direction === 'input' && use.kind === 'parameter') {
      substitutions.set(use.node, {
        kind: 'text',
        text: `__input(${JSON.stringify(use.slot)})`,
      });
    } else if (use.direction === 'input') {
      substitutions.set(use.node, {
        kind: 'text',
        text: `__inputArtifact(${JSON.stringify(inputArtifactPath(workdir, use.slot))})`,
      });
    } else if (use.kind === 'artifact') {
      substitutions.set(use.node, {
        kind: 'text',
        text: `__outputArtifact(${JSON.stringify(outputArtifactPath(workdir, use.slot))})`,
      });
    } else if (use.assignment) {
      substitutions.set(use.assignment, {
        kind: 'write-parameter',
        path: outputParameterPath(workdir, use.slot),
        value: use.assignment.right,
      });
    }
  }

  // Parameters keep the type of their default, as they do in a local run
  for (const reference of step.parameterReferences) {
    const { name, defaultValue } = reference.parameter;
    const value = `__workflowParameter(${JSON.stringify(name)}, ${JSON.stringify(typeof defaultValue)})`;
    const shorthand = ts.isShorthandPropertyAssignment(reference.node.parent);
    substitutions.set(reference.node, {
      kind: 'text',
      text: shorthand ? `${reference.node.text}: ${value}` : value,
    });
  }

  return substitutions;
}

/**
 * Source text of `root` with every substituted node replaced; everything else is copied
 * through unchanged, comments included
 */
function splice(
  script: ParsedScript,
  root: ts.Node,
  substitutions: Map<ts.Node, Substitution>
): string {
  const { sourceFile, text } = script;

  const render = (node: ts.Node): string => {
    const substitution = substitutions.get(node);
    if (substitution?.kind === 'text') {
      return substitution.text;
    }
    if (substitution) {
      return `__writeParameter(${JSON.stringify(substitution.path)}, ${render(substitution.value)})`;
    }

    let output = '';
    let cursor = node.getStart(sourceFile);
    ts.forEachChild(node, child => {
      if (!containsSubstitution(child)) return;
      output += text.slice(cursor, child.getStart(sourceFile)) + render(child);
      cursor = child.end;
    });
    return output + text.slice(cursor, node.end);
  };

  const containsSubstitution = (node: ts.Node): boolean =>
    substitutions.has(node) || ts.forEachChild(node, containsSubstitution) === true;

  return render(root);
}
