import type { BindingValue, ValuePart } from '../types/ir';

/**
 * Argo placeholder text of a single value part
 */
export function renderPart(part: ValuePart): string {
  switch (part.kind) {
    case 'literal':
      return part.value;
    case 'workflow-parameter':
      return `{{workflow.parameters.${part.name}}}`;
    case 'step-output':
      return `{{steps.${part.stepId}.outputs.parameters.${part.slot}}}`;
    case 'loop-item':
      if (part.field !== undefined) {
        throw new Error(
          `Loop item field '${part.field}' has no placeholder; it is read in the step container`
        );
      }
      return '{{item}}';
  }
}

export function renderValue(value: BindingValue): string {
  return value.map(renderPart).join('');
}

export function stepOutputArtifactRef(stepId: string, slot: string): string {
  return `{{steps.${stepId}.outputs.artifacts.${slot}}}`;
}

export function inputParameterRef(name: string): string {
  return `{{inputs.parameters.${name}}}`;
}

/**
 * Join adjacent literal parts and drop empty ones
 */
export function normalizeValue(parts: BindingValue): BindingValue {
  const result: BindingValue = [];
  for (const part of parts) {
    if (part.kind === 'literal') {
      if (part.value === '') continue;
      const last = result[result.length - 1];
      if (last && last.kind === 'literal') {
        result[result.length - 1] = { kind: 'literal', value: last.value + part.value };
        continue;
      }
    }
    result.push(part);
  }
  return result;
}

/**
 * Step ids a value depends on
 */
export function producersOf(value: BindingValue): string[] {
  const ids: string[] = [];
  for (const part of value) {
    if (part.kind === 'step-output' && !ids.includes(part.stepId)) {
      ids.push(part.stepId);
    }
  }
  return ids;
}
