import { SlotContractError, UnsupportedConstructError, formatLocation } from '../errors';
import { logger } from '../logger';
import type { StageGraph, StepRegistry, StepTemplate, WorkflowStep } from '../types/ir';
import { renderEmbedded } from './body-transformer';
import { ParsedScript } from './source';
import { LOOP_FIELDS_PARAMETER, LOOP_INDEX_PARAMETER, LOOP_ITEMS_ARTIFACT } from './workdir';

export function remoteBucketParameter(slot: string): string {
  return `${slot}-s3-bucket`;
}

export function remoteKeyParameter(slot: string): string {
  return `${slot}-s3-key`;
}

/**
 * One template per invoked step function, in order of first invocation.
 *
 * Call sites of a function share its template, so an output artifact has to go to the same
 * kind of destination everywhere; remote destinations are passed in as hidden parameters.
 */
export function buildStepTemplates(
  script: ParsedScript,
  registry: StepRegistry,
  graph: StageGraph,
  workdir: string
): StepTemplate[] {
  const callSites = new Map<string, WorkflowStep[]>();
  for (const step of graph.steps) {
    if (step.functionName === undefined) continue;
    const sites = callSites.get(step.functionName) ?? [];
    sites.push(step);
    callSites.set(step.functionName, sites);
  }

  for (const fn of registry.steps.values()) {
    if (!callSites.has(fn.name)) {
      logger.warn(
        `⚠️  Step function '${fn.name}' is never called from the entry function and is not emitted (${formatLocation(fn.location)})`
      );
    }
  }

  const templates: StepTemplate[] = [];
  for (const [name, sites] of callSites) {
    const fn = registry.steps.get(name);
    if (!fn) continue;

    const remoteOutputs = remoteOutputsOf(sites);
    const inputParameters = new Set(
      fn.contract.inputs.filter(slot => slot.kind === 'parameter').map(slot => slot.name)
    );
    for (const slot of remoteOutputs) {
      for (const hidden of [remoteBucketParameter(slot), remoteKeyParameter(slot)]) {
        if (inputParameters.has(hidden)) {
          throw new SlotContractError(
            `Input parameter '${hidden}' of '${fn.name}' clashes with the location parameter of output artifact '${slot}'`,
            fn.location
          );
        }
      }
    }

    const loopItems = sites.some(site => site.iteration?.kind === 'collection');
    if (loopItems) {
      for (const slot of fn.contract.inputs) {
        const reserved =
          slot.kind === 'parameter'
            ? slot.name === LOOP_INDEX_PARAMETER || slot.name === LOOP_FIELDS_PARAMETER
            : slot.name === LOOP_ITEMS_ARTIFACT;
        if (reserved) {
          throw new SlotContractError(
            `Input ${slot.kind} '${slot.name}' of '${fn.name}' clashes with the loop input of the same name`,
            fn.location
          );
        }
      }
    }

    templates.push({
      name: fn.templateName,
      step: fn,
      remoteOutputs,
      loopItems,
      embeddedSource: renderEmbedded(script, fn, { workdir }),
    });
    logger.debug(
      `Template '${fn.templateName}' serves ${sites.length} call site(s)` +
        (remoteOutputs.length > 0 ? `, remote outputs: ${remoteOutputs.join(', ')}` : '') +
        (loopItems ? ', iterates over loop items' : '')
    );
  }
  return templates;
}

function remoteOutputsOf(sites: WorkflowStep[]): string[] {
  const kinds = new Map<string, { remote: boolean; site: WorkflowStep }>();
  for (const site of sites) {
    for (const binding of site.outputBindings) {
      if (binding.kind !== 'artifact') continue;
      const remote = binding.destination.kind === 's3';
      const seen = kinds.get(binding.slot);
      if (seen && seen.remote !== remote) {
        throw new UnsupportedConstructError(
          `Output artifact '${binding.slot}' goes to ${remote ? 'a FileOutput' : 'a temporary artifact'} here but to ${seen.remote ? 'a FileOutput' : 'a temporary artifact'} at ${formatLocation(seen.site.location)}; every call of a step must use the same kind of destination`,
          site.location
        );
      }
      if (!seen) kinds.set(binding.slot, { remote, site });
    }
  }
  return [...kinds].filter(([, entry]) => entry.remote).map(([slot]) => slot);
}
