import { Liquid, LiquidOptions } from 'liquidjs';
import * as path from 'path';
import { inputParameterRef } from './placeholders';
import {
  LOOP_FIELDS_ENV,
  LOOP_INDEX_ENV,
  LOOP_ITEMS_ARTIFACT,
  inputArtifactPath,
  inputParameterEnv,
  outputArtifactPath,
  outputParameterPath,
  workflowParameterEnv,
} from './workdir';

/** Liquid templates of the scripts embedded in the emitted document */
export const TEMPLATE_DIR = path.join(__dirname, '..', '..', 'templates');

let __liquid: Liquid | null = null;

/**
 * Shared Liquid instance rooted at the template directory
 */
export function createScriptLiquid(options: LiquidOptions = {}): Liquid {
  return new Liquid({
    root: TEMPLATE_DIR,
    cache: false,
    strictFilters: true,
    strictVariables: false,
    ...options,
  });
}

function getLiquid(): Liquid {
  if (!__liquid) {
    __liquid = createScriptLiquid({ cache: true });
  }
  return __liquid;
}

/**
 * Helpers the embedded step scripts call instead of the runtime accessors
 */
export function renderPrelude(context: {
  template: string;
  step: string;
  workdir: string;
}): string {
  return String(
    getLiquid().renderFileSync('prelude.js.liquid', {
      ...context,
      loopItemsPath: inputArtifactPath(context.workdir, LOOP_ITEMS_ARTIFACT),
      loopIndexEnv: LOOP_INDEX_ENV,
      loopFieldsEnv: LOOP_FIELDS_ENV,
      inputEnvPrefix: inputParameterEnv(''),
      workflowEnvPrefix: workflowParameterEnv(''),
    })
  );
}

/**
 * Script of the synthesized `split-items` template
 */
export function renderSplitScript(template: string, workdir: string): string {
  return String(
    getLiquid().renderFileSync('split.js.liquid', {
      template,
      sourcePath: inputArtifactPath(workdir, 'source'),
      formatPlaceholder: inputParameterRef('format'),
      countPath: outputParameterPath(workdir, 'count'),
      itemsPath: outputArtifactPath(workdir, 'items'),
    })
  );
}
