/**
 * Compose generator
 *
 * Runs the full pipeline for one app:
 * expand → defaults → route → transforms → globals → custom env → assemble → env file.
 *
 * Synchronous and free of I/O. Network creation requested by transforms is
 * returned in `networkRequests` for the caller to perform.
 */

import type {
  AppIdentity,
  Blueprint,
  GenerationResult,
  GlobalSettings,
  RawInputs,
} from '@dockyard/shared';
import { generatorLogger } from '../../lib/logger.js';
import { applyCustomEnvironment } from './customEnv.js';
import { renderEnvFile } from './envFile.js';
import { injectGlobals } from './globalInjector.js';
import { routeInputs } from './inputRouter.js';
import { assembleStack } from './stackAssembler.js';
import { applyDefaults, expandBlueprintSchema } from './templateExpander.js';
import { applyFieldTransforms, createTransformCache } from './transforms.js';

export interface GenerateStackOptions {
  blueprint: Pick<Blueprint, 'name' | 'schema'>;
  globals: GlobalSettings;
  app: AppIdentity;
  rawInputs: RawInputs;
  /** Freezes the env-file header timestamp */
  generatedAt?: Date;
}

export function generateStack(options: GenerateStackOptions): GenerationResult {
  const { blueprint, globals, app, rawInputs, generatedAt } = options;

  generatorLogger.info({ app: app.name, blueprint: blueprint.name }, 'Generating stack');

  const schema = expandBlueprintSchema(blueprint.schema, globals, app);
  const inputs = applyDefaults(rawInputs, schema);

  const routed = routeInputs(inputs, schema);
  const cache = createTransformCache();
  applyFieldTransforms(inputs, schema, routed.service, cache);
  injectGlobals(routed.service, schema, globals);
  applyCustomEnvironment(routed.service, inputs, schema);

  const { descriptor, serviceName, containerName } = assembleStack(routed.service, routed.compose, cache, app);
  const envFile = renderEnvFile(app, rawInputs, blueprint.schema, { generatedAt });

  generatorLogger.info(
    { app: app.name, service: serviceName, networkRequests: cache.networkRequests.length },
    'Stack generated'
  );

  return {
    descriptor,
    envFile,
    serviceName,
    containerName,
    metadata: routed.metadata,
    networkRequests: [...cache.networkRequests],
  };
}
