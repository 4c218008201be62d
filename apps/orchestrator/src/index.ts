// Pipeline
export { generateStack, type GenerateStackOptions } from './services/compose/composeGenerator.js';
export { expandBlueprintSchema, expandTemplateString, applyDefaults } from './services/compose/templateExpander.js';
export { routeInputs, parseRoutingPath, type RoutingTarget } from './services/compose/inputRouter.js';
export {
  applyTransform,
  applyFieldTransforms,
  createTransformCache,
  getAvailableTransforms,
  isTransformName,
  type TransformCache,
  type TransformContext,
  type TransformFn,
} from './services/compose/transforms.js';
export { injectGlobals, resolveGlobalValue } from './services/compose/globalInjector.js';
export { applyCustomEnvironment } from './services/compose/customEnv.js';
export { assembleStack, applyImageTag, type AssembledStack } from './services/compose/stackAssembler.js';
export { validateStack } from './services/compose/stackValidator.js';
export { renderEnvFile, type EnvFileOptions } from './services/compose/envFile.js';
export { normalizePort, normalizeVolume, parsePortString, parseVolumeString } from './services/compose/normalize.js';

// Collaborators
export { loadBlueprint, loadBlueprints, parseBlueprint, type BlueprintLoadResult } from './services/blueprintLoader.js';
export { validateInputs, assertValidInputs, type InputValidationResult } from './services/inputValidator.js';
export { findMissingPrerequisites, assertPrerequisitesMet, resolveInstallOrder } from './services/installOrder.js';
export {
  DockerNetworkDriver,
  ensureNetwork,
  runCommand,
  type CommandRunner,
  type NetworkDriver,
} from './services/networkManager.js';
export { buildStack, detachNetworks, type BuiltStack } from './services/stackBuilder.js';
export { writeStackFiles, serializeCompose, type StackArtifacts } from './services/stackWriter.js';
export { buildHookContext } from './services/hookContext.js';
export { getStackPath, getHostStackPath } from './services/pathResolver.js';
export {
  loadPreset,
  loadPresets,
  parsePreset,
  findRequiredInputs,
  analyzePreset,
  planPreset,
  type PlanPresetOptions,
  type PresetLoadResult,
} from './services/presetService.js';

// Errors
export {
  StackError,
  SchemaError,
  TransformError,
  ValidationError,
  ExternalSideEffectError,
  DependencyError,
  BlueprintLoadError,
  PresetLoadError,
  getErrorMessage,
  type ValidationIssue,
} from './lib/errors.js';
