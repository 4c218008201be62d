/**
 * Presets
 *
 * A preset is a JSON file naming blueprints that are installed together. It
 * carries no inputs of its own: analysis tells the caller which required
 * fields still need a value, and planning fills the remaining ones from the
 * blueprint defaults.
 */

import { readdir, readFile } from 'fs/promises';
import { basename, join } from 'path';
import {
  DEFAULT_GLOBAL_SETTINGS,
  ErrorCodes,
  PresetFileSchema,
  type AppIdentity,
  type Blueprint,
  type BlueprintSchemaMap,
  type GlobalSettings,
  type Preset,
  type PresetAnalysis,
  type PresetPlan,
  type RawInputs,
  type RequiredInput,
} from '@dockyard/shared';
import { config } from '../config.js';
import { getErrorMessage, PresetLoadError, StackError } from '../lib/errors.js';
import { presetLogger } from '../lib/logger.js';
import { applyDefaults, expandBlueprintSchema } from './compose/templateExpander.js';
import { validateInputs } from './inputValidator.js';
import { resolveInstallOrder } from './installOrder.js';
import { getHostStackPath } from './pathResolver.js';

const PRESET_ID = /^[a-z0-9][a-z0-9_-]*$/;

export interface PresetLoadResult {
  presets: Preset[];
  errors: PresetLoadError[];
}

export function parsePreset(file: string, content: string): Preset {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new PresetLoadError(file, `invalid JSON: ${getErrorMessage(err)}`);
  }

  const parsed = PresetFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new PresetLoadError(file, 'does not match the preset schema', issues);
  }

  return { id: basename(file, '.json'), ...parsed.data };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Load one preset by id from the presets directory.
 */
export async function loadPreset(id: string, directory: string = config.paths.presets): Promise<Preset> {
  if (!PRESET_ID.test(id)) {
    throw new StackError(ErrorCodes.PRESET_NOT_FOUND, `Preset not found: ${id}`);
  }

  const file = join(directory, `${id}.json`);
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      throw new StackError(ErrorCodes.PRESET_NOT_FOUND, `Preset not found: ${id}`);
    }
    throw new PresetLoadError(file, `cannot read file: ${getErrorMessage(err)}`);
  }
  return parsePreset(file, content);
}

/**
 * Load every preset in a directory, sorted by display name. A missing
 * directory means there are no presets.
 */
export async function loadPresets(directory: string = config.paths.presets): Promise<PresetLoadResult> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (err) {
    if (isMissingFile(err)) {
      presetLogger.warn({ directory }, 'Presets directory not found');
      return { presets: [], errors: [] };
    }
    throw err;
  }

  const presets: Preset[] = [];
  const errors: PresetLoadError[] = [];

  for (const entry of entries.filter(name => name.endsWith('.json') && !name.startsWith('.')).sort()) {
    const file = join(directory, entry);
    try {
      presets.push(parsePreset(file, await readFile(file, 'utf-8')));
    } catch (err) {
      const loadError = err instanceof PresetLoadError ? err : new PresetLoadError(file, getErrorMessage(err));
      presetLogger.error({ file: entry, details: loadError.details }, loadError.message);
      errors.push(loadError);
    }
  }

  presets.sort((a, b) => a.name.localeCompare(b.name));
  return { presets, errors };
}

/**
 * Required top-level fields the user has to fill in: no default and not
 * inherited from the global settings.
 */
export function findRequiredInputs(schema: BlueprintSchemaMap): RequiredInput[] {
  const required: RequiredInput[] = [];

  for (const [name, field] of Object.entries(schema)) {
    const hasDefault = field.default !== undefined && field.default !== null;
    if (!field.required || hasDefault || field.use_global) {
      continue;
    }
    required.push({
      field: name,
      label: field.label ?? name,
      type: field.type,
      ui_component: field.ui_component,
      description: field.description,
      placeholder: field.placeholder,
      is_sensitive: field.is_sensitive ?? false,
    });
  }

  return required;
}

interface PresetSelection {
  available: Blueprint[];
  missing: string[];
  installed: string[];
}

function selectBlueprints(preset: Preset, blueprints: readonly Blueprint[], installed: Iterable<string>): PresetSelection {
  const byName = new Map(blueprints.map(blueprint => [blueprint.name, blueprint]));
  const installedNames = new Set(installed);
  const selection: PresetSelection = { available: [], missing: [], installed: [] };

  for (const name of preset.apps) {
    const blueprint = byName.get(name);
    if (!blueprint) {
      selection.missing.push(name);
    } else if (installedNames.has(name)) {
      selection.installed.push(name);
    } else {
      selection.available.push(blueprint);
    }
  }

  return selection;
}

/**
 * Sort a preset's apps into available, missing and already installed, and
 * list the required inputs of each available app.
 */
export function analyzePreset(
  preset: Preset,
  blueprints: readonly Blueprint[],
  installed: Iterable<string> = []
): PresetAnalysis {
  const selection = selectBlueprints(preset, blueprints, installed);
  const requiredInputs: Record<string, RequiredInput[]> = {};

  for (const blueprint of selection.available) {
    const fields = findRequiredInputs(blueprint.schema);
    if (fields.length > 0) {
      requiredInputs[blueprint.name] = fields;
    }
  }

  return {
    availableApps: selection.available.map(blueprint => blueprint.name),
    missingBlueprints: selection.missing,
    alreadyInstalled: selection.installed,
    requiredInputs,
  };
}

export interface PlanPresetOptions {
  /** User inputs keyed by app name */
  userInputs?: Record<string, RawInputs>;
  installed?: Iterable<string>;
  globals?: GlobalSettings;
}

/**
 * Build the raw inputs for every app a preset installs, in install order.
 *
 * Defaults come from each blueprint's expanded schema, so placeholders in them
 * are already resolved for the app. Apps whose blueprint is missing, that are
 * already installed, or whose inputs do not validate are skipped and their
 * reason recorded.
 */
export function planPreset(
  preset: Preset,
  blueprints: readonly Blueprint[],
  options: PlanPresetOptions = {}
): PresetPlan {
  const { userInputs = {}, installed = [], globals = DEFAULT_GLOBAL_SETTINGS } = options;
  const selection = selectBlueprints(preset, blueprints, installed);
  const plan: PresetPlan = { apps: [], skipped: [], errors: {} };

  for (const name of selection.missing) {
    plan.skipped.push(name);
    plan.errors[name] = 'Blueprint not found';
  }
  for (const name of selection.installed) {
    plan.skipped.push(name);
    plan.errors[name] = 'App already exists';
  }

  for (const blueprint of resolveInstallOrder(selection.available)) {
    const app: AppIdentity = {
      id: blueprint.name,
      name: blueprint.name,
      blueprintName: blueprint.name,
      hostPath: getHostStackPath(blueprint.name),
    };
    const schema = expandBlueprintSchema(blueprint.schema, globals, app);
    const rawInputs = applyDefaults(userInputs[blueprint.name] ?? {}, schema);

    const validation = validateInputs(rawInputs, blueprint.schema);
    if (!validation.valid) {
      plan.skipped.push(blueprint.name);
      plan.errors[blueprint.name] = validation.errors.map(issue => `${issue.path}: ${issue.message}`).join('; ');
      continue;
    }
    plan.apps.push({ name: blueprint.name, rawInputs });
  }

  presetLogger.info(
    { preset: preset.id, planned: plan.apps.length, skipped: plan.skipped.length },
    'Preset planned'
  );
  return plan;
}
