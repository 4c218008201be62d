#!/usr/bin/env node
/**
 * Dockyard CLI
 * Generates, validates and orders app stacks from blueprint files
 */

import { readFile } from 'fs/promises';
import { pathToFileURL } from 'url';
import {
  ErrorCodes,
  GlobalSettingsSchema,
  PresetInputsSchema,
  RawInputsSchema,
  type AppIdentity,
  type Blueprint,
  type GlobalSettings,
  type RawInputs,
} from '@dockyard/shared';
import { config } from './config.js';
import { getErrorMessage, StackError, ValidationError } from './lib/errors.js';
import { loadBlueprint, loadBlueprints } from './services/blueprintLoader.js';
import { generateStack } from './services/compose/composeGenerator.js';
import { getAvailableTransforms } from './services/compose/transforms.js';
import { assertValidInputs, validateInputs } from './services/inputValidator.js';
import { assertPrerequisitesMet, resolveInstallOrder } from './services/installOrder.js';
import { getHostStackPath, getStackPath } from './services/pathResolver.js';
import { analyzePreset, loadPreset, loadPresets, planPreset } from './services/presetService.js';
import { buildStack } from './services/stackBuilder.js';
import { serializeCompose, writeStackFiles } from './services/stackWriter.js';

function printUsage() {
  console.log(`
Dockyard CLI

Usage: dockyard <command> [options]

Commands:
  generate <blueprint.json> <inputs.json>   Print the compose file and .env for an app
      --name <app>                          App instance name (default: blueprint name)
      --settings <settings.json>            Global settings (default: built-in defaults)
      --write                               Create requested networks and write the stack directory
  validate <blueprint.json> <inputs.json>   Check inputs against the blueprint's fields
  order <blueprint> [blueprint...]          Print the install order for blueprints in BLUEPRINTS_PATH
      --installed <a,b,...>                 Blueprints already installed
  presets                                   List presets in PRESETS_PATH
  preset <id>                               Show a preset's apps and the inputs they still need
      --installed <a,b,...>                 Blueprints already installed
      --inputs <inputs.json>                Per-app inputs; prints the planned inputs as JSON
  transforms                                List available compose transforms
  help                                      Show this help message

Examples:
  dockyard generate blueprints/jellyfin.json jellyfin-inputs.json
  dockyard generate blueprints/jellyfin.json jellyfin-inputs.json --name jellyfin-4k --write
  dockyard order sonarr radarr prowlarr
  dockyard preset media-stack --installed prowlarr
`);
}

interface ParsedArgs {
  positional: string[];
  options: Map<string, string | true>;
}

function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  const options = new Map<string, string | true>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const name = arg.slice(2);
    const next = args[i + 1];
    if (name === 'write' || next === undefined || next.startsWith('--')) {
      options.set(name, true);
    } else {
      options.set(name, next);
      i++;
    }
  }

  return { positional, options };
}

function stringOption(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.options.get(name);
  return typeof value === 'string' ? value : undefined;
}

async function readJsonFile(file: string): Promise<unknown> {
  const content = await readFile(file, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new Error(`${file}: invalid JSON: ${getErrorMessage(err)}`);
  }
}

async function readInputs(file: string): Promise<RawInputs> {
  const parsed = RawInputsSchema.safeParse(await readJsonFile(file));
  if (!parsed.success) {
    throw new Error(`${file}: inputs must be a JSON object`);
  }
  return parsed.data;
}

async function readSettings(file: string | undefined): Promise<GlobalSettings> {
  const data = file ? await readJsonFile(file) : {};
  const parsed = GlobalSettingsSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }));
    throw new ValidationError(`${file}: invalid global settings`, issues);
  }
  return parsed.data;
}

function buildAppIdentity(blueprint: Blueprint, name: string | undefined): AppIdentity {
  const appName = name ?? blueprint.name;
  return {
    id: appName,
    name: appName,
    blueprintName: blueprint.name,
    hostPath: getHostStackPath(appName),
  };
}

async function generate(parsed: ParsedArgs): Promise<number> {
  const [blueprintFile, inputsFile] = parsed.positional;
  if (!blueprintFile || !inputsFile) {
    console.error('Error: blueprint and inputs files required');
    return 1;
  }

  const blueprint = await loadBlueprint(blueprintFile);
  const rawInputs = await readInputs(inputsFile);
  const globals = await readSettings(stringOption(parsed, 'settings'));
  const app = buildAppIdentity(blueprint, stringOption(parsed, 'name'));

  assertValidInputs(rawInputs, blueprint.schema);

  if (parsed.options.get('write') !== true) {
    const result = generateStack({ blueprint, globals, app, rawInputs });
    console.log(serializeCompose(result.descriptor));
    console.log('# --- .env ---');
    console.log(result.envFile);
    return 0;
  }

  const built = await buildStack({ blueprint, globals, app, rawInputs });
  const stackDir = getStackPath(app.name);
  await writeStackFiles(stackDir, built);

  console.log(`Stack written to ${stackDir}`);
  for (const network of built.failedNetworks) {
    console.log(`  Warning: network "${network}" could not be created and was left out`);
  }
  return 0;
}

async function validate(parsed: ParsedArgs): Promise<number> {
  const [blueprintFile, inputsFile] = parsed.positional;
  if (!blueprintFile || !inputsFile) {
    console.error('Error: blueprint and inputs files required');
    return 1;
  }

  const blueprint = await loadBlueprint(blueprintFile);
  const result = validateInputs(await readInputs(inputsFile), blueprint.schema);

  if (result.valid) {
    console.log('Inputs are valid');
    return 0;
  }
  console.log('Inputs are invalid:');
  for (const error of result.errors) {
    console.log(`  ${error.path}: ${error.message}`);
  }
  return 1;
}

async function order(parsed: ParsedArgs): Promise<number> {
  if (parsed.positional.length === 0) {
    console.error('Error: at least one blueprint name required');
    return 1;
  }

  const { blueprints } = await loadBlueprints(config.paths.blueprints);
  const byName = new Map(blueprints.map(blueprint => [blueprint.name, blueprint]));

  const selected: Blueprint[] = [];
  for (const name of parsed.positional) {
    const blueprint = byName.get(name);
    if (!blueprint) {
      throw new StackError(ErrorCodes.BLUEPRINT_NOT_FOUND, `blueprint '${name}' not found in ${config.paths.blueprints}`);
    }
    selected.push(blueprint);
  }

  const installed = installedOption(parsed);
  assertPrerequisitesMet(selected, installed);

  resolveInstallOrder(selected).forEach((blueprint, index) => {
    console.log(`${index + 1}. ${blueprint.name}`);
  });
  return 0;
}

function installedOption(parsed: ParsedArgs): string[] {
  return stringOption(parsed, 'installed')?.split(',').filter(Boolean) ?? [];
}

async function listPresets(): Promise<number> {
  const { presets } = await loadPresets(config.paths.presets);
  for (const preset of presets) {
    console.log(`${preset.id}: ${preset.name} (${preset.apps.join(', ')})`);
  }
  return 0;
}

async function preset(parsed: ParsedArgs): Promise<number> {
  const [id] = parsed.positional;
  if (!id) {
    console.error('Error: preset id required');
    return 1;
  }

  const found = await loadPreset(id, config.paths.presets);
  const { blueprints } = await loadBlueprints(config.paths.blueprints);
  const installed = installedOption(parsed);
  const inputsFile = stringOption(parsed, 'inputs');

  if (inputsFile) {
    const userInputs = PresetInputsSchema.safeParse(await readJsonFile(inputsFile));
    if (!userInputs.success) {
      throw new Error(`${inputsFile}: inputs must map app names to JSON objects`);
    }
    const plan = planPreset(found, blueprints, { userInputs: userInputs.data, installed });
    console.log(JSON.stringify(plan, null, 2));
    return plan.apps.length > 0 ? 0 : 1;
  }

  const analysis = analyzePreset(found, blueprints, installed);
  console.log(`${found.name}: ${analysis.availableApps.join(', ') || 'nothing to install'}`);
  if (analysis.alreadyInstalled.length > 0) {
    console.log(`  Already installed: ${analysis.alreadyInstalled.join(', ')}`);
  }
  if (analysis.missingBlueprints.length > 0) {
    console.log(`  Missing blueprints: ${analysis.missingBlueprints.join(', ')}`);
  }
  for (const [app, fields] of Object.entries(analysis.requiredInputs)) {
    console.log(`  ${app} needs: ${fields.map(field => `${field.field} (${field.label})`).join(', ')}`);
  }
  return 0;
}

function listTransforms(): number {
  for (const name of getAvailableTransforms()) {
    console.log(name);
  }
  return 0;
}

export async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;
  const parsed = parseArgs(rest);

  try {
    switch (command) {
      case 'generate':
        return await generate(parsed);
      case 'validate':
        return await validate(parsed);
      case 'order':
        return await order(parsed);
      case 'presets':
        return await listPresets();
      case 'preset':
        return await preset(parsed);
      case 'transforms':
        return listTransforms();
      case 'help':
      case '--help':
      case '-h':
      case undefined:
        printUsage();
        return 0;
      default:
        console.error(`Unknown command: ${command}`);
        printUsage();
        return 1;
    }
  } catch (err) {
    const prefix = err instanceof StackError ? `Error [${err.code}]` : 'Error';
    console.error(`${prefix}: ${getErrorMessage(err)}`);
    return 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2)).then(
    code => process.exit(code),
    (err: unknown) => {
      console.error('Error:', getErrorMessage(err));
      process.exit(1);
    }
  );
}
