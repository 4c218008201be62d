/**
 * Template expansion for blueprint schemas.
 *
 * Supported placeholders:
 * - ${GLOBAL.PUID}, ${GLOBAL.PGID}, ${GLOBAL.TIMEZONE}
 * - ${GLOBAL.NETWORK_NAME}, ${GLOBAL.NETWORK_SUBNET}, ${GLOBAL.NETWORK_GATEWAY}
 * - ${APP.HOST_PATH}, ${APP.NAME}
 *
 * Anything else in `${...}` form is left untouched; compose interpolates
 * variables such as ${TAG} or ${HOST_PATH} itself.
 */

import type {
  AppIdentity,
  BlueprintField,
  BlueprintSchemaMap,
  GlobalSettings,
  JsonValue,
  RawInputs,
} from '@dockyard/shared';
import { generatorLogger } from '../../lib/logger.js';
import { cloneTree, isTreeMap, type TreeMap } from '../../lib/tree.js';

export interface TemplateContext {
  globals: GlobalSettings;
  app: AppIdentity;
}

type Resolver = (context: TemplateContext) => string;

const RESOLVERS: Record<string, Resolver> = {
  'GLOBAL.PUID': ({ globals }) => String(globals.puid),
  'GLOBAL.PGID': ({ globals }) => String(globals.pgid),
  'GLOBAL.TIMEZONE': ({ globals }) => globals.timezone,
  'GLOBAL.NETWORK_NAME': ({ globals }) => globals.networkName,
  'GLOBAL.NETWORK_SUBNET': ({ globals }) => globals.networkSubnet,
  'GLOBAL.NETWORK_GATEWAY': ({ globals }) => globals.networkGateway,
  'APP.HOST_PATH': ({ app }) => app.hostPath,
  'APP.NAME': ({ app }) => app.name,
};

const PLACEHOLDER_PATTERN = /\$\{((?:GLOBAL|APP)\.[A-Z_]+)\}/g;
const SINGLE_PLACEHOLDER = /^\$\{(?:GLOBAL|APP)\.[A-Z_]+\}$/;

/**
 * Substitute known placeholders in a string.
 * A string made of exactly one placeholder that expands to digits becomes an integer.
 */
export function expandTemplateString(text: string, context: TemplateContext): string | number {
  const expanded = text.replace(PLACEHOLDER_PATTERN, (match: string, key: string) => {
    const resolve = RESOLVERS[key];
    return resolve ? resolve(context) : match;
  });

  if (expanded !== text && SINGLE_PLACEHOLDER.test(text) && /^\d+$/.test(expanded)) {
    return parseInt(expanded, 10);
  }
  return expanded;
}

export function expandValue(value: JsonValue, context: TemplateContext): JsonValue {
  if (typeof value === 'string') {
    return expandTemplateString(value, context);
  }
  if (Array.isArray(value)) {
    return value.map(item => expandValue(item, context));
  }
  if (isTreeMap(value)) {
    const result: TreeMap = {};
    for (const [key, child] of Object.entries(value)) {
      result[key] = expandValue(child, context);
    }
    return result;
  }
  return value;
}

function expandField(field: BlueprintField, context: TemplateContext): BlueprintField {
  const expanded: BlueprintField = { ...field };

  if (field.default !== undefined) {
    expanded.default = expandValue(field.default, context);
  }
  if (typeof field.schema === 'string') {
    // Routing paths stay strings even when they expand to digits
    expanded.schema = String(expandTemplateString(field.schema, context));
  }

  if (expanded.type === 'object' && expanded.fields) {
    expanded.fields = expandSchemaMap(expanded.fields, context);
  } else if (expanded.type === 'array' && expanded.item_schema) {
    expanded.item_schema = expandField(expanded.item_schema, context);
  } else if (expanded.type !== 'object' && expanded.type !== 'array' && expanded.dependent_fields) {
    expanded.dependent_fields = expandSchemaMap(expanded.dependent_fields, context);
  }

  return expanded;
}

function expandSchemaMap(schema: BlueprintSchemaMap, context: TemplateContext): BlueprintSchemaMap {
  const expanded: BlueprintSchemaMap = {};
  for (const [name, field] of Object.entries(schema)) {
    expanded[name] = expandField(field, context);
  }
  return expanded;
}

/**
 * Expand placeholders in every field's `default` and routing path, recursing
 * into compound `fields` and array `item_schema`.
 */
export function expandBlueprintSchema(
  schema: BlueprintSchemaMap,
  globals: GlobalSettings,
  app: AppIdentity
): BlueprintSchemaMap {
  const expanded = expandSchemaMap(schema, { globals, app });
  generatorLogger.debug({ app: app.name, fields: Object.keys(expanded).length }, 'Template expansion completed');
  return expanded;
}

/**
 * Fill inputs that are absent or null from the expanded schema's defaults.
 * Values the user supplied, including `false` and `0`, are kept.
 */
export function applyDefaults(rawInputs: RawInputs, expandedSchema: BlueprintSchemaMap): RawInputs {
  const complete: RawInputs = { ...rawInputs };

  for (const [name, field] of Object.entries(expandedSchema)) {
    const current = complete[name];
    if (current !== undefined && current !== null) {
      continue;
    }
    if (field.default !== undefined && field.default !== null) {
      complete[name] = cloneTree(field.default);
    }
  }

  return complete;
}
