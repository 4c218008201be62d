import { z } from 'zod';
import { DEFAULT_GLOBAL_SETTINGS, GLOBAL_KEYS } from '../constants/pipeline.js';
import type { BlueprintField } from '../types/blueprint.js';
import type { JsonValue } from '../types/json.js';

const JsonScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([JsonScalarSchema, z.array(JsonValueSchema), z.record(z.string(), JsonValueSchema)])
);

export const RawInputsSchema = z.record(z.string(), JsonValueSchema);

export const UiComponentSchema = z.enum([
  'text',
  'password',
  'checkbox',
  'dropdown',
  'radio_group',
  'conditional',
  'number',
  'textarea',
  'port_mapping',
  'volume_mapping',
  'network_config',
  'device_mapping',
  'healthcheck_config',
]);

export const UiOptionSchema = z.object({
  label: z.string(),
  value: z.string(),
});

export const FieldPrerequisiteSchema = z.object({
  app_name: z.string(),
  status: z.enum(['installed', 'running']).optional(),
  input_name: z.string().optional(),
  input_value: JsonValueSchema.optional(),
});

const baseFieldShape = {
  ui_component: UiComponentSchema,
  label: z.string().optional(),
  description: z.string().optional(),
  tooltip: z.string().optional(),
  placeholder: z.string().optional(),
  schema: z.string().optional(),
  compose_transform: z.string().optional(),
  default: JsonValueSchema.optional(),
  required: z.boolean().optional(),
  visible: z.boolean().optional(),
  is_sensitive: z.boolean().optional(),
  use_global: z.enum(GLOBAL_KEYS).optional(),
  options: z.array(UiOptionSchema).optional(),
  show_when: z.record(z.string(), JsonValueSchema).optional(),
  prerequisites: z.array(FieldPrerequisiteSchema).optional(),
  min_value: z.number().optional(),
  max_value: z.number().optional(),
  pattern: z.string().optional(),
  volume_target: z.string().optional(),
};

const ScalarFieldSchema = z.object({
  ...baseFieldShape,
  type: z.enum(['string', 'integer', 'boolean']),
  dependent_fields: z.lazy(() => z.record(z.string(), BlueprintFieldSchema)).optional(),
});

const CompoundFieldSchema = z.object({
  ...baseFieldShape,
  type: z.literal('object'),
  fields: z.lazy(() => z.record(z.string(), BlueprintFieldSchema)).optional(),
});

const ArrayFieldSchema = z.object({
  ...baseFieldShape,
  type: z.literal('array'),
  item_schema: z.lazy(() => BlueprintFieldSchema).optional(),
});

export const BlueprintFieldSchema: z.ZodType<BlueprintField> = z.lazy(() =>
  z.union([ScalarFieldSchema, CompoundFieldSchema, ArrayFieldSchema])
);

export const BlueprintSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_-]*$/),
  display_name: z.string(),
  description: z.string().optional(),
  category: z.enum([
    'SYSTEM',
    'MEDIA SERVERS',
    'STARR APPS',
    'DOWNLOAD CLIENTS',
    'NETWORKING',
    'MANAGEMENT',
    'M3U UTILITY',
  ]),
  icon_url: z.string().optional(),
  install_order: z.number().default(10),
  visible: z.boolean().default(true),
  prerequisites: z.array(z.string()).default([]),
  static_ips: z.record(z.string(), z.string()).optional(),
  schema: z.record(z.string(), BlueprintFieldSchema),
  post_install_hook: z.string().optional(),
  pre_uninstall_hook: z.string().optional(),
  health_check_hook: z.string().optional(),
});

export const GlobalSettingsSchema = z.object({
  puid: z.number().int().nonnegative().default(DEFAULT_GLOBAL_SETTINGS.puid),
  pgid: z.number().int().nonnegative().default(DEFAULT_GLOBAL_SETTINGS.pgid),
  umask: z.string().regex(/^[0-7]{3,4}$/).default(DEFAULT_GLOBAL_SETTINGS.umask),
  timezone: z.string().min(1).default(DEFAULT_GLOBAL_SETTINGS.timezone),
  user: z.string().min(1).nullable().default(null),
  networkName: z.string().min(1).default(DEFAULT_GLOBAL_SETTINGS.networkName),
  networkSubnet: z.string().default(DEFAULT_GLOBAL_SETTINGS.networkSubnet),
  networkGateway: z.string().default(DEFAULT_GLOBAL_SETTINGS.networkGateway),
  stacksPath: z.string().default(DEFAULT_GLOBAL_SETTINGS.stacksPath),
  dataPath: z.string().default(DEFAULT_GLOBAL_SETTINGS.dataPath),
});
