import type { JsonValue } from './json.js';

export type FieldType = 'string' | 'integer' | 'boolean' | 'object' | 'array';

export type UiComponent =
  | 'text'
  | 'password'
  | 'checkbox'
  | 'dropdown'
  | 'radio_group'
  | 'conditional'
  | 'number'
  | 'textarea'
  | 'port_mapping'
  | 'volume_mapping'
  | 'network_config'
  | 'device_mapping'
  | 'healthcheck_config';

/** Global settings a field can inherit through `use_global`. */
export type GlobalKey = 'PUID' | 'PGID' | 'UMASK' | 'TZ' | 'USER';

export type TransformName =
  | 'port_mapping'
  | 'port_array'
  | 'volume_mapping'
  | 'volume_array'
  | 'network_config'
  | 'custom_networks_array';

export type BlueprintCategory =
  | 'SYSTEM'
  | 'MEDIA SERVERS'
  | 'STARR APPS'
  | 'DOWNLOAD CLIENTS'
  | 'NETWORKING'
  | 'MANAGEMENT'
  | 'M3U UTILITY';

export interface UiOption {
  label: string;
  value: string;
}

export interface FieldPrerequisite {
  app_name: string;
  status?: 'installed' | 'running';
  input_name?: string;
  input_value?: JsonValue;
}

interface BaseField {
  ui_component: UiComponent;
  label?: string;
  description?: string;
  tooltip?: string;
  placeholder?: string;

  /**
   * Routing path, e.g. `service.environment.PUID`, `compose.networks`,
   * `metadata.admin_user`, `env.TAG` or `service.environment.*`.
   * Absent means `service`.
   */
  schema?: string;
  compose_transform?: string;

  default?: JsonValue;
  required?: boolean;
  visible?: boolean;
  is_sensitive?: boolean;
  use_global?: GlobalKey;

  options?: UiOption[];
  show_when?: Record<string, JsonValue>;
  prerequisites?: FieldPrerequisite[];

  min_value?: number;
  max_value?: number;
  pattern?: string;

  // Legacy volume_mapping target for bare string values
  volume_target?: string;
}

export interface ScalarField extends BaseField {
  type: 'string' | 'integer' | 'boolean';
  dependent_fields?: Record<string, BlueprintField>;
}

export interface CompoundField extends BaseField {
  type: 'object';
  fields?: Record<string, BlueprintField>;
}

export interface ArrayField extends BaseField {
  type: 'array';
  item_schema?: BlueprintField;
}

export type BlueprintField = ScalarField | CompoundField | ArrayField;

/** Field name → definition, in declaration order. */
export type BlueprintSchemaMap = Record<string, BlueprintField>;

export interface Blueprint {
  name: string;
  display_name: string;
  description?: string;
  category: BlueprintCategory;
  icon_url?: string;
  install_order: number;
  visible: boolean;
  prerequisites: string[];
  static_ips?: Record<string, string>;
  schema: BlueprintSchemaMap;
  post_install_hook?: string;
  pre_uninstall_hook?: string;
  health_check_hook?: string;
}
