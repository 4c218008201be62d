import type { FieldType, UiComponent } from './blueprint.js';
import type { RawInputs } from './stack.js';

/** A named bundle of blueprints installed together. */
export interface Preset {
  /** File name without `.json` */
  id: string;
  name: string;
  description?: string;
  icon?: string;
  apps: string[];
}

/** A required field with no default, which the user has to fill in. */
export interface RequiredInput {
  field: string;
  label: string;
  type: FieldType;
  ui_component: UiComponent;
  description?: string;
  placeholder?: string;
  is_sensitive: boolean;
}

export interface PresetAnalysis {
  availableApps: string[];
  missingBlueprints: string[];
  alreadyInstalled: string[];
  /** App name → fields to ask for; apps needing nothing are left out */
  requiredInputs: Record<string, RequiredInput[]>;
}

export interface PresetPlan {
  /** Raw inputs per app, with blueprint defaults filled in */
  apps: Array<{ name: string; rawInputs: RawInputs }>;
  skipped: string[];
  errors: Record<string, string>;
}
