import {
  HOST_PATH_VARIABLE,
  type AppIdentity,
  type BlueprintSchemaMap,
  type JsonValue,
  type RawInputs,
} from '@dockyard/shared';

export interface EnvFileOptions {
  /** Timestamp written in the header comment; defaults to now */
  generatedAt?: Date;
}

const ENV_PREFIX = 'env.';
const NEEDS_QUOTES = /[\s#"'\\]/;

/** Structured values are written as JSON, then quoted like any other value. */
export function formatEnvValue(value: JsonValue): string {
  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else if (typeof value === 'number' || typeof value === 'boolean') {
    text = String(value);
  } else {
    text = JSON.stringify(value);
  }
  // compose interpolates `$` in .env values, quoted or not
  text = text.replace(/\$/g, '$$$$');

  if (!NEEDS_QUOTES.test(text)) {
    return text;
  }
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Render the stack's `.env` file.
 *
 * `HOST_PATH` always comes first, followed by every `env.*` field in schema
 * order. Routing paths are read from the schema as written in the blueprint
 * (before template expansion) and values from the raw inputs, so defaults are
 * not written here.
 */
export function renderEnvFile(
  app: AppIdentity,
  rawInputs: RawInputs,
  originalSchema: BlueprintSchemaMap,
  options: EnvFileOptions = {}
): string {
  const generatedAt = options.generatedAt ?? new Date();
  const lines = [
    `# Environment for ${app.name}`,
    `# Generated by dockyard at ${generatedAt.toISOString()}`,
    `${HOST_PATH_VARIABLE}=${formatEnvValue(app.hostPath)}`,
  ];

  for (const [fieldName, field] of Object.entries(originalSchema)) {
    if (typeof field.schema !== 'string' || !field.schema.startsWith(ENV_PREFIX)) {
      continue;
    }
    const variable = field.schema.slice(ENV_PREFIX.length);
    const value = rawInputs[fieldName];
    if (!variable || variable === HOST_PATH_VARIABLE || value === undefined || value === null) {
      continue;
    }
    lines.push(`${variable}=${formatEnvValue(value)}`);
  }

  return `${lines.join('\n')}\n`;
}
