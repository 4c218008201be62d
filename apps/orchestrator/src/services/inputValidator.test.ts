import { describe, it, expect } from 'vitest';
import type { BlueprintSchemaMap } from '@dockyard/shared';
import { ValidationError } from '../lib/errors.js';
import { assertValidInputs, validateInputs } from './inputValidator.js';

const schema: BlueprintSchemaMap = {
  server_name: { type: 'string', ui_component: 'text', label: 'Server name', required: true },
  puid: { type: 'integer', ui_component: 'number', required: true, use_global: 'PUID' },
  image: { type: 'string', ui_component: 'text', required: true, default: 'alpine' },
  port: { type: 'integer', ui_component: 'number', label: 'Port', min_value: 1, max_value: 65535 },
  mode: {
    type: 'string',
    ui_component: 'dropdown',
    label: 'Mode',
    options: [
      { label: 'Fast', value: 'fast' },
      { label: 'Safe', value: 'safe' },
    ],
  },
  slug: { type: 'string', ui_component: 'text', label: 'Slug', pattern: '^[a-z-]+$' },
  enabled: { type: 'boolean', ui_component: 'checkbox', label: 'Enabled' },
  web_port: {
    type: 'object',
    ui_component: 'port_mapping',
    label: 'Web port',
    fields: {
      host: { type: 'integer', ui_component: 'number', label: 'Host port', max_value: 65535 },
    },
  },
  tags: {
    type: 'array',
    ui_component: 'textarea',
    label: 'Tags',
    item_schema: { type: 'string', ui_component: 'text', label: 'Tag' },
  },
};

describe('validateInputs', () => {
  it('accepts valid inputs', () => {
    const result = validateInputs(
      {
        server_name: 'media',
        port: 8096,
        mode: 'safe',
        slug: 'living-room',
        enabled: false,
        web_port: { host: 8096 },
        tags: ['a', 'b'],
      },
      schema
    );

    expect(result).toEqual({ valid: true, errors: [] });
  });

  it('reports missing required fields without a global or default', () => {
    const result = validateInputs({ server_name: '' }, schema);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([{ path: 'server_name', message: 'Required field "Server name" is missing' }]);
  });

  it('reports type, range, option and pattern errors', () => {
    const result = validateInputs(
      { server_name: 'media', port: 70000, mode: 'turbo', slug: 'Living Room', enabled: 'yes' },
      schema
    );

    expect(result.errors).toEqual([
      { path: 'port', message: '"Port" must be at most 65535' },
      { path: 'mode', message: '"Mode" must be one of: fast, safe' },
      { path: 'slug', message: '"Slug" does not match pattern ^[a-z-]+$' },
      { path: 'enabled', message: '"Enabled" must be a boolean' },
    ]);
  });

  it('rejects non-integer numbers', () => {
    const result = validateInputs({ server_name: 'media', port: 80.5 }, schema);
    expect(result.errors).toEqual([{ path: 'port', message: '"Port" must be an integer' }]);
  });

  it('checks nested fields and list items', () => {
    const result = validateInputs(
      { server_name: 'media', web_port: { host: 'http' }, tags: ['a', 3] },
      schema
    );

    expect(result.errors).toEqual([
      { path: 'web_port.host', message: '"Host port" must be an integer' },
      { path: 'tags.1', message: '"Tag" must be a string' },
    ]);
  });

  it('rejects the wrong container type', () => {
    const result = validateInputs({ server_name: 'media', web_port: [8096], tags: 'a' }, schema);

    expect(result.errors).toEqual([
      { path: 'web_port', message: '"Web port" must be an object' },
      { path: 'tags', message: '"Tags" must be a list' },
    ]);
  });
});

describe('assertValidInputs', () => {
  it('throws an input validation error', () => {
    try {
      assertValidInputs({}, schema);
      expect.fail('expected a validation error');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (!(err instanceof ValidationError)) return;
      expect(err.code).toBe('INPUT_VALIDATION_ERROR');
      expect(err.message).toBe('Invalid configuration:\n  - server_name: Required field "Server name" is missing');
    }
  });

  it('passes valid inputs', () => {
    expect(() => assertValidInputs({ server_name: 'media' }, schema)).not.toThrow();
  });
});
