import { describe, it, expect } from 'vitest';
import type { AppIdentity, BlueprintSchemaMap } from '@dockyard/shared';
import { formatEnvValue, renderEnvFile } from './envFile.js';

const app: AppIdentity = { id: 7, name: 'jellyfin', blueprintName: 'jellyfin', hostPath: '/srv/stacks/jellyfin' };
const generatedAt = new Date('2026-01-02T03:04:05.000Z');

describe('formatEnvValue', () => {
  it('writes plain values as they are', () => {
    expect(formatEnvValue('10.9.0')).toBe('10.9.0');
    expect(formatEnvValue(8096)).toBe('8096');
    expect(formatEnvValue(false)).toBe('false');
  });

  it('quotes values with whitespace, comments or quotes', () => {
    expect(formatEnvValue('Media Server')).toBe('"Media Server"');
    expect(formatEnvValue('a#b')).toBe('"a#b"');
    expect(formatEnvValue('say "hi"')).toBe('"say \\"hi\\""');
  });

  it('serializes structured values as quoted JSON', () => {
    expect(formatEnvValue(['a', 'b'])).toBe('"[\\"a\\",\\"b\\"]"');
    expect(formatEnvValue({ port: 1 })).toBe('"{\\"port\\":1}"');
  });

  it('doubles dollar signs so compose keeps them literal', () => {
    expect(formatEnvValue('pa$word')).toBe('pa$$word');
    expect(formatEnvValue('a $b')).toBe('"a $$b"');
    expect(formatEnvValue('${TAG}')).toBe('$${TAG}');
  });
});

describe('renderEnvFile', () => {
  const schema: BlueprintSchemaMap = {
    tag: { type: 'string', ui_component: 'text', schema: 'env.TAG', default: 'latest' },
    server_name: { type: 'string', ui_component: 'text', schema: 'env.SERVER_NAME' },
    web_port: { type: 'integer', ui_component: 'number', schema: 'service.ports' },
    override: { type: 'string', ui_component: 'text', schema: 'env.HOST_PATH' },
    unset: { type: 'string', ui_component: 'text', schema: 'env.UNSET' },
  };

  it('writes the header, HOST_PATH and env fields in schema order', () => {
    const content = renderEnvFile(
      app,
      { server_name: 'Living Room', tag: '10.9.0', web_port: 8096, override: '/tmp', unset: null },
      schema,
      { generatedAt }
    );

    expect(content).toBe(
      [
        '# Environment for jellyfin',
        '# Generated by dockyard at 2026-01-02T03:04:05.000Z',
        'HOST_PATH=/srv/stacks/jellyfin',
        'TAG=10.9.0',
        'SERVER_NAME="Living Room"',
        '',
      ].join('\n')
    );
  });

  it('does not write defaults for fields without an input', () => {
    const content = renderEnvFile(app, {}, schema, { generatedAt });
    expect(content.split('\n').slice(2)).toEqual(['HOST_PATH=/srv/stacks/jellyfin', '']);
  });
});
