/**
 * Input Router Tests
 *
 * - Bucket selection (service / compose / metadata / env)
 * - Nested subpaths and top-level fallback to the field name
 * - Skipped fields: transforms, wildcards, env, unknown inputs
 * - Malformed routing paths
 */

import { describe, it, expect } from 'vitest';
import type { BlueprintField, BlueprintSchemaMap } from '@dockyard/shared';
import { SchemaError } from '../../lib/errors.js';
import { parseRoutingPath, routeInputs } from './inputRouter.js';

function text(schema?: string): BlueprintField {
  return schema === undefined ? { type: 'string', ui_component: 'text' } : { type: 'string', ui_component: 'text', schema };
}

describe('parseRoutingPath', () => {
  it('defaults to the service bucket', () => {
    expect(parseRoutingPath('image', text())).toEqual({ bucket: 'service', path: [], wildcard: false });
  });

  it('splits bucket and subpath', () => {
    expect(parseRoutingPath('puid', text('service.environment.PUID'))).toEqual({
      bucket: 'service',
      path: ['environment', 'PUID'],
      wildcard: false,
    });
  });

  it('recognizes trailing wildcards', () => {
    expect(parseRoutingPath('extra', text('service.environment.*'))).toEqual({
      bucket: 'service',
      path: ['environment'],
      wildcard: true,
    });
  });

  it('degrades unknown buckets to the service top level', () => {
    expect(parseRoutingPath('odd', text('labels.foo'))).toEqual({ bucket: 'service', path: [], wildcard: false });
  });

  it('degrades malformed subpaths to the bucket top level', () => {
    expect(parseRoutingPath('odd', text('compose..networks'))).toEqual({ bucket: 'compose', path: [], wildcard: false });
  });

  it('rejects a wildcard in the middle of a path', () => {
    expect(() => parseRoutingPath('bad', text('service.*.PUID'))).toThrow(SchemaError);
  });

  it('rejects env paths without a variable name', () => {
    expect(() => parseRoutingPath('tag', text('env'))).toThrow('env routing path needs a variable name');
  });

  it('rejects non-string routing paths', () => {
    const field = text();
    Reflect.set(field, 'schema', 42);
    expect(() => parseRoutingPath('bad', field)).toThrow('Field "bad": routing path must be a string, got number');
  });
});

describe('routeInputs', () => {
  it('routes into the three buckets', () => {
    const schema: BlueprintSchemaMap = {
      image: text('service.image'),
      puid: { type: 'integer', ui_component: 'number', schema: 'service.environment.PUID' },
      net: { type: 'object', ui_component: 'network_config', schema: 'compose.networks.media' },
      admin_user: text('metadata.admin_user'),
      hostname: text(),
    };

    const routed = routeInputs(
      { image: 'jellyfin/jellyfin', puid: 1000, net: { external: true }, admin_user: 'admin', hostname: 'media' },
      schema
    );

    expect(routed).toEqual({
      service: { image: 'jellyfin/jellyfin', environment: { PUID: 1000 }, hostname: 'media' },
      compose: { networks: { media: { external: true } } },
      metadata: { admin_user: 'admin' },
    });
  });

  it('skips transform, wildcard and env fields', () => {
    const schema: BlueprintSchemaMap = {
      port: { type: 'object', ui_component: 'port_mapping', compose_transform: 'port_mapping' },
      extra: { type: 'array', ui_component: 'textarea', schema: 'service.environment.*' },
      tag: text('env.TAG'),
    };

    const routed = routeInputs(
      { port: { host: 80, container: 80 }, extra: [{ key: 'A', value: '1' }], tag: '10.8' },
      schema
    );

    expect(routed).toEqual({ service: {}, compose: {}, metadata: {} });
  });

  it('drops inputs without a schema entry', () => {
    expect(routeInputs({ stray: 'x' }, {})).toEqual({ service: {}, compose: {}, metadata: {} });
  });

  it('wraps a bare network name into a list', () => {
    const routed = routeInputs({ networks: 'media' }, { networks: text('service.networks') });
    expect(routed.service).toEqual({ networks: ['media'] });
  });

  it('converts a network list to map form before nested network paths', () => {
    const schema: BlueprintSchemaMap = {
      networks: text('service.networks'),
      ip: text('service.networks.media.ipv4_address'),
    };

    const routed = routeInputs({ networks: 'media', ip: '10.0.0.5' }, schema);

    expect(routed.service).toEqual({ networks: { media: { ipv4_address: '10.0.0.5' } } });
  });

  it('visits fields in schema order, last write wins', () => {
    const schema: BlueprintSchemaMap = {
      first: text('service.hostname'),
      second: text('service.hostname'),
    };

    const routed = routeInputs({ second: 'b', first: 'a' }, schema);

    expect(routed.service.hostname).toBe('b');
  });

  it('copies values so later passes cannot mutate the inputs', () => {
    const inputs = { labels: { a: '1' } };
    const routed = routeInputs(inputs, { labels: { type: 'object', ui_component: 'textarea', schema: 'service.labels' } });
    expect(routed.service.labels).toEqual({ a: '1' });
    expect(routed.service.labels).not.toBe(inputs.labels);
  });
});
