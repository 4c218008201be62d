/**
 * Global-Value Injector Tests
 *
 * - Injection into service keys and the environment map
 * - Explicit values are never overwritten
 * - USER override and puid:pgid fallback
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_GLOBAL_SETTINGS, type BlueprintSchemaMap, type GlobalSettings } from '@dockyard/shared';
import type { TreeMap } from '../../lib/tree.js';
import { injectGlobals, resolveGlobalValue } from './globalInjector.js';

const globals: GlobalSettings = { ...DEFAULT_GLOBAL_SETTINGS, puid: 1000, pgid: 100, umask: '002', timezone: 'Europe/Paris' };

const schema: BlueprintSchemaMap = {
  puid: { type: 'integer', ui_component: 'number', schema: 'service.environment.PUID', use_global: 'PUID' },
  pgid: { type: 'integer', ui_component: 'number', schema: 'service.environment.PGID', use_global: 'PGID' },
  umask: { type: 'string', ui_component: 'text', schema: 'service.environment.UMASK', use_global: 'UMASK' },
  tz: { type: 'string', ui_component: 'text', schema: 'service.environment.TZ', use_global: 'TZ' },
  user: { type: 'string', ui_component: 'text', schema: 'service.user', use_global: 'USER' },
};

describe('resolveGlobalValue', () => {
  it('resolves each key', () => {
    expect(resolveGlobalValue('PUID', globals)).toBe(1000);
    expect(resolveGlobalValue('PGID', globals)).toBe(100);
    expect(resolveGlobalValue('UMASK', globals)).toBe('002');
    expect(resolveGlobalValue('TZ', globals)).toBe('Europe/Paris');
    expect(resolveGlobalValue('USER', globals)).toBe('1000:100');
  });

  it('prefers an explicit USER override', () => {
    expect(resolveGlobalValue('USER', { ...globals, user: '0:0' })).toBe('0:0');
  });
});

describe('injectGlobals', () => {
  it('fills absent keys', () => {
    const service: TreeMap = {};
    injectGlobals(service, schema, globals);

    expect(service).toEqual({
      environment: { PUID: 1000, PGID: 100, UMASK: '002', TZ: 'Europe/Paris' },
      user: '1000:100',
    });
  });

  it('fills null values', () => {
    const service: TreeMap = { environment: { TZ: null } };
    injectGlobals(service, { tz: schema.tz }, globals);
    expect(service).toEqual({ environment: { TZ: 'Europe/Paris' } });
  });

  it('never overwrites explicit values, including "0" and "false"', () => {
    const service: TreeMap = { environment: { PUID: '0', TZ: 'false' }, user: 'root' };
    injectGlobals(service, schema, globals);

    expect(service.environment).toEqual({ PUID: '0', TZ: 'false', PGID: 100, UMASK: '002' });
    expect(service.user).toBe('root');
  });

  it('uses the field name when the routing path has no subpath', () => {
    const service: TreeMap = {};
    injectGlobals(service, { TZ: { type: 'string', ui_component: 'text', use_global: 'TZ' } }, globals);
    expect(service).toEqual({ TZ: 'Europe/Paris' });
  });

  it('ignores fields routed outside the service bucket', () => {
    const service: TreeMap = {};
    injectGlobals(
      service,
      { tz: { type: 'string', ui_component: 'text', schema: 'metadata.tz', use_global: 'TZ' } },
      globals
    );
    expect(service).toEqual({});
  });

  it('does not replace a non-map parent', () => {
    const service: TreeMap = { environment: ['PUID=1'] };
    injectGlobals(service, { puid: schema.puid }, globals);
    expect(service).toEqual({ environment: ['PUID=1'] });
  });
});
