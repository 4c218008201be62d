import type { BlueprintSchemaMap, GlobalKey, GlobalSettings } from '@dockyard/shared';
import { generatorLogger } from '../../lib/logger.js';
import { getPath, isTreeMap, setPath, type TreeMap, type TreeValue } from '../../lib/tree.js';
import { parseRoutingPath } from './inputRouter.js';

export function resolveGlobalValue(key: GlobalKey, globals: GlobalSettings): string | number {
  switch (key) {
    case 'PUID':
      return globals.puid;
    case 'PGID':
      return globals.pgid;
    case 'UMASK':
      return globals.umask;
    case 'TZ':
      return globals.timezone;
    case 'USER':
      return globals.user ? globals.user : `${globals.puid}:${globals.pgid}`;
  }
}

/**
 * Fill `use_global` fields into the routed service map.
 * Only keys that are absent or null are set; user values win, including "0" and "false".
 */
export function injectGlobals(service: TreeMap, schema: BlueprintSchemaMap, globals: GlobalSettings): TreeMap {
  for (const [fieldName, field] of Object.entries(schema)) {
    if (!field.use_global) {
      continue;
    }

    const target = parseRoutingPath(fieldName, field);
    if (target.bucket !== 'service' || target.wildcard) {
      generatorLogger.debug({ field: fieldName, bucket: target.bucket }, 'use_global only applies to service paths');
      continue;
    }

    const path = target.path.length === 0 ? [fieldName] : target.path;
    const parentPath = path.slice(0, -1);
    const parent: TreeValue | undefined = parentPath.length === 0 ? service : getPath(service, parentPath);
    if (parent !== undefined && parent !== null && !isTreeMap(parent)) {
      generatorLogger.warn({ field: fieldName, path }, 'Cannot inject global value below a non-map value');
      continue;
    }

    const current = getPath(service, path);
    if (current !== undefined && current !== null) {
      continue;
    }

    setPath(service, path, resolveGlobalValue(field.use_global, globals));
  }

  return service;
}
