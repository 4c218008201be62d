/**
 * Short-form → long-form conversion for service ports, volumes and environment.
 *
 * Ports:   "8080", "8080:80", "8080:80/udp", "127.0.0.1:8080:80"
 * Volumes: "./config:/config", "/mnt/media:/media:ro", "cache:/cache", "/scratch"
 */

import { HOST_PATH_VARIABLE } from '@dockyard/shared';
import { isTreeMap, type TreeMap, type TreeValue } from '../../lib/tree.js';

const DIGITS = /^\d+$/;

function toPortNumber(value: TreeValue | undefined): TreeValue | undefined {
  return typeof value === 'string' && DIGITS.test(value) ? parseInt(value, 10) : value;
}

/**
 * Parse a compose short-form port. Returns null when the string has more
 * than three colon-separated parts.
 */
export function parsePortString(spec: string): TreeMap | null {
  const trimmed = spec.trim();
  const slash = trimmed.lastIndexOf('/');
  const body = slash === -1 ? trimmed : trimmed.slice(0, slash);
  const protocol = slash === -1 ? 'tcp' : trimmed.slice(slash + 1) || 'tcp';

  const parts = body.split(':');
  let hostIp: string | undefined;
  let published: string;
  let target: string;

  if (parts.length === 1) {
    published = parts[0];
    target = parts[0];
  } else if (parts.length === 2) {
    [published, target] = parts;
  } else if (parts.length === 3) {
    [hostIp, published, target] = parts;
  } else {
    return null;
  }

  const port: TreeMap = {};
  const targetValue = toPortNumber(target);
  const publishedValue = toPortNumber(published);
  if (targetValue !== undefined) {
    port.target = targetValue;
  }
  if (publishedValue !== undefined && publishedValue !== '') {
    port.published = publishedValue;
  }
  port.protocol = protocol;
  if (hostIp) {
    port.host_ip = hostIp;
  }
  return port;
}

export function normalizePort(value: TreeValue): TreeValue {
  if (typeof value === 'number') {
    return { target: value, published: value, protocol: 'tcp' };
  }
  if (typeof value === 'string') {
    return parsePortString(value) ?? value;
  }
  if (!isTreeMap(value)) {
    return value;
  }

  const port: TreeMap = { ...value };
  const target = toPortNumber(value.target);
  const published = toPortNumber(value.published);
  if (target !== undefined) {
    port.target = target;
  }
  if (published !== undefined) {
    port.published = published;
  }
  if (typeof port.protocol !== 'string' || port.protocol === '') {
    port.protocol = 'tcp';
  }
  return port;
}

/** `./config` → `${HOST_PATH}/config`. Already rewritten sources are unchanged. */
export function rewriteRelativeSource(source: string): string {
  return source.startsWith('./') ? `\${${HOST_PATH_VARIABLE}}/${source.slice(2)}` : source;
}

function isBindSource(source: string): boolean {
  return /^[/.~$]/.test(source);
}

/**
 * Parse `SRC:TARGET[:ro|rw]`. A lone path is an anonymous volume.
 */
export function parseVolumeString(spec: string): TreeMap | null {
  const parts = spec.trim().split(':');

  if (parts.length === 1) {
    return parts[0] ? { type: 'volume', target: parts[0] } : null;
  }
  if (parts.length > 3) {
    return null;
  }

  const [source, target, mode] = parts;
  const type = isBindSource(source) ? 'bind' : 'volume';
  const volume: TreeMap = {
    type,
    source: type === 'bind' ? rewriteRelativeSource(source) : source,
    target,
  };
  if (mode === 'ro') {
    volume.read_only = true;
  }
  return volume;
}

export function normalizeVolume(value: TreeValue): TreeValue {
  if (typeof value === 'string') {
    return parseVolumeString(value) ?? value;
  }
  if (!isTreeMap(value)) {
    return value;
  }

  const volume: TreeMap = { ...value };
  if (typeof volume.type !== 'string' || volume.type === '') {
    volume.type = typeof volume.source === 'string' && !isBindSource(volume.source) ? 'volume' : 'bind';
  }
  if (volume.type === 'bind' && typeof volume.source === 'string') {
    volume.source = rewriteRelativeSource(volume.source);
  }
  return volume;
}

function formatEnvValue(value: TreeValue): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Environment map → `KEY=VALUE` list, in insertion order.
 * Lists are kept; their non-string entries are stringified.
 */
export function environmentToList(environment: TreeValue): string[] {
  if (Array.isArray(environment)) {
    return environment.map(formatEnvValue);
  }
  if (!isTreeMap(environment)) {
    return [];
  }
  return Object.entries(environment).map(([key, value]) => `${key}=${formatEnvValue(value)}`);
}
