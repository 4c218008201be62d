import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { config } from './config.js';
import { main } from './cli.js';

describe('cli', () => {
  let log: MockInstance<Parameters<typeof console.log>, void>;
  let error: MockInstance<Parameters<typeof console.error>, void>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists transforms', async () => {
    expect(await main(['transforms'])).toBe(0);
    expect(log.mock.calls.map(call => call[0])).toEqual([
      'port_mapping',
      'port_array',
      'volume_mapping',
      'volume_array',
      'network_config',
      'custom_networks_array',
    ]);
  });

  it('prints the install order of bundled blueprints', async () => {
    expect(await main(['order', 'sonarr', 'prowlarr'])).toBe(0);
    expect(log.mock.calls.map(call => call[0])).toEqual(['1. prowlarr', '2. sonarr']);
  });

  it('reports missing prerequisites with their error code', async () => {
    expect(await main(['order', 'sonarr'])).toBe(1);
    expect(error).toHaveBeenCalledWith(
      'Error [DEPENDENCY_MISSING]: Missing required apps: prowlarr. Install these first or add them to your selection.'
    );
  });

  it('accepts installed prerequisites', async () => {
    expect(await main(['order', 'sonarr', '--installed', 'prowlarr'])).toBe(0);
    expect(log).toHaveBeenCalledWith('1. sonarr');
  });

  it('reports blueprints that do not exist', async () => {
    expect(await main(['order', 'radarr'])).toBe(1);
    expect(error).toHaveBeenCalledWith(expect.stringMatching(/^Error \[BLUEPRINT_NOT_FOUND\]: blueprint 'radarr' not found in /));
  });

  it('reports invalid inputs as an input validation error', async () => {
    const dir = join(tmpdir(), `cli-test-${Date.now()}-inputs`);
    mkdirSync(dir, { recursive: true });
    const inputsFile = join(dir, 'inputs.json');
    writeFileSync(inputsFile, JSON.stringify({ web_port: 8096 }));

    try {
      expect(await main(['generate', join(config.paths.blueprints, 'jellyfin.json'), inputsFile])).toBe(1);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }

    expect(error).toHaveBeenCalledTimes(1);
    const [message] = error.mock.calls[0];
    expect(message).toMatch(/^Error \[INPUT_VALIDATION_ERROR\]: Invalid configuration:\n/);
    expect(message).toContain('  - web_port: "Web UI port" must be an object');
  });

  it('lists bundled presets', async () => {
    expect(await main(['presets'])).toBe(0);
    expect(log.mock.calls.map(call => call[0])).toEqual([
      'media-stack: Media Stack (jellyfin, sonarr, prowlarr)',
      'starr-apps: Starr Apps (prowlarr, sonarr, radarr)',
    ]);
  });

  it('shows what a preset would install', async () => {
    expect(await main(['preset', 'starr-apps', '--installed', 'prowlarr'])).toBe(0);
    expect(log.mock.calls.map(call => call[0])).toEqual([
      'Starr Apps: sonarr',
      '  Already installed: prowlarr',
      '  Missing blueprints: radarr',
    ]);
  });

  it('reports presets that do not exist', async () => {
    expect(await main(['preset', 'nope'])).toBe(1);
    expect(error).toHaveBeenCalledWith('Error [PRESET_NOT_FOUND]: Preset not found: nope');
  });

  it('rejects unknown commands', async () => {
    expect(await main(['deploy'])).toBe(1);
    expect(error).toHaveBeenCalledWith('Unknown command: deploy');
  });
});
