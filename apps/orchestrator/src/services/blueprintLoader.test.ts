/**
 * Blueprint Loader Tests
 *
 * - Schema defaults applied on parse
 * - Invalid JSON and schema mismatches reported per file
 * - Duplicate names rejected, other files still load
 * - The bundled blueprints load cleanly
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { BlueprintLoadError } from '../lib/errors.js';
import { loadBlueprint, loadBlueprints, parseBlueprint } from './blueprintLoader.js';

const prowlarr = {
  name: 'prowlarr',
  display_name: 'Prowlarr',
  category: 'STARR APPS',
  schema: {
    image: { type: 'string', ui_component: 'text', schema: 'service.image', default: 'lscr.io/linuxserver/prowlarr' },
  },
};

describe('parseBlueprint', () => {
  it('applies defaults', () => {
    const blueprint = parseBlueprint('prowlarr.json', JSON.stringify(prowlarr));

    expect(blueprint.install_order).toBe(10);
    expect(blueprint.visible).toBe(true);
    expect(blueprint.prerequisites).toEqual([]);
    expect(blueprint.schema.image.default).toBe('lscr.io/linuxserver/prowlarr');
  });

  it('rejects invalid JSON', () => {
    expect(() => parseBlueprint('broken.json', '{')).toThrow(/^broken\.json: invalid JSON: /);
  });

  it('reports schema issues with their paths', () => {
    try {
      parseBlueprint('bad.json', JSON.stringify({ ...prowlarr, category: 'GAMES' }));
      expect.fail('expected a load error');
    } catch (err) {
      expect(err).toBeInstanceOf(BlueprintLoadError);
      if (!(err instanceof BlueprintLoadError)) return;
      expect(err.message).toBe('bad.json: does not match the blueprint schema');
      expect(err.code).toBe('BLUEPRINT_INVALID');
      expect(err.details).toEqual([expect.objectContaining({ path: 'category' })]);
    }
  });
});

describe('loadBlueprints', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `blueprints-test-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('loads valid files and reports the rest', async () => {
    writeFileSync(join(testDir, 'prowlarr.json'), JSON.stringify(prowlarr));
    writeFileSync(join(testDir, 'broken.json'), '{');
    writeFileSync(join(testDir, 'wrong.json'), JSON.stringify({ name: 'wrong' }));
    writeFileSync(join(testDir, 'zcopy.json'), JSON.stringify(prowlarr));
    writeFileSync(join(testDir, '.hidden.json'), '{');
    writeFileSync(join(testDir, 'notes.txt'), 'not a blueprint');

    const { blueprints, errors } = await loadBlueprints(testDir);

    expect(blueprints.map(b => b.name)).toEqual(['prowlarr']);
    expect(errors.map(err => err.file)).toEqual([
      join(testDir, 'broken.json'),
      join(testDir, 'wrong.json'),
      join(testDir, 'zcopy.json'),
    ]);
    expect(errors[2].message).toBe(`${join(testDir, 'zcopy.json')}: duplicate blueprint name "prowlarr"`);
  });

  it('reports unreadable files', async () => {
    await expect(loadBlueprint(join(testDir, 'missing.json'))).rejects.toThrow('cannot read file');
  });

  it('loads the bundled blueprints', async () => {
    const { blueprints, errors } = await loadBlueprints();

    expect(errors).toEqual([]);
    expect(blueprints.map(b => b.name)).toEqual(['jellyfin', 'prowlarr', 'sonarr']);
  });
});
