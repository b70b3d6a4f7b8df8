import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  PhaseCatalog,
  loadPhaseCatalog,
  parsePhaseCatalog,
} from '../src/orchestrator/phases.js';
import { PhaseCatalogError, PhaseNotFoundError } from '../src/orchestrator/errors.js';

describe('Phase catalog', () => {
  describe('PhaseCatalog', () => {
    const catalog = new PhaseCatalog({
      setup: ['a', 'b'],
      teardown: ['c'],
    });

    it('should list phases in definition order', () => {
      expect(catalog.names()).toEqual(['setup', 'teardown']);
      expect(catalog.has('setup')).toBe(true);
      expect(catalog.has('other')).toBe(false);
    });

    it('should return the units of a phase', () => {
      expect(catalog.unitsOf('setup')).toEqual(['a', 'b']);
    });

    it('should throw PhaseNotFoundError listing valid phases', () => {
      expect(() => catalog.unitsOf('other')).toThrow(PhaseNotFoundError);
      expect(() => catalog.unitsOf('other')).toThrow(
        'Invalid phase other. Valid phases: setup, teardown'
      );
    });

    it('should serialize to a plain object', () => {
      expect(catalog.toJSON()).toEqual({ setup: ['a', 'b'], teardown: ['c'] });
    });
  });

  describe('parsePhaseCatalog', () => {
    it('should parse YAML', () => {
      const catalog = parsePhaseCatalog('phases:\n  build:\n    - compile\n    - link\n');

      expect(catalog.toJSON()).toEqual({ build: ['compile', 'link'] });
    });

    it('should parse JSON', () => {
      const catalog = parsePhaseCatalog('{"phases": {"only": ["x"]}}');

      expect(catalog.unitsOf('only')).toEqual(['x']);
    });

    it('should reject a catalog without phases', () => {
      expect(() => parsePhaseCatalog('stages: {}', 'inline.yaml')).toThrow(PhaseCatalogError);
    });

    it('should report invalid entries with their path', () => {
      expect(() => parsePhaseCatalog('phases:\n  build: compile\n', 'inline.yaml')).toThrow(
        expect.objectContaining({
          filePath: 'inline.yaml',
          problems: [expect.stringMatching(/^phases\.build: /)],
        })
      );
    });

    it('should reject malformed YAML', () => {
      expect(() => parsePhaseCatalog('phases: [unclosed')).toThrow(PhaseCatalogError);
    });
  });

  describe('loadPhaseCatalog', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'workgraph-phases-'));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should load the built-in catalog by default', async () => {
      const catalog = await loadPhaseCatalog();

      expect(catalog.names()).toEqual([
        'phase_1_foundation',
        'phase_2_onpage',
        'phase_3_technical',
        'phase_4_content',
        'phase_5_offpage',
      ]);
      expect(catalog.unitsOf('phase_1_foundation')).toEqual([
        'robots_txt_management',
        'xml_sitemap_generator',
        'canonical_tag_management',
      ]);
    });

    it('should load a catalog file', async () => {
      const file = join(dir, 'phases.yaml');
      await writeFile(file, 'phases:\n  nightly:\n    - backup\n');

      const catalog = await loadPhaseCatalog(file);

      expect(catalog.toJSON()).toEqual({ nightly: ['backup'] });
    });

    it('should throw PhaseCatalogError for a missing file', async () => {
      await expect(loadPhaseCatalog(join(dir, 'missing.yaml'))).rejects.toBeInstanceOf(
        PhaseCatalogError
      );
    });
  });
});
