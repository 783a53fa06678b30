/**
 * Tests for writing .ini files and reading options files
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { loadOptionsFile, writeIniFile, isOptionsObject } from './io';
import { createRunConfig } from './types';
import { InvalidInputError } from '../utils/errors';

describe('config io', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'circuitscape-io-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('writeIniFile', () => {
    it('should write <outputName>.ini with the worked example sections', async () => {
      const config = createRunConfig({
        costFile: 'cost.asc',
        focalPointsFile: 'pts.txt',
        outputName: 'run1',
        outputDir: tempDir,
        scenario: 'pairwise',
      });

      const written = await writeIniFile(config);
      const content = await fs.readFile(path.join(tempDir, 'run1.ini'), 'utf-8');
      const lines = content.split('\n');

      expect(written.path).toBe(path.join(tempDir, 'run1.ini'));
      expect(lines.slice(0, 3)).toEqual(['[Circuitscape mode]', 'scenario = pairwise', 'data_type = raster']);
      expect(lines).toContain('[Options for pairwise and one-to-all and all-to-one modes]');
      expect(lines).toContain('point_file = pts.txt');
      expect(content.endsWith('use_polygons = false\n')).toBe(true);
      expect(content).toBe(`${written.lines.join('\n')}\n`);
    });

    it('should create a missing output directory', async () => {
      const nested = path.join(tempDir, 'a', 'b');
      const config = createRunConfig({ costFile: 'cost.asc', focalPointsFile: 'pts.txt', outputDir: nested });

      await writeIniFile(config);

      const stat = await fs.stat(path.join(nested, 'circuitscape_output.ini'));
      expect(stat.isFile()).toBe(true);
    });

    it('should overwrite a previous file with identical bytes for identical inputs', async () => {
      const options = { costFile: 'cost.asc', focalPointsFile: 'pts.txt', outputName: 'again', outputDir: tempDir };
      const iniPath = path.join(tempDir, 'again.ini');

      await writeIniFile(createRunConfig(options));
      const first = await fs.readFile(iniPath);

      await fs.writeFile(iniPath, 'stale contents');
      await writeIniFile(createRunConfig(options));
      const second = await fs.readFile(iniPath);

      expect(second.equals(first)).toBe(true);
    });
  });

  describe('isOptionsObject', () => {
    it('should accept known keys only', () => {
      expect(isOptionsObject({ costFile: 'cost.asc', parallelize: true })).toBe(true);
      expect(isOptionsObject({ cost_file: 'cost.asc' })).toBe(false);
      expect(isOptionsObject([])).toBe(false);
      expect(isOptionsObject(null)).toBe(false);
      expect(isOptionsObject('cost.asc')).toBe(false);
    });
  });

  describe('loadOptionsFile', () => {
    it('should read a JSON options object', async () => {
      const file = path.join(tempDir, 'options.json');
      await fs.writeFile(file, JSON.stringify({ costFile: 'cost.asc', maxParallel: 4, scenario: 'advanced' }));

      await expect(loadOptionsFile(file)).resolves.toEqual({ costFile: 'cost.asc', maxParallel: 4, scenario: 'advanced' });
    });

    it('should name unknown keys', async () => {
      const file = path.join(tempDir, 'options.json');
      await fs.writeFile(file, JSON.stringify({ costFile: 'cost.asc', max_parallel: 4 }));

      await expect(loadOptionsFile(file)).rejects.toThrow(`Unknown option(s) in ${file}: max_parallel`);
    });

    it('should reject malformed JSON', async () => {
      const file = path.join(tempDir, 'options.json');
      await fs.writeFile(file, '{ costFile: ');

      await expect(loadOptionsFile(file)).rejects.toThrow(InvalidInputError);
    });

    it('should reject a missing file', async () => {
      await expect(loadOptionsFile(path.join(tempDir, 'nope.json'))).rejects.toThrow('Could not read options file');
    });
  });
});
