/**
 * Unit tests for Tag Generation Service
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { promises as fs, existsSync } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { TagGenerationService } from '../tag-generation.service.js';
import { NoValidInputError } from '../../collection/file-collector.service.js';
import {
  IndexerRunner,
  IndexerError,
  type CommandExecutor,
} from '../../../infrastructure/indexers/indexer-runner.js';
import { loadConfig, type ConfigInput } from '../../../shared/config/index.js';
import { createLogger, type Logger } from '../../../shared/logging/index.js';

describe('TagGenerationService', () => {
  let testDir: string;
  let executor: Mock<CommandExecutor>;
  let logger: Logger;

  const createService = (input: Partial<ConfigInput>): TagGenerationService => {
    const config = loadConfig(input, testDir);
    return new TagGenerationService(config, {
      logger,
      indexers: new IndexerRunner(config.cwd, logger, executor),
    });
  };

  async function touch(...segments: string[]): Promise<void> {
    const filePath = path.join(testDir, ...segments);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, 'content');
  }

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tag-generation-test-'));
    executor = vi.fn<CommandExecutor>().mockResolvedValue(undefined);
    logger = createLogger('silent');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('generate', () => {
    it('should write the index file and run cscope then ctags', async () => {
      await touch('src', 'main.c');
      await touch('src', 'util.h');
      const indexFile = path.join(testDir, 'gentags.files');

      const report = await createService({ dirs: ['src'] }).generate(['gentags', '-d', 'src']);

      expect(report.files).toEqual([
        path.join(testDir, 'src', 'main.c'),
        path.join(testDir, 'src', 'util.h'),
      ]);
      expect(report.indexersRun).toBe(true);
      expect(await fs.readFile(indexFile, 'utf8')).toBe(
        `${path.join(testDir, 'src', 'main.c')}\n${path.join(testDir, 'src', 'util.h')}\n`
      );
      expect(executor.mock.calls).toEqual([
        ['cscope', ['-bkq', '-i', indexFile], { cwd: testDir }],
        ['ctags', ['-L', indexFile], { cwd: testDir }],
      ]);
    });

    it('should write the command and config records', async () => {
      await touch('src', 'main.c');

      await createService({ dirs: ['src'], indexOnly: true }).generate(['gentags', '-d', 'src', '-i']);

      expect(await fs.readFile(path.join(testDir, 'gentags.cmd'), 'utf8')).toBe('gentags -d src -i\n');
      expect(await fs.readFile(path.join(testDir, 'gentags.conf'), 'utf8')).toContain(
        `[dirs]\npath = ${path.join(testDir, 'src')}\n`
      );
    });

    it('should stop after the index file when index-only', async () => {
      await touch('lib', 'tool.py');

      const report = await createService({
        dirs: ['lib'],
        types: ['python'],
        indexOnly: true,
      }).generate(['gentags']);

      expect(report.indexersRun).toBe(false);
      expect(report.files).toEqual([path.join(testDir, 'lib', 'tool.py')]);
      expect(executor).not.toHaveBeenCalled();
    });

    it('should report missing roots and still index the others', async () => {
      await touch('src', 'main.c');

      const report = await createService({ dirs: ['missing', 'src'], indexOnly: true }).generate([
        'gentags',
      ]);

      expect(report.files).toEqual([path.join(testDir, 'src', 'main.c')]);
      expect(report.issues).toEqual([
        {
          kind: 'DirectoryNotFound',
          path: path.join(testDir, 'missing'),
          message: `Directory not found: ${path.join(testDir, 'missing')}`,
        },
      ]);
    });

    it('should write an empty index file when nothing matches', async () => {
      await touch('docs', 'guide.md');

      const report = await createService({ dirs: ['docs'], indexOnly: true }).generate(['gentags']);

      expect(report.files).toEqual([]);
      expect(await fs.readFile(report.indexFile, 'utf8')).toBe('');
    });

    it('should fail with NoValidInputError without directories', async () => {
      await expect(createService({}).generate(['gentags'])).rejects.toThrow(NoValidInputError);
      expect(existsSync(path.join(testDir, 'gentags.conf'))).toBe(false);
    });

    it('should fail with NoValidInputError when every root is missing', async () => {
      await expect(
        createService({ dirs: ['missing'] }).generate(['gentags'])
      ).rejects.toThrow(NoValidInputError);
      expect(existsSync(path.join(testDir, 'gentags.files'))).toBe(false);
    });

    it('should propagate indexer failures without running ctags', async () => {
      await touch('src', 'main.c');
      executor.mockRejectedValueOnce(new Error('spawn cscope ENOENT'));

      await expect(createService({ dirs: ['src'] }).generate(['gentags'])).rejects.toThrow(
        IndexerError
      );
      expect(executor).toHaveBeenCalledOnce();
      expect(existsSync(path.join(testDir, 'gentags.files'))).toBe(true);
    });

    it('should log a failure once, with the error message', async () => {
      await touch('src', 'main.c');
      executor.mockRejectedValueOnce(new Error('spawn cscope ENOENT'));
      const errors: string[] = [];
      logger = createLogger('error', false, {
        write: (line: string) => {
          const parsed: unknown = JSON.parse(line);
          if (typeof parsed === 'object' && parsed !== null && 'msg' in parsed && typeof parsed.msg === 'string') {
            errors.push(parsed.msg);
          }
        },
      });

      await expect(createService({ dirs: ['src'] }).generate(['gentags'])).rejects.toThrow(
        IndexerError
      );
      expect(errors).toEqual([
        `Command execution failed: cscope -bkq -i ${path.join(testDir, 'gentags.files')}: spawn cscope ENOENT`,
      ]);
    });
  });

  describe('clean', () => {
    it('should remove the generated files', async () => {
      await touch('gentags.files');
      await touch('tags');

      const removed = await createService({}).clean();

      expect(removed).toEqual([path.join(testDir, 'gentags.files'), path.join(testDir, 'tags')]);
    });
  });
});
