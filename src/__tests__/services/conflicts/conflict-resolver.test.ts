import { ConflictResolver } from '../../../services/conflicts/conflict-resolver';
import { ConflictInfo } from '../../../services/conflicts/conflict-info';
import { FileMover } from '../../../services/local/file-mover';
import { pathExists } from '../../../services/local/directory-manager';
import { ConflictUnresolvableError, OperationError } from '../../../core/errors';
import { ConsoleLogger } from '../../../core/logger';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

describe('ConflictResolver', () => {
  const now = new Date(2024, 2, 5, 14, 30, 15);
  let tempDir: string;
  let sourceDir: string;
  let destDir: string;
  let fileMover: FileMover;
  let resolver: ConflictResolver;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'organizer-conflicts-'));
    sourceDir = path.join(tempDir, 'source');
    destDir = path.join(tempDir, 'dest');
    await fs.mkdir(sourceDir);
    await fs.mkdir(destDir);

    const logger = new ConsoleLogger('ERROR');
    fileMover = new FileMover(logger);
    resolver = new ConflictResolver(fileMover, logger, {
      backupRoot: path.join(tempDir, 'backup'),
      now: () => now,
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writePair(
    name: string,
    sourceContent: string,
    destinationContent: string
  ): Promise<{ source: string; destination: string }> {
    const source = path.join(sourceDir, name);
    const destination = path.join(destDir, name);
    await fs.writeFile(source, sourceContent);
    await fs.writeFile(destination, destinationContent);
    return { source, destination };
  }

  async function expectUnresolvable(promise: Promise<string>, reason: string): Promise<void> {
    const error: unknown = await promise.then(
      () => undefined,
      (rejection: unknown) => rejection
    );
    expect(error).toBeInstanceOf(ConflictUnresolvableError);
    expect(error instanceof ConflictUnresolvableError && error.reason).toBe(reason);
  }

  describe('resolve', () => {
    it('should return the destination unchanged when there is no conflict', async () => {
      const source = path.join(sourceDir, 'report.txt');
      await fs.writeFile(source, 'report');
      const destination = path.join(destDir, 'report.txt');

      await expect(resolver.resolve(source, destination)).resolves.toBe(destination);
      expect(resolver.getConflictStats().totalConflicts).toBe(0);
    });

    it('should rename to the first free numbered name', async () => {
      const { source, destination } = await writePair('report.txt', 'new', 'old');
      await fs.writeFile(path.join(destDir, 'report_1.txt'), 'older');

      await expect(resolver.resolve(source, destination, 'rename')).resolves.toBe(
        path.join(destDir, 'report_2.txt')
      );
      await expect(fs.readFile(destination, 'utf-8')).resolves.toBe('old');
    });

    it('should use the default strategy when none is given', async () => {
      const { source, destination } = await writePair('report.txt', 'new', 'old');

      await expect(resolver.resolve(source, destination)).resolves.toBe(path.join(destDir, 'report_1.txt'));
      expect(resolver.getConflictStats().resolutionStrategies).toEqual({ rename: 1 });
    });

    it('should refuse the file for skip', async () => {
      const { source, destination } = await writePair('report.txt', 'new', 'old');

      await expectUnresolvable(resolver.resolve(source, destination, 'skip'), 'File skipped due to conflict');
    });

    it('should remove the existing file for overwrite', async () => {
      const { source, destination } = await writePair('report.txt', 'new', 'old');

      await expect(resolver.resolve(source, destination, 'overwrite')).resolves.toBe(destination);
      await expect(pathExists(destination)).resolves.toBe(false);
    });

    it('should leave the existing file in place for overwrite in dry run', async () => {
      const { source, destination } = await writePair('report.txt', 'new', 'old');

      await expect(resolver.resolve(source, destination, 'overwrite', { dryRun: true })).resolves.toBe(destination);
      await expect(fs.readFile(destination, 'utf-8')).resolves.toBe('old');
    });

    it('should back up the existing file before freeing the destination', async () => {
      const { source, destination } = await writePair('report.txt', 'new', 'old');
      const backupPath = path.join(tempDir, 'backup', '20240305_143015', 'report_20240305_143015.txt');

      await expect(resolver.resolve(source, destination, 'backup')).resolves.toBe(destination);

      await expect(pathExists(destination)).resolves.toBe(false);
      await expect(fs.readFile(backupPath, 'utf-8')).resolves.toBe('old');
      expect(resolver.getBackupDirectory()).toBe(path.join(tempDir, 'backup', '20240305_143015'));
    });

    it('should not create a backup in dry run', async () => {
      const { source, destination } = await writePair('report.txt', 'new', 'old');

      await resolver.resolve(source, destination, 'backup', { dryRun: true });

      await expect(pathExists(path.join(tempDir, 'backup'))).resolves.toBe(false);
      await expect(fs.readFile(destination, 'utf-8')).resolves.toBe('old');
    });

    it('should wrap backup failures as backup operation errors', async () => {
      const { source, destination } = await writePair('report.txt', 'new', 'old');
      jest.spyOn(fileMover, 'copy').mockRejectedValue(new Error('disk full'));

      const error: unknown = await resolver.resolve(source, destination, 'backup').catch((rejection: unknown) => rejection);

      expect(error).toBeInstanceOf(OperationError);
      expect(error instanceof OperationError && error.operation).toBe('backup');
      await expect(fs.readFile(destination, 'utf-8')).resolves.toBe('old');
    });

    it('should wrap unexpected failures in an operation error', async () => {
      const { source, destination } = await writePair('report.txt', 'new', 'old');
      jest.spyOn(fileMover, 'remove').mockRejectedValue(new Error('busy'));

      const error: unknown = await resolver
        .resolve(source, destination, 'overwrite')
        .catch((rejection: unknown) => rejection);

      expect(error).toBeInstanceOf(OperationError);
      expect(error instanceof OperationError && error.operation).toBe('delete');
    });

    describe('size-compare', () => {
      it('should overwrite with a larger source', async () => {
        const { source, destination } = await writePair('data.bin', 'larger content', 'small');

        await expect(resolver.resolve(source, destination, 'size-compare')).resolves.toBe(destination);
        await expect(pathExists(destination)).resolves.toBe(false);
      });

      it('should keep a larger destination', async () => {
        const { source, destination } = await writePair('data.bin', 'small', 'larger content');

        await expectUnresolvable(
          resolver.resolve(source, destination, 'size-compare'),
          'Destination file is larger - keeping existing'
        );
        await expect(fs.readFile(destination, 'utf-8')).resolves.toBe('larger content');
      });

      it('should compare content when sizes match', async () => {
        const same = await writePair('same.bin', 'abc', 'abc');
        const different = await writePair('diff.bin', 'abc', 'xyz');

        await expectUnresolvable(
          resolver.resolve(same.source, same.destination, 'size-compare'),
          'Files are identical - skipping duplicate'
        );
        await expect(resolver.resolve(different.source, different.destination, 'size-compare')).resolves.toBe(
          path.join(destDir, 'diff_1.bin')
        );
      });
    });

    describe('date-compare', () => {
      it('should overwrite with a newer source', async () => {
        const { source, destination } = await writePair('notes.txt', 'new', 'old');
        await fs.utimes(destination, new Date(2020, 0, 1), new Date(2020, 0, 1));
        await fs.utimes(source, new Date(2023, 0, 1), new Date(2023, 0, 1));

        await expect(resolver.resolve(source, destination, 'date-compare')).resolves.toBe(destination);
        await expect(pathExists(destination)).resolves.toBe(false);
      });

      it('should keep a newer destination', async () => {
        const { source, destination } = await writePair('notes.txt', 'new', 'old');
        await fs.utimes(source, new Date(2020, 0, 1), new Date(2020, 0, 1));
        await fs.utimes(destination, new Date(2023, 0, 1), new Date(2023, 0, 1));

        await expectUnresolvable(
          resolver.resolve(source, destination, 'date-compare'),
          'Destination file is newer - keeping existing'
        );
      });

      it('should compare content when modification times match', async () => {
        const { source, destination } = await writePair('notes.txt', 'abc', 'abd');
        const time = new Date(2022, 5, 1);
        await fs.utimes(source, time, time);
        await fs.utimes(destination, time, time);

        await expect(resolver.resolve(source, destination, 'date-compare')).resolves.toBe(
          path.join(destDir, 'notes_1.txt')
        );
      });
    });

    describe('hash-compare', () => {
      it('should skip identical files without touching either', async () => {
        const { source, destination } = await writePair('photo.jpg', 'same bytes', 'same bytes');

        await expectUnresolvable(
          resolver.resolve(source, destination, 'hash-compare'),
          'Files are identical - skipping duplicate'
        );
        await expect(fs.readFile(source, 'utf-8')).resolves.toBe('same bytes');
        await expect(fs.readFile(destination, 'utf-8')).resolves.toBe('same bytes');
      });

      it('should keep both when content differs', async () => {
        const { source, destination } = await writePair('photo.jpg', 'one', 'two');

        await expect(resolver.resolve(source, destination, 'hash-compare')).resolves.toBe(
          path.join(destDir, 'photo_1.jpg')
        );
      });
    });
  });

  describe('generateSafeFilename', () => {
    it('should keep a free name and number a taken one', async () => {
      await expect(resolver.generateSafeFilename('a.txt', destDir)).resolves.toBe('a.txt');

      await fs.writeFile(path.join(destDir, 'a.txt'), 'a');
      await fs.writeFile(path.join(destDir, 'a_1.txt'), 'a');

      await expect(resolver.generateSafeFilename('a.txt', destDir)).resolves.toBe('a_2.txt');
    });

    it('should number only the final extension', async () => {
      await fs.writeFile(path.join(destDir, 'logs.tar.gz'), 'a');

      await expect(resolver.generateSafeFilename('logs.tar.gz', destDir)).resolves.toBe('logs.tar_1.gz');
    });
  });

  describe('analyzeConflicts', () => {
    it('should recommend a resolution per conflicting file', async () => {
      const identical = await writePair('identical.txt', 'same', 'same');
      const larger = await writePair('larger.txt', 'much larger', 'tiny');
      const newer = await writePair('newer.txt', 'abc', 'xyz');
      await fs.utimes(newer.destination, new Date(2020, 0, 1), new Date(2020, 0, 1));
      await fs.utimes(newer.source, new Date(2023, 0, 1), new Date(2023, 0, 1));
      const other = await writePair('other.txt', 'a', 'longer');
      await fs.utimes(other.source, new Date(2020, 0, 1), new Date(2020, 0, 1));
      await fs.utimes(other.destination, new Date(2023, 0, 1), new Date(2023, 0, 1));
      const free = path.join(sourceDir, 'free.txt');
      await fs.writeFile(free, 'free');

      const analysis = await resolver.analyzeConflicts(
        [identical.source, larger.source, newer.source, other.source, free],
        destDir
      );

      expect(analysis).toMatchObject({
        totalFiles: 5,
        conflicts: 4,
        identicalFiles: 1,
        sizeDifferences: 1,
        dateDifferences: 1,
      });
      expect(analysis.details.map((detail) => detail.recommendation)).toEqual([
        'skip_identical',
        'overwrite_larger',
        'overwrite_newer',
        'rename_safe',
      ]);
      expect(analysis.details[1]).toMatchObject({ sourceSize: 11, destinationSize: 4, identical: false });
      expect(resolver.getConflictStats().totalConflicts).toBe(0);
    });
  });

  describe('statistics', () => {
    it('should count conflicts per strategy until reset', async () => {
      const first = await writePair('a.txt', 'new', 'old');
      const second = await writePair('b.txt', 'new', 'old');

      await resolver.resolve(first.source, first.destination, 'rename');
      await resolver.resolve(second.source, second.destination, 'skip').catch(() => undefined);

      expect(resolver.getConflictStats()).toEqual({
        totalConflicts: 2,
        resolutionStrategies: { rename: 1, skip: 1 },
        backupDirectory: path.join(tempDir, 'backup', '20240305_143015'),
      });

      resolver.resetStats();
      expect(resolver.getConflictStats().totalConflicts).toBe(0);
      expect(resolver.getConflictStats().resolutionStrategies).toEqual({});
    });
  });
});

describe('ConflictInfo', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'organizer-conflict-info-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should report a missing destination', async () => {
    const source = path.join(tempDir, 'a.txt');
    await fs.writeFile(source, 'abc');

    const info = await ConflictInfo.create(source, path.join(tempDir, 'missing.txt'));

    expect(info.sourceExists).toBe(true);
    expect(info.sourceSize).toBe(3);
    expect(info.destinationExists).toBe(false);
    expect(info.compareModified()).toBeUndefined();
    await expect(info.areIdentical()).resolves.toBe(false);
  });

  it('should hash content with SHA-256', async () => {
    const source = path.join(tempDir, 'a.txt');
    await fs.writeFile(source, 'abc');

    const info = await ConflictInfo.create(source, source);

    await expect(info.getSourceHash()).resolves.toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
    await expect(info.areIdentical()).resolves.toBe(true);
  });
});
