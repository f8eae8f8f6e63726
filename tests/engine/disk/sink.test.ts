import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { DirectoryFileSink, candidateName } from '../../../src/engine/disk/sink.js';
import { RecordingLogger } from '../../helpers/fakes.js';

describe('candidateName', () => {
  it('should add a numeric suffix before the extension', () => {
    expect(candidateName('photo.jpg', 0)).toBe('photo.jpg');
    expect(candidateName('photo.jpg', 1)).toBe('photo_1.jpg');
    expect(candidateName('archive.tar.gz', 2)).toBe('archive.tar_2.gz');
    expect(candidateName('README', 3)).toBe('README_3');
  });

  it('should keep suffixed names within the byte limit', () => {
    const result = candidateName(`${'文'.repeat(83)}.txt`, 2);

    expect(result).toBe(`${'文'.repeat(83)}_2.txt`);
    expect(Buffer.byteLength(result)).toBe(255);
    expect(candidateName(`${'文'.repeat(84)}.txt`, 2)).toBe(`${'文'.repeat(83)}_2.txt`);
  });
});

describe('DirectoryFileSink', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = path.join(tmpdir(), `radiodrop-sink-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should create the directory and write the file', async () => {
    const sink = new DirectoryFileSink(testDir);

    const location = await sink.save('notes.txt', Buffer.from('hello'));

    expect(location).toBe(path.join(testDir, 'notes.txt'));
    expect(await fs.readFile(location, 'utf-8')).toBe('hello');
  });

  it('should never overwrite an existing file', async () => {
    const sink = new DirectoryFileSink(testDir);

    const first = await sink.save('notes.txt', Buffer.from('one'));
    const second = await sink.save('notes.txt', Buffer.from('two'));
    const third = await sink.save('notes.txt', Buffer.from('three'));

    expect(path.basename(second)).toBe('notes_1.txt');
    expect(path.basename(third)).toBe('notes_2.txt');
    expect(await fs.readFile(first, 'utf-8')).toBe('one');
    expect(await fs.readFile(third, 'utf-8')).toBe('three');
  });

  it('should keep traversal attempts inside the directory', async () => {
    const logger = new RecordingLogger();
    const sink = new DirectoryFileSink(testDir, { logger });

    const location = await sink.save('../../escape.txt', Buffer.from('x'));

    expect(location).toBe(path.join(testDir, 'escape.txt'));
    expect(logger.messages('warn')).toEqual(["Sanitized filename '../../escape.txt' to 'escape.txt'"]);
  });

  it('should save names that are long in UTF-8', async () => {
    const sink = new DirectoryFileSink(testDir);
    const name = `${'文'.repeat(200)}.txt`;

    const first = await sink.save(name, Buffer.from('one'));
    const second = await sink.save(name, Buffer.from('two'));

    expect(path.basename(first)).toBe(`${'文'.repeat(83)}.txt`);
    expect(path.basename(second)).toBe(`${'文'.repeat(83)}_1.txt`);
    expect(await fs.readFile(second, 'utf-8')).toBe('two');
  });

  it('should resolve a relative directory', () => {
    expect(path.isAbsolute(new DirectoryFileSink('received_files').directory)).toBe(true);
  });
});
