import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FolderNotFoundError } from '../utils/errorHandler';
import { isMediaFile, scanFolder } from './folderScanner';

describe('isMediaFile', () => {
  it('matches audio and video extensions case-insensitively', () => {
    expect(isMediaFile('song.MP3')).toBe(true);
    expect(isMediaFile('clip.webm')).toBe(true);
    expect(isMediaFile('cover.jpg')).toBe(false);
    expect(isMediaFile('mp3')).toBe(false);
  });
});

describe('scanFolder', () => {
  let folder: string;

  beforeEach(async () => {
    folder = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'folder-scan-'));
  });

  afterEach(async () => {
    await fs.promises.rm(folder, { recursive: true, force: true });
  });

  async function touch(name: string): Promise<void> {
    await fs.promises.writeFile(path.join(folder, name), 'placeholder');
  }

  it('lists media files in natural order', async () => {
    await touch('Track10.mp3');
    await touch('track2.MP3');
    await touch('clip.mkv');
    await touch('notes.txt');
    await touch('cover.jpg');

    expect(await scanFolder(folder)).toEqual(['clip.mkv', 'track2.MP3', 'Track10.mp3']);
  });

  it('skips directories and does not recurse', async () => {
    await touch('a.mp3');
    await fs.promises.mkdir(path.join(folder, 'album.mp3'));
    await fs.promises.writeFile(path.join(folder, 'album.mp3', 'inner.mp3'), 'placeholder');

    expect(await scanFolder(folder)).toEqual(['a.mp3']);
  });

  it('returns an empty list for a folder without media', async () => {
    await touch('readme.md');
    expect(await scanFolder(folder)).toEqual([]);
  });

  it('follows links to files and skips dangling links', async () => {
    await touch('real.mp3');
    await fs.promises.symlink(path.join(folder, 'real.mp3'), path.join(folder, 'link.mp3'), 'file');
    await fs.promises.symlink(path.join(folder, 'gone.mp3'), path.join(folder, 'dead.mp3'), 'file');

    expect(await scanFolder(folder)).toEqual(['link.mp3', 'real.mp3']);
  });

  it('rejects a missing folder', async () => {
    const missing = path.join(folder, 'missing');
    await expect(scanFolder(missing)).rejects.toBeInstanceOf(FolderNotFoundError);
    await expect(scanFolder(missing)).rejects.toThrow(`Folder not found: ${missing}`);
  });

  it('rejects a path that is a file', async () => {
    await touch('song.mp3');
    await expect(scanFolder(path.join(folder, 'song.mp3'))).rejects.toBeInstanceOf(FolderNotFoundError);
  });
});
