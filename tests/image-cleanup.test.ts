import * as fs from 'fs';
import * as path from 'path';
import {
  EmbeddedPictureProbe,
  ImageCleanup,
  MusicMetadataProbe,
  findMatchingAudio,
  scanFolder,
  toMediaItem,
} from '../src/services/image-cleanup';
import { ErrorType } from '../src/utils/error-handler';
import { makeTempDir, removeDir, touch } from './helpers';

class FakeProbe implements EmbeddedPictureProbe {
  readonly probed: string[] = [];

  constructor(private withPicture: Set<string>) {}

  async hasEmbeddedPicture(audioPath: string): Promise<boolean> {
    this.probed.push(path.basename(audioPath));
    if (path.basename(audioPath) === 'unreadable.opus') {
      throw new Error('Invalid Ogg page');
    }
    return this.withPicture.has(path.basename(audioPath));
  }
}

describe('findMatchingAudio', () => {
  const audio = [toMediaItem('/m', 'Song One.opus'), toMediaItem('/m', 'Other.opus')];

  it('should match when the audio name contains the image name', () => {
    expect(findMatchingAudio(toMediaItem('/m', 'song.jpg'), audio)?.name).toBe('Song One.opus');
  });

  it('should match when the image name contains the audio name', () => {
    expect(findMatchingAudio(toMediaItem('/m', 'Other (front).png'), audio)?.name).toBe('Other.opus');
  });

  it('should ignore case and extensions', () => {
    expect(findMatchingAudio(toMediaItem('/m', 'SONG ONE.JPEG'), audio)?.name).toBe('Song One.opus');
  });

  it('should leave unrelated images unmatched', () => {
    expect(findMatchingAudio(toMediaItem('/m', 'cover.jpg'), audio)).toBeUndefined();
  });
});

describe('scanFolder', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should list Opus and image files in name order and ignore the rest', () => {
    touch(dir, 'b.opus');
    touch(dir, 'a.opus');
    touch(dir, 'c.mp3');
    touch(dir, 'z.WEBP');
    touch(dir, 'cover.jpg');
    fs.mkdirSync(path.join(dir, 'art.png'));

    const { audioFiles, imageFiles } = scanFolder(dir);

    expect(audioFiles.map((item) => item.name)).toEqual(['a.opus', 'b.opus']);
    expect(imageFiles.map((item) => item.name)).toEqual(['cover.jpg', 'z.WEBP']);
    expect(imageFiles[1]).toEqual({ path: path.join(dir, 'z.WEBP'), name: 'z.WEBP', baseName: 'z' });
  });

  it('should throw NotFound for a missing folder', () => {
    expect(() => scanFolder(path.join(dir, 'nope'))).toThrow(expect.objectContaining({ type: ErrorType.NotFound }));
  });
});

describe('ImageCleanup', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    jest.spyOn(console, 'log').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
    touch(dir, 'Song One.opus');
    touch(dir, 'Song Two.opus');
    touch(dir, 'song one.jpg');
    touch(dir, 'Song Two.png');
    touch(dir, 'cover.jpg');
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeDir(dir);
  });

  describe('plan', () => {
    it('should select every image in all mode', async () => {
      const plan = await new ImageCleanup(new FakeProbe(new Set())).plan(dir, 'all');

      expect(plan.toDelete.map((item) => item.name)).toEqual(['Song Two.png', 'cover.jpg', 'song one.jpg']);
      expect(plan.unmatched.map((item) => item.name)).toEqual(['cover.jpg']);
    });

    it('should select only matched images in matched mode', async () => {
      const plan = await new ImageCleanup(new FakeProbe(new Set())).plan(dir, 'matched');

      expect(plan.matches.map((match) => [match.image.name, match.audioBaseName])).toEqual([
        ['Song Two.png', 'song two'],
        ['song one.jpg', 'song one'],
      ]);
      expect(plan.toDelete.map((item) => item.name)).toEqual(['Song Two.png', 'song one.jpg']);
      expect(plan.matches.every((match) => match.hasEmbeddedCover === undefined)).toBe(true);
    });

    it('should keep images whose audio has no embedded picture when verifying', async () => {
      const probe = new FakeProbe(new Set(['Song One.opus']));

      const plan = await new ImageCleanup(probe).plan(dir, 'matched', { verify: true });

      expect(plan.toDelete.map((item) => item.name)).toEqual(['song one.jpg']);
      expect(plan.matches.map((match) => match.hasEmbeddedCover)).toEqual([false, true]);
      expect(probe.probed).toEqual(['Song Two.opus', 'Song One.opus']);
    });

    it('should probe each audio file once and treat read errors as no picture', async () => {
      touch(dir, 'unreadable.opus');
      touch(dir, 'unreadable.jpg');
      touch(dir, 'unreadable-back.jpg');
      const probe = new FakeProbe(new Set());

      const plan = await new ImageCleanup(probe).plan(dir, 'matched', { verify: true });

      expect(probe.probed.filter((name) => name === 'unreadable.opus')).toHaveLength(1);
      expect(plan.toDelete).toEqual([]);
      expect(console.warn).toHaveBeenCalled();
    });

    it('should not filter all mode by verification', async () => {
      const plan = await new ImageCleanup(new FakeProbe(new Set())).plan(dir, 'all', { verify: true });
      expect(plan.toDelete).toHaveLength(3);
    });
  });

  describe('deleteFiles', () => {
    it('should delete the files and count what remains', async () => {
      const cleanup = new ImageCleanup(new FakeProbe(new Set()));
      const plan = await cleanup.plan(dir, 'matched');
      const seen: string[] = [];

      const result = cleanup.deleteFiles(dir, plan.toDelete, (outcome) => seen.push(outcome.file));

      expect(result).toEqual({
        deleted: 2,
        errors: 0,
        remaining: 3,
        outcomes: [
          { file: 'Song Two.png', success: true },
          { file: 'song one.jpg', success: true },
        ],
      });
      expect(seen).toEqual(['Song Two.png', 'song one.jpg']);
      expect(fs.readdirSync(dir).sort()).toEqual(['Song One.opus', 'Song Two.opus', 'cover.jpg']);
    });

    it('should continue past files that cannot be deleted', () => {
      const cleanup = new ImageCleanup(new FakeProbe(new Set()));
      const files = [toMediaItem(dir, 'already-gone.jpg'), toMediaItem(dir, 'cover.jpg')];

      const result = cleanup.deleteFiles(dir, files);

      expect(result.deleted).toBe(1);
      expect(result.errors).toBe(1);
      expect(result.outcomes[0]).toMatchObject({ file: 'already-gone.jpg', success: false });
      expect(result.outcomes[0].error).toContain('ENOENT');
      expect(result.remaining).toBe(4);
    });
  });
});

describe('MusicMetadataProbe', () => {
  it('should report whether the file carries a picture', async () => {
    const parse = jest
      .fn()
      .mockResolvedValueOnce({ common: { picture: [{ format: 'image/jpeg', data: Buffer.alloc(1) }] } })
      .mockResolvedValueOnce({ common: {} });
    const probe = new MusicMetadataProbe(parse);

    await expect(probe.hasEmbeddedPicture('/m/a.opus')).resolves.toBe(true);
    await expect(probe.hasEmbeddedPicture('/m/b.opus')).resolves.toBe(false);
    expect(parse).toHaveBeenCalledWith('/m/a.opus', { duration: false, skipCovers: false });
  });
});
