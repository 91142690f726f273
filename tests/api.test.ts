import { FfmpegClient } from '../src/api/ffmpeg';
import { NATIVE_OPUS_FORMAT, STRICT_OPUS_FORMAT, YtDlpClient, parseJsonOutput, toPlaylist } from '../src/api/yt-dlp';
import { AppError, ErrorType } from '../src/utils/error-handler';
import { ScriptedRunner } from './helpers';

const timeouts = { infoTimeoutMs: 30, playlistTimeoutMs: 60, downloadTimeoutMs: 300, tagTimeoutMs: 90 };

describe('YtDlpClient', () => {
  let runner: ScriptedRunner;
  let client: YtDlpClient;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
    runner = new ScriptedRunner();
    client = new YtDlpClient(runner, 'yt-dlp', timeouts);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('isAvailable', () => {
    it('should run --version', async () => {
      runner.enqueue({ stdout: '2024.08.06\n' });
      await expect(client.isAvailable()).resolves.toBe(true);
      expect(runner.calls[0].args).toEqual(['--version']);
    });

    it('should report a missing binary as unavailable', async () => {
      runner.enqueue(() => {
        throw new AppError(ErrorType.MissingDependency, 'yt-dlp');
      });
      await expect(client.isAvailable()).resolves.toBe(false);
    });

    it('should report a non-zero exit as unavailable', async () => {
      runner.enqueue({ exitCode: 1 });
      await expect(client.isAvailable()).resolves.toBe(false);
    });
  });

  describe('getTrackInfo', () => {
    it('should query a single video with the info timeout', async () => {
      runner.enqueue({ stdout: JSON.stringify({ id: 'abc', title: 'Song', track_number: 4, extra: true }) });

      const info = await client.getTrackInfo('https://music.youtube.com/watch?v=abc');

      expect(runner.calls[0].args).toEqual(['--dump-json', '--no-playlist', 'https://music.youtube.com/watch?v=abc']);
      expect(runner.calls[0].options.timeoutMs).toBe(30);
      expect(info.id).toBe('abc');
      expect(info.title).toBe('Song');
      expect(info.track_number).toBe(4);
      expect(info.artist).toBeUndefined();
    });

    it('should fail on a non-zero exit', async () => {
      runner.enqueue({ exitCode: 1, stderr: 'ERROR: Video unavailable' });
      await expect(client.getTrackInfo('u')).rejects.toMatchObject({ type: ErrorType.ProcessFailed });
    });

    it('should fail on a timeout', async () => {
      runner.enqueue({ exitCode: null, timedOut: true });
      await expect(client.getTrackInfo('u')).rejects.toMatchObject({ type: ErrorType.Timeout });
    });

    it('should fail on unparsable output', async () => {
      runner.enqueue({ stdout: 'not json' });
      await expect(client.getTrackInfo('u')).rejects.toMatchObject({ type: ErrorType.MalformedOutput });
    });
  });

  describe('getPlaylist', () => {
    it('should list entries flat with the playlist timeout', async () => {
      runner.enqueue({
        stdout: JSON.stringify({ title: 'Mix', entries: [{ id: 'a1', title: 'One' }, null, { title: 'no id' }] }),
      });

      const playlist = await client.getPlaylist('https://music.youtube.com/playlist?list=PL1');

      expect(runner.calls[0].args).toEqual([
        '--flat-playlist',
        '--dump-single-json',
        'https://music.youtube.com/playlist?list=PL1',
      ]);
      expect(runner.calls[0].options.timeoutMs).toBe(60);
      expect(playlist.title).toBe('Mix');
      expect(playlist.entries).toEqual([
        { id: 'a1', title: 'One', url: undefined },
        null,
        { id: undefined, title: 'no id', url: undefined },
      ]);
    });
  });

  describe('getDirectAudioUrl', () => {
    it('should return the first line of output', async () => {
      runner.enqueue({ stdout: 'https://cdn.example/audio\nhttps://cdn.example/other\n' });

      await expect(client.getDirectAudioUrl('u')).resolves.toBe('https://cdn.example/audio');
      expect(runner.calls[0].args).toEqual(['-f', STRICT_OPUS_FORMAT, '--get-url', '--no-playlist', 'u']);
    });

    it('should reject empty output', async () => {
      runner.enqueue({ stdout: '\n' });
      await expect(client.getDirectAudioUrl('u')).rejects.toThrow('Empty direct URL received');
    });
  });

  describe('downloads', () => {
    it('should build the native download command', async () => {
      runner.enqueue({});
      await client.downloadNative('u', { cwd: '/music' });

      expect(runner.calls[0].args).toEqual([
        '-f',
        NATIVE_OPUS_FORMAT,
        '--no-playlist',
        '--no-embed-thumbnail',
        '--restrict-filenames',
        '-o',
        '%(title)s.%(ext)s',
        'u',
      ]);
      expect(runner.calls[0].options).toMatchObject({ cwd: '/music', timeoutMs: 300 });
    });

    it('should build the extract-and-convert command', async () => {
      runner.enqueue({});
      await client.downloadAndExtract('u', '/music/temp_1', {});

      const args = runner.calls[0].args;
      expect(args.slice(0, 7)).toEqual(['-f', NATIVE_OPUS_FORMAT, '-x', '--audio-format', 'opus', '--audio-quality', '0']);
      expect(args.slice(-3)).toEqual(['--output', '/music/temp_1', 'u']);
      expect(args).toContain('--no-overwrites');
      expect(args).toContain('--no-embed-metadata');
    });
  });
});

describe('yt-dlp output parsing', () => {
  it('should reject empty output', () => {
    expect(() => parseJsonOutput('  ', 'op')).toThrow('yt-dlp returned no output');
  });

  it('should reject non-object documents', () => {
    expect(() => parseJsonOutput('[1,2]', 'op')).toThrow('yt-dlp returned a non-object JSON document');
  });

  it('should treat a missing entries list as empty', () => {
    expect(toPlaylist({ title: 'x' }).entries).toEqual([]);
  });
});

describe('FfmpegClient', () => {
  let runner: ScriptedRunner;
  let client: FfmpegClient;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation();
    runner = new ScriptedRunner();
    client = new FfmpegClient(runner, 'ffmpeg', timeouts);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should check -version', async () => {
    runner.enqueue({});
    await expect(client.isAvailable()).resolves.toBe(true);
    expect(runner.calls[0]).toMatchObject({ command: 'ffmpeg', args: ['-version'] });
  });

  it('should copy a stream without re-encoding', async () => {
    runner.enqueue({});
    await client.copyStream('https://cdn.example/audio', '/music/Song.opus');

    expect(runner.calls[0].args).toEqual(['-i', 'https://cdn.example/audio', '-c', 'copy', '-vn', '-y', '/music/Song.opus']);
    expect(runner.calls[0].options.timeoutMs).toBe(300);
  });

  it('should pass each tag as a -metadata pair', async () => {
    runner.enqueue({});
    await client.writeMetadata('/m/a.opus', '/m/a.temp.opus', [
      ['artist', 'Someone'],
      ['date', '2021'],
    ]);

    expect(runner.calls[0].args).toEqual([
      '-i',
      '/m/a.opus',
      '-c',
      'copy',
      '-map_metadata',
      '0',
      '-metadata',
      'artist=Someone',
      '-metadata',
      'date=2021',
      '-y',
      '/m/a.temp.opus',
    ]);
    expect(runner.calls[0].options.timeoutMs).toBe(90);
  });
});
