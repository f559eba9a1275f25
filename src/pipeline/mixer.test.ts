import * as fs from 'fs/promises';
import * as path from 'path';
import { mixMusicBed } from '../media/ffmpeg.js';
import { fakeMediaBytes, readFakeMedia } from '../testing/fake-media.js';
import { makeTempDir, removeDir } from '../testing/tmp.js';
import type { Timeline } from './composer.js';
import { mixAudio } from './mixer.js';

vi.mock('../media/ffmpeg.js', () => import('../testing/fake-media.js'));

describe('mixAudio', () => {
  let dir: string;
  let timeline: Timeline;
  let paths: { musicPath: string; outputPath: string };

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await makeTempDir();
    const timelinePath = path.join(dir, 'timeline.mp4');
    await fs.writeFile(timelinePath, fakeMediaBytes({ duration: 6, video: true }));
    timeline = { path: timelinePath, durationSeconds: 6, width: 1280, height: 720, fps: 24, clipCount: 2 };
    paths = { musicPath: path.join(dir, 'music-input'), outputPath: path.join(dir, 'final.mp4') };
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('passes the timeline through when no music is given', async () => {
    const result = await mixAudio({ timeline, ...paths });

    expect(result).toEqual({ path: paths.outputPath, durationSeconds: 6, hasMusic: false });
    expect(await fs.readFile(paths.outputPath)).toEqual(await fs.readFile(timeline.path));
    expect(vi.mocked(mixMusicBed)).not.toHaveBeenCalled();
  });

  it('lays music under the narration for the timeline\'s length', async () => {
    const music = fakeMediaBytes({ duration: 60, audio: true });

    const result = await mixAudio({ timeline, music, ...paths });

    expect(result).toEqual({ path: paths.outputPath, durationSeconds: 6, hasMusic: true });
    expect(vi.mocked(mixMusicBed)).toHaveBeenCalledWith(
      timeline.path,
      paths.musicPath,
      { durationSeconds: 6, volume: 0.2, fadeOutSeconds: 2 },
      paths.outputPath,
      undefined,
    );
    expect(await readFakeMedia(paths.outputPath)).toEqual({ fake: true, duration: 6, audio: true, video: true, music: true });
  });

  it('warns and passes through on empty music', async () => {
    const result = await mixAudio({ timeline, music: Buffer.alloc(0), ...paths });

    expect(result).toEqual({
      path: paths.outputPath,
      durationSeconds: 6,
      hasMusic: false,
      warning: { kind: 'music', message: 'Background music is empty' },
    });
  });

  it('warns on music without an audio stream', async () => {
    const music = fakeMediaBytes({ duration: 10, audio: false, video: true });

    const result = await mixAudio({ timeline, music, ...paths });

    expect(result.hasMusic).toBe(false);
    expect(result.warning).toEqual({ kind: 'music', message: 'Background music has no audio stream' });
  });

  it('warns on undecodable music and keeps the timeline', async () => {
    const result = await mixAudio({ timeline, music: Buffer.from('definitely not audio'), ...paths });

    expect(result.hasMusic).toBe(false);
    expect(result.warning?.message).toMatch(/^Background music could not be read: FFprobe probeMedia failed: /);
    expect(await readFakeMedia(paths.outputPath)).toMatchObject({ duration: 6, music: false });
  });

  it('warns when the mix itself fails', async () => {
    vi.mocked(mixMusicBed).mockRejectedValueOnce(new Error('ffmpeg exited with code 1'));

    const result = await mixAudio({ timeline, music: fakeMediaBytes({ duration: 60 }), ...paths });

    expect(result.warning).toEqual({ kind: 'music', message: 'Background music could not be mixed: ffmpeg exited with code 1' });
    expect(await readFakeMedia(paths.outputPath)).toMatchObject({ duration: 6, music: false });
  });
});
