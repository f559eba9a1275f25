import { buildMusicBedArgs, buildSlideArgs } from './ffmpeg.js';

const ENCODE_ARGS = [
  '-c:v', 'libx264', '-preset', 'fast', '-crf', '23',
  '-pix_fmt', 'yuv420p',
  '-c:a', 'aac', '-b:a', '128k',
  '-ar', '44100', '-ac', '2',
  '-movflags', '+faststart',
];

describe('buildSlideArgs', () => {
  it('composites the image and narration into a fixed-length clip', () => {
    const args = buildSlideArgs({
      width: 1280,
      height: 720,
      durationSeconds: 2.3,
      background: '0xf8f9fa',
      image: { path: '/w/s.png', x: 294, y: 338 },
      audioPath: '/w/n.mp3',
      filters: ['drawbox=A', 'drawtext=B'],
    }, '/w/out.mp4');

    expect(args).toEqual([
      '-f', 'lavfi', '-i', 'color=c=0xf8f9fa:s=1280x720:r=24:d=2.300',
      '-loop', '1', '-framerate', '24', '-i', '/w/s.png',
      '-i', '/w/n.mp3',
      '-filter_complex',
      '[0:v][1:v]overlay=294:338:shortest=1[base];' +
      '[base]drawbox=A,drawtext=B,format=yuv420p[v];' +
      '[2:a]aformat=sample_rates=44100:channel_layouts=stereo,apad=whole_dur=2.300[a]',
      '-map', '[v]', '-map', '[a]',
      '-t', '2.300',
      '-r', '24',
      ...ENCODE_ARGS,
      '/w/out.mp4',
    ]);
  });

  it('generates silence and applies fades when there is no narration', () => {
    const args = buildSlideArgs({
      width: 720,
      height: 1280,
      durationSeconds: 3,
      background: '0x27ae60',
      filters: ['drawtext=A'],
      fadeSeconds: 0.5,
    }, '/w/outro.mp4');

    expect(args.slice(0, 8)).toEqual([
      '-f', 'lavfi', '-i', 'color=c=0x27ae60:s=720x1280:r=24:d=3.000',
      '-f', 'lavfi', '-i', 'anullsrc=r=44100:cl=stereo',
    ]);
    expect(args[args.indexOf('-filter_complex') + 1]).toBe(
      '[0:v]drawtext=A,fade=t=in:st=0:d=0.500,fade=t=out:st=2.500:d=0.500,format=yuv420p[v];' +
      '[1:a]aformat=sample_rates=44100:channel_layouts=stereo,apad=whole_dur=3.000[a]',
    );
  });

  it('caps the fade at half the clip', () => {
    const args = buildSlideArgs({
      width: 1280, height: 720, durationSeconds: 1, background: '0x000000', filters: [], fadeSeconds: 2,
    }, '/w/x.mp4');

    expect(args[args.indexOf('-filter_complex') + 1]).toContain(
      '[0:v]fade=t=in:st=0:d=0.500,fade=t=out:st=0.500:d=0.500,format=yuv420p[v]',
    );
  });
});

describe('buildMusicBedArgs', () => {
  it('loops, trims, attenuates and fades the bed under the narration', () => {
    const args = buildMusicBedArgs('/w/t.mp4', '/w/m', { durationSeconds: 10, volume: 0.2, fadeOutSeconds: 2 }, '/w/o.mp4');

    expect(args).toEqual([
      '-i', '/w/t.mp4',
      '-stream_loop', '-1', '-i', '/w/m',
      '-filter_complex',
      '[1:a]atrim=0:10.000,asetpts=N/SR/TB,volume=0.2,afade=t=out:st=8.000:d=2.000,' +
      'aformat=sample_rates=44100:channel_layouts=stereo[bed];' +
      '[0:a][bed]amix=inputs=2:duration=first:dropout_transition=0:normalize=0[out]',
      '-map', '0:v', '-map', '[out]',
      '-c:v', 'copy',
      '-c:a', 'aac', '-b:a', '128k',
      '-t', '10.000',
      '-movflags', '+faststart',
      '/w/o.mp4',
    ]);
  });

  it('shortens the fade for videos shorter than the fade', () => {
    const args = buildMusicBedArgs('/v', '/m', { durationSeconds: 1.5, volume: 0.2, fadeOutSeconds: 2 }, '/o');

    expect(args[args.indexOf('-filter_complex') + 1]).toContain('afade=t=out:st=0.000:d=1.500');
  });
});
