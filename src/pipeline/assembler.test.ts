import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { MediaConfig } from '../config.js';
import { RenderError } from '../errors.js';
import {
  muxNarration,
  readDurationSeconds,
  renderPlainComposite,
  renderTitleCard,
} from '../media/ffmpeg.js';
import { assembleVideo, finalDurationSeconds } from './assembler.js';

vi.mock('../media/ffmpeg.js', () => ({
  readDurationSeconds: vi.fn(),
  renderTitleCard:      vi.fn(),
  muxNarration:         vi.fn(),
  renderPlainComposite: vi.fn(),
}));

const MEDIA: MediaConfig = {
  ffmpegBin:  '/bin/ffmpeg-test',
  ffprobeBin: '/bin/ffprobe-test',
  fontFile:   '/fonts/Bold.ttf',
};

let dir: string;
let audioPath: string;
let outputPath: string;
let colorClip: string;

async function exists(p: string): Promise<boolean> {
  return fs.access(p).then(() => true, () => false);
}

beforeEach(async () => {
  vi.resetAllMocks();
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'assembler-test-'));
  audioPath = path.join(dir, 'audio.mp3');
  outputPath = path.join(dir, 'video.mp4');
  colorClip = `${outputPath}.color.mp4`;

  vi.mocked(renderTitleCard).mockImplementation(async (_bin, opts) => {
    await fs.writeFile(opts.outputPath, 'color');
  });
  vi.mocked(muxNarration).mockImplementation(async (_bin, opts) => {
    await fs.writeFile(opts.outputPath, 'final');
  });
  vi.mocked(renderPlainComposite).mockImplementation(async (_bin, opts) => {
    await fs.writeFile(opts.outputPath, 'plain');
  });
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('finalDurationSeconds', () => {
  it('never goes below the guideline', () => {
    expect(finalDurationSeconds(12.4, 30)).toBe(30);
  });

  it('rounds a longer narration to whole seconds', () => {
    expect(finalDurationSeconds(31.6, 30)).toBe(32);
    expect(finalDurationSeconds(30.5, 30)).toBe(31);
  });
});

describe('assembleVideo', () => {
  it('renders the title card, muxes narration and removes the intermediate clip', async () => {
    vi.mocked(readDurationSeconds).mockResolvedValue(31.6);

    const video = await assembleVideo({ audioPath, title: 'Sun Snacks', outputPath, guidelineSeconds: 30 }, MEDIA);

    expect(video).toEqual({ videoPath: outputPath, durationSeconds: 32, overlay: 'title' });
    expect(readDurationSeconds).toHaveBeenCalledWith('/bin/ffprobe-test', audioPath);
    expect(renderTitleCard).toHaveBeenCalledWith('/bin/ffmpeg-test', {
      title: 'Sun Snacks',
      durationSeconds: 32,
      fontFile: '/fonts/Bold.ttf',
      outputPath: colorClip,
    });
    expect(muxNarration).toHaveBeenCalledWith('/bin/ffmpeg-test', { videoPath: colorClip, audioPath, outputPath });
    expect(renderPlainComposite).not.toHaveBeenCalled();
    expect(await fs.readFile(outputPath, 'utf-8')).toBe('final');
    expect(await exists(colorClip)).toBe(false);
  });

  it('uses the guideline when the duration lookup fails', async () => {
    vi.mocked(readDurationSeconds).mockRejectedValue(new Error('FFprobe readDuration failed: boom'));

    const video = await assembleVideo({ audioPath, title: 'T', outputPath, guidelineSeconds: 45 }, MEDIA);

    expect(video.durationSeconds).toBe(45);
  });

  it('falls back to the plain composite when the title render fails', async () => {
    vi.mocked(readDurationSeconds).mockResolvedValue(20);
    vi.mocked(muxNarration).mockRejectedValue(new Error('FFmpeg muxNarration failed: bad stream'));

    const video = await assembleVideo({ audioPath, title: 'T', outputPath, guidelineSeconds: 30 }, MEDIA);

    expect(video).toEqual({ videoPath: outputPath, durationSeconds: 30, overlay: 'plain' });
    expect(renderPlainComposite).toHaveBeenCalledWith('/bin/ffmpeg-test', { durationSeconds: 30, audioPath, outputPath });
    expect(await fs.readFile(outputPath, 'utf-8')).toBe('plain');
    expect(await exists(colorClip)).toBe(false);
  });

  it('raises RenderError carrying both failures when the fallback fails too', async () => {
    vi.mocked(readDurationSeconds).mockResolvedValue(20);
    vi.mocked(renderTitleCard).mockRejectedValue(new Error('FFmpeg renderTitleCard failed: no font'));
    vi.mocked(renderPlainComposite).mockImplementation(async (_bin, opts) => {
      await fs.writeFile(opts.outputPath, 'partial');
      throw new Error('FFmpeg renderPlainComposite failed: no encoder');
    });

    const err = await assembleVideo({ audioPath, title: 'T', outputPath, guidelineSeconds: 30 }, MEDIA)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RenderError);
    expect(err).toMatchObject({
      stage:   'render',
      code:    'RenderFailed',
      message: 'ffmpeg failed: FFmpeg renderTitleCard failed: no font\nfallback failed: FFmpeg renderPlainComposite failed: no encoder',
    });
    expect(await exists(outputPath)).toBe(false);
    expect(await exists(colorClip)).toBe(false);
  });
});
