import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { Mock } from 'vitest';
import { synthesizeNarration } from '../ai/voice.js';
import { loadConfig } from '../config.js';
import type { VideoBucket } from '../db/storage.js';
import type { VideoTable } from '../db/videos.js';
import { PipelineError, RenderError } from '../errors.js';
import type { Alerts } from '../monitoring/telegram.js';
import { assembleVideo } from './assembler.js';
import { GenerationRequestSchema, runPipeline, type PipelineDeps } from './index.js';
import { generateLesson, type LessonPayload } from './scriptwriter.js';

vi.mock('./scriptwriter.js', () => ({ generateLesson: vi.fn() }));
vi.mock('../ai/voice.js', () => ({ synthesizeNarration: vi.fn() }));
vi.mock('./assembler.js', () => ({ assembleVideo: vi.fn() }));

const LESSON: LessonPayload = {
  title:  'Sun Snacks',
  script: 'Plants eat sunlight. It is the original solar panel.',
  quiz: [
    { question: 'What do plants eat?', options: ['Pizza', 'Sunlight', 'Rocks', 'Wifi'], answer: 'Sunlight' },
    { question: 'Where does it happen?', options: ['Roots', 'Leaves', 'Bark', 'Soil'], answer: 'Leaves' },
    { question: 'What gas goes in?', options: ['CO2', 'O2', 'He', 'N2'], answer: 'CO2' },
  ],
};

let tempRoot: string;
let deps: PipelineDeps;
let upload: Mock<VideoBucket['upload']>;
let insert: Mock<VideoTable['insert']>;
let workDirs: string[];

beforeEach(async () => {
  vi.resetAllMocks();
  tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-test-'));
  workDirs = [];

  upload = vi.fn<VideoBucket['upload']>(async () => ({ error: null }));
  insert = vi.fn<VideoTable['insert']>(async (row) => ({ record: { id: 1, ...row } }));
  const alerts: Alerts = { alert: vi.fn(async () => undefined) };

  deps = {
    config: loadConfig({
      HUGGINGFACE_API_KEY:  'test-key',
      SUPABASE_URL:         'https://project.supabase.test',
      SUPABASE_SERVICE_KEY: 'test-secret',
      TEMP_DIR:             tempRoot,
    }),
    bucket: {
      upload,
      publicUrl: (key) => `https://cdn.test/ai_videos/${key}`,
      signedUrl: async () => null,
    },
    videos: { insert },
    alerts,
  };

  vi.mocked(generateLesson).mockResolvedValue(LESSON);
  vi.mocked(synthesizeNarration).mockImplementation(async (_text, outputPath) => {
    workDirs.push(path.dirname(outputPath));
    await fs.writeFile(outputPath, 'mp3');
    return outputPath;
  });
  vi.mocked(assembleVideo).mockImplementation(async (job) => {
    await fs.writeFile(job.outputPath, 'mp4');
    return { videoPath: job.outputPath, durationSeconds: job.guidelineSeconds, overlay: 'title' };
  });
});

afterEach(async () => {
  await fs.rm(tempRoot, { recursive: true, force: true });
});

describe('GenerationRequestSchema', () => {
  it('defaults length_seconds to 45', () => {
    expect(GenerationRequestSchema.parse({ topic: 'Photosynthesis', role: 'Student' }))
      .toEqual({ topic: 'Photosynthesis', role: 'Student', length_seconds: 45 });
    expect(GenerationRequestSchema.parse({ topic: 'Photosynthesis', role: 'Student', length_seconds: null }).length_seconds)
      .toBe(45);
  });

  it('trims topic and role', () => {
    expect(GenerationRequestSchema.parse({ topic: ' Gravity ', role: ' Teacher ', length_seconds: 60 }))
      .toEqual({ topic: 'Gravity', role: 'Teacher', length_seconds: 60 });
  });

  it('rejects blank fields and out-of-range lengths', () => {
    expect(GenerationRequestSchema.safeParse({ topic: '  ', role: 'Student' }).success).toBe(false);
    expect(GenerationRequestSchema.safeParse({ topic: 'X', role: 'Student', length_seconds: 0 }).success).toBe(false);
    expect(GenerationRequestSchema.safeParse({ topic: 'X', role: 'Student', length_seconds: 601 }).success).toBe(false);
    expect(GenerationRequestSchema.safeParse({ topic: 'X', role: 'Student', length_seconds: 2.5 }).success).toBe(false);
  });
});

describe('runPipeline', () => {
  const request = { topic: 'Photosynthesis', role: 'Student', length_seconds: 30 };

  it('runs every stage and returns the title, URL, full quiz and record', async () => {
    const result = await runPipeline(request, deps);

    const call = upload.mock.calls[0];
    if (!call) throw new Error('upload was not called');
    const [key] = call;
    const videoUrl = `https://cdn.test/ai_videos/${key}`;

    expect(generateLesson).toHaveBeenCalledWith(request, deps.config.inference);
    expect(synthesizeNarration).toHaveBeenCalledWith(LESSON.script, expect.stringMatching(/audio\.mp3$/), deps.config.tts);
    expect(assembleVideo).toHaveBeenCalledWith(
      expect.objectContaining({ title: 'Sun Snacks', guidelineSeconds: 30 }),
      deps.config.media,
    );
    expect(result).toEqual({
      ok:        true,
      title:     'Sun Snacks',
      video_url: videoUrl,
      quiz:      LESSON.quiz,
      meta: {
        id:            1,
        title:         'Sun Snacks',
        video_url:     videoUrl,
        role:          'Student',
        quiz_question: 'What do plants eat?',
        quiz_options:  '["Pizza","Sunlight","Rocks","Wifi"]',
        quiz_answer:   'Sunlight',
      },
    });
  });

  it('removes the work directory after success', async () => {
    await runPipeline(request, deps);

    expect(workDirs).toHaveLength(1);
    expect(path.dirname(workDirs[0] ?? '')).toBe(tempRoot);
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it('reports an insert failure in meta while still returning the URL', async () => {
    insert.mockResolvedValue({ error: 'permission denied for table videos' });

    const result = await runPipeline(request, deps);

    expect(result.meta).toEqual({ insert_error: 'permission denied for table videos' });
    expect(result.video_url).toMatch(/^https:\/\/cdn\.test\/ai_videos\/student_[0-9a-f]{32}\.mp4$/);
  });

  it('stops at generation without creating a work directory', async () => {
    vi.mocked(generateLesson).mockRejectedValue(new PipelineError('generation', 'UnparsableModelOutput', 'bad json'));

    await expect(runPipeline(request, deps)).rejects.toMatchObject({ stage: 'generation' });
    expect(synthesizeNarration).not.toHaveBeenCalled();
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it('propagates a render failure, skips publishing and cleans up', async () => {
    const failure = new RenderError('ffmpeg failed: a\nfallback failed: b');
    vi.mocked(assembleVideo).mockRejectedValue(failure);

    await expect(runPipeline(request, deps)).rejects.toBe(failure);
    expect(upload).not.toHaveBeenCalled();
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it('labels an unclassified error with the stage it came from', async () => {
    vi.mocked(synthesizeNarration).mockRejectedValue(new Error('disk full'));

    await expect(runPipeline(request, deps)).rejects.toMatchObject({
      stage:   'synthesis',
      code:    'Unexpected',
      message: 'synthesis failed: disk full',
    });
  });
});
