/**
 * Assembler — turns narration audio into the final title-card video.
 * Order: read duration → title card → narration mux; on failure, a plain
 * color composite without the text overlay.
 */
import type { MediaConfig } from '../config.js';
import { RenderError, errorMessage } from '../errors.js';
import {
  muxNarration,
  readDurationSeconds,
  renderPlainComposite,
  renderTitleCard,
} from '../media/ffmpeg.js';
import { removeIfExists } from '../utils/tempdir.js';
import { logger } from '../utils/logger.js';

export interface AssemblyJob {
  audioPath: string;
  title: string;
  outputPath: string;
  /** Requested lesson length; the video is never shorter than this. */
  guidelineSeconds: number;
}

export interface AssembledVideo {
  videoPath: string;
  durationSeconds: number;
  overlay: 'title' | 'plain';
}

export function finalDurationSeconds(measuredSeconds: number, guidelineSeconds: number): number {
  return Math.max(Math.round(measuredSeconds), guidelineSeconds);
}

async function narrationSeconds(media: MediaConfig, job: AssemblyJob): Promise<number> {
  try {
    return await readDurationSeconds(media.ffprobeBin, job.audioPath);
  } catch (err) {
    logger.warn('Assembler: duration lookup failed — using guideline duration', {
      guidelineSeconds: job.guidelineSeconds,
      error: errorMessage(err),
    });
    return job.guidelineSeconds;
  }
}

export async function assembleVideo(job: AssemblyJob, media: MediaConfig): Promise<AssembledVideo> {
  const measured = await narrationSeconds(media, job);
  const durationSeconds = finalDurationSeconds(measured, job.guidelineSeconds);
  const colorClip = `${job.outputPath}.color.mp4`;

  logger.info('Assembler: assembling video', { measuredSeconds: measured, durationSeconds });

  try {
    try {
      await renderTitleCard(media.ffmpegBin, {
        title: job.title,
        durationSeconds,
        fontFile: media.fontFile,
        outputPath: colorClip,
      });
      await muxNarration(media.ffmpegBin, {
        videoPath: colorClip,
        audioPath: job.audioPath,
        outputPath: job.outputPath,
      });
      return { videoPath: job.outputPath, durationSeconds, overlay: 'title' };
    } catch (primaryErr) {
      logger.warn('Assembler: title render failed — retrying without text overlay', {
        error: errorMessage(primaryErr),
      });
      await removeIfExists(job.outputPath);
      await removeIfExists(colorClip);

      try {
        await renderPlainComposite(media.ffmpegBin, {
          durationSeconds,
          audioPath: job.audioPath,
          outputPath: job.outputPath,
        });
      } catch (fallbackErr) {
        await removeIfExists(job.outputPath);
        throw new RenderError(
          `ffmpeg failed: ${errorMessage(primaryErr)}\nfallback failed: ${errorMessage(fallbackErr)}`,
          fallbackErr,
        );
      }
      return { videoPath: job.outputPath, durationSeconds, overlay: 'plain' };
    }
  } finally {
    await removeIfExists(colorClip);
  }
}
