import ffmpeg from 'fluent-ffmpeg';
import ffprobe from 'ffprobe-static';
import fs from 'fs-extra';
import path from 'path';
import sharp from 'sharp';
import { logger as rootLogger } from '../../utils/logger';

const logger = rootLogger.child('media');

ffmpeg.setFfprobePath(ffprobe.path);
if (process.env.FFMPEG_PATH) {
  ffmpeg.setFfmpegPath(process.env.FFMPEG_PATH);
}

const THUMB_WIDTH = 400;

export interface VideoMetadata {
  kind: 'video';
  resolution: string;
  duration: string;
  durationSeconds: number;
  codec: string;
}

export interface ImageMetadata {
  kind: 'image';
  resolution: string;
  format: string;
}

export type ExtractedMetadata = VideoMetadata | ImageMetadata;

/**
 * External media tools used by ingestion and archive migration.
 */
export interface MediaToolkit {
  extractVideo(filePath: string): Promise<VideoMetadata>;
  extractImage(filePath: string): Promise<ImageMetadata>;
  /** Write one frame at `offsetSeconds` to `outPath` as JPEG. */
  captureFrame(videoPath: string, offsetSeconds: number, outPath: string): Promise<void>;
  /** Re-encode any container to H.264/AAC MP4. Resolves false on failure. */
  transcode(sourcePath: string, destPath: string): Promise<boolean>;
}

export const TRANSCODE_OUTPUT_OPTIONS = [
  '-c:v libx264',
  '-crf 23',
  '-preset medium',
  '-c:a aac',
  '-b:a 128k',
  '-movflags +faststart',
];

/**
 * fluent-ffmpeg/ffprobe for video, sharp for stills.
 */
export class FfmpegMediaToolkit implements MediaToolkit {
  extractVideo(filePath: string): Promise<VideoMetadata> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (err, data) => {
        if (err) return reject(err);

        const videoStream = data.streams.find(stream => stream.codec_type === 'video');
        if (!videoStream || !videoStream.width || !videoStream.height) {
          return reject(new Error('Unable to read video dimensions'));
        }

        const durationSeconds = data.format?.duration ? Number(data.format.duration) : Number(videoStream.duration || 0);
        resolve({
          kind: 'video',
          resolution: `${videoStream.width}x${videoStream.height}`,
          duration: formatDuration(durationSeconds),
          durationSeconds,
          codec: videoStream.codec_name ?? 'unknown',
        });
      });
    });
  }

  async extractImage(filePath: string): Promise<ImageMetadata> {
    const meta = await sharp(filePath).metadata();
    if (!meta.width || !meta.height) {
      throw new Error('Unable to read image dimensions');
    }
    return {
      kind: 'image',
      resolution: `${meta.width}x${meta.height}`,
      format: (meta.format ?? path.extname(filePath).slice(1)).toUpperCase(),
    };
  }

  async captureFrame(videoPath: string, offsetSeconds: number, outPath: string): Promise<void> {
    await fs.ensureDir(path.dirname(outPath));
    await new Promise<void>((resolve, reject) => {
      ffmpeg(videoPath)
        .on('end', () => resolve())
        .on('error', reject)
        .screenshots({
          timestamps: [Math.max(offsetSeconds, 0)],
          filename: path.basename(outPath),
          folder: path.dirname(outPath),
          size: `${THUMB_WIDTH}x?`,
        });
    });
  }

  async transcode(sourcePath: string, destPath: string): Promise<boolean> {
    await fs.ensureDir(path.dirname(destPath));
    try {
      await new Promise<void>((resolve, reject) => {
        ffmpeg(sourcePath)
          .outputOptions(TRANSCODE_OUTPUT_OPTIONS)
          .on('end', () => resolve())
          .on('error', reject)
          .save(destPath);
      });
      return true;
    } catch (error) {
      logger.warn('Transcode failed', { sourcePath, error: error instanceof Error ? error.message : String(error) });
      await fs.remove(destPath);
      return false;
    }
  }
}

/**
 * `m:ss` below an hour, `h:mm:ss` above.
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.round(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;
  const pad = (value: number) => value.toString().padStart(2, '0');
  return hours > 0 ? `${hours}:${pad(minutes)}:${pad(secs)}` : `${minutes}:${pad(secs)}`;
}

/**
 * Frame offset used for video thumbnails: a quarter of the way in.
 */
export function thumbnailOffset(durationSeconds: number): number {
  return durationSeconds > 0 ? durationSeconds * 0.25 : 0;
}
