import ffmpeg from 'fluent-ffmpeg';
import * as fs from 'fs';
import * as path from 'path';
import { ConversionError } from '../../domain/errors';
import { IAudioConverter } from '../../domain/ports/IAudioConverter';
import { logger } from '../logging/logger';

export const TARGET_SAMPLE_RATE = 16000;

/**
 * Normalizes audio to mono 16 kHz pcm_s16le WAV using FFmpeg.
 * Requires 'ffmpeg' on PATH unless an explicit binary path is given.
 */
export class FFmpegAudioConverter implements IAudioConverter {
    constructor(private readonly ffmpegPath?: string) {}

    async convertToWav(inputPath: string, outputPath: string): Promise<void> {
        const extension = path.extname(inputPath).slice(1) || path.basename(inputPath);

        await new Promise<void>((resolve, reject) => {
            const cmd = ffmpeg(inputPath);
            if (this.ffmpegPath) {
                cmd.setFfmpegPath(this.ffmpegPath);
            }

            cmd.noVideo()
                .audioCodec('pcm_s16le')
                .audioFrequency(TARGET_SAMPLE_RATE)
                .audioChannels(1)
                .outputOptions([
                    '-write_bext 0',
                    '-fflags +bitexact',
                    '-map_metadata -1',
                ])
                .on('start', (commandLine: string) => logger.debug(`[FFmpeg] Running: ${commandLine}`))
                .on('end', () => resolve())
                .on('error', (err: Error) => reject(this.toConversionError(err, extension)))
                .save(outputPath);
        });

        if (!fs.existsSync(outputPath)) {
            throw new ConversionError('Failed to convert audio file to WAV', [`FFmpeg produced no output at ${outputPath}`]);
        }
    }

    private toConversionError(err: Error, extension: string): ConversionError {
        if (/cannot find ffmpeg|ENOENT/i.test(err.message)) {
            return new ConversionError(`ffmpeg is required to convert ${extension} files to WAV`, [
                'Please install ffmpeg (https://ffmpeg.org/download.html) or set FFMPEG_PATH',
            ]);
        }
        return new ConversionError('Failed to convert audio file to WAV', [`FFmpeg error: ${err.message}`]);
    }
}
