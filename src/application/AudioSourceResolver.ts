import * as fs from 'fs';
import * as path from 'path';
import { expandHomeDir } from '../config';
import { ConversionError, InvalidArgumentError, NotFoundError } from '../domain/errors';
import { IAudioConverter } from '../domain/ports/IAudioConverter';
import { encodeDataUri, getMimeType, isDataUri } from '../infrastructure/audio/DataUri';
import { logger } from '../infrastructure/logging/logger';

export type AudioSourceKind = 'url' | 'data-uri' | 'local';

export interface AudioSourceResolverOptions {
    /** Keep the intermediate `<name>_tmp.wav` next to the original */
    keepConverted?: boolean;
    homeDir?: string;
}

export function classifyAudioSource(source: string): AudioSourceKind {
    if (/^https?:\/\//.test(source)) {
        return 'url';
    }
    if (source.startsWith('data:')) {
        return 'data-uri';
    }
    return 'local';
}

/**
 * Path of the converted WAV for a non-WAV input: same directory, `_tmp.wav` suffix.
 */
export function convertedWavPath(filePath: string): string {
    const extension = path.extname(filePath);
    const baseName = path.basename(filePath, extension);
    return path.join(path.dirname(filePath), `${baseName}_tmp.wav`);
}

/**
 * Turns the --file argument into the `audio_url` value sent to the API.
 * URLs and data URIs pass through untouched; local files become data URIs,
 * converted to WAV first when they are in another format.
 */
export class AudioSourceResolver {
    constructor(
        private readonly converter: IAudioConverter,
        private readonly options: AudioSourceResolverOptions = {}
    ) {}

    async resolve(source: string): Promise<string> {
        switch (classifyAudioSource(source)) {
            case 'url':
                return source;
            case 'data-uri':
                if (!isDataUri(source)) {
                    throw new InvalidArgumentError('Malformed data URI', ['Expected data:<mime>;base64,<payload>']);
                }
                return source;
            case 'local':
                return this.encodeLocalFile(expandHomeDir(source, this.options.homeDir));
        }
    }

    private async encodeLocalFile(filePath: string): Promise<string> {
        await this.assertFileExists(filePath);

        let audioFile = filePath;
        let extension = path.extname(filePath).slice(1).toLowerCase();
        let converted: string | null = null;

        if (extension !== 'wav') {
            converted = convertedWavPath(filePath);
            // Never overwrite a file of the user's; kept conversions are ours to replace
            if (!this.options.keepConverted && (await pathExists(converted))) {
                throw new ConversionError(`Converted file path already exists: ${converted}`, [
                    'Move or rename it, or pass --keep-converted to overwrite it',
                ]);
            }
        }

        try {
            if (converted) {
                logger.info(`Converting ${extension || 'file'} to WAV...`);
                await this.converter.convertToWav(filePath, converted);
                logger.info(`Conversion complete: ${converted}`);
                audioFile = converted;
                extension = 'wav';
            }

            const data = await fs.promises.readFile(audioFile);
            logger.debug(`File size: ${data.length} bytes`);
            logger.debug(`Base64 length: ${Math.ceil(data.length / 3) * 4} characters`);

            const dataUri = encodeDataUri(data, getMimeType(extension));
            logger.debug(`Data URI length: ${dataUri.length} characters`);
            return dataUri;
        } finally {
            if (converted && !this.options.keepConverted) {
                await this.removeConverted(converted);
            }
        }
    }

    private async assertFileExists(filePath: string): Promise<void> {
        try {
            const stats = await fs.promises.stat(filePath);
            if (stats.isFile()) {
                return;
            }
        } catch (error) {
            if (!isMissingFileError(error)) {
                throw error;
            }
        }
        throw new NotFoundError(`Audio file not found: ${filePath}`);
    }

    private async removeConverted(filePath: string): Promise<void> {
        try {
            await fs.promises.rm(filePath, { force: true });
        } catch (error) {
            logger.warn(`Failed to remove converted file ${filePath}`, {
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }
}

async function pathExists(filePath: string): Promise<boolean> {
    try {
        await fs.promises.stat(filePath);
        return true;
    } catch (error) {
        if (isMissingFileError(error)) {
            return false;
        }
        throw error;
    }
}

function isMissingFileError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
