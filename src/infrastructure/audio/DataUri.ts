import { InvalidArgumentError } from '../../domain/errors';

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

const MIME_TYPES: Record<string, string> = {
    mp3: 'audio/mpeg',
    wav: 'audio/wav',
    ogg: 'audio/ogg',
    flac: 'audio/flac',
    m4a: 'audio/mp4',
};

const DATA_URI_PATTERN = /^data:([^;,]*)((?:;[^;,]*)*),(.*)$/s;

export interface DecodedDataUri {
    mimeType: string;
    data: Buffer;
}

/**
 * MIME type for a file extension (with or without the leading dot).
 */
export function getMimeType(extension: string): string {
    const key = extension.replace(/^\./, '').toLowerCase();
    return MIME_TYPES[key] ?? DEFAULT_MIME_TYPE;
}

export function isDataUri(value: string): boolean {
    return DATA_URI_PATTERN.test(value);
}

export function encodeDataUri(data: Buffer, mimeType: string): string {
    return `data:${mimeType};base64,${data.toString('base64')}`;
}

export function decodeDataUri(uri: string): DecodedDataUri {
    const match = DATA_URI_PATTERN.exec(uri);
    if (!match) {
        throw new InvalidArgumentError('Malformed data URI');
    }

    const [, mimeType, parameters, payload] = match;
    const isBase64 = parameters.split(';').includes('base64');

    return {
        mimeType: mimeType || 'text/plain',
        data: isBase64 ? Buffer.from(payload, 'base64') : Buffer.from(decodeURIComponent(payload), 'utf8'),
    };
}
