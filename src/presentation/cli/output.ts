import { formatRaw, isBlankText, TranslationResult } from '../../domain/entities/TranslationResponse';
import { logger } from '../../infrastructure/logging/logger';

export type LineWriter = (line: string) => void;

const writeStdout: LineWriter = (line) => console.log(line);

/**
 * Prints the transcript (and audio reference) to stdout.
 * Falls back to the whole response when the API sent no text or an empty one;
 * whitespace-only text only gets the warning.
 */
export function renderResult(result: TranslationResult, write: LineWriter = writeStdout): void {
    if (result.text !== undefined && !isBlankText(result.text)) {
        write(result.text);
    } else {
        logger.warn('No text found in response');
    }

    if (result.audio) {
        write('');
        write(`Audio: ${result.audio}`);
    }

    if (!result.text) {
        write('Response:');
        write(formatRaw(result.raw));
    }
}
