import { ApiError } from '../errors';

/**
 * Raw HTTP exchange result, before any field extraction.
 */
export interface TranslationResponse {
    status: number;
    /** Response body as text */
    body: string;
}

/**
 * Fields extracted from a successful response.
 */
export interface TranslationResult {
    /** First text field present in the response; may be empty or blank */
    text?: string;
    /** Audio URL or audio data, only when translated audio was requested */
    audio?: string;
    /** Parsed JSON body, or the body text when it is not JSON */
    raw: unknown;
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstResult(body: JsonObject): JsonObject | undefined {
    const results = body.results;
    if (Array.isArray(results) && isJsonObject(results[0])) {
        return results[0];
    }
    return undefined;
}

/**
 * First candidate that is present, i.e. not missing, null or false.
 * Empty strings count as present. Non-string values are serialized.
 */
function firstPresent(candidates: unknown[]): string | undefined {
    for (const candidate of candidates) {
        if (candidate === undefined || candidate === null || candidate === false) {
            continue;
        }
        return typeof candidate === 'string' ? candidate : JSON.stringify(candidate);
    }
    return undefined;
}

/**
 * Missing, empty or whitespace-only text has nothing to print.
 */
export function isBlankText(text: string | undefined): boolean {
    return text === undefined || text.trim().length === 0;
}

/**
 * Pretty-printed JSON, or the body text as received when it is not JSON.
 */
export function formatRaw(raw: unknown): string {
    return typeof raw === 'string' ? raw : JSON.stringify(raw, null, 2);
}

export function parseResponseBody(body: string): unknown {
    try {
        return JSON.parse(body);
    } catch {
        return body;
    }
}

/**
 * Returns the API-reported error, if any. Non-string values are serialized.
 */
export function extractError(raw: unknown): string | undefined {
    if (!isJsonObject(raw)) {
        return undefined;
    }
    const error = raw.error;
    if (error === undefined || error === null || error === false || error === '') {
        return undefined;
    }
    return typeof error === 'string' ? error : JSON.stringify(error);
}

/**
 * First present of `transcript`, `results[0].text`, `text`. May be blank.
 */
export function extractText(raw: unknown): string | undefined {
    if (!isJsonObject(raw)) {
        return undefined;
    }
    return firstPresent([raw.transcript, firstResult(raw)?.text, raw.text]);
}

/**
 * First of `results[0].audio_url`, `audio_url`, `audio_data`.
 */
export function extractAudio(raw: unknown): string | undefined {
    if (!isJsonObject(raw)) {
        return undefined;
    }
    return firstPresent([firstResult(raw)?.audio_url, raw.audio_url, raw.audio_data]);
}

/**
 * Turns a raw response into a result, or throws ApiError when the API
 * reported one (or answered non-2xx without usable content).
 */
export function interpretResponse(
    response: TranslationResponse,
    options: { includeAudio: boolean }
): TranslationResult {
    const raw = parseResponseBody(response.body);

    const error = extractError(raw);
    if (error) {
        throw new ApiError(error, response.status);
    }

    const text = extractText(raw);
    if (response.status >= 400 && isBlankText(text)) {
        throw new ApiError(`API request failed with status ${response.status}`, response.status, [
            'Response:',
            formatRaw(raw),
        ]);
    }

    const result: TranslationResult = { raw };
    if (text !== undefined) {
        result.text = text;
    }
    if (options.includeAudio) {
        const audio = extractAudio(raw);
        if (audio) {
            result.audio = audio;
        }
    }
    return result;
}
