import { InvalidArgumentError } from '../errors';

/**
 * Languages the API can transcribe or translate into.
 */
export const SUPPORTED_LANGUAGES = [
    'english',
    'french',
    'spanish',
    'japanese',
    'chinese',
    'korean',
    'italian',
    'portuguese',
    'german',
] as const;

export type TargetLanguage = (typeof SUPPORTED_LANGUAGES)[number];

export const DEFAULT_LANGUAGE: TargetLanguage = 'english';

/** Fixed request parameters expected by the endpoint */
export const SAMPLING_RATE = 16000;
export const TEMPERATURE = 0;
export const MAX_TOKENS = 1024;

/**
 * Validated parameters of a single CLI invocation.
 */
export interface TranslationRequest {
    /** Local path, http(s) URL, or data URI as given on the command line */
    readonly audioSource: string;
    readonly targetLanguage: TargetLanguage;
    /** true for translation, false for transcription */
    readonly isTranslate: boolean;
    /** Ask the API for synthesized audio of the translation */
    readonly returnTranslationAudio: boolean;
}

export interface TranslationRequestInput {
    audioSource: string;
    targetLanguage?: string;
    isTranslate?: boolean;
    returnTranslationAudio?: boolean;
}

/**
 * JSON body of the transcription/translation endpoint.
 */
export interface TranslationPayload {
    audio_url: string;
    sampling_rate: number;
    temperature: number;
    max_tokens: number;
    target_language: TargetLanguage;
    is_translate: boolean;
    return_translation_audio: boolean;
}

export function isTargetLanguage(value: string): value is TargetLanguage {
    return SUPPORTED_LANGUAGES.some((language) => language === value);
}

export function parseTargetLanguage(value: string): TargetLanguage {
    if (!isTargetLanguage(value)) {
        throw new InvalidArgumentError(`Invalid target language: ${value}`, [
            `Supported languages: ${SUPPORTED_LANGUAGES.join(' ')}`,
        ]);
    }
    return value;
}

export function createTranslationRequest(input: TranslationRequestInput): TranslationRequest {
    const audioSource = input.audioSource.trim();
    if (!audioSource) {
        throw new InvalidArgumentError('No audio file provided', [
            'Usage: reka-translate -f <audio_file> [-l <language>] [-t true|false] [-a true|false]',
        ]);
    }

    return Object.freeze({
        audioSource,
        targetLanguage: parseTargetLanguage(input.targetLanguage ?? DEFAULT_LANGUAGE),
        isTranslate: input.isTranslate ?? false,
        returnTranslationAudio: input.returnTranslationAudio ?? false,
    });
}

/**
 * Builds the request body. `audioUrl` is the resolved source (URL or data URI).
 */
export function buildTranslationPayload(request: TranslationRequest, audioUrl: string): TranslationPayload {
    return {
        audio_url: audioUrl,
        sampling_rate: SAMPLING_RATE,
        temperature: TEMPERATURE,
        max_tokens: MAX_TOKENS,
        target_language: request.targetLanguage,
        is_translate: request.isTranslate,
        return_translation_audio: request.returnTranslationAudio,
    };
}
