import axios from 'axios';
import { DEFAULT_API_ENDPOINT } from '../../config';
import { NetworkError } from '../../domain/errors';
import { TranslationPayload } from '../../domain/entities/TranslationRequest';
import { TranslationResponse } from '../../domain/entities/TranslationResponse';
import { ITranslationClient } from '../../domain/ports/ITranslationClient';
import { logger } from '../logging/logger';

const RAW_RESPONSE_ECHO_LIMIT = 1000;

/**
 * Client for Reka's /v1/transcription_or_translation endpoint.
 * Audio is sent inline (URL or data URI) in a single JSON POST.
 */
export class RekaTranslationClient implements ITranslationClient {
    private readonly apiKey: string;
    private readonly endpoint: string;

    constructor(apiKey: string, endpoint: string = DEFAULT_API_ENDPOINT) {
        if (!apiKey) {
            throw new Error('Reka API key is required');
        }
        this.apiKey = apiKey;
        this.endpoint = endpoint;
    }

    async submit(payload: TranslationPayload): Promise<TranslationResponse> {
        const body = JSON.stringify(payload);
        logger.info(`Request payload size: ${Buffer.byteLength(body)} bytes`);
        logger.debug(`Audio URL in JSON length: ${payload.audio_url.length} characters`);
        logger.info('Sending request to API...');

        try {
            const response = await axios.post<string>(this.endpoint, body, {
                headers: {
                    'X-Api-Key': this.apiKey,
                    'Content-Type': 'application/json',
                },
                responseType: 'text',
                maxContentLength: Infinity,
                maxBodyLength: Infinity,
                // API errors come back as JSON bodies; surface them instead of throwing
                validateStatus: () => true,
            });

            const text = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
            logger.debug(`[Reka] Response status ${response.status}, length: ${text.length} characters`);
            if (text.length < RAW_RESPONSE_ECHO_LIMIT) {
                logger.debug(`[Reka] Raw response: ${text}`);
            }

            return { status: response.status, body: text };
        } catch (error) {
            if (axios.isAxiosError(error)) {
                throw new NetworkError(`Failed to connect to API: ${error.message}`, [`Endpoint: ${this.endpoint}`]);
            }
            throw error;
        }
    }
}
