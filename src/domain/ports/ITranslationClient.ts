import { TranslationPayload } from '../entities/TranslationRequest';
import { TranslationResponse } from '../entities/TranslationResponse';

/**
 * ITranslationClient - Port for the hosted transcription/translation API.
 * Implementations: RekaTranslationClient
 */
export interface ITranslationClient {
    /**
     * Sends one request. Resolves with whatever the API answered (including
     * non-2xx statuses); rejects only when no response was received.
     */
    submit(payload: TranslationPayload): Promise<TranslationResponse>;
}
