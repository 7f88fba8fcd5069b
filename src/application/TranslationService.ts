import { buildTranslationPayload, TranslationRequest } from '../domain/entities/TranslationRequest';
import { interpretResponse, TranslationResult } from '../domain/entities/TranslationResponse';
import { ICredentialStore } from '../domain/ports/ICredentialStore';
import { ITranslationClient } from '../domain/ports/ITranslationClient';
import { AudioSourceResolver } from './AudioSourceResolver';

export interface TranslationServiceDependencies {
    audioSourceResolver: AudioSourceResolver;
    credentialStore: ICredentialStore;
    /** The client needs the key, which is only read once the audio is ready */
    createClient: (apiKey: string) => ITranslationClient;
}

/**
 * Runs one transcription/translation: resolve audio, load the key,
 * send the request, extract the result.
 */
export class TranslationService {
    constructor(private readonly deps: TranslationServiceDependencies) {}

    async execute(request: TranslationRequest): Promise<TranslationResult> {
        const audioUrl = await this.deps.audioSourceResolver.resolve(request.audioSource);
        const apiKey = await this.deps.credentialStore.getApiKey();

        const client = this.deps.createClient(apiKey);
        const response = await client.submit(buildTranslationPayload(request, audioUrl));

        return interpretResponse(response, { includeAudio: request.returnTranslationAudio });
    }
}
