import { Config } from '../config';
import { FFmpegAudioConverter } from '../infrastructure/audio/FFmpegAudioConverter';
import { FileCredentialStore } from '../infrastructure/credentials/FileCredentialStore';
import { RekaTranslationClient } from '../infrastructure/translation/RekaTranslationClient';
import { AudioSourceResolver } from './AudioSourceResolver';
import { TranslationService } from './TranslationService';

export interface TranslationServiceOptions {
    keepConverted?: boolean;
}

/**
 * Wires the service with the production adapters.
 */
export function createTranslationService(config: Config, options: TranslationServiceOptions = {}): TranslationService {
    return new TranslationService({
        audioSourceResolver: new AudioSourceResolver(new FFmpegAudioConverter(config.ffmpegPath), {
            keepConverted: options.keepConverted,
        }),
        credentialStore: new FileCredentialStore(config.apiKeyFile, config.apiKey),
        createClient: (apiKey) => new RekaTranslationClient(apiKey, config.apiEndpoint),
    });
}
