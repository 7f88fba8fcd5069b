import { AudioSourceResolver } from '../../../src/application/AudioSourceResolver';
import { TranslationService } from '../../../src/application/TranslationService';
import { createTranslationRequest } from '../../../src/domain/entities/TranslationRequest';
import { ApiError, ConfigError, NotFoundError } from '../../../src/domain/errors';
import { ICredentialStore } from '../../../src/domain/ports/ICredentialStore';
import { ITranslationClient } from '../../../src/domain/ports/ITranslationClient';

describe('TranslationService', () => {
    let resolve: jest.Mock<Promise<string>, [string]>;
    let credentialStore: jest.Mocked<ICredentialStore>;
    let client: jest.Mocked<ITranslationClient>;
    let createClient: jest.Mock<ITranslationClient, [string]>;
    let service: TranslationService;

    beforeEach(() => {
        resolve = jest.fn(async (source: string) => source);
        credentialStore = { getApiKey: jest.fn().mockResolvedValue('test-api-key') };
        client = {
            submit: jest.fn().mockResolvedValue({ status: 200, body: '{"transcript":"hello"}' }),
        };
        createClient = jest.fn((_apiKey: string) => client);

        service = new TranslationService({
            audioSourceResolver: { resolve } as unknown as AudioSourceResolver,
            credentialStore,
            createClient,
        });
    });

    test('should send the resolved audio and return the transcript', async () => {
        resolve.mockResolvedValueOnce('data:audio/wav;base64,UklGRg==');
        const request = createTranslationRequest({
            audioSource: 'voice.wav',
            targetLanguage: 'spanish',
            isTranslate: true,
        });

        const result = await service.execute(request);

        expect(resolve).toHaveBeenCalledWith('voice.wav');
        expect(createClient).toHaveBeenCalledWith('test-api-key');
        expect(client.submit).toHaveBeenCalledWith({
            audio_url: 'data:audio/wav;base64,UklGRg==',
            sampling_rate: 16000,
            temperature: 0,
            max_tokens: 1024,
            target_language: 'spanish',
            is_translate: true,
            return_translation_audio: false,
        });
        expect(result.text).toBe('hello');
    });

    test('should not load the key or call the API when the file is missing', async () => {
        resolve.mockRejectedValueOnce(new NotFoundError('Audio file not found: /nope.wav'));

        await expect(service.execute(createTranslationRequest({ audioSource: '/nope.wav' })))
            .rejects.toThrow(NotFoundError);

        expect(credentialStore.getApiKey).not.toHaveBeenCalled();
        expect(client.submit).not.toHaveBeenCalled();
    });

    test('should not call the API without a key', async () => {
        credentialStore.getApiKey.mockRejectedValueOnce(new ConfigError('API key file is empty'));

        await expect(service.execute(createTranslationRequest({ audioSource: 'https://example.com/a.mp3' })))
            .rejects.toThrow('API key file is empty');

        expect(client.submit).not.toHaveBeenCalled();
    });

    test('should surface API errors', async () => {
        client.submit.mockResolvedValueOnce({ status: 200, body: '{"error":"x"}' });

        await expect(service.execute(createTranslationRequest({ audioSource: 'https://example.com/a.mp3' })))
            .rejects.toThrow(ApiError);
    });

    test('should extract audio when translated audio was requested', async () => {
        client.submit.mockResolvedValueOnce({
            status: 200,
            body: JSON.stringify({ results: [{ text: 'hola', audio_url: 'https://cdn.example.com/hola.wav' }] }),
        });

        const result = await service.execute(createTranslationRequest({
            audioSource: 'https://example.com/a.mp3',
            targetLanguage: 'spanish',
            isTranslate: true,
            returnTranslationAudio: true,
        }));

        expect(result.text).toBe('hola');
        expect(result.audio).toBe('https://cdn.example.com/hola.wav');
    });
});
