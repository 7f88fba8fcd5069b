/**
 * ICredentialStore - Port for the API key.
 * Implementations: FileCredentialStore
 */
export interface ICredentialStore {
    getApiKey(): Promise<string>;
}
