import * as fs from 'fs';
import { ConfigError } from '../../domain/errors';
import { ICredentialStore } from '../../domain/ports/ICredentialStore';
import { logger } from '../logging/logger';

const SECURE_MODES = [0o600, 0o400];

/**
 * Reads the API key from a local file (default ~/.config/reka/api_key).
 * A key passed in directly (REKA_API_KEY) wins over the file.
 */
export class FileCredentialStore implements ICredentialStore {
    constructor(
        private readonly keyFilePath: string,
        private readonly overrideKey?: string
    ) {}

    async getApiKey(): Promise<string> {
        if (this.overrideKey && this.overrideKey.trim()) {
            logger.debug('[Credentials] Using API key from REKA_API_KEY');
            return this.overrideKey.trim();
        }

        if (!fs.existsSync(this.keyFilePath)) {
            throw new ConfigError(`API key file not found at ${this.keyFilePath}`, [
                'Please create the file and add your Reka API key',
                '',
                'You can do this by running:',
                '  mkdir -p ~/.config/reka',
                "  echo 'your-api-key-here' > ~/.config/reka/api_key",
                '  chmod 600 ~/.config/reka/api_key',
            ]);
        }

        await this.checkPermissions();

        const contents = await fs.promises.readFile(this.keyFilePath, 'utf8');
        const apiKey = contents.replace(/\s/g, '');
        if (!apiKey) {
            throw new ConfigError('API key file is empty', [`Please add your Reka API key to ${this.keyFilePath}`]);
        }

        return apiKey;
    }

    private async checkPermissions(): Promise<void> {
        if (process.platform === 'win32') {
            return;
        }

        const stats = await fs.promises.stat(this.keyFilePath);
        const mode = stats.mode & 0o777;
        if (!SECURE_MODES.includes(mode)) {
            logger.warn(`API key file has insecure permissions (${mode.toString(8)})`);
            logger.info(`Consider running: chmod 600 ${this.keyFilePath}`);
        }
    }
}
