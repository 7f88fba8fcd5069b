#!/usr/bin/env node
import { CommanderError } from 'commander';
import { createTranslationService } from './application/TranslationServiceFactory';
import { loadConfig } from './config';
import { createTranslationRequest } from './domain/entities/TranslationRequest';
import { logger, setLogLevel } from './infrastructure/logging/logger';
import { handleCliError } from './presentation/cli/errorHandler';
import { renderResult } from './presentation/cli/output';
import { buildProgram, CliOptions } from './presentation/cli/program';

/**
 * Runs the CLI and resolves with the exit code.
 */
export async function main(argv: string[] = process.argv): Promise<number> {
    const program = buildProgram();

    let options: CliOptions;
    try {
        options = program.parse(argv).opts<CliOptions>();
    } catch (error) {
        // Commander has already printed help, version or the usage error
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        throw error;
    }

    try {
        const config = loadConfig();
        setLogLevel(options.verbose ? 'debug' : config.logLevel);

        const request = createTranslationRequest({
            audioSource: options.file,
            targetLanguage: options.language,
            isTranslate: options.translate,
            returnTranslationAudio: options.audio,
        });
        if (request.returnTranslationAudio && !request.isTranslate) {
            logger.warn('Translated audio is only returned together with --translate true');
        }

        const service = createTranslationService(config, { keepConverted: options.keepConverted });
        const result = await service.execute(request);

        renderResult(result);
        return 0;
    } catch (error) {
        return handleCliError(error);
    }
}

if (require.main === module) {
    main().then(
        (code) => {
            process.exitCode = code;
        },
        (error) => {
            console.error('Fatal error:', error);
            process.exitCode = 1;
        }
    );
}
