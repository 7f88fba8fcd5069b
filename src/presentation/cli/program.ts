import { Command, InvalidArgumentError as CommanderArgumentError } from 'commander';
import { DEFAULT_LANGUAGE, SUPPORTED_LANGUAGES } from '../../domain/entities/TranslationRequest';

export const VERSION = '1.0.0';

/**
 * Parsed command-line options.
 */
export type CliOptions = {
    file: string;
    language: string;
    translate: boolean;
    audio: boolean;
    keepConverted: boolean;
    verbose: boolean;
};

const EXAMPLES = `
Examples:
  reka-translate -f "audio.mp3"
  reka-translate -f "~/audio.wav" --translate true --language french
  reka-translate --file "https://example.com/audio.mp3" --translate true --language french
  reka-translate -f "audio.mp3" -t true -l spanish -a true`;

/**
 * Accepts `true` / `false` in any case, as the flags take an explicit value.
 */
export function parseBooleanFlag(value: string): boolean {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') {
        return true;
    }
    if (normalized === 'false') {
        return false;
    }
    throw new CommanderArgumentError('Expected true or false.');
}

export function buildProgram(): Command {
    return new Command()
        .name('reka-translate')
        .description('Transcribe or translate an audio file with the Reka API.')
        .version(VERSION)
        .requiredOption('-f, --file <source>', 'local audio file path, URL, or data URI')
        .option(
            '-l, --language <name>',
            `target language (${SUPPORTED_LANGUAGES.join(', ')})`,
            DEFAULT_LANGUAGE
        )
        .option('-t, --translate <bool>', 'true for translation, false for transcription', parseBooleanFlag, false)
        .option('-a, --audio <bool>', 'true to return translated audio (only with -t true)', parseBooleanFlag, false)
        .option('--keep-converted', 'keep the intermediate WAV produced by ffmpeg', false)
        .option('-v, --verbose', 'print debug diagnostics', false)
        .allowExcessArguments(false)
        .showHelpAfterError()
        .addHelpText('after', EXAMPLES)
        .exitOverride();
}
