import { CommanderError } from 'commander';
import { buildProgram, CliOptions, parseBooleanFlag } from '../../../src/presentation/cli/program';

const parse = (...args: string[]): CliOptions =>
    buildProgram()
        .configureOutput({ writeOut: () => undefined, writeErr: () => undefined })
        .parse(['node', 'reka-translate', ...args])
        .opts<CliOptions>();

const parseError = (...args: string[]): CommanderError => {
    try {
        parse(...args);
    } catch (error) {
        if (error instanceof CommanderError) {
            return error;
        }
        throw error;
    }
    throw new Error('expected the arguments to be rejected');
};

describe('CLI program', () => {
    describe('parseBooleanFlag', () => {
        test('should accept true and false in any case', () => {
            expect(parseBooleanFlag('true')).toBe(true);
            expect(parseBooleanFlag('FALSE')).toBe(false);
            expect(parseBooleanFlag(' True ')).toBe(true);
        });

        test('should reject anything else', () => {
            expect(() => parseBooleanFlag('yes')).toThrow('Expected true or false.');
        });
    });

    test('should apply defaults', () => {
        expect(parse('-f', 'voice.wav')).toEqual({
            file: 'voice.wav',
            language: 'english',
            translate: false,
            audio: false,
            keepConverted: false,
            verbose: false,
        });
    });

    test('should parse short flags', () => {
        expect(parse('-f', 'a.mp3', '-t', 'true', '-l', 'spanish', '-a', 'true')).toEqual({
            file: 'a.mp3',
            language: 'spanish',
            translate: true,
            audio: true,
            keepConverted: false,
            verbose: false,
        });
    });

    test('should parse long flags', () => {
        const options = parse(
            '--file', 'https://example.com/audio.mp3',
            '--translate', 'true',
            '--language', 'french',
            '--keep-converted',
            '--verbose'
        );

        expect(options.file).toBe('https://example.com/audio.mp3');
        expect(options.translate).toBe(true);
        expect(options.language).toBe('french');
        expect(options.keepConverted).toBe(true);
        expect(options.verbose).toBe(true);
    });

    test('should require --file', () => {
        const error = parseError('-l', 'french');
        expect(error.code).toBe('commander.missingMandatoryOptionValue');
        expect(error.exitCode).toBe(1);
    });

    test('should reject invalid boolean values', () => {
        const error = parseError('-f', 'a.wav', '-t', 'maybe');
        expect(error.code).toBe('commander.invalidArgument');
        expect(error.exitCode).toBe(1);
    });

    test('should reject unknown options', () => {
        expect(parseError('-f', 'a.wav', '--speed', '2').code).toBe('commander.unknownOption');
    });

    test('should exit 0 for --help', () => {
        const error = parseError('--help');
        expect(error.code).toBe('commander.helpDisplayed');
        expect(error.exitCode).toBe(0);
    });
});
