import { getLogLevel, isLogLevel, logger, setLogLevel } from '../../../src/infrastructure/logging/logger';

describe('logger', () => {
    let stderrSpy: jest.SpyInstance;
    let stdoutSpy: jest.SpyInstance;

    beforeEach(() => {
        setLogLevel('info');
        stderrSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        stdoutSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        stderrSpy.mockRestore();
        stdoutSpy.mockRestore();
    });

    test('should write every level to stderr', () => {
        setLogLevel('debug');

        logger.debug('d');
        logger.info('i');
        logger.warn('w');
        logger.error('e');

        expect(stderrSpy.mock.calls).toEqual([['d'], ['i'], ['Warning: w'], ['Error: e']]);
        expect(stdoutSpy).not.toHaveBeenCalled();
    });

    test('should drop messages below the current level', () => {
        logger.debug('hidden');
        logger.info('shown');

        expect(stderrSpy.mock.calls).toEqual([['shown']]);
    });

    test('should append metadata as JSON', () => {
        logger.warn('cleanup failed', { path: '/tmp/a_tmp.wav' });

        expect(stderrSpy).toHaveBeenCalledWith('Warning: cleanup failed {"path":"/tmp/a_tmp.wav"}');
    });

    test('should validate level names', () => {
        expect(isLogLevel('warn')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
    });

    test('should expose the current level', () => {
        setLogLevel('error');
        expect(getLogLevel()).toBe('error');
    });
});
