import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import {
    LogLevel,
    configureLogger,
    createLogger,
    formatMessage,
    isDebugEnabled,
    parseLogLevel,
    sanitize,
    setLogLevel,
} from '../../js/logger.js';

describe('Logger', () => {
    beforeEach(() => {
        configureLogger({ minLevel: LogLevel.INFO, timestamps: false, showModule: true });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('parseLogLevel', () => {
        it('resolves level names case-insensitively', () => {
            expect(parseLogLevel('warn')).toBe(LogLevel.WARN);
            expect(parseLogLevel(' Debug ')).toBe(LogLevel.DEBUG);
            expect(parseLogLevel('NONE')).toBe(LogLevel.NONE);
        });

        it('returns null for unknown or missing names', () => {
            expect(parseLogLevel('verbose')).toBeNull();
            expect(parseLogLevel(undefined)).toBeNull();
        });
    });

    describe('formatMessage', () => {
        it('includes level and module', () => {
            expect(formatMessage(LogLevel.WARN, 'Calc', 'hello')).toBe('[WARN] [Calc] hello');
        });

        it('can hide the module', () => {
            configureLogger({ showModule: false });
            expect(formatMessage(LogLevel.ERROR, 'Calc', 'hello')).toBe('[ERROR] hello');
        });

        it('prefixes an ISO timestamp when enabled', () => {
            configureLogger({ timestamps: true });
            expect(formatMessage(LogLevel.INFO, 'Calc', 'hello')).toMatch(
                /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[INFO\] \[Calc\] hello$/
            );
        });
    });

    describe('sanitize', () => {
        it('redacts sensitive keys recursively', () => {
            expect(
                sanitize({ token: 'abc', nested: { password: 'test-secret', name: 'acme' }, dsn: 'x', count: 2 })
            ).toEqual({ token: '[REDACTED]', nested: { password: '[REDACTED]', name: 'acme' }, dsn: '[REDACTED]', count: 2 });
        });

        it('masks long opaque strings', () => {
            expect(sanitize('key ' + 'a'.repeat(40))).toBe('key [REDACTED]');
            expect(sanitize('short')).toBe('short');
        });

        it('turns sets into arrays', () => {
            expect(sanitize({ order: new Set(['acme', 'globex']) })).toEqual({ order: ['acme', 'globex'] });
        });
    });

    describe('createLogger', () => {
        it('writes warnings through console.warn with sanitized data', () => {
            const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
            const log = createLogger('Test');

            log.warn('careful', { secret: 'test-secret' });

            expect(warn).toHaveBeenCalledWith('[WARN] [Test] careful', { secret: '[REDACTED]' });
        });

        it('suppresses messages below the minimum level', () => {
            const info = jest.spyOn(console, 'log').mockImplementation(() => undefined);
            const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
            setLogLevel(LogLevel.ERROR);
            const log = createLogger('Test');

            log.info('hidden');
            log.error('shown');

            expect(info).not.toHaveBeenCalled();
            expect(error).toHaveBeenCalledWith('[ERROR] [Test] shown');
        });

        it('routes debug output when enabled', () => {
            const debug = jest.spyOn(console, 'log').mockImplementation(() => undefined);
            setLogLevel(LogLevel.DEBUG);

            createLogger('Test').debug('details');

            expect(isDebugEnabled()).toBe(true);
            expect(debug).toHaveBeenCalledWith('[DEBUG] [Test] details');
        });

        it('logs nothing at NONE', () => {
            const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
            setLogLevel(LogLevel.NONE);

            createLogger('Test').log(LogLevel.ERROR, 'quiet');

            expect(error).not.toHaveBeenCalled();
            expect(isDebugEnabled()).toBe(false);
        });
    });
});
