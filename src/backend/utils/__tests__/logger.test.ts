/**
 * Unit tests for the component logger
 */

import { createLogger, errorFields } from '../logger';

describe('createLogger', () => {
    let errorSpy: jest.SpiedFunction<typeof console.error>;
    let logSpy: jest.SpiedFunction<typeof console.log>;

    beforeEach(() => {
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        errorSpy.mockRestore();
        logSpy.mockRestore();
    });

    it('should write one JSON line tagged with the component', () => {
        createLogger('server', 'debug').error('startup_failed', errorFields(new Error('port in use')));

        expect(logSpy).not.toHaveBeenCalled();
        expect(errorSpy).toHaveBeenCalledTimes(1);
        expect(JSON.parse(String(errorSpy.mock.calls[0][0]))).toEqual({
            ts: expect.any(String),
            level: 'error',
            component: 'server',
            event: 'startup_failed',
            error: 'port in use',
            errorName: 'Error',
        });
    });

    it('should drop events below its level', () => {
        const log = createLogger('server', 'warn');
        log.info('listening');
        log.debug('request');

        expect(logSpy).not.toHaveBeenCalled();
        expect(errorSpy).not.toHaveBeenCalled();
    });
});

describe('errorFields', () => {
    it('should read errors raised in another realm by their shape', () => {
        expect(errorFields({ name: 'SystemError', message: 'listen EADDRINUSE' })).toEqual({
            error: 'listen EADDRINUSE',
            errorName: 'SystemError',
        });
    });

    it('should stringify values that are not errors', () => {
        expect(errorFields('stopped')).toEqual({ error: 'stopped' });
    });
});
