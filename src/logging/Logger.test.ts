/**
 * @file Logger Tests
 *
 * @module logging
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, consoleSink_attach, level_passes } from './Logger.js';
import type { LogEvent } from './Logger.js';

describe('logging/Logger', () => {

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should deliver events to subscribers until they unsubscribe', () => {
        const logger = new Logger();
        const events: LogEvent[] = [];
        const unsubscribe = logger.subscribe((event: LogEvent): void => {
            events.push(event);
        });
        logger.info('first');
        unsubscribe();
        logger.info('second');
        expect(events.map((event: LogEvent): string => event.message)).toEqual(['first']);
        expect(events[0].level).toBe('info');
    });

    it('should share the emitter with child loggers and tag their prefix', () => {
        const logger = new Logger();
        const events: LogEvent[] = [];
        logger.subscribe((event: LogEvent): void => {
            events.push(event);
        });
        logger.child('[P1] ').warn('careful');
        expect(events).toHaveLength(1);
        expect(events[0]).toMatchObject({ level: 'warn', message: 'careful', prefix: '[P1] ' });
    });

    it('should order levels from debug to error', () => {
        expect(level_passes('error', 'warn')).toBe(true);
        expect(level_passes('info', 'info')).toBe(true);
        expect(level_passes('debug', 'info')).toBe(false);
    });

    it('should print events at or above the threshold', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const logger = new Logger();
        const detach = consoleSink_attach(logger, 'info');

        logger.debug('hidden');
        logger.child('[P1] ').warn('careful');
        detach();
        logger.warn('after detach');

        expect(log).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
        expect(String(warn.mock.calls[0][0])).toContain('[P1] careful');
    });
});
