/**
 * @file Logger
 *
 * Leveled logging for the planner and stage wrappers.
 *
 * Typed facade over Node.js EventEmitter, the same shape as a telemetry
 * bus: producers call `debug/info/warn/error`, sinks subscribe. Child
 * loggers share the parent's emitter and only add a message prefix
 * (the `[<param set>] ` tag used while a stage runs for a record).
 *
 * @module logging
 */

import { EventEmitter } from 'events';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * A single emitted log line.
 *
 * @property level - Severity
 * @property message - Message text without the prefix
 * @property prefix - Scope prefix ('' at the root)
 * @property timestamp - ISO timestamp of emission
 */
export interface LogEvent {
    level: LogLevel;
    message: string;
    prefix: string;
    timestamp: string;
}

export type LogObserver = (event: LogEvent) => void;

const CHANNEL = 'log' as const;

export class Logger {
    private readonly emitter: EventEmitter;
    private readonly prefix: string;

    constructor(emitter?: EventEmitter, prefix: string = '') {
        this.emitter = emitter ?? new EventEmitter();
        this.emitter.setMaxListeners(0);
        this.prefix = prefix;
    }

    /**
     * Subscribe to every event emitted by this logger tree.
     *
     * @returns Unsubscribe function.
     */
    subscribe(observer: LogObserver): () => void {
        this.emitter.on(CHANNEL, observer);
        return () => this.emitter.off(CHANNEL, observer);
    }

    /**
     * Derive a logger that tags its messages with `prefix`.
     */
    child(prefix: string): Logger {
        return new Logger(this.emitter, prefix);
    }

    debug(message: string): void {
        this.emit('debug', message);
    }

    info(message: string): void {
        this.emit('info', message);
    }

    warn(message: string): void {
        this.emit('warn', message);
    }

    error(message: string): void {
        this.emit('error', message);
    }

    private emit(level: LogLevel, message: string): void {
        const event: LogEvent = {
            level,
            message,
            prefix: this.prefix,
            timestamp: new Date().toISOString(),
        };
        this.emitter.emit(CHANNEL, event);
    }
}

/**
 * Whether `level` passes a `threshold`.
 */
export function level_passes(level: LogLevel, threshold: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

/**
 * Format an event as one terminal line with ANSI colour.
 */
export function logLine_format(event: LogEvent): string {
    const text: string = `${event.prefix}${event.message}`;
    switch (event.level) {
        case 'error': return chalk.red(text);
        case 'warn':  return chalk.yellow(text);
        case 'info':  return chalk.white(text);
        default:      return chalk.gray(text);
    }
}

/**
 * Render a logger's events to the console, dropping those below `threshold`.
 *
 * @returns Detach function.
 */
export function consoleSink_attach(logger: Logger, threshold: LogLevel = 'info'): () => void {
    return logger.subscribe((event: LogEvent): void => {
        if (!level_passes(event.level, threshold)) return;
        const line: string = logLine_format(event);
        if (event.level === 'error') {
            console.error(line);
        } else if (event.level === 'warn') {
            console.warn(line);
        } else {
            console.log(line);
        }
    });
}
