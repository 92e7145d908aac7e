import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { resolveSettings } from './config';
import { Logger, LogLevel, globalLogger, getLogger } from './logger';
import type { LogEntry } from './logger';

function spyOnConsole() {
	return {
		log: vi.spyOn(console, 'log').mockImplementation(() => {}),
		warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
		error: vi.spyOn(console, 'error').mockImplementation(() => {}),
		debug: vi.spyOn(console, 'debug').mockImplementation(() => {})
	};
}

describe('Logger', () => {
	let consoleSpy: ReturnType<typeof spyOnConsole>;

	beforeEach(() => {
		consoleSpy = spyOnConsole();
	});

	afterEach(() => {
		vi.restoreAllMocks();
		globalLogger.configure({ level: LogLevel.INFO, console: true });
	});

	describe('LogLevel filtering', () => {
		it('should respect OFF level and not log anything', () => {
			const logger = new Logger({ level: LogLevel.OFF });

			logger.debug('debug message');
			logger.info('info message');
			logger.warn('warn message');
			logger.error('error message');

			expect(consoleSpy.log).not.toHaveBeenCalled();
			expect(consoleSpy.warn).not.toHaveBeenCalled();
			expect(consoleSpy.error).not.toHaveBeenCalled();
			expect(consoleSpy.debug).not.toHaveBeenCalled();
		});

		it('should respect WARN level and log warnings and errors', () => {
			const logger = new Logger({ level: LogLevel.WARN });

			logger.debug('debug message');
			logger.info('info message');
			logger.warn('warn message');
			logger.error('error message');

			expect(consoleSpy.log).not.toHaveBeenCalled();
			expect(consoleSpy.debug).not.toHaveBeenCalled();
			expect(consoleSpy.warn).toHaveBeenCalledOnce();
			expect(consoleSpy.error).toHaveBeenCalledOnce();
		});

		it('should send each level to its console method', () => {
			const logger = new Logger({ level: LogLevel.ALL });

			logger.debug('debug message');
			logger.info('info message');
			logger.warn('warn message');
			logger.error('error message');

			expect(consoleSpy.debug).toHaveBeenCalledOnce();
			expect(consoleSpy.log).toHaveBeenCalledOnce();
			expect(consoleSpy.warn).toHaveBeenCalledOnce();
			expect(consoleSpy.error).toHaveBeenCalledOnce();
		});

		it('should report whether a level is enabled', () => {
			const logger = new Logger({ level: LogLevel.INFO });

			expect(logger.isEnabled(LogLevel.DEBUG)).toBe(false);
			expect(logger.isEnabled(LogLevel.ERROR)).toBe(true);
			expect(new Logger({ level: LogLevel.OFF }).isEnabled(LogLevel.OFF)).toBe(false);
		});
	});

	describe('Formatting', () => {
		it('should write level, context, message and data on one line', () => {
			const entries: string[] = [];
			const logger = new Logger({ level: LogLevel.INFO, handler: entry => entries.push(`${entry.context}|${entry.message}`) });

			logger.info('Insert completed', 'DataSource', { affectedRows: 1 });

			expect(entries).toEqual(['DataSource|Insert completed']);
		});

		it('should include context and data in console output', () => {
			const logger = new Logger({ level: LogLevel.INFO });

			logger.info('Insert completed', 'DataSource', { operation: 'Insert', affectedRows: 1 });

			const line = String(consoleSpy.log.mock.calls[0][0]);
			expect(line).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ INFO  \[DataSource\] Insert completed /);
			expect(line.endsWith(' {"operation":"Insert","affectedRows":1}')).toBe(true);
		});

		it('should serialize bigints and buffers in data', () => {
			const logger = new Logger({ level: LogLevel.INFO });

			logger.info('Prepared command', undefined, { key: 9007199254740993n, blob: Buffer.from('abc') });

			const line = String(consoleSpy.log.mock.calls[0][0]);
			expect(line.endsWith(' {"key":"9007199254740993","blob":"<Buffer 3 bytes>"}')).toBe(true);
		});

		it('should use custom formatter when provided', () => {
			const customFormatter = vi.fn((entry: LogEntry) => `CUSTOM ${entry.message}`);
			const logger = new Logger({ level: LogLevel.INFO, formatter: customFormatter });

			logger.info('test message');

			expect(customFormatter).toHaveBeenCalledWith({
				timestamp: expect.any(Date),
				level: LogLevel.INFO,
				message: 'test message',
				context: undefined,
				data: undefined
			});
			expect(consoleSpy.log).toHaveBeenCalledWith('CUSTOM test message');
		});
	});

	describe('Configuration', () => {
		it('should allow configuration changes', () => {
			const logger = new Logger({ level: LogLevel.ERROR });

			logger.info('should not log');
			expect(consoleSpy.log).not.toHaveBeenCalled();

			logger.configure({ level: LogLevel.INFO });
			logger.info('should log now');
			expect(consoleSpy.log).toHaveBeenCalledOnce();
		});

		it('should disable console output when configured', () => {
			const logger = new Logger({ level: LogLevel.INFO, console: false });

			logger.info('test message');
			logger.error('error message');

			expect(consoleSpy.log).not.toHaveBeenCalled();
			expect(consoleSpy.error).not.toHaveBeenCalled();
		});

		it('should get and set log level', () => {
			const logger = new Logger({ level: LogLevel.WARN });

			expect(logger.getLevel()).toBe(LogLevel.WARN);

			logger.setLevel(LogLevel.DEBUG);
			expect(logger.getLevel()).toBe(LogLevel.DEBUG);
		});
	});

	describe('getLogger helper', () => {
		it('should log through the global logger with its context', () => {
			const logger = getLogger('SqlDialect');

			logger.warn('test message');

			expect(logger.context).toBe('SqlDialect');
			expect(consoleSpy.warn).toHaveBeenCalledWith(expect.stringContaining('[SqlDialect] test message'));
		});

		it('should follow the global level', () => {
			const logger = getLogger('CompiledBinderCache');

			expect(logger.isDebugEnabled()).toBe(false);
			globalLogger.setLevel(LogLevel.DEBUG);
			expect(logger.isDebugEnabled()).toBe(true);
		});

		it('should take its level from data source settings', () => {
			resolveSettings({ logLevel: LogLevel.ERROR });

			getLogger('DataSource').info('Insert completed');

			expect(globalLogger.getLevel()).toBe(LogLevel.ERROR);
			expect(consoleSpy.log).not.toHaveBeenCalled();
		});
	});
});
