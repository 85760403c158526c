import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { Logger } from './logger';

describe('Logger', () => {
    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should write tagged lines to stderr', () => {
        new Logger('Test', { level: 'debug' }).debug('hello');
        expect(console.error).toHaveBeenCalledWith('[Test] hello');
    });

    it('should drop lines below the configured level', () => {
        const logger = new Logger('Test');
        logger.debug('quiet');
        logger.info('quiet');
        logger.warn('loud');

        expect(console.error).toHaveBeenCalledTimes(1);
        expect(console.error).toHaveBeenCalledWith('[Test] loud');
    });

    it('should write nothing when silent', () => {
        const logger = new Logger('Test', { level: 'silent' });
        logger.error('nothing');

        expect(console.error).not.toHaveBeenCalled();
        expect(logger.isEnabled('error')).toBe(false);
    });

    it('should append error details', () => {
        new Logger('Test').error('Failed', 'boom');
        expect(console.error).toHaveBeenCalledWith('[Test] Failed: boom');
    });

    it('should give children their own tag and the parent settings', () => {
        const child = new Logger('Parent', { level: 'info' }).child('Child');
        child.info('ready');

        expect(console.error).toHaveBeenCalledWith('[Child] ready');
        expect(child.isEnabled('debug')).toBe(false);
    });

    describe('file sink', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'calculator-log-'));
        });

        afterEach(() => {
            fs.removeSync(dir);
        });

        it('should create the file and append timestamped lines', () => {
            const file = path.join(dir, 'nested', 'calc.log');
            const logger = new Logger('Test', { level: 'info', file });
            logger.info('first');
            logger.debug('skipped');
            logger.warn('second');

            const lines = fs.readFileSync(file, 'utf-8').trimEnd().split('\n');
            expect(lines).toHaveLength(2);
            expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z INFO \[Test\] first$/);
            expect(lines[1]).toMatch(/^\S+ WARN \[Test\] second$/);
        });
    });
});
