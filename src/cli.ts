#!/usr/bin/env node
// ============================================================
// Calculator CLI - Interactive Terminal Interface
// ============================================================

import * as dotenv from 'dotenv';
import { loadConfig } from './config';
import { defaultFactory } from './calculation';
import { Logger } from './logger';
import { runSession } from './session';

dotenv.config();

// ============================================================
// ANSI Colors & Formatting
// ============================================================
const c = {
    reset: '\x1b[0m',
    bold: '\x1b[1m',
    dim: '\x1b[2m',
    cyan: '\x1b[36m',
};

function header(out: NodeJS.WriteStream) {
    const colored = out.isTTY === true;
    const paint = (code: string, text: string) => (colored ? `${code}${text}${c.reset}` : text);

    out.write('\n');
    out.write(`  ${paint(c.cyan + c.bold, 'Calculator REPL')}\n`);
    out.write(`  ${paint(c.dim, `Operations: ${defaultFactory.names().join(', ')}`)}\n`);
    out.write(`  ${paint(c.dim, "Type 'help' for instructions or 'exit' to quit")}\n`);
    out.write('\n');
}

// ============================================================
// Entry Point
// ============================================================
async function main(): Promise<void> {
    const config = loadConfig();
    const logger = new Logger('Calculator', { level: config.logLevel, file: config.logFile });

    header(process.stdout);
    logger.debug(`Starting session (precision=${config.precision})`);

    const history = await runSession(process.stdin, process.stdout, {
        prompt: config.prompt,
        precision: config.precision,
        logger: logger.child('Session'),
    });

    logger.info(`Session ended after ${history.length} calculation(s)`);
    process.stdout.write('Goodbye!\n');
}

main()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
        new Logger('Calculator', { level: 'error' }).error('Unexpected failure', error);
        process.exit(1);
    });
