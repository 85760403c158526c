import { ConfigurationError } from './errors';
import type { CalculatorConfig, LogLevel } from './types';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export const DEFAULT_CONFIG: CalculatorConfig = {
    prompt: '>> ',
    precision: 10,
    logLevel: 'warn',
};

function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Reads calculator settings from the environment.
 * Callers that want `.env` support run dotenv.config() before this.
 *
 * @throws ConfigurationError when a variable is set to an unusable value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CalculatorConfig {
    const config: CalculatorConfig = { ...DEFAULT_CONFIG };

    if (env.CALCULATOR_PROMPT !== undefined) {
        config.prompt = env.CALCULATOR_PROMPT;
    }

    const precision = env.CALCULATOR_PRECISION?.trim();
    if (precision) {
        if (!/^\d+$/.test(precision) || Number(precision) > 100) {
            throw new ConfigurationError('CALCULATOR_PRECISION', precision, 'expected an integer from 0 to 100');
        }
        config.precision = Number(precision);
    }

    const level = env.CALCULATOR_LOG_LEVEL?.trim().toLowerCase();
    if (level) {
        if (!isLogLevel(level)) {
            throw new ConfigurationError('CALCULATOR_LOG_LEVEL', level, `expected one of ${LOG_LEVELS.join(', ')}`);
        }
        config.logLevel = level;
    }

    const logFile = env.CALCULATOR_LOG_FILE?.trim();
    if (logFile) {
        config.logFile = logFile;
    }

    return config;
}
