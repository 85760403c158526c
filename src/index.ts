export { add, subtract, multiply, divide } from './calculator';
export {
    CalculationFactory,
    DEFAULT_REGISTRY,
    OPERATION_SYMBOLS,
    defaultFactory,
    evaluate,
    execute,
} from './calculation';
export type { Calculation, CalculationKind, CalculationRegistry } from './calculation';
export {
    CalculatorError,
    ConfigurationError,
    DivisionByZeroError,
    InvalidArgumentsError,
    InvalidOperandError,
    UnsupportedOperationError,
    isCalculatorError,
} from './errors';
export type { CalculatorErrorCode } from './errors';
export { History, LoggingObserver, formatCalculation, formatEntry, formatNumber } from './history';
export type { HistoryObserver } from './history';
export { Session, helpText, parseOperand, runSession } from './session';
export type { RunSessionOptions, SessionOptions } from './session';
export { DEFAULT_CONFIG, loadConfig } from './config';
export { Logger } from './logger';
export type { LoggerOptions } from './logger';
export type {
    CalculatorConfig,
    HistoryEntry,
    LineOutcome,
    LogLevel,
    MetaCommand,
    Result,
    SessionState,
} from './types';
