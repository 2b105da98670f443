export { Amount, type AmountKind, type AmountOptions } from './domain/amount.js';
export { Instant, type InstantKind, type InstantOptions } from './domain/instant.js';
export { Id, type IdKind, type IdOptions } from './domain/id.js';
export { TaggedValue, type Descriptor } from './domain/tagged-value.js';
export { DisplayProxy, Formatter, type DisplayerOf } from './domain/display.js';
export type { Kind, KindOptions } from './domain/kind.js';
export { decodeJson, encodeJson } from './domain/codec.js';
export type { Elapsed, Scalar, Temporal } from './domain/repr/arithmetic.js';
export type {
    Comparable,
    Equatable,
    Hashable,
    HashableRepr,
    HashKey,
    Ordering,
    Primitive
} from './domain/repr/structural.js';

export { TaggedValueError, DecodeError, ConfigError, type ErrorType, type DecodeFailure } from './application/errors.js';
export type { Logger, LoggerContext } from './application/ports/logger.js';
export { fail, isFailure, isSuccess, mapResult, ok, type Failure, type Result, type Success } from './shared/result.js';

export { createConfig, getConfig, loadConfig, readConfig, type Config, type LoggingConfig } from './composition/config.js';
export { defaultLogger, setDefaultLogger } from './composition/container.js';
export { PinoLogger } from './infrastructure/observability/pino-logger.js';
