// Public entry point

export * from './services/drivers'
export { silentLog } from './services/types'
export {
  NocGearError,
  ConnectionError,
  CommandTimeoutError,
  ParseError,
  InvalidArgumentError,
  SnmpError,
  PduNotLoadedError,
  toErrorMessage,
} from './services/errors'
export { loadConfig, parseEnvInt, type NocGearConfig } from './services/config'
export { createLogger, toLogFn, type CreateLoggerOptions } from './services/logging'
export { pollUntil, sleep, type PollOptions } from './services/poll'
