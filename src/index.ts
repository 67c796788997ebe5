/**
 * @entry perfgate 公共 API
 *
 * CLI 之外的调用方（例如自定义 CI 脚本）从这里使用各模块
 */

export * from './matrix/index.js'
export * from './runner/index.js'
export * from './report/index.js'
export * from './git/index.js'
export * from './pipeline/index.js'
export * from './config/index.js'

export { AppError, type ErrorCode, type ErrorCategory, printError } from './shared/error.js'
export { createLogger, setLogLevel, type Logger, type LogLevel } from './shared/logger.js'
