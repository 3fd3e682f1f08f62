/**
 * Error handling exports
 */

export { ErrorHandler, ErrorHandlerOptions, ErrorContext } from './error-handler';
export {
  MonitoringError,
  MonitoringErrorRecord,
  ErrorCategory,
  ErrorSeverity,
  ComponentHealth,
  SystemHealth,
  toError
} from './error-types';
