/**
 * Shared Utilities
 *
 * Centralized error handling and file system operations.
 */

export {
    ErrorHandler,
    ErrorSeverity,
    type ErrorContext,
    type ErrorInfo
} from './ErrorHandler.js';

export {
    FileSystemHelper
} from './FileSystemHelper.js';
