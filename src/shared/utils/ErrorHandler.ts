/**
 * Centralized Error Handler
 *
 * Reports failures of the diff pipeline with a component prefix and a
 * severity. Only CRITICAL re-throws; callers decide whether a reported
 * error ends the run.
 */

import { ScreenshotDiffError } from '../errors.js';

export enum ErrorSeverity {
    /** Warning only - the run continues */
    WARNING = 'warning',
    /** Error logging - the caller ends the run */
    ERROR = 'error',
    /** Critical - re-throws after logging */
    CRITICAL = 'critical'
}

export interface ErrorContext {
    /** Component or function name */
    component: string;
    /** Operation being performed */
    operation?: string;
    /** Additional context data */
    data?: Record<string, unknown>;
}

/**
 * Standardized error information
 */
export interface ErrorInfo {
    message: string;
    stack?: string;
    code?: string;
    context: ErrorContext;
    timestamp: string;
}

export class ErrorHandler {
    /** Errors already logged as CRITICAL on their way up */
    private static reported = new WeakSet<Error>();

    private static formatContext(ctx: ErrorContext): string {
        const parts = [ctx.component];
        if (ctx.operation) parts.push(ctx.operation);
        return `[${parts.join('.')}]`;
    }

    /**
     * Error code of a pipeline error or of a failed fs call (ENOENT, EACCES...)
     */
    static codeOf(error: Error): string | undefined {
        if (error instanceof ScreenshotDiffError) return error.code;
        if ('code' in error && typeof error.code === 'string') return error.code;
        return undefined;
    }

    /**
     * True once the error has been logged as CRITICAL, so an outer handler
     * need not log it again
     */
    static wasReported(error: unknown): boolean {
        return error instanceof Error && this.reported.has(error);
    }

    /**
     * Handle an error with specified severity
     */
    static handle(
        error: unknown,
        context: ErrorContext,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): ErrorInfo {
        const err = error instanceof Error ? error : new Error(String(error));
        const errorInfo = this.report(err, context, severity);
        if (severity === ErrorSeverity.CRITICAL) {
            throw err;
        }
        return errorInfo;
    }

    /**
     * Run a sync step, logging any failure as CRITICAL before it propagates
     */
    static runCritical<T>(fn: () => T, context: ErrorContext): T {
        try {
            return fn();
        } catch (error) {
            const err = error instanceof Error ? error : new Error(String(error));
            this.report(err, context, ErrorSeverity.CRITICAL);
            throw err;
        }
    }

    private static report(err: Error, context: ErrorContext, severity: ErrorSeverity): ErrorInfo {
        const prefix = this.formatContext(context);
        const code = this.codeOf(err);
        const label = code ? `${err.message} (${code})` : err.message;

        switch (severity) {
            case ErrorSeverity.WARNING:
                console.warn(`${prefix} Warning: ${label}`);
                break;

            case ErrorSeverity.ERROR:
                console.error(`${prefix} Error: ${label}`);
                if (context.data) {
                    console.error(`${prefix} Context:`, context.data);
                }
                break;

            case ErrorSeverity.CRITICAL:
                this.reported.add(err);
                console.error(`${prefix} CRITICAL: ${label}`);
                console.error(`${prefix} Stack:`, err.stack);
                if (context.data) {
                    console.error(`${prefix} Context:`, context.data);
                }
                break;
        }

        return {
            message: err.message,
            stack: err.stack,
            code,
            context,
            timestamp: new Date().toISOString()
        };
    }
}

export default ErrorHandler;
