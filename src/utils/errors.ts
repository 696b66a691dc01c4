/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Retry might succeed
    TRANSIENT = "TRANSIENT", // Temporary issue, will resolve
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",

    // File system errors
    FILE_NOT_FOUND = "FILE_NOT_FOUND",
    FILE_READ_ERROR = "FILE_READ_ERROR",
    DISK_FULL = "DISK_FULL",
    DESTINATION_EXISTS = "DESTINATION_EXISTS",
    PERMISSION_DENIED = "PERMISSION_DENIED",

    // Fingerprinting errors
    FINGERPRINT_FAILED = "FINGERPRINT_FAILED",

    // Lookup service errors
    LOOKUP_FAILED = "LOOKUP_FAILED",
    SUBMISSION_FAILED = "SUBMISSION_FAILED",

    // Manual review errors
    INPUT_CLOSED = "INPUT_CLOSED",
}

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function errnoCode(error: unknown): string | undefined {
    if (typeof error !== "object" || error === null || !("code" in error)) {
        return undefined;
    }
    const { code } = error;
    return typeof code === "string" ? code : undefined;
}

/**
 * Wrap a Node.js error in an AppError
 */
export function wrapNodeError(err: unknown, context: string): AppError {
    const code = errnoCode(err);
    const details = { originalError: errorMessage(err) };

    if (code === "ENOENT") {
        return new AppError(
            ErrorCode.FILE_NOT_FOUND,
            ErrorCategory.RECOVERABLE,
            `File not found: ${context}`,
            details
        );
    }

    if (code === "EACCES" || code === "EPERM") {
        return new AppError(
            ErrorCode.PERMISSION_DENIED,
            ErrorCategory.FATAL,
            `Permission denied: ${context}`,
            details
        );
    }

    if (code === "EEXIST") {
        return new AppError(
            ErrorCode.DESTINATION_EXISTS,
            ErrorCategory.RECOVERABLE,
            `Destination already exists: ${context}`,
            details
        );
    }

    if (code === "ENOSPC") {
        return new AppError(
            ErrorCode.DISK_FULL,
            ErrorCategory.TRANSIENT,
            `Disk full: ${context}`,
            details
        );
    }

    // Generic file error
    return new AppError(
        ErrorCode.FILE_READ_ERROR,
        ErrorCategory.RECOVERABLE,
        `File operation failed: ${context}`,
        details
    );
}
