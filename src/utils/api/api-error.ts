/**
 * HTTP-facing error. `message` and `code` are sent to the client; `cause`
 * only reaches the server log.
 */
class ApiError extends Error {
    public readonly statusCode: number;
    public readonly code: string;
    public readonly data: Record<string, unknown> | undefined;
    public readonly timestamp: string;

    constructor(
        message: string,
        statusCode: number = 500,
        code: string = 'INTERNAL_ERROR',
        data?: Record<string, unknown>,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
        this.statusCode = statusCode;
        this.code = code;
        this.data = data;
        this.timestamp = new Date().toISOString();

        Error.captureStackTrace(this, new.target);
    }
}

export { ApiError };
