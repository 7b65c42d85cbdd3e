import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import type { ErrorResponse, FieldIssue, SuccessResponse } from '../../types/api';
import { OidcError } from '../../types/oidc';
import { ApiError } from './api-error';

export class ApiResponse {
    static success<T>(reply: FastifyReply, data: T, message = 'Success') {
        const response: SuccessResponse<T> = {
            success: true,
            message,
            data,
            timestamp: new Date().toISOString(),
        };
        return reply.status(200).send(response);
    }

    /**
     * Sends the error envelope. Defaults to 400 `UNEXPECTED_ERROR`.
     */
    static error(
        reply: FastifyReply,
        options: {
            message: string;
            statusCode?: number;
            code?: string;
            issues?: FieldIssue[];
            data?: Record<string, unknown>;
        }
    ) {
        const { message, statusCode = 400, code = 'UNEXPECTED_ERROR', issues, data } = options;
        const response: ErrorResponse = {
            success: false,
            message,
            code,
            ...(issues && { issues }),
            ...(data && { data }),
            timestamp: new Date().toISOString(),
        };
        return reply.status(statusCode).send(response);
    }

    static unauthorized(reply: FastifyReply, message = 'Unauthorized', code = 'UNAUTHORIZED') {
        return this.error(reply, { message, statusCode: 401, code });
    }

    static redirect(reply: FastifyReply, url: string) {
        return reply.redirect(url, 302);
    }

    /**
     * Sends an OAuth 2.0 error body (`{error, error_description}`), never
     * cached. `invalid_token` also gets a Bearer challenge.
     */
    static oauthError(reply: FastifyReply, error: OidcError) {
        if (error.code === 'invalid_token') {
            reply.header('WWW-Authenticate', `Bearer error="${error.code}"`);
        }
        return reply
            .status(error.statusCode)
            .header('Cache-Control', 'no-store')
            .send(error.toResponse());
    }

    static fromApiError(reply: FastifyReply, error: ApiError) {
        if (error.cause !== undefined) {
            reply.log.warn({ err: error.cause, code: error.code }, error.message);
        }
        return this.error(reply, {
            message: error.message,
            statusCode: error.statusCode,
            code: error.code,
            ...(error.data && { data: error.data }),
        });
    }

    static fromZodError(reply: FastifyReply, error: ZodError) {
        const issues: FieldIssue[] = error.issues.map((issue) => ({
            code: issue.code,
            field: issue.path.join('.'),
            message: issue.message,
        }));
        reply.log.debug({ issues }, 'Request validation failed');

        return this.error(reply, {
            message: 'Validation error',
            statusCode: 422,
            code: 'VALIDATION_ERROR',
            issues,
        });
    }

    /**
     * Routes any thrown value to its response. Unexpected errors are logged
     * and answered with a fixed 500.
     */
    static handleError(reply: FastifyReply, error: unknown) {
        if (error instanceof OidcError) {
            if (error.cause !== undefined) {
                reply.log.error({ err: error.cause }, error.message);
            }
            return this.oauthError(reply, error);
        }
        if (error instanceof ApiError) {
            return this.fromApiError(reply, error);
        }
        if (error instanceof ZodError) {
            return this.fromZodError(reply, error);
        }

        reply.log.error({ err: error }, 'Unhandled request error');
        return this.error(reply, {
            message: 'Internal server error',
            statusCode: 500,
            code: 'INTERNAL_ERROR',
        });
    }
}
