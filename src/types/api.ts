// ============================================
// Response envelope for the first-party endpoints
// (OAuth endpoints answer with `{error, error_description}` instead)
// ============================================

export interface FieldIssue {
    code: string;
    field: string;
    message: string;
}

export interface SuccessResponse<T> {
    success: true;
    message: string;
    data: T;
    timestamp: string;
}

export interface ErrorResponse {
    success: false;
    message: string;
    code: string;
    issues?: FieldIssue[];
    data?: Record<string, unknown>;
    timestamp: string;
}
