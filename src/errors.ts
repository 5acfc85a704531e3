/**
 * Error types raised while auditing access keys.
 * Every failure aborts the run; nothing here is retried by the core.
 */

export class AuditError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AuditError';
    }
}

/**
 * Missing credentials, unknown profile or similar. Raised before any key is classified.
 */
export class SetupError extends AuditError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SetupError';
    }
}

export class ConfigError extends AuditError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export class InvalidFactError extends AuditError {
    public readonly userName: string;
    public readonly accessKeyId: string;

    constructor(userName: string, accessKeyId: string, problem: string) {
        super(`Invalid access key ${accessKeyId} for user ${userName}: ${problem}`);
        this.name = 'InvalidFactError';
        this.userName = userName;
        this.accessKeyId = accessKeyId;
    }
}

export type FetchErrorCategory =
    | 'credentials'
    | 'permission'
    | 'throttling'
    | 'transient'
    | 'unknown';

export class FetchError extends AuditError {
    public readonly category: FetchErrorCategory;
    public readonly retryable: boolean;
    public readonly operation: string;
    public readonly errorCode?: string;

    constructor(
        operation: string,
        category: FetchErrorCategory,
        message: string,
        options?: { cause?: unknown; errorCode?: string }
    ) {
        super(`${operation} failed (${category}): ${message}`, options);
        this.name = 'FetchError';
        this.operation = operation;
        this.category = category;
        this.retryable = category === 'throttling' || category === 'transient';
        this.errorCode = options?.errorCode;
    }
}

const CREDENTIAL_ERRORS = new Set([
    'CredentialsProviderError',
    'ExpiredToken',
    'ExpiredTokenException',
    'InvalidClientTokenId',
    'UnrecognizedClientException',
    'SignatureDoesNotMatch',
    'IncompleteSignature',
]);

const PERMISSION_ERRORS = new Set([
    'AccessDenied',
    'AccessDeniedException',
    'UnauthorizedOperation',
]);

const THROTTLING_ERRORS = new Set([
    'Throttling',
    'ThrottlingException',
    'TooManyRequestsException',
    'RequestLimitExceeded',
]);

const TRANSIENT_ERRORS = new Set([
    'TimeoutError',
    'RequestTimeout',
    'RequestTimeoutException',
    'ServiceUnavailable',
    'ServiceFailure',
    'InternalFailure',
    'ECONNRESET',
    'ECONNREFUSED',
    'ETIMEDOUT',
    'EPIPE',
    'ENOTFOUND',
    'EAI_AGAIN',
]);

function errorIdentity(error: unknown): { name: string; code?: string; message: string } {
    if (error instanceof Error) {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
        return { name: error.name, code, message: error.message };
    }
    return { name: 'UnknownError', message: String(error) };
}

/**
 * Maps an AWS SDK (or network) failure onto a FetchError category.
 * AuditErrors pass through unchanged.
 */
export function classifyAwsError(error: unknown, operation: string): AuditError {
    if (error instanceof AuditError) return error;

    const { name, code, message } = errorIdentity(error);
    const errorCode = code ?? name;
    let category: FetchErrorCategory = 'unknown';

    if (CREDENTIAL_ERRORS.has(name)) {
        category = 'credentials';
    } else if (PERMISSION_ERRORS.has(name)) {
        category = 'permission';
    } else if (THROTTLING_ERRORS.has(name)) {
        category = 'throttling';
    } else if (TRANSIENT_ERRORS.has(name) || (code !== undefined && TRANSIENT_ERRORS.has(code))) {
        category = 'transient';
    }

    return new FetchError(operation, category, message, { cause: error, errorCode });
}

/**
 * Credential failures surfaced while resolving the caller identity are setup errors.
 */
export function toSetupError(error: unknown, profile?: string): AuditError {
    const classified = classifyAwsError(error, 'GetCallerIdentity');
    if (classified instanceof FetchError && classified.category === 'credentials') {
        const target = profile ? `profile '${profile}'` : 'default credential chain';
        return new SetupError(
            `Unable to load AWS credentials from ${target}: ${errorIdentity(error).message}`,
            { cause: error }
        );
    }
    return classified;
}
