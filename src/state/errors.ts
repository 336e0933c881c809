/**
 * State Error Taxonomy
 *
 * Every failure the state layer raises maps to one of these codes.
 * Callers branch on `code`, not on message text.
 */

export enum StateErrorCode {
    VALIDATION = 'VALIDATION',
    NOT_FOUND = 'NOT_FOUND',
    CONFLICT = 'CONFLICT',
    SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',
    CORRUPT_STATE = 'CORRUPT_STATE',
}

export class StateError extends Error {
    readonly code: StateErrorCode;
    readonly metadata?: Record<string, unknown>;

    constructor(code: StateErrorCode, message: string, metadata?: Record<string, unknown>) {
        super(message);
        this.name = 'StateError';
        this.code = code;
        this.metadata = metadata;
    }
}

/**
 * Malformed entry on append. Rejected; the caller fixes it and retries.
 */
export class ValidationError extends StateError {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(StateErrorCode.VALIDATION, message, { issues });
        this.name = 'ValidationError';
        this.issues = issues;
    }
}

/**
 * Expected file or record absent.
 */
export class NotFoundError extends StateError {
    constructor(what: string) {
        super(StateErrorCode.NOT_FOUND, `${what} not found`, { what });
        this.name = 'NotFoundError';
    }
}

/**
 * The snapshot head moved between restore() and persist().
 */
export class ConflictError extends StateError {
    readonly expectedVersion: number | null;
    readonly actualVersion: number | null;

    constructor(expectedVersion: number | null, actualVersion: number | null) {
        super(
            StateErrorCode.CONFLICT,
            `snapshot head moved: expected version ${expectedVersion ?? 'none'}, found ${actualVersion ?? 'none'}`,
            { expectedVersion, actualVersion }
        );
        this.name = 'ConflictError';
        this.expectedVersion = expectedVersion;
        this.actualVersion = actualVersion;
    }
}

/**
 * The broker balance could not be fetched. The cycle aborts without touching positions.
 */
export class SourceUnavailableError extends StateError {
    constructor(source: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(StateErrorCode.SOURCE_UNAVAILABLE, `${source} unavailable: ${reason}`, { source, reason });
        this.name = 'SourceUnavailableError';
    }
}

/**
 * A persisted file violates its schema. Never repaired with guessed values.
 */
export class StateCorruptionError extends StateError {
    readonly file: string;

    constructor(file: string, issues: string[]) {
        super(StateErrorCode.CORRUPT_STATE, `${file} is corrupt: ${issues.join('; ')}`, { file, issues });
        this.name = 'StateCorruptionError';
        this.file = file;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
