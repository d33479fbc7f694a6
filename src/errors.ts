/**
 * Raised when a path cannot be created or have its times updated.
 * Carries the OS error as `cause` and its errno code when there is one.
 */
export class TouchError extends Error {
    readonly path: string;
    readonly code?: string;

    constructor(path: string, reason: string, code?: string, cause?: unknown) {
        super(`Error touching ${path}: ${reason}`, { cause });
        this.name = 'TouchError';
        this.path = path;
        this.code = code;
    }

    static from(path: string, err: unknown): TouchError {
        if (err instanceof Error) {
            const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
            return new TouchError(path, err.message, code, err);
        }
        return new TouchError(path, String(err), undefined, err);
    }
}
