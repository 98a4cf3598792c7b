/**
 * A known problem, optionally with a link that explains how to fix it.
 */
export class IdentifiedError extends Error {
    constructor(message: string, readonly url: string = "") {
        super(message);
        this.name = "IdentifiedError";
    }
}

/**
 * AIHorde answered with an error status. `rc` is the return code
 * AIHorde sends along, e.g. "KudosUpfront".
 */
export class HordeApiError extends Error {
    constructor(
        readonly status: number,
        message: string,
        readonly rc?: string
    ) {
        super(message);
        this.name = "HordeApiError";
    }
}

export class NetworkError extends Error {
    constructor(message: string, readonly timedOut: boolean = false) {
        super(message);
        this.name = "NetworkError";
    }
}

export class CancelledError extends Error {
    constructor(message = "Image generation cancelled") {
        super(message);
        this.name = "CancelledError";
    }
}

export function errorMessage(e: unknown): string {
    if (e instanceof Error) {
        return e.message;
    }
    return String(e);
}
