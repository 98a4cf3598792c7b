/**
 * Cycles through a pattern of errors, null meaning "no error this time".
 * Used by the mocks to make calls fail on schedule.
 */
export class ErrorFactory {
    private cursor = 0;
    constructor(private pattern: Array<Error | null>) {}

    error(): Error | null {
        if (this.pattern.length == 0) {
            return null;
        }
        const error = this.pattern[this.cursor];
        this.cursor = (this.cursor + 1) % this.pattern.length;
        return error;
    }
}
