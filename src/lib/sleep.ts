export type Sleeper = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
