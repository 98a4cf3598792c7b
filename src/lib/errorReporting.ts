import Bugsnag from "@bugsnag/js";

let started = false;

export function startErrorReporting(apiKey?: string, appVersion?: string) {
    if (!apiKey || started) {
        return;
    }
    Bugsnag.start({
        apiKey,
        appVersion,
        logger: null,
    });
    started = true;
}

export function reportError(error: unknown, context: string) {
    if (!started) {
        return;
    }
    const err = error instanceof Error ? error : new Error(String(error));
    Bugsnag.notify(err, (evt) => {
        evt.context = context;
    });
}
