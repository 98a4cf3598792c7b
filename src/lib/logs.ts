import fs from "fs";
import moment from "moment";
import axios from "axios";

const NEW_RELIC_URL = "https://log-api.newrelic.com/log/v1";

const SECRET_ATTRIBUTES = ["apikey", "api_key", "apiKey"];

export type LogAttributes = { [key: string]: unknown };

interface LogMessage {
    timestamp: number;
    message: string;
    attributes?: LogAttributes;
}

interface LogBatch {
    common?: {
        attributes: LogAttributes;
    };
    logs: LogMessage[];
}

export interface Logger {
    log(message: string, attributes?: LogAttributes): void;
}

export function redact(attributes?: LogAttributes): LogAttributes | undefined {
    if (!attributes) {
        return attributes;
    }
    const result: LogAttributes = {};
    for (const key of Object.keys(attributes)) {
        result[key] = SECRET_ATTRIBUTES.includes(key) ? "***" : attributes[key];
    }
    return result;
}

export class ConsoleLogger implements Logger {
    public log(message: string, attributes?: LogAttributes) {
        const safe = redact(attributes);
        if (safe) {
            console.log(message, safe);
        } else {
            console.log(message);
        }
    }
}

export class NullLogger implements Logger {
    public log(_message: string, _attributes?: LogAttributes) {}
}

export interface LogsClientOptions {
    logFile?: string;
    debug?: boolean;
    newRelicLicenseKey?: string;
}

/**
 * Writes log lines to a file, echoes them to the console when debugging
 * and ships them to New Relic in batches when a license key is configured.
 */
export class LogsClient implements Logger {
    private logs: LogMessage[] = [];
    private interval?: NodeJS.Timeout;

    private get enabled() {
        return !!this.options.newRelicLicenseKey;
    }

    constructor(private options: LogsClientOptions) {
        if (this.enabled) {
            this.interval = setInterval(() => {
                this.sendLogs().catch((e) => this.writeLine(`Failed to export logs: ${e}`));
            }, 10000);
            this.interval.unref();
        }
    }

    private async sendLogs() {
        if (this.enabled && this.logs.length > 0) {
            const data: LogBatch = {
                common: {
                    attributes: {
                        service: "horde-writer",
                    },
                },
                logs: this.logs,
            };
            this.logs = [];

            await axios.post(NEW_RELIC_URL, [data], {
                headers: {
                    "Content-Type": "application/json",
                    "Api-Key": this.options.newRelicLicenseKey,
                },
            });
        }
    }

    private writeLine(line: string) {
        if (this.options.debug) {
            console.error(line);
        }
        if (this.options.logFile) {
            try {
                fs.appendFileSync(this.options.logFile, line + "\n");
            } catch (e) {
                // optional
                if (this.options.debug) {
                    console.error(`Cannot write ${this.options.logFile}: ${e}`);
                }
            }
        }
    }

    public log(message: string, attributes?: LogAttributes) {
        const safe = redact(attributes);
        const now = moment();
        let line = `[${now.format("YYYY-MM-DD HH:mm:ss")}] ${message}`;
        if (safe) {
            line += ` ${JSON.stringify(safe)}`;
        }
        this.writeLine(line);
        if (this.enabled) {
            this.logs.push({
                timestamp: now.unix(),
                message,
                attributes: safe,
            });
        }
    }

    public async stop() {
        if (this.interval) {
            clearInterval(this.interval);
        }
        await this.sendLogs();
    }
}
