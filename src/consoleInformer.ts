import { Informer, PropertyValue } from "./lib/progress";

export interface StatusStream {
    isTTY?: boolean;
    write(text: string): unknown;
}

/**
 * Informer for a terminal: messages on stderr and a status line that
 * is rewritten in place when stderr is a TTY.
 */
export class ConsoleInformer implements Informer {
    private properties: { [name: string]: PropertyValue } = {};
    private statusShown = false;

    constructor(
        private directory: string,
        private out: StatusStream = process.stderr
    ) {}

    private get interactive(): boolean {
        return !!this.out.isTTY;
    }

    private clearStatus() {
        if (this.statusShown && this.interactive) {
            this.out.write("\r\x1b[K");
        }
        this.statusShown = false;
    }

    private print(kind: string, message: string, url?: string, title?: string) {
        this.clearStatus();
        const heading = title || kind;
        this.out.write(`[${heading}] ${message}\n`);
        if (url) {
            this.out.write(`  ${url}\n`);
        }
    }

    showMessage(message: string, url?: string, title?: string) {
        this.print("info", message, url, title);
    }

    showError(message: string, url?: string, title?: string) {
        this.print("error", message, url, title);
    }

    updateStatus(text: string, progress: number) {
        const line = `${progress.toFixed(0).padStart(3)}% ${text}`;
        if (this.interactive) {
            this.out.write(`\r\x1b[K${line}`);
        } else {
            this.out.write(`${line}\n`);
        }
        this.statusShown = true;
    }

    setFinished() {
        if (this.statusShown && this.interactive) {
            this.out.write("\n");
        }
        this.statusShown = false;
    }

    getProperty(name: string): PropertyValue | undefined {
        return this.properties[name];
    }

    setProperty(name: string, value: PropertyValue) {
        this.properties[name] = value;
    }

    storeDirectory(): string {
        return this.directory;
    }
}
