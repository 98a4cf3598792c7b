import moment from "moment";
import { Clock } from "./clock";

export type PropertyValue = string | boolean;

/**
 * The frontend as seen by the generator: where messages, errors and
 * progress go, and where session properties live.
 */
export interface Informer {
    showMessage(message: string, url?: string, title?: string): void;
    showError(message: string, url?: string, title?: string): void;
    /** progress goes from 0 to 100 */
    updateStatus(text: string, progress: number): void;
    setFinished(): void;
    getProperty(name: string): PropertyValue | undefined;
    setProperty(name: string, value: PropertyValue): void;
    /** directory where settings and caches are stored */
    storeDirectory(): string;
}

/**
 * Estimates progress as the share of the waiting budget already spent.
 */
export class ProgressTracker {
    private readonly start: moment.Moment;
    private readonly deadline: moment.Moment;
    private lastProgress = -1;
    private lastText = "";
    text: string;

    constructor(
        private clock: Clock,
        maxWaitMinutes: number,
        private informer?: Informer,
        text = "Starting..."
    ) {
        this.start = clock.now();
        this.deadline = this.start.clone().add(maxWaitMinutes, "minutes");
        this.text = text;
    }

    get maxTime(): moment.Moment {
        return this.deadline.clone();
    }

    progress(): number {
        const total = this.deadline.diff(this.start);
        if (total <= 0) {
            return 100;
        }
        const elapsed = this.clock.now().diff(this.start);
        return Math.min(100, Math.max(0, (100 * elapsed) / total));
    }

    inform(text?: string) {
        if (text !== undefined) {
            this.text = text;
        }
        const progress = Math.round(this.progress());
        if (this.informer && (progress !== this.lastProgress || this.text !== this.lastText)) {
            this.informer.updateStatus(this.text, progress);
            this.lastProgress = progress;
            this.lastText = this.text;
        }
    }
}

export interface InformerMessage {
    message: string;
    url?: string;
    title?: string;
}

export class MockInformer implements Informer {
    messages: InformerMessage[] = [];
    errors: InformerMessage[] = [];
    statuses: Array<{ text: string; progress: number }> = [];
    finished = 0;
    properties: { [name: string]: PropertyValue } = {};

    constructor(private directory = "") {}

    showMessage(message: string, url?: string, title?: string) {
        this.messages.push({ message, url, title });
    }

    showError(message: string, url?: string, title?: string) {
        this.errors.push({ message, url, title });
    }

    updateStatus(text: string, progress: number) {
        this.statuses.push({ text, progress });
    }

    setFinished() {
        this.finished++;
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
