import axios, { AxiosInstance } from "axios";
import { Buffer } from "buffer";
import { ErrorFactory } from "./errorFactory";
import { CancelledError, HordeApiError, NetworkError } from "./errors";
import { Logger, NullLogger } from "./logs";
import {
    ANONYMOUS_API_KEY,
    CLIENT_NAME,
    CLIENT_VERSION,
    HordeRequestPayload,
    HordeUser,
    ModelReference,
    ModelStats,
    RequestStatus,
    RequestStatusCheck,
    SubmitResult,
    VersionInfo,
} from "./models";

/**
 * The part of the AIHorde REST API this project consumes.
 */
export interface HordeApi {
    setApiKey(apiKey: string): void;
    submitGeneration(payload: HordeRequestPayload): Promise<SubmitResult>;
    checkGeneration(id: string, signal?: AbortSignal): Promise<RequestStatusCheck>;
    getGenerationStatus(id: string, signal?: AbortSignal): Promise<RequestStatus>;
    cancelGeneration(id: string): Promise<void>;
    findUser(): Promise<HordeUser>;
    getModelStats(): Promise<ModelStats>;
    getModelReference(): Promise<ModelReference>;
    getVersionInfo(url: string): Promise<VersionInfo>;
    downloadImage(url: string, signal?: AbortSignal): Promise<Buffer>;
}

export interface HordeClientOptions {
    baseUrl?: string;
    modelReferenceUrl?: string;
    timeoutSeconds?: number;
    /** identifies the program to AIHorde, name:version:contact */
    clientAgent?: string;
    http?: AxiosInstance;
    logger?: Logger;
}

function isRecord(value: unknown): value is { [key: string]: unknown } {
    return typeof value === "object" && value !== null;
}

export function translateError(e: unknown): Error {
    if (axios.isCancel(e)) {
        return new CancelledError();
    }
    if (axios.isAxiosError(e)) {
        if (e.response) {
            const data = e.response.data;
            let message = e.response.statusText || e.message;
            let rc: string | undefined;
            if (isRecord(data)) {
                if (typeof data.message === "string") {
                    message = data.message;
                }
                if (typeof data.rc === "string") {
                    rc = data.rc;
                }
            }
            return new HordeApiError(e.response.status, message, rc);
        }
        const timedOut = e.code === "ECONNABORTED" || e.code === "ETIMEDOUT";
        return new NetworkError(e.message, timedOut);
    }
    return e instanceof Error ? e : new Error(String(e));
}

export class HordeClient implements HordeApi {
    private readonly http: AxiosInstance;
    private readonly baseUrl: string;
    private readonly modelReferenceUrl: string;
    private readonly clientAgent: string;
    private readonly logger: Logger;

    constructor(private apiKey: string = ANONYMOUS_API_KEY, options: HordeClientOptions = {}) {
        this.baseUrl = (options.baseUrl || "https://aihorde.net/api").replace(/\/+$/, "");
        this.modelReferenceUrl = options.modelReferenceUrl || "";
        this.clientAgent =
            options.clientAgent || `${CLIENT_NAME}:${CLIENT_VERSION}:cli`;
        this.logger = options.logger || new NullLogger();
        this.http =
            options.http ||
            axios.create({
                timeout: (options.timeoutSeconds || 10) * 1000,
            });
    }

    setApiKey(apiKey: string) {
        this.apiKey = apiKey;
    }

    private get headers() {
        return {
            Accept: "application/json",
            apikey: this.apiKey,
            "Client-Agent": this.clientAgent,
        };
    }

    private async request<T>(
        method: "get" | "post" | "delete",
        url: string,
        body?: unknown,
        extraHeaders: { [key: string]: string } = {},
        signal?: AbortSignal
    ): Promise<T> {
        this.logger.log(`${method.toUpperCase()} ${url}`);
        try {
            const headers: { [key: string]: string } = {
                ...this.headers,
                ...extraHeaders,
            };
            if (body !== undefined) {
                headers["Content-Type"] = "application/json";
            }
            const response = await this.http.request<T>({
                method,
                url,
                data: body,
                headers,
                signal,
            });
            return response.data;
        } catch (e) {
            const err = translateError(e);
            this.logger.log(`${method.toUpperCase()} ${url} failed`, {
                error: err.message,
            });
            throw err;
        }
    }

    async submitGeneration(payload: HordeRequestPayload): Promise<SubmitResult> {
        return this.request<SubmitResult>(
            "post",
            `${this.baseUrl}/v2/generate/async`,
            payload
        );
    }

    async checkGeneration(id: string, signal?: AbortSignal): Promise<RequestStatusCheck> {
        return this.request<RequestStatusCheck>(
            "get",
            `${this.baseUrl}/v2/generate/check/${id}`,
            undefined,
            {},
            signal
        );
    }

    async getGenerationStatus(id: string, signal?: AbortSignal): Promise<RequestStatus> {
        return this.request<RequestStatus>(
            "get",
            `${this.baseUrl}/v2/generate/status/${id}`,
            undefined,
            {},
            signal
        );
    }

    async cancelGeneration(id: string): Promise<void> {
        await this.request<unknown>(
            "delete",
            `${this.baseUrl}/v2/generate/status/${id}`
        );
        this.logger.log(`Request with ID: ${id} has been deleted.`);
    }

    async findUser(): Promise<HordeUser> {
        return this.request<HordeUser>("get", `${this.baseUrl}/v2/find_user`);
    }

    async getModelStats(): Promise<ModelStats> {
        return this.request<ModelStats>(
            "get",
            `${this.baseUrl}/v2/stats/img/models?model_state=known`,
            undefined,
            { "X-Fields": "month" }
        );
    }

    async getModelReference(): Promise<ModelReference> {
        if (!this.modelReferenceUrl) {
            return {};
        }
        return this.fetchJson<ModelReference>(this.modelReferenceUrl);
    }

    async getVersionInfo(url: string): Promise<VersionInfo> {
        return this.fetchJson<VersionInfo>(url);
    }

    // documents hosted outside AIHorde never get the api key
    private async fetchJson<T>(url: string): Promise<T> {
        this.logger.log(`GET ${url}`);
        try {
            const response = await this.http.get<T>(url, {
                headers: { Accept: "application/json" },
            });
            return response.data;
        } catch (e) {
            throw translateError(e);
        }
    }

    async downloadImage(url: string, signal?: AbortSignal): Promise<Buffer> {
        this.logger.log(`Downloading ${url}`);
        try {
            const response = await this.http.get<ArrayBuffer>(url, {
                responseType: "arraybuffer",
                signal,
            });
            return Buffer.from(response.data);
        } catch (e) {
            throw translateError(e);
        }
    }
}

export type HordeOperation = Exclude<keyof HordeApi, "setApiKey">;

export class MockHordeApi implements HordeApi {
    apiKey = "";
    submitted: HordeRequestPayload[] = [];
    cancelled: string[] = [];
    downloaded: string[] = [];
    submitResult: SubmitResult = { id: "job-1" };
    // returned in order, the last one repeats
    checks: RequestStatusCheck[] = [];
    checkCount = 0;
    status: RequestStatus = {
        ...checkResult({ done: true, finished: 1 }),
        generations: [],
    };
    user: HordeUser = { username: "tester#1", kudos: 0 };
    modelStats: ModelStats = { month: {} };
    modelStatsCalls = 0;
    modelReference: ModelReference = {};
    versionInfo: VersionInfo = { version: "0.0", message: {} };
    images: { [url: string]: Buffer } = {};
    failures: { [operation in HordeOperation]?: ErrorFactory } = {};

    private fail(operation: HordeOperation) {
        const factory = this.failures[operation];
        const err = factory ? factory.error() : null;
        if (err) {
            throw err;
        }
    }

    setApiKey(apiKey: string) {
        this.apiKey = apiKey;
    }

    async submitGeneration(payload: HordeRequestPayload): Promise<SubmitResult> {
        this.fail("submitGeneration");
        this.submitted.push(payload);
        return this.submitResult;
    }

    async checkGeneration(_id: string): Promise<RequestStatusCheck> {
        this.fail("checkGeneration");
        const index = Math.min(this.checkCount, this.checks.length - 1);
        this.checkCount++;
        return this.checks[index];
    }

    async getGenerationStatus(_id: string): Promise<RequestStatus> {
        this.fail("getGenerationStatus");
        return this.status;
    }

    async cancelGeneration(id: string): Promise<void> {
        this.fail("cancelGeneration");
        this.cancelled.push(id);
    }

    async findUser(): Promise<HordeUser> {
        this.fail("findUser");
        return this.user;
    }

    async getModelStats(): Promise<ModelStats> {
        this.modelStatsCalls++;
        this.fail("getModelStats");
        return this.modelStats;
    }

    async getModelReference(): Promise<ModelReference> {
        this.fail("getModelReference");
        return this.modelReference;
    }

    async getVersionInfo(_url: string): Promise<VersionInfo> {
        this.fail("getVersionInfo");
        return this.versionInfo;
    }

    async downloadImage(url: string): Promise<Buffer> {
        this.fail("downloadImage");
        this.downloaded.push(url);
        const image = this.images[url];
        if (!image) {
            throw new HordeApiError(404, "Not Found");
        }
        return image;
    }
}

/** a check result with everything idle, overridden by `fields` */
export function checkResult(fields: Partial<RequestStatusCheck> = {}): RequestStatusCheck {
    return {
        finished: 0,
        processing: 0,
        restarted: 0,
        waiting: 1,
        done: false,
        faulted: false,
        wait_time: 0,
        queue_position: 0,
        kudos: 0,
        is_possible: true,
        ...fields,
    };
}
