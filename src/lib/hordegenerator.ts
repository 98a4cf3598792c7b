import fs from "fs";
import os from "os";
import path from "path";
import { Buffer } from "buffer";
import * as uuid from "uuid";
import { Clock, RealClock } from "./clock";
import {
    CancelledError,
    HordeApiError,
    IdentifiedError,
    NetworkError,
    errorMessage,
} from "./errors";
import { reportError } from "./errorReporting";
import { HordeApi } from "./hordeclient";
import {
    imageDescription,
    imageName,
    imageTitle,
    imageTooltip,
} from "./imagemeta";
import { LogAttributes, Logger, NullLogger } from "./logs";
import { ModelCatalog } from "./modelcatalog";
import {
    ANONYMOUS_API_KEY,
    GeneratedImage,
    GenerationOptions,
    GenerationWarning,
    HELP_URL,
    HordeRequestParams,
    HordeRequestPayload,
    HordeSettings,
    ModelRequirements,
    REGISTER_URL,
    SubmitResult,
} from "./models";
import { Informer, ProgressTracker } from "./progress";
import { resolveRequirements } from "./requirements";
import { Sleeper, sleep } from "./sleep";
import { UpdateChecker, UpdateNotice, getBalance } from "./updates";

/** seconds between two checks of a queued job */
export const CHECK_WAIT = 5;
/** upper bound in seconds for the wait between checks */
export const MAX_TIME_REFRESH = 15;
const SLICE_MS = 500;

export interface HordeGeneratorOptions {
    clock?: Clock;
    sleep?: Sleeper;
    logger?: Logger;
    /** where downloaded images are written, the OS temp dir by default */
    outputDir?: string;
    versionCheckUrl?: string;
    clientVersion?: string;
}

export function roundDownTo64(value: number): number {
    return Math.floor(value / 64) * 64;
}

export function describePayload(payload: HordeRequestPayload): LogAttributes {
    const { source_image, ...rest } = payload;
    if (source_image === undefined) {
        return { ...rest };
    }
    return { ...rest, source_image_size: source_image.length };
}

function throwIfAborted(signal?: AbortSignal) {
    if (signal && signal.aborted) {
        throw new CancelledError();
    }
}

/**
 * Runs a generation on AIHorde from submission to the downloaded files:
 * submit, poll until done, fetch the generations and store them.
 * Problems are told to the user through the informer.
 */
export class HordeGenerator {
    private settings: HordeSettings;
    private warnings: GenerationWarning[] = [];
    private readonly clock: Clock;
    private readonly sleep: Sleeper;
    private readonly logger: Logger;
    private readonly outputDir: string;
    readonly catalog: ModelCatalog;
    readonly updates: UpdateChecker;
    censored = false;

    constructor(
        readonly api: HordeApi,
        readonly informer: Informer,
        settings?: HordeSettings,
        options: HordeGeneratorOptions = {}
    ) {
        this.settings = settings || { apiKey: ANONYMOUS_API_KEY };
        this.clock = options.clock || new RealClock();
        this.sleep = options.sleep || sleep;
        this.logger = options.logger || new NullLogger();
        this.outputDir = options.outputDir || os.tmpdir();
        this.catalog = new ModelCatalog(api, informer, this.clock, this.logger);
        this.updates = new UpdateChecker(
            api,
            informer,
            this.logger,
            options.versionCheckUrl,
            options.clientVersion
        );
        this.api.setApiKey(this.settings.apiKey);
    }

    getSettings(): HordeSettings {
        return this.settings;
    }

    setSettings(settings: HordeSettings) {
        this.settings = settings;
    }

    imageName(): string {
        return imageName(this.settings);
    }

    imageTitle(): string {
        return imageTitle(this.settings);
    }

    imageTooltip(): string {
        return imageTooltip(this.settings);
    }

    imageDescription(): string {
        return imageDescription(this.settings);
    }

    getBalance(): Promise<string> {
        return getBalance(this.api, this.settings.apiKey);
    }

    checkUpdate(): Promise<UpdateNotice> {
        return this.updates.checkUpdate();
    }

    async buildPayload(options: GenerationOptions): Promise<HordeRequestPayload> {
        const params: HordeRequestParams = {
            cfg_scale: Number(options.promptStrength),
            steps: Math.trunc(options.steps),
            width: roundDownTo64(options.imageWidth),
            height: roundDownTo64(options.imageHeight),
        };
        if (options.seed) {
            params.seed = options.seed;
        }

        let requirements: ModelRequirements | undefined;
        try {
            requirements = await this.catalog.requirementsFor(this.settings, options.model);
        } catch (e) {
            this.logger.log("Model requirements unavailable", { error: errorMessage(e) });
        }
        const overrides = resolveRequirements(requirements, params);
        this.logger.log(`Requirements for ${options.model}`, overrides);
        Object.assign(params, overrides);
        // the size the user chose wins over the model requirements
        params.width = roundDownTo64(options.imageWidth);
        params.height = roundDownTo64(options.imageHeight);

        const payload: HordeRequestPayload = {
            params,
            prompt: options.prompt,
            nsfw: options.nsfw,
            censor_nsfw: options.censorNsfw,
            r2: true,
            models: [options.model],
        };

        if (options.mode === "MODE_IMG2IMG" || options.mode === "MODE_INPAINTING") {
            if (!options.sourceImage) {
                throw new IdentifiedError(
                    "A source image is required for image to image and inpainting"
                );
            }
            payload.source_image = options.sourceImage;
            params.n = options.nimages || 1;
            if (options.mode === "MODE_IMG2IMG") {
                payload.source_processing = "img2img";
                params.denoising_strength = 1 - Number(options.initStrength ?? 0.5);
            } else {
                payload.source_processing = "inpainting";
            }
        }
        return payload;
    }

    /**
     * Generates the images for the options and returns where they were
     * stored. Returns an empty list when nothing could be generated, after
     * telling the user why.
     */
    async generateImage(
        options: GenerationOptions,
        signal?: AbortSignal
    ): Promise<GeneratedImage[]> {
        this.settings = { ...this.settings, ...options };
        this.censored = false;
        this.api.setApiKey(options.apiKey);
        const tracker = new ProgressTracker(
            this.clock,
            options.maxWaitMinutes,
            this.informer,
            "Contacting the Horde..."
        );

        let pendingId = "";
        try {
            const payload = await this.buildPayload(options);
            this.logger.log("Submitting generation", describePayload(payload));
            tracker.inform();
            throwIfAborted(signal);

            const submitted = await this.submit(payload, options.apiKey);
            this.warnings = submitted.warnings || [];
            pendingId = submitted.id;
            tracker.inform("Horde Contacted");

            await this.waitUntilReady(submitted.id, options, tracker, signal);
            pendingId = "";
            return await this.fetchImages(submitted.id, options, tracker, signal);
        } catch (e) {
            if (pendingId) {
                await this.cancel(pendingId);
            }
            this.reportFailure(e);
            return [];
        } finally {
            this.informer.setFinished();
            await this.notifyUpdate();
        }
    }

    private async submit(payload: HordeRequestPayload, apiKey: string): Promise<SubmitResult> {
        try {
            const submitted = await this.api.submitGeneration(payload);
            this.logger.log("Horde Contacted", { id: submitted.id, kudos: submitted.kudos });
            return submitted;
        } catch (e) {
            if (!(e instanceof HordeApiError)) {
                throw e;
            }
            if (e.rc !== "KudosUpfront") {
                throw new IdentifiedError(e.message);
            }
            if (apiKey === ANONYMOUS_API_KEY) {
                throw new IdentifiedError(
                    `Register at ${REGISTER_URL} and use your key to improve your rate success. Detail: ${e.message}.`,
                    REGISTER_URL
                );
            }
            throw new IdentifiedError(
                `${HELP_URL} to learn to earn kudos. Detail: ${e.message}.`
            );
        }
    }

    private async waitUntilReady(
        id: string,
        options: GenerationOptions,
        tracker: ProgressTracker,
        signal?: AbortSignal
    ): Promise<void> {
        const checkMax = (options.maxWaitMinutes * 60) / CHECK_WAIT;
        let checkCounter = 1;
        for (;;) {
            throwIfAborted(signal);
            const data = await this.api.checkGeneration(id, signal);
            this.logger.log("Checked generation", { ...data });
            throwIfAborted(signal);
            checkCounter++;

            if (data.faulted) {
                throw new IdentifiedError(
                    "AIHorde could not generate the image. Please try again later."
                );
            }
            if (data.done) {
                tracker.inform("Downloading generated image...");
                return;
            }

            if (data.processing === 0) {
                tracker.text =
                    data.queue_position === 0
                        ? "You are first in the queue"
                        : `Queue position: ${data.queue_position}`;
                this.logger.log(`Wait time ${data.wait_time}`);
            } else {
                tracker.text = "Generating...";
            }

            if (checkCounter >= checkMax) {
                throw this.timeoutError(options, checkMax);
            }

            const waitTime = Number.isFinite(data.wait_time) ? data.wait_time : 0;
            const expectedEnd = this.clock.now().add(waitTime, "seconds");
            if (data.processing === 0 && expectedEnd.isAfter(tracker.maxTime)) {
                // still queued, the job would not be served in time
                if (options.apiKey === ANONYMOUS_API_KEY) {
                    throw new IdentifiedError(
                        `Get a free API Key at ${REGISTER_URL}.\n This model takes more time than your current configuration.`,
                        REGISTER_URL
                    );
                }
                throw new IdentifiedError(
                    `Please try another model, ${options.model} would take more time than you configured, or try again later.`
                );
            }

            if (!data.is_possible) {
                throw new IdentifiedError(
                    "There are no workers available with these settings. Please try again later."
                );
            }

            const waitSeconds = Math.min(
                Math.max(CHECK_WAIT, Math.floor(waitTime / 2)),
                MAX_TIME_REFRESH
            );
            await this.pause(waitSeconds * 1000, tracker, signal);
        }
    }

    private timeoutError(options: GenerationOptions, checkMax: number): IdentifiedError {
        if (options.apiKey === ANONYMOUS_API_KEY) {
            return new IdentifiedError(
                `Get an Api key for free at ${REGISTER_URL}.\n This model takes more time than your current configuration.`,
                REGISTER_URL
            );
        }
        const minutes = (checkMax * CHECK_WAIT) / 60;
        const unit = minutes === 1 ? "minute" : "minutes";
        return new IdentifiedError(
            `Image generation timed out after ${minutes} ${unit}. Please try again later.`
        );
    }

    private async pause(ms: number, tracker: ProgressTracker, signal?: AbortSignal) {
        for (let waited = 0; waited < ms; waited += SLICE_MS) {
            throwIfAborted(signal);
            await this.sleep(SLICE_MS);
            tracker.inform();
        }
    }

    private async fetchImages(
        id: string,
        options: GenerationOptions,
        tracker: ProgressTracker,
        signal?: AbortSignal
    ): Promise<GeneratedImage[]> {
        tracker.inform("Fetching images...");
        throwIfAborted(signal);
        const status = await this.api.getGenerationStatus(id, signal);
        if (status.faulted) {
            throw new IdentifiedError(
                "AIHorde could not generate the image. Please try again later."
            );
        }

        const images: GeneratedImage[] = [];
        const total = status.generations.length;
        await fs.promises.mkdir(this.outputDir, { recursive: true });
        for (let i = 0; i < total; i++) {
            throwIfAborted(signal);
            const generation = status.generations[i];
            if (generation.censored) {
                const message = `«${options.prompt}» is censored, try changing the prompt wording`;
                this.logger.log(message);
                this.informer.showError(message, "", "warning");
                this.censored = true;
                break;
            }
            let data: Buffer;
            if (generation.img.startsWith("https")) {
                tracker.inform(
                    total === 1 ? "Downloading result..." : `Downloading image ${i + 1}/${total}`
                );
                data = await this.api.downloadImage(generation.img, signal);
                throwIfAborted(signal);
            } else {
                this.logger.log(`Storing embedded image ${i + 1}`);
                data = Buffer.from(generation.img, "base64");
            }
            const file = path.join(this.outputDir, `${uuid.v4()}.webp`);
            this.logger.log(`Dumping to ${file}`);
            await fs.promises.writeFile(file, data);
            images.push({
                path: file,
                seed: generation.seed,
                model: generation.model || options.model,
            });
        }

        if (this.warnings.length > 0) {
            const message =
                "You may need to reduce your settings or choose another model, or you may have been censored. Horde message:\n * " +
                this.warnings.map((w) => w.message).join("\n * ");
            this.informer.showError(message, "", "warning");
            this.warnings = [];
        }

        try {
            await this.catalog.refreshModels(this.settings);
        } catch (e) {
            this.logger.log("Failed to refresh models", { error: errorMessage(e) });
        }
        return images;
    }

    private async cancel(id: string) {
        try {
            await this.api.cancelGeneration(id);
        } catch (e) {
            this.logger.log(`Could not delete request ${id}`, { error: errorMessage(e) });
        }
    }

    private reportFailure(e: unknown) {
        this.logger.log("Generation failed", { error: errorMessage(e) });
        if (e instanceof IdentifiedError) {
            this.informer.showError(e.message, e.url);
        } else if (e instanceof CancelledError) {
            this.informer.showError(e.message);
        } else if (e instanceof HordeApiError) {
            this.informer.showError(`AIhorde response: '${e.message}'.`);
        } else if (e instanceof NetworkError) {
            this.informer.showError("Internet required, check your connection");
        } else {
            reportError(e, "HordeGenerator.generateImage");
            this.informer.showError(`Service failed with: '${errorMessage(e)}'.`);
        }
    }

    private async notifyUpdate() {
        try {
            const notice = await this.updates.checkUpdate();
            if (notice.message) {
                this.informer.showMessage(notice.message, notice.url);
            }
        } catch (e) {
            this.logger.log("Update check failed", { error: errorMessage(e) });
        }
    }
}
