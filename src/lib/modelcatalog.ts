import moment from "moment";
import { Clock } from "./clock";
import { HordeApiError, NetworkError, errorMessage } from "./errors";
import { HordeApi } from "./hordeclient";
import { Logger } from "./logs";
import {
    DEFAULT_MODEL,
    HordeSettings,
    INPAINT_MODELS,
    LocalSettings,
    MODELS,
    ModelRequirements,
} from "./models";
import { Informer } from "./progress";
import { parseModelReference } from "./requirements";

/** models are refreshed at most once in this many days */
export const MAX_DAYS_MODEL_UPDATE = 5;
export const MAX_MODELS_LIST = 50;
const NEVER_REFRESHED = "2025-07-01";
const DATE_FORMAT = "YYYY-MM-DD";

export function defaultModelsFor(settings: HordeSettings): string[] {
    return settings.mode === "MODE_INPAINTING" ? INPAINT_MODELS : MODELS;
}

export function availableModels(settings: HordeSettings): string[] {
    const models = settings.localSettings?.models;
    return models && models.length > 0 ? models : defaultModelsFor(settings);
}

export function newModelsMessage(newModels: string[]): string {
    if (newModels.length === 1) {
        return `We have a new model:\n\n * ${newModels[0]}`;
    }
    const listed = "\n * " + newModels.slice(0, 10).join("\n * ");
    if (newModels.length > 10) {
        return `We have ${newModels.length} new models, including:${listed}`;
    }
    return `We have ${newModels.length} new models:${listed}`;
}

/**
 * Keeps the list of offered models and their requirements up to date
 * inside the user settings.
 */
export class ModelCatalog {
    constructor(
        private api: HordeApi,
        private informer: Informer,
        private clock: Clock,
        private logger: Logger
    ) {}

    async updateRequirements(settings: HordeSettings): Promise<void> {
        const reference = await this.api.getModelReference();
        const requirements = parseModelReference(reference);
        this.logger.log(
            `We have requirements for ${Object.keys(requirements).length} models`
        );
        const locals: LocalSettings = settings.localSettings || {};
        locals.requirements = {
            ...(locals.requirements || {}),
            ...requirements,
        };
        settings.localSettings = locals;
    }

    /**
     * Requirements for a model, downloading the table the first time.
     */
    async requirementsFor(
        settings: HordeSettings,
        model: string
    ): Promise<ModelRequirements | undefined> {
        if (!settings.localSettings?.requirements) {
            await this.updateRequirements(settings);
        }
        return settings.localSettings?.requirements?.[model];
    }

    async refreshModels(settings: HordeSettings): Promise<void> {
        const previousUpdate =
            settings.localSettings?.dateRefreshedModels || NEVER_REFRESHED;
        const today = this.clock.now().startOf("day");
        const daysUpdated = today.diff(
            moment(previousUpdate, DATE_FORMAT).startOf("day"),
            "days"
        );
        if (daysUpdated < MAX_DAYS_MODEL_UPDATE) {
            this.logger.log(`No need to update models ${previousUpdate}`);
            return;
        }

        this.logger.log("time to update models");
        let stats: { [model: string]: number };
        try {
            stats = (await this.api.getModelStats()).month;
        } catch (e) {
            if (e instanceof NetworkError && e.timedOut) {
                this.logger.log("Failed updating models due to timeout");
                return;
            }
            if (e instanceof HordeApiError || e instanceof NetworkError) {
                this.informer.showError(
                    "Failed to get latest models, check your Internet connection"
                );
                return;
            }
            throw e;
        }

        const inpainting = settings.mode === "MODE_INPAINTING";
        const popular = Object.keys(stats)
            .sort((a, b) => stats[b] - stats[a])
            .filter((name) => name.toLowerCase().includes("inpaint") === inpainting)
            .slice(0, MAX_MODELS_LIST);
        this.logger.log(`Downloaded ${Object.keys(stats).length} models`);

        const defaultModel = settings.defaultModel || DEFAULT_MODEL;
        if (!popular.includes(defaultModel)) {
            popular.push(defaultModel);
        }

        const locals: LocalSettings = settings.localSettings || {};
        if (popular.length > 3) {
            const known = locals.models || defaultModelsFor(settings);
            const newModels = popular.filter((name) => !known.includes(name));
            if (newModels.length > 0) {
                this.logger.log(`New models ${newModels.length}`);
                locals.models = [...popular].sort((a, b) =>
                    a.toUpperCase().localeCompare(b.toUpperCase())
                );
                this.informer.showMessage(newModelsMessage(newModels));
            }
        }
        locals.dateRefreshedModels = today.format(DATE_FORMAT);
        settings.localSettings = locals;

        try {
            await this.updateRequirements(settings);
        } catch (e) {
            this.logger.log("Failed to update model requirements", {
                error: errorMessage(e),
            });
        }

        const models = availableModels(settings);
        if (!settings.model || !models.includes(settings.model)) {
            settings.model = models[0];
        }
    }
}
