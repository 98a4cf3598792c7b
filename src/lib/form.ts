import { availableModels } from "./modelcatalog";
import {
    ANONYMOUS_API_KEY,
    DEFAULT_MODEL,
    GENERATION_MODES,
    GenerationMode,
    GenerationOptions,
    HordeSettings,
    MAX_HEIGHT,
    MAX_WIDTH,
    MIN_HEIGHT,
    MIN_PROMPT_LENGTH,
    MIN_WIDTH,
} from "./models";

export const MAX_STEPS = 150;
export const MAX_STRENGTH = 30;
export const MAX_WAIT_MINUTES = 30;

/**
 * What the user fills in before generating. An empty api key means
 * anonymous.
 */
export interface GenerationForm {
    prompt: string;
    apiKey: string;
    model: string;
    models: string[];
    imageWidth: number;
    imageHeight: number;
    promptStrength: number;
    steps: number;
    nsfw: boolean;
    censorNsfw: boolean;
    maxWaitMinutes: number;
    seed: string;
    mode: GenerationMode;
    sourceImage?: string;
    initStrength: number;
    nimages: number;
}

export function defaultForm(settings: HordeSettings, selectedText = ""): GenerationForm {
    const models = availableModels(settings);
    return {
        prompt: selectedText,
        apiKey: settings.apiKey === ANONYMOUS_API_KEY ? "" : settings.apiKey,
        model: settings.model || DEFAULT_MODEL,
        models,
        imageWidth: settings.imageWidth ?? MIN_WIDTH,
        imageHeight: settings.imageHeight ?? MIN_HEIGHT,
        promptStrength: settings.promptStrength ?? 6.3,
        steps: settings.steps ?? 25,
        nsfw: settings.nsfw ?? false,
        censorNsfw: settings.censorNsfw ?? true,
        maxWaitMinutes: settings.maxWaitMinutes ?? 3,
        seed: settings.seed ?? "",
        mode: settings.mode ?? "MODE_TEXT2IMG",
        initStrength: settings.initStrength ?? 0.5,
        nimages: settings.nimages ?? 1,
    };
}

function outside(value: number, low: number, high: number): boolean {
    return !Number.isFinite(value) || value < low || value > high;
}

/**
 * Problems that keep the form from being submitted, none when it is ready.
 */
export function validateForm(form: GenerationForm): string[] {
    const problems: string[] = [];
    if (form.prompt.trim().length < MIN_PROMPT_LENGTH) {
        problems.push(
            `Please provide a prompt with at least ${MIN_PROMPT_LENGTH} characters`
        );
    }
    if (!form.model) {
        problems.push("Please choose a model");
    }
    if (outside(form.imageWidth, MIN_WIDTH, MAX_WIDTH)) {
        problems.push(`Width must be between ${MIN_WIDTH} and ${MAX_WIDTH}`);
    }
    if (outside(form.imageHeight, MIN_HEIGHT, MAX_HEIGHT)) {
        problems.push(`Height must be between ${MIN_HEIGHT} and ${MAX_HEIGHT}`);
    }
    if (outside(form.steps, 1, MAX_STEPS)) {
        problems.push(`Steps must be between 1 and ${MAX_STEPS}`);
    }
    if (outside(form.promptStrength, 0, MAX_STRENGTH)) {
        problems.push(`Strength must be between 0 and ${MAX_STRENGTH}`);
    }
    if (outside(form.maxWaitMinutes, 1, MAX_WAIT_MINUTES)) {
        problems.push(`Max wait must be between 1 and ${MAX_WAIT_MINUTES} minutes`);
    }
    if (!GENERATION_MODES.includes(form.mode)) {
        problems.push(`Unknown mode ${form.mode}`);
    } else if (form.mode !== "MODE_TEXT2IMG") {
        if (!form.sourceImage) {
            problems.push("A source image is required for image to image and inpainting");
        }
        if (outside(form.initStrength, 0, 1)) {
            problems.push("Init strength must be between 0 and 1");
        }
        if (outside(form.nimages, 1, 10)) {
            problems.push("Number of images must be between 1 and 10");
        }
    }
    return problems;
}

export function toGenerationOptions(form: GenerationForm): GenerationOptions {
    const options: GenerationOptions = {
        prompt: form.prompt.trim(),
        apiKey: form.apiKey.trim() || ANONYMOUS_API_KEY,
        model: form.model,
        imageWidth: form.imageWidth,
        imageHeight: form.imageHeight,
        promptStrength: form.promptStrength,
        steps: form.steps,
        seed: form.seed.trim(),
        nsfw: form.nsfw,
        censorNsfw: form.censorNsfw,
        maxWaitMinutes: form.maxWaitMinutes,
        mode: form.mode,
    };
    if (form.mode !== "MODE_TEXT2IMG") {
        options.sourceImage = form.sourceImage;
        options.initStrength = form.initStrength;
        options.nimages = form.nimages;
    }
    return options;
}
