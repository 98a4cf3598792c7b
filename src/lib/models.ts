export type GenerationMode = "MODE_TEXT2IMG" | "MODE_IMG2IMG" | "MODE_INPAINTING";

export const GENERATION_MODES: GenerationMode[] = [
    "MODE_TEXT2IMG",
    "MODE_IMG2IMG",
    "MODE_INPAINTING",
];

export const CLIENT_NAME = "horde-writer";
export const CLIENT_VERSION = "0.5.0";

/** api key used by AIHorde for anonymous requests */
export const ANONYMOUS_API_KEY = "0000000000";

export const DEFAULT_MODEL = "stable_diffusion";
export const DEFAULT_INPAINT_MODEL = "stable_diffusion_inpainting";

export const MIN_WIDTH = 384;
export const MAX_WIDTH = 1024;
export const MIN_HEIGHT = 384;
export const MAX_HEIGHT = 1024;
export const MIN_PROMPT_LENGTH = 10;

export const HELP_URL = "https://aihorde.net/faq";
export const REGISTER_URL = "https://aihorde.net/register";

// Initial lists, replaced by the most used models once fetched from AIHorde
export const MODELS = [
    "Deliberate",
    "Dreamshaper",
    "NatViS",
    "noob_v_pencil XL",
    "Nova Anime XL",
    "Prefect Pony",
    "Realistic Vision",
    "stable_diffusion",
    "Ultraspice",
    "Unstable Diffusers XL",
    "WAI-ANI-NSFW-PONYXL",
];

export const INPAINT_MODELS = [
    "A-Zovya RPG Inpainting",
    "Anything Diffusion Inpainting",
    "Epic Diffusion Inpainting",
    "iCoMix Inpainting",
    "Realistic Vision Inpainting",
    "stable_diffusion_inpainting",
];

export interface GenerationOptions {
    prompt: string;
    model: string;
    imageWidth: number;
    imageHeight: number;
    /** cfg scale */
    promptStrength: number;
    steps: number;
    seed: string;
    nsfw: boolean;
    censorNsfw: boolean;
    apiKey: string;
    maxWaitMinutes: number;
    mode?: GenerationMode;
    /** base64 encoded webp, required by the image modes */
    sourceImage?: string;
    initStrength?: number;
    nimages?: number;
}

export type RequirementValue = number | string | boolean | number[] | string[];

export interface ModelRequirements {
    [name: string]: RequirementValue;
}

export interface LocalSettings {
    dateRefreshedModels?: string;
    models?: string[];
    requirements?: { [model: string]: ModelRequirements };
}

export interface HordeSettings extends Partial<GenerationOptions> {
    apiKey: string;
    defaultModel?: string;
    localSettings?: LocalSettings;
}

export type ParamValue = number | string | boolean | undefined;

export interface HordeRequestParams {
    [name: string]: ParamValue;
    cfg_scale: number;
    steps: number;
    seed?: string;
    width: number;
    height: number;
    n?: number;
    denoising_strength?: number;
    sampler_name?: string;
}

export interface HordeRequestPayload {
    params: HordeRequestParams;
    prompt: string;
    nsfw: boolean;
    censor_nsfw: boolean;
    r2: boolean;
    models: string[];
    source_image?: string;
    source_processing?: "img2img" | "inpainting";
}

export interface GenerationWarning {
    code?: string;
    message: string;
}

export interface SubmitResult {
    id: string;
    kudos?: number;
    message?: string;
    warnings?: GenerationWarning[];
}

export interface RequestStatusCheck {
    finished: number;
    processing: number;
    restarted: number;
    waiting: number;
    done: boolean;
    faulted: boolean;
    wait_time: number;
    queue_position: number;
    kudos: number;
    is_possible: boolean;
}

export interface Generation {
    id?: string;
    img: string;
    seed: string;
    censored: boolean;
    model?: string;
    worker_id?: string;
    worker_name?: string;
}

export interface RequestStatus extends RequestStatusCheck {
    generations: Generation[];
}

export interface HordeUser {
    username: string;
    kudos: number;
}

export interface ModelStats {
    month: { [model: string]: number };
}

export interface ModelReferenceEntry {
    name?: string;
    trigger?: string[];
    requirements?: { [name: string]: RequirementValue };
}

export interface ModelReference {
    [model: string]: ModelReferenceEntry;
}

export interface VersionInfo {
    version: string | number;
    message: { [lang: string]: string };
    /** where to get the new version */
    url?: string;
}

export interface GeneratedImage {
    path: string;
    seed: string;
    model: string;
}
