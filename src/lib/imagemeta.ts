import { HordeSettings } from "./models";

const PLACEHOLDER = "AIHorde will be invoked and this image will appear";

/** identifier of an inserted image */
export function imageName(settings: HordeSettings): string {
    if (!settings.prompt) {
        return PLACEHOLDER;
    }
    return `${settings.prompt} ${settings.model}`;
}

export function imageTitle(settings: HordeSettings): string {
    if (!settings.prompt) {
        return PLACEHOLDER;
    }
    return `${settings.prompt} generated by AIHorde`;
}

// for assistive technologies
export function imageTooltip(settings: HordeSettings): string {
    if (!settings.prompt) {
        return PLACEHOLDER;
    }
    return `${settings.prompt} with ${settings.model} generated by AIHorde`;
}

export function imageCaption(settings: HordeSettings): string {
    return `${settings.prompt || ""} by ${settings.model || ""}`;
}

const DESCRIBED: Array<[string, keyof HordeSettings]> = [
    ["prompt", "prompt"],
    ["model", "model"],
    ["seed", "seed"],
    ["image_width", "imageWidth"],
    ["image_height", "imageHeight"],
    ["prompt_strength", "promptStrength"],
    ["steps", "steps"],
    ["nsfw", "nsfw"],
    ["censor_nsfw", "censorNsfw"],
];

/**
 * Everything needed to generate the same image again, one
 * "key : value" line per setting.
 */
export function imageDescription(settings: HordeSettings): string {
    if (!settings.prompt) {
        return "AIHorde shall be working sometime in the future";
    }
    return DESCRIBED.map(([label, key]) => `${label} : ${String(settings[key] ?? "")}`).join(
        "\n"
    );
}
