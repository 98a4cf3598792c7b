import {
    HordeSettings,
    ModelReference,
    ModelRequirements,
    ParamValue,
    RequirementValue,
} from "./models";

const RANGE_PREFIX = "range_";

function isNumberPair(value: RequirementValue): value is number[] {
    return (
        Array.isArray(value) &&
        value.length === 2 &&
        typeof value[0] === "number" &&
        typeof value[1] === "number"
    );
}

/**
 * Turns the requirements of the model reference into a table per model.
 *
 * min_X and max_X collapse into range_X = [min, max], a lone max_X starts
 * the range at 0 and a lone min_X pins the value. Ranges with equal ends
 * become the fixed value X.
 */
export function parseModelReference(reference: ModelReference): {
    [model: string]: ModelRequirements;
} {
    const result: { [model: string]: ModelRequirements } = {};
    for (const model of Object.keys(reference)) {
        const requirements = reference[model].requirements;
        if (!requirements) {
            continue;
        }
        const table: ModelRequirements = {};
        const ranges: { [name: string]: [number, number] } = {};
        for (const name of Object.keys(requirements)) {
            const value = requirements[name];
            const bound = name.startsWith("max_")
                ? "max"
                : name.startsWith("min_")
                ? "min"
                : null;
            if (bound && typeof value === "number") {
                const rangeName = RANGE_PREFIX + name.substring(4);
                const range = ranges[rangeName];
                if (bound === "max") {
                    ranges[rangeName] = range ? [range[0], value] : [0, value];
                } else {
                    ranges[rangeName] = range ? [value, range[1]] : [value, value];
                }
            } else {
                table[name] = value;
            }
        }
        for (const rangeName of Object.keys(ranges)) {
            const [low, high] = ranges[rangeName];
            if (low === high) {
                table[rangeName.substring(RANGE_PREFIX.length)] = low;
            } else {
                table[rangeName] = [low, high];
            }
        }
        result[model] = table;
    }
    return result;
}

/** "samplers" -> "sampler_name", "schedulers" -> "scheduler_name" */
export function listParamName(key: string): string {
    const singular = key.endsWith("s") ? key.substring(0, key.length - 1) : key;
    return `${singular}_name`;
}

/**
 * The parameter overrides a request needs to honor the requirement table
 * of its model. Values already inside a range or list are kept.
 */
export function resolveRequirements(
    table: ModelRequirements | undefined,
    params: { [name: string]: ParamValue }
): { [name: string]: ParamValue } {
    const overrides: { [name: string]: ParamValue } = {};
    if (!table) {
        return overrides;
    }
    for (const key of Object.keys(table)) {
        const value = table[key];
        if (key.startsWith(RANGE_PREFIX) && isNumberPair(value)) {
            const name = key.substring(RANGE_PREFIX.length);
            const [low, high] = value;
            const current = params[name];
            if (typeof current !== "number" || current < low) {
                overrides[name] = low;
            } else if (current > high) {
                overrides[name] = high;
            }
        } else if (Array.isArray(value)) {
            if (value.length === 0) {
                continue;
            }
            const name = listParamName(key);
            const allowed: Array<number | string> = value;
            const current = params[name];
            if (
                (typeof current !== "string" && typeof current !== "number") ||
                !allowed.includes(current)
            ) {
                overrides[name] = allowed[0];
            }
        } else {
            overrides[key] = value;
        }
    }
    return overrides;
}

/**
 * Fixed values and ranges stored for a model, for validating user input.
 */
export function restrictionsFor(settings: HordeSettings, model: string): ModelRequirements {
    return settings.localSettings?.requirements?.[model] || {};
}
