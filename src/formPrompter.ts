import { GenerationForm, validateForm } from "./lib/form";

export type Ask = (question: string) => Promise<string>;

const MAX_ROUNDS = 5;

/** Answer that empties an optional field. */
export const CLEAR_ANSWER = "-";

export function numberAnswer(answer: string, current: number): number {
    const trimmed = answer.trim();
    if (!trimmed) {
        return current;
    }
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : NaN;
}

export function booleanAnswer(answer: string, current: boolean): boolean {
    const trimmed = answer.trim().toLowerCase();
    if (!trimmed) {
        return current;
    }
    return ["y", "yes", "true", "1"].includes(trimmed);
}

function yesNo(value: boolean): string {
    return value ? "Y/n" : "y/N";
}

/**
 * Fills the generation form by asking one question per field, the
 * current value being the answer when the user just presses enter.
 */
export class FormPrompter {
    constructor(private ask: Ask, private report: (problems: string[]) => void) {}

    private async text(label: string, current: string, clearable = false): Promise<string> {
        const hint = clearable && current ? `${current}, ${CLEAR_ANSWER} to clear` : current;
        const answer = (await this.ask(hint ? `${label} [${hint}]: ` : `${label}: `)).trim();
        if (clearable && answer === CLEAR_ANSWER) {
            return "";
        }
        return answer || current;
    }

    private async fill(form: GenerationForm): Promise<GenerationForm> {
        const filled = { ...form };
        filled.prompt = await this.text("Prompt", form.prompt);
        filled.model = await this.text(`Model (${form.models.join(", ")})`, form.model);
        filled.imageWidth = numberAnswer(
            await this.ask(`Width [${form.imageWidth}]: `),
            form.imageWidth
        );
        filled.imageHeight = numberAnswer(
            await this.ask(`Height [${form.imageHeight}]: `),
            form.imageHeight
        );
        filled.promptStrength = numberAnswer(
            await this.ask(`Strength [${form.promptStrength}]: `),
            form.promptStrength
        );
        filled.steps = numberAnswer(await this.ask(`Steps [${form.steps}]: `), form.steps);
        filled.nsfw = booleanAnswer(await this.ask(`NSFW (${yesNo(form.nsfw)}): `), form.nsfw);
        filled.censorNsfw = booleanAnswer(
            await this.ask(`Censor NSFW (${yesNo(form.censorNsfw)}): `),
            form.censorNsfw
        );
        filled.maxWaitMinutes = numberAnswer(
            await this.ask(`Max wait minutes [${form.maxWaitMinutes}]: `),
            form.maxWaitMinutes
        );
        filled.seed = await this.text("Seed", form.seed, true);
        filled.apiKey = await this.text("API key (empty for anonymous)", form.apiKey, true);
        return filled;
    }

    /**
     * Asks until the form validates. Null when the user gave up.
     */
    async prompt(form: GenerationForm): Promise<GenerationForm | null> {
        let current = form;
        for (let round = 0; round < MAX_ROUNDS; round++) {
            current = await this.fill(current);
            const problems = validateForm(current);
            if (problems.length === 0) {
                return current;
            }
            this.report(problems);
            current = {
                ...current,
                imageWidth: Number.isFinite(current.imageWidth) ? current.imageWidth : form.imageWidth,
                imageHeight: Number.isFinite(current.imageHeight) ? current.imageHeight : form.imageHeight,
                promptStrength: Number.isFinite(current.promptStrength)
                    ? current.promptStrength
                    : form.promptStrength,
                steps: Number.isFinite(current.steps) ? current.steps : form.steps,
                maxWaitMinutes: Number.isFinite(current.maxWaitMinutes)
                    ? current.maxWaitMinutes
                    : form.maxWaitMinutes,
            };
        }
        return null;
    }
}
