import * as readline from "readline/promises";
import { parseArgs } from "util";
import { ConsoleInformer, StatusStream } from "./consoleInformer";
import { FormPrompter } from "./formPrompter";
import { Clock } from "./lib/clock";
import { Config, loadConfig } from "./lib/config";
import {
    Position,
    Selection,
    TextDocument,
    insertImage,
    openDocument,
    parsePosition,
    parseSelection,
    saveDocument,
    selectedText,
} from "./lib/document";
import { errorMessage } from "./lib/errors";
import { startErrorReporting } from "./lib/errorReporting";
import { GenerationForm, defaultForm, toGenerationOptions, validateForm } from "./lib/form";
import { HordeApi, HordeClient } from "./lib/hordeclient";
import { HordeGenerator } from "./lib/hordegenerator";
import { ImageFormat, placeImage, readSourceImage } from "./lib/imagefiles";
import {
    imageCaption,
    imageDescription,
    imageTitle,
    imageTooltip,
} from "./lib/imagemeta";
import { LogsClient } from "./lib/logs";
import { availableModels } from "./lib/modelcatalog";
import {
    ANONYMOUS_API_KEY,
    CLIENT_VERSION,
    GENERATION_MODES,
    GeneratedImage,
    GenerationMode,
    GenerationOptions,
    HordeSettings,
} from "./lib/models";
import { Informer } from "./lib/progress";
import { SettingsStore } from "./lib/settings";
import { Sleeper } from "./lib/sleep";

export const USAGE = `Usage: horde-writer <command> [options]

Commands:
  generate [PROMPT]   generate an image with AIHorde
  models              list the models offered
  balance             show the kudos of your API key
  help                show this message

Generate options:
  --model NAME            model to use
  --width N, --height N   image size, 384 to 1024
  --steps N               sampling steps
  --strength N            prompt strength (cfg scale)
  --seed TEXT             seed, random when empty
  --nsfw                  allow NSFW images
  --no-censor             do not censor NSFW images
  --wait MINUTES          maximum time to wait for the image
  --api-key KEY           AIHorde API key, anonymous by default
  --mode MODE             MODE_TEXT2IMG, MODE_IMG2IMG or MODE_INPAINTING
  --source FILE           source image for the image modes
  --init-strength N       how much of the source image is kept, 0 to 1
  --count N               number of images in the image modes
  --out DIR               where downloaded images are written
  --doc FILE              Markdown or HTML document to insert the image into
  --at LINE:COL           cursor position in the document
  --select L:C-L:C        selection replaced by the image, also the default prompt
  --format webp|png       format of the image inserted in the document
  --interactive           ask for every option
`;

export interface GenerateCommand {
    name: "generate";
    prompt?: string;
    form: Partial<GenerationForm>;
    sourceFile?: string;
    outputDir?: string;
    doc?: string;
    at?: Position;
    select?: Selection;
    format: ImageFormat;
    interactive: boolean;
}

export type Command =
    | GenerateCommand
    | { name: "models" }
    | { name: "balance"; apiKey?: string }
    | { name: "help" };

function toNumber(option: string, value: string | undefined): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        throw new Error(`--${option} expects a number, got "${value}"`);
    }
    return parsed;
}

function isMode(value: string): value is GenerationMode {
    return GENERATION_MODES.some((mode) => mode === value);
}

function isFormat(value: string): value is ImageFormat {
    return value === "webp" || value === "png";
}

export function parseCommand(argv: string[]): Command {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        strict: true,
        options: {
            model: { type: "string" },
            width: { type: "string" },
            height: { type: "string" },
            steps: { type: "string" },
            strength: { type: "string" },
            seed: { type: "string" },
            nsfw: { type: "boolean" },
            "no-censor": { type: "boolean" },
            wait: { type: "string" },
            "api-key": { type: "string" },
            mode: { type: "string" },
            source: { type: "string" },
            "init-strength": { type: "string" },
            count: { type: "string" },
            out: { type: "string" },
            doc: { type: "string" },
            at: { type: "string" },
            select: { type: "string" },
            format: { type: "string" },
            interactive: { type: "boolean", short: "i" },
            help: { type: "boolean", short: "h" },
        },
    });

    const [name, ...rest] = positionals;
    if (values.help || !name || name === "help") {
        return { name: "help" };
    }
    if (name === "models") {
        return { name: "models" };
    }
    if (name === "balance") {
        return { name: "balance", apiKey: values["api-key"] };
    }
    if (name !== "generate") {
        throw new Error(`Unknown command "${name}"`);
    }

    const form: Partial<GenerationForm> = {};
    const numbers: Array<[keyof GenerationForm, string, string | undefined]> = [
        ["imageWidth", "width", values.width],
        ["imageHeight", "height", values.height],
        ["steps", "steps", values.steps],
        ["promptStrength", "strength", values.strength],
        ["maxWaitMinutes", "wait", values.wait],
        ["initStrength", "init-strength", values["init-strength"]],
        ["nimages", "count", values.count],
    ];
    for (const [field, option, value] of numbers) {
        const parsed = toNumber(option, value);
        if (parsed !== undefined) {
            Object.assign(form, { [field]: parsed });
        }
    }
    if (values.model) {
        form.model = values.model;
    }
    if (values.seed !== undefined) {
        form.seed = values.seed;
    }
    if (values.nsfw) {
        form.nsfw = true;
    }
    if (values["no-censor"]) {
        form.censorNsfw = false;
    }
    if (values["api-key"] !== undefined) {
        form.apiKey = values["api-key"];
    }
    if (values.mode !== undefined) {
        if (!isMode(values.mode)) {
            throw new Error(`--mode expects one of ${GENERATION_MODES.join(", ")}`);
        }
        form.mode = values.mode;
    }
    const format = values.format || "webp";
    if (!isFormat(format)) {
        throw new Error("--format expects webp or png");
    }

    return {
        name: "generate",
        prompt: rest.length > 0 ? rest.join(" ") : undefined,
        form,
        sourceFile: values.source,
        outputDir: values.out,
        doc: values.doc,
        at: values.at ? parsePosition(values.at) : undefined,
        select: values.select ? parseSelection(values.select) : undefined,
        format,
        interactive: !!values.interactive,
    };
}

export interface InterruptSource {
    once(event: "SIGINT", listener: () => void): unknown;
    removeListener(event: "SIGINT", listener: () => void): unknown;
}

/**
 * What the commands run against. Anything left out is built from the
 * config: the AIHorde client, a console informer, the process streams.
 */
export interface CliServices {
    api?: HordeApi;
    informer?: Informer;
    stdout?: StatusStream;
    stderr?: StatusStream;
    clock?: Clock;
    sleep?: Sleeper;
    /** the process by default */
    signals?: InterruptSource;
}

interface Context {
    config: Config;
    logger: LogsClient;
    informer: Informer;
    stdout: StatusStream;
    signals: InterruptSource;
    store: SettingsStore;
    settings: HordeSettings;
    generator: HordeGenerator;
}

async function createContext(
    config: Config,
    services: CliServices,
    outputDir?: string
): Promise<Context> {
    const logger = new LogsClient({
        logFile: config.logFile,
        debug: config.debug,
        newRelicLicenseKey: config.newRelicLicenseKey,
    });
    const informer =
        services.informer || new ConsoleInformer(config.settingsDir, services.stderr);
    const store = new SettingsStore(config.settingsDir);
    const settings = await store.load();
    if (config.apiKey && settings.apiKey === ANONYMOUS_API_KEY) {
        settings.apiKey = config.apiKey;
    }
    const api =
        services.api ||
        new HordeClient(settings.apiKey, {
            baseUrl: config.hordeBaseUrl,
            modelReferenceUrl: config.modelReferenceUrl,
            timeoutSeconds: config.requestTimeoutSeconds,
            logger,
        });
    const generator = new HordeGenerator(api, informer, settings, {
        clock: services.clock,
        sleep: services.sleep,
        logger,
        outputDir,
        versionCheckUrl: config.versionCheckUrl,
    });
    return {
        config,
        logger,
        informer,
        stdout: services.stdout || process.stdout,
        signals: services.signals || process,
        store,
        settings,
        generator,
    };
}

async function askForm(form: GenerationForm, informer: Informer): Promise<GenerationForm | null> {
    const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
    try {
        const prompter = new FormPrompter(
            (question) => rl.question(question),
            (problems) => informer.showError(problems.join("\n"))
        );
        return await prompter.prompt(form);
    } finally {
        rl.close();
    }
}

async function insertIntoDocument(
    doc: TextDocument,
    image: GeneratedImage,
    options: GenerationOptions,
    command: GenerateCommand
): Promise<TextDocument> {
    const placed = await placeImage(image.path, doc, command.format);
    const described: HordeSettings = {
        ...options,
        model: image.model,
        seed: image.seed || options.seed,
    };
    const updated = insertImage(
        doc,
        {
            src: placed.src,
            title: imageTitle(described),
            tooltip: imageTooltip(described),
            caption: imageCaption(described),
            description: imageDescription(described),
            width: placed.width,
            height: placed.height,
        },
        command.select || command.at
    );
    await saveDocument(updated);
    return updated;
}

async function generate(ctx: Context, command: GenerateCommand): Promise<number> {
    const { informer, generator, signals, stdout } = ctx;
    const doc = command.doc ? await openDocument(command.doc) : undefined;
    const selected = doc ? selectedText(doc, command.select) : "";

    let form: GenerationForm = {
        ...defaultForm(generator.getSettings(), selected.trim()),
        ...command.form,
    };
    if (command.prompt) {
        form.prompt = command.prompt;
    }
    if (command.sourceFile) {
        form.sourceImage = await readSourceImage(command.sourceFile);
    }

    const interactive = command.interactive || (!form.prompt && !!process.stdin.isTTY);
    if (interactive) {
        const answered = await askForm(form, informer);
        if (!answered) {
            ctx.logger.log("User gave up, nothing to do");
            return 1;
        }
        form = answered;
    }
    const problems = validateForm(form);
    if (problems.length > 0) {
        informer.showError(problems.join("\n"));
        return 1;
    }

    const options = toGenerationOptions(form);
    const controller = new AbortController();
    const onInterrupt = () => controller.abort();
    signals.once("SIGINT", onInterrupt);
    let images: GeneratedImage[];
    try {
        images = await generator.generateImage(options, controller.signal);
    } finally {
        signals.removeListener("SIGINT", onInterrupt);
    }
    if (images.length === 0) {
        return 1;
    }
    informer.showMessage("Your image was generated", "", "AIHorde has good news");

    if (doc) {
        const updated = await insertIntoDocument(doc, images[0], options, command);
        stdout.write(`${updated.path}\n`);
    } else {
        for (const image of images) {
            stdout.write(`${image.path}\n`);
        }
    }
    await ctx.store.save(generator.getSettings());
    return 0;
}

async function listModels(ctx: Context): Promise<number> {
    const settings = ctx.generator.getSettings();
    await ctx.generator.catalog.refreshModels(settings);
    for (const model of availableModels(settings)) {
        ctx.stdout.write(`${model}\n`);
    }
    await ctx.store.save(settings);
    return 0;
}

async function showBalance(ctx: Context, apiKey?: string): Promise<number> {
    if (apiKey) {
        ctx.generator.setSettings({ ...ctx.generator.getSettings(), apiKey });
    }
    try {
        ctx.stdout.write(`${await ctx.generator.getBalance()}\n`);
        return 0;
    } catch (e) {
        ctx.informer.showError(`AIhorde response: '${errorMessage(e)}'.`);
        return 1;
    }
}

export async function run(
    argv: string[],
    config: Config = loadConfig(),
    services: CliServices = {}
): Promise<number> {
    let command: Command;
    try {
        command = parseCommand(argv);
    } catch (e) {
        (services.stderr || process.stderr).write(`${errorMessage(e)}\n\n${USAGE}`);
        return 2;
    }
    if (command.name === "help") {
        (services.stdout || process.stdout).write(USAGE);
        return 0;
    }

    startErrorReporting(config.bugsnagApiKey, CLIENT_VERSION);
    const ctx = await createContext(
        config,
        services,
        command.name === "generate" ? command.outputDir : undefined
    );
    try {
        if (command.name === "generate") {
            return await generate(ctx, command);
        }
        if (command.name === "models") {
            return await listModels(ctx);
        }
        return await showBalance(ctx, command.apiKey);
    } finally {
        await ctx.logger.stop();
    }
}
