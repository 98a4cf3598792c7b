import os from "os";
import path from "path";
import dotenv from "dotenv";
dotenv.config();

export const MODEL_REFERENCE_URL =
    "https://raw.githubusercontent.com/Haidra-Org/AI-Horde-image-model-reference/main/stable_diffusion.json";

export interface Config {
    apiKey?: string;
    hordeBaseUrl: string;
    modelReferenceUrl: string;
    versionCheckUrl?: string;
    settingsDir: string;
    logFile: string;
    debug: boolean;
    requestTimeoutSeconds: number;
    newRelicLicenseKey?: string;
    bugsnagApiKey?: string;
}

function parseNumber(value: string | undefined, fallback: number): number {
    if (!value) {
        return fallback;
    }
    const parsed = parseInt(value, 10);
    return isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
    // Load config from environment variables
    const config: Config = {
        apiKey: env.HORDE_API_KEY || undefined,
        hordeBaseUrl: env.HORDE_URL || "https://aihorde.net/api",
        modelReferenceUrl: env.HORDE_MODEL_REFERENCE_URL || MODEL_REFERENCE_URL,
        versionCheckUrl: env.HORDE_VERSION_URL || undefined,
        settingsDir:
            env.HORDE_SETTINGS_DIR ||
            path.join(os.homedir(), ".config", "horde-writer"),
        logFile:
            env.HORDE_LOG_FILE || path.join(os.tmpdir(), "horde-writer.log"),
        debug: env.HORDE_DEBUG === "true",
        requestTimeoutSeconds: parseNumber(env.HORDE_REQUEST_TIMEOUT_SECONDS, 10),
        newRelicLicenseKey: env.NEW_RELIC_LICENSE_KEY || undefined,
        bugsnagApiKey: env.BUGSNAG_API_KEY || undefined,
    };
    return config;
};
