import fs from "fs";
import path from "path";
import { ANONYMOUS_API_KEY, HordeSettings } from "./models";

export const SETTINGS_FILENAME = "hordesettings.json";

/**
 * Stores the user settings as JSON, readable only by the user since
 * they carry the api key.
 */
export class SettingsStore {
    readonly settingsFile: string;

    constructor(readonly directory: string) {
        this.settingsFile = path.join(directory, SETTINGS_FILENAME);
    }

    async load(): Promise<HordeSettings> {
        if (!fs.existsSync(this.settingsFile)) {
            return { apiKey: ANONYMOUS_API_KEY };
        }
        const data = await fs.promises.readFile(this.settingsFile, "utf-8");
        const settings = JSON.parse(data) as HordeSettings;
        if (!settings.apiKey) {
            settings.apiKey = ANONYMOUS_API_KEY;
        }
        return settings;
    }

    async save(settings: HordeSettings): Promise<void> {
        await fs.promises.mkdir(this.directory, { recursive: true });
        const stored: HordeSettings = { ...settings };
        // the source image is per request
        delete stored.sourceImage;
        await fs.promises.writeFile(this.settingsFile, JSON.stringify(stored, null, 2), {
            mode: 0o600,
        });
        await fs.promises.chmod(this.settingsFile, 0o600);
    }
}
