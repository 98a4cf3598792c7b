import { HordeApiError, NetworkError } from "./errors";
import { HordeApi } from "./hordeclient";
import { Logger } from "./logs";
import { ANONYMOUS_API_KEY, CLIENT_VERSION, REGISTER_URL } from "./models";
import { Informer } from "./progress";

/** session property telling the update was already checked */
export const PROPERTY_CURRENT_SESSION = "ai_horde_checked_update";

export interface UpdateNotice {
    message: string;
    url: string;
}

function versionParts(version: string): number[] {
    return version.split(".").map((part) => parseInt(part, 10) || 0);
}

/** negative when a is older than b */
export function compareVersions(a: string, b: string): number {
    const left = versionParts(a);
    const right = versionParts(b);
    for (let i = 0; i < Math.max(left.length, right.length); i++) {
        const diff = (left[i] || 0) - (right[i] || 0);
        if (diff !== 0) {
            return diff;
        }
    }
    return 0;
}

export function currentLanguage(env: NodeJS.ProcessEnv = process.env): string {
    const locale =
        env.LC_ALL || env.LC_MESSAGES || env.LANG || Intl.DateTimeFormat().resolvedOptions().locale;
    return (locale || "en").substring(0, 2).toLowerCase();
}

export class UpdateChecker {
    constructor(
        private api: HordeApi,
        private informer: Informer,
        private logger: Logger,
        private versionCheckUrl?: string,
        private localVersion: string = CLIENT_VERSION,
        private language: string = currentLanguage()
    ) {}

    /**
     * Checks once per session whether a newer release exists. The notice
     * is empty when the installed version is the latest one.
     */
    async checkUpdate(): Promise<UpdateNotice> {
        const none: UpdateNotice = { message: "", url: "" };
        if (!this.versionCheckUrl) {
            return none;
        }
        if (this.informer.getProperty(PROPERTY_CURRENT_SESSION)) {
            this.logger.log("We already checked for a new version during this session");
            return none;
        }
        this.logger.log("Checking for update");
        try {
            const data = await this.api.getVersionInfo(this.versionCheckUrl);
            this.informer.setProperty(PROPERTY_CURRENT_SESSION, true);
            if (typeof data.version !== "string") {
                // deprecated format, the installed version is newer
                return none;
            }
            if (compareVersions(this.localVersion, data.version) < 0) {
                return {
                    message: data.message[this.language] || data.message["en"] || "",
                    url: data.url || this.versionCheckUrl,
                };
            }
            return none;
        } catch (e) {
            if (e instanceof HordeApiError || e instanceof NetworkError) {
                return {
                    message:
                        "Failed to check for most recent version, check your Internet connection",
                    url: "",
                };
            }
            throw e;
        }
    }
}

export async function getBalance(api: HordeApi, apiKey: string): Promise<string> {
    if (apiKey === ANONYMOUS_API_KEY) {
        return `Register at ${REGISTER_URL}`;
    }
    api.setApiKey(apiKey);
    const user = await api.findUser();
    return `You have ${user.kudos} kudos`;
}
