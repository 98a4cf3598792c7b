import fs from "fs";
import os from "os";
import path from "path";
import { LogsClient, redact } from "./logs";

describe("redact", () => {
    it("should hide api keys", () => {
        expect(redact({ apikey: "test-key", api_key: "test-key", apiKey: "test-key", model: "m" })).toEqual({
            apikey: "***",
            api_key: "***",
            apiKey: "***",
            model: "m",
        });
        expect(redact()).toBeUndefined();
    });
});

describe("LogsClient", () => {
    let dir: string;
    let logFile: string;
    let client: LogsClient;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "horde-logs-"));
        logFile = path.join(dir, "horde-writer.log");
        client = new LogsClient({ logFile });
    });

    afterEach(async () => {
        await client.stop();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should append timestamped lines to the file", () => {
        client.log("Submitting generation", { apikey: "test-key", steps: 25 });
        client.log("Horde Contacted");
        const lines = fs.readFileSync(logFile, "utf-8").split("\n");
        expect(lines.length).toBe(3);
        expect(lines[0]).toMatch(
            /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] Submitting generation \{"apikey":"\*\*\*","steps":25\}$/
        );
        expect(lines[1]).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] Horde Contacted$/);
        expect(lines[2]).toBe("");
    });

    it("should keep going when the file cannot be written", () => {
        client = new LogsClient({ logFile: path.join(dir, "missing", "horde-writer.log") });
        expect(() => client.log("Horde Contacted")).not.toThrow();
    });
});
