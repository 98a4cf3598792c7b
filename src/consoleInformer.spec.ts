import { ConsoleInformer, StatusStream } from "./consoleInformer";

class RecordingStream implements StatusStream {
    written: string[] = [];

    constructor(public isTTY: boolean) {}

    write(text: string) {
        this.written.push(text);
        return true;
    }
}

describe("ConsoleInformer", () => {
    describe("without a terminal", () => {
        let out: RecordingStream;
        let informer: ConsoleInformer;

        beforeEach(() => {
            out = new RecordingStream(false);
            informer = new ConsoleInformer("/tmp/horde-writer", out);
        });

        it("should print messages with their link", () => {
            informer.showError("Get a free API Key", "https://aihorde.net/register");
            informer.showMessage("Your image was generated", "", "AIHorde has good news");
            expect(out.written).toEqual([
                "[error] Get a free API Key\n",
                "  https://aihorde.net/register\n",
                "[AIHorde has good news] Your image was generated\n",
            ]);
        });

        it("should print one line per status", () => {
            informer.updateStatus("Generating...", 25);
            informer.setFinished();
            expect(out.written).toEqual([" 25% Generating...\n"]);
        });

        it("should keep properties for the session", () => {
            informer.setProperty("ai_horde_checked_update", true);
            expect(informer.getProperty("ai_horde_checked_update")).toBe(true);
            expect(informer.storeDirectory()).toBe("/tmp/horde-writer");
        });
    });

    describe("on a terminal", () => {
        let out: RecordingStream;
        let informer: ConsoleInformer;

        beforeEach(() => {
            out = new RecordingStream(true);
            informer = new ConsoleInformer("/tmp/horde-writer", out);
        });

        it("should rewrite the status line in place", () => {
            informer.updateStatus("Queue position: 2", 5);
            informer.showMessage("We have a new model");
            informer.updateStatus("Generating...", 40);
            informer.setFinished();
            expect(out.written).toEqual([
                "\r\x1b[K  5% Queue position: 2",
                "\r\x1b[K",
                "[info] We have a new model\n",
                "\r\x1b[K 40% Generating...",
                "\n",
            ]);
        });
    });
});
