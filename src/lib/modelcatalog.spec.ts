import moment from "moment";
import { FakeClock } from "./clock";
import { ErrorFactory } from "./errorFactory";
import { HordeApiError, NetworkError } from "./errors";
import { MockHordeApi } from "./hordeclient";
import { NullLogger } from "./logs";
import { ModelCatalog, availableModels, newModelsMessage } from "./modelcatalog";
import { ANONYMOUS_API_KEY, HordeSettings, MODELS } from "./models";
import { MockInformer } from "./progress";

describe("ModelCatalog", () => {
    let api: MockHordeApi;
    let informer: MockInformer;
    let clock: FakeClock;
    let catalog: ModelCatalog;
    let settings: HordeSettings;

    beforeEach(() => {
        api = new MockHordeApi();
        api.modelStats = {
            month: {
                Alpha: 10,
                "beta inpainting": 50,
                Gamma: 30,
                Delta: 20,
                stable_diffusion: 5,
            },
        };
        informer = new MockInformer();
        clock = new FakeClock(moment("2025-08-20", "YYYY-MM-DD"));
        catalog = new ModelCatalog(api, informer, clock, new NullLogger());
        settings = { apiKey: ANONYMOUS_API_KEY, model: "Gamma" };
    });

    describe("when the models were refreshed 2 days ago", () => {
        beforeEach(async () => {
            settings.localSettings = { dateRefreshedModels: "2025-08-18" };
            await catalog.refreshModels(settings);
        });

        it("should not ask AIHorde", () => {
            expect(api.modelStatsCalls).toBe(0);
            expect(settings.localSettings).toEqual({ dateRefreshedModels: "2025-08-18" });
        });
    });

    describe("when the models were never refreshed", () => {
        beforeEach(async () => {
            api.modelReference = {
                Gamma: { requirements: { min_steps: 30, max_steps: 50 } },
            };
            await catalog.refreshModels(settings);
        });

        it("should store the most used models sorted by name", () => {
            expect(settings.localSettings?.models).toEqual([
                "Alpha",
                "Delta",
                "Gamma",
                "stable_diffusion",
            ]);
        });

        it("should announce the new models by popularity", () => {
            expect(informer.messages).toEqual([
                { message: "We have 3 new models:\n * Gamma\n * Delta\n * Alpha" },
            ]);
        });

        it("should remember the day of the refresh", () => {
            expect(settings.localSettings?.dateRefreshedModels).toBe("2025-08-20");
        });

        it("should store the requirements of the models", () => {
            expect(settings.localSettings?.requirements).toEqual({
                Gamma: { range_steps: [30, 50] },
            });
        });

        it("should keep the chosen model", () => {
            expect(settings.model).toBe("Gamma");
        });

        describe("when a new model shows up a week later", () => {
            beforeEach(async () => {
                informer.messages = [];
                api.modelStats.month["Epsilon"] = 1;
                clock.setNow(moment("2025-08-27", "YYYY-MM-DD"));
                await catalog.refreshModels(settings);
            });

            it("should announce the single model", () => {
                expect(informer.messages).toEqual([
                    { message: "We have a new model:\n\n * Epsilon" },
                ]);
            });

            it("should add it to the list", () => {
                expect(settings.localSettings?.models).toEqual([
                    "Alpha",
                    "Delta",
                    "Epsilon",
                    "Gamma",
                    "stable_diffusion",
                ]);
            });
        });
    });

    describe("when the chosen model is no longer offered", () => {
        beforeEach(async () => {
            settings.model = "Retired";
            await catalog.refreshModels(settings);
        });

        it("should switch to the first model", () => {
            expect(settings.model).toBe("Alpha");
        });
    });

    describe("when inpainting", () => {
        beforeEach(async () => {
            settings = { apiKey: ANONYMOUS_API_KEY, mode: "MODE_INPAINTING" };
            await catalog.refreshModels(settings);
        });

        it("should not replace the list with too few models", () => {
            expect(settings.localSettings?.models).toBeUndefined();
            expect(informer.messages).toEqual([]);
        });

        it("should pick the first inpainting model", () => {
            expect(settings.model).toBe("A-Zovya RPG Inpainting");
        });
    });

    describe("when AIHorde cannot be reached", () => {
        beforeEach(async () => {
            api.failures.getModelStats = new ErrorFactory([new NetworkError("connect ECONNREFUSED")]);
            await catalog.refreshModels(settings);
        });

        it("should tell the user", () => {
            expect(informer.errors).toEqual([
                { message: "Failed to get latest models, check your Internet connection" },
            ]);
            expect(settings.localSettings).toBeUndefined();
        });
    });

    describe("when AIHorde answers with an error", () => {
        beforeEach(async () => {
            api.failures.getModelStats = new ErrorFactory([new HordeApiError(500, "Internal")]);
            await catalog.refreshModels(settings);
        });

        it("should tell the user", () => {
            expect(informer.errors.length).toBe(1);
        });
    });

    describe("when the request times out", () => {
        beforeEach(async () => {
            api.failures.getModelStats = new ErrorFactory([new NetworkError("timeout", true)]);
            await catalog.refreshModels(settings);
        });

        it("should give up silently", () => {
            expect(informer.errors).toEqual([]);
            expect(settings.localSettings).toBeUndefined();
        });
    });

    describe("when the model reference is unavailable", () => {
        beforeEach(async () => {
            api.failures.getModelReference = new ErrorFactory([new NetworkError("down")]);
            await catalog.refreshModels(settings);
        });

        it("should still refresh the models", () => {
            expect(settings.localSettings?.dateRefreshedModels).toBe("2025-08-20");
            expect(settings.localSettings?.requirements).toBeUndefined();
        });
    });

    describe("requirementsFor", () => {
        beforeEach(() => {
            api.modelReference = { Gamma: { requirements: { cfg_scale: 2 } } };
        });

        it("should download the table the first time", async () => {
            expect(await catalog.requirementsFor(settings, "Gamma")).toEqual({ cfg_scale: 2 });
            expect(settings.localSettings?.requirements).toEqual({ Gamma: { cfg_scale: 2 } });
        });

        it("should use the stored table afterwards", async () => {
            settings.localSettings = { requirements: {} };
            expect(await catalog.requirementsFor(settings, "Gamma")).toBeUndefined();
        });
    });
});

describe("newModelsMessage", () => {
    it("should list at most 10 models", () => {
        const names = Array.from({ length: 12 }, (_, i) => `Model ${i + 1}`);
        expect(newModelsMessage(names)).toBe(
            "We have 12 new models, including:\n * " + names.slice(0, 10).join("\n * ")
        );
    });
});

describe("availableModels", () => {
    it("should fall back to the initial list", () => {
        expect(availableModels({ apiKey: ANONYMOUS_API_KEY })).toEqual(MODELS);
        expect(
            availableModels({ apiKey: ANONYMOUS_API_KEY, localSettings: { models: ["Alpha"] } })
        ).toEqual(["Alpha"]);
    });
});
