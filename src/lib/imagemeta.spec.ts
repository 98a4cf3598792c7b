import {
    imageCaption,
    imageDescription,
    imageName,
    imageTitle,
    imageTooltip,
} from "./imagemeta";
import { ANONYMOUS_API_KEY, HordeSettings } from "./models";

describe("image metadata", () => {
    const settings: HordeSettings = {
        apiKey: ANONYMOUS_API_KEY,
        prompt: "a quiet harbor at night",
        model: "Deliberate",
        seed: "42",
        imageWidth: 512,
        imageHeight: 384,
        promptStrength: 7,
        steps: 30,
        nsfw: false,
        censorNsfw: true,
    };

    it("should name the image after the prompt and model", () => {
        expect(imageName(settings)).toBe("a quiet harbor at night Deliberate");
        expect(imageTitle(settings)).toBe("a quiet harbor at night generated by AIHorde");
        expect(imageTooltip(settings)).toBe(
            "a quiet harbor at night with Deliberate generated by AIHorde"
        );
        expect(imageCaption(settings)).toBe("a quiet harbor at night by Deliberate");
    });

    it("should describe how to generate it again", () => {
        expect(imageDescription(settings)).toBe(
            [
                "prompt : a quiet harbor at night",
                "model : Deliberate",
                "seed : 42",
                "image_width : 512",
                "image_height : 384",
                "prompt_strength : 7",
                "steps : 30",
                "nsfw : false",
                "censor_nsfw : true",
            ].join("\n")
        );
    });

    describe("before any prompt", () => {
        const empty: HordeSettings = { apiKey: ANONYMOUS_API_KEY };

        it("should use placeholders", () => {
            expect(imageTitle(empty)).toBe("AIHorde will be invoked and this image will appear");
            expect(imageDescription(empty)).toBe(
                "AIHorde shall be working sometime in the future"
            );
        });
    });
});
