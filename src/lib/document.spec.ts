import fs from "fs";
import os from "os";
import path from "path";
import {
    ImageInsertion,
    TextDocument,
    documentKind,
    escapeHtml,
    insertImage,
    offsetOf,
    openDocument,
    parsePosition,
    parseSelection,
    renderImage,
    saveDocument,
    selectedText,
} from "./document";

const image: ImageInsertion = {
    src: "images/fox.webp",
    title: "a [red] fox generated by AIHorde",
    tooltip: 'a "red" fox with Deliberate generated by AIHorde',
    caption: "a red fox by Deliberate",
    description: "prompt : a red fox\nmodel : Deliberate",
};

const renderedMarkdown = [
    '![a \\[red\\] fox generated by AIHorde](images/fox.webp "a \\"red\\" fox with Deliberate generated by AIHorde")',
    "a red fox by Deliberate",
    "<!-- prompt : a red fox\nmodel : Deliberate -->",
].join("\n");

function markdown(text: string): TextDocument {
    return { path: "notes.md", kind: "markdown", text, created: false };
}

describe("positions", () => {
    it("should parse a position", () => {
        expect(parsePosition("3:7")).toEqual({ line: 3, column: 7 });
    });

    it("should reject invalid positions", () => {
        expect(() => parsePosition("3")).toThrow('Invalid position "3", expected LINE:COLUMN');
        expect(() => parsePosition("0:1")).toThrow();
    });

    it("should parse a selection", () => {
        expect(parseSelection("1:1-2:4")).toEqual({
            start: { line: 1, column: 1 },
            end: { line: 2, column: 4 },
        });
        expect(() => parseSelection("1:1")).toThrow();
    });

    it("should turn positions into offsets", () => {
        expect(offsetOf("ab\ncde", { line: 2, column: 2 })).toBe(4);
        expect(offsetOf("ab\ncde", { line: 2, column: 10 })).toBe(6);
        expect(offsetOf("ab\ncde", { line: 5, column: 1 })).toBe(6);
    });

    it("should read the selected text", () => {
        const doc = markdown("Title\nA red fox jumps\n");
        expect(
            selectedText(doc, { start: { line: 2, column: 3 }, end: { line: 2, column: 10 } })
        ).toBe("red fox");
        expect(selectedText(doc)).toBe("");
    });
});

describe("documentKind", () => {
    it("should know markdown and html", () => {
        expect(documentKind("a/notes.md")).toBe("markdown");
        expect(documentKind("page.HTML")).toBe("html");
        expect(documentKind("letter.odt")).toBeNull();
    });
});

describe("renderImage", () => {
    it("should render markdown with the description in a comment", () => {
        expect(renderImage("markdown", image)).toBe(renderedMarkdown);
    });

    it("should keep the comment closed", () => {
        const rendered = renderImage("markdown", { ...image, description: "a -- b" });
        expect(rendered.split("\n")[2]).toBe("<!-- a - - b -->");
    });

    it("should keep markup in the caption literal", () => {
        const rendered = renderImage("markdown", {
            ...image,
            caption: "a <b>bold</b> *fox* & hound_dog by `Deliberate`",
        });
        expect(rendered.split("\n")[1]).toBe(
            "a &lt;b&gt;bold&lt;/b&gt; \\*fox\\* &amp; hound\\_dog by \\`Deliberate\\`"
        );
    });

    it("should render an html figure", () => {
        expect(
            renderImage("html", {
                src: "images/fox & hound.webp",
                title: "fox & hound",
                tooltip: "t",
                caption: "fox <3",
                description: "a : 1\nb : 2",
                width: 512,
                height: 384,
            })
        ).toBe(
            [
                "<figure>",
                '<img src="images/fox%20%26%20hound.webp" alt="fox &amp; hound" title="t" width="512" height="384" data-description="a : 1&#10;b : 2">',
                "<figcaption>fox &lt;3</figcaption>",
                "</figure>",
            ].join("\n")
        );
    });

    it("should escape html", () => {
        expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
            "&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;"
        );
    });
});

describe("insertImage", () => {
    it("should replace the selection", () => {
        const doc = markdown("Intro\nreplace me here\nEnd\n");
        const updated = insertImage(doc, image, {
            start: { line: 2, column: 9 },
            end: { line: 2, column: 16 },
        });
        expect(updated.text).toBe(`Intro\nreplace ${renderedMarkdown}\nEnd\n`);
        expect(doc.text).toBe("Intro\nreplace me here\nEnd\n");
    });

    it("should insert at the cursor", () => {
        const updated = insertImage(markdown("Hello"), image, { line: 1, column: 1 });
        expect(updated.text).toBe(`${renderedMarkdown}Hello`);
    });

    it("should append on a new line at the end", () => {
        expect(insertImage(markdown("Hello"), image).text).toBe(`Hello\n${renderedMarkdown}\n`);
        expect(insertImage(markdown(""), image).text).toBe(`${renderedMarkdown}\n`);
    });
});

describe("openDocument", () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "horde-document-"));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should open a markdown document beside other files", async () => {
        const doc = await openDocument(path.join(dir, "letter.txt"));
        expect(doc).toEqual({
            path: path.join(dir, "letter.horde.md"),
            kind: "markdown",
            text: "",
            created: true,
        });
    });

    it("should read an existing document", async () => {
        const file = path.join(dir, "page.html");
        fs.writeFileSync(file, "<p>hi</p>\n");
        expect(await openDocument(file)).toEqual({
            path: file,
            kind: "html",
            text: "<p>hi</p>\n",
            created: false,
        });
    });

    it("should save into new directories", async () => {
        const file = path.join(dir, "drafts", "notes.md");
        await saveDocument({ path: file, kind: "markdown", text: "# Notes\n", created: true });
        expect(fs.readFileSync(file, "utf-8")).toBe("# Notes\n");
    });
});
