import fs from "fs";
import path from "path";

export type DocumentKind = "markdown" | "html";

/** a cursor position between two characters, 1-based */
export interface Position {
    line: number;
    column: number;
}

export interface Selection {
    start: Position;
    end: Position;
}

export interface TextDocument {
    path: string;
    kind: DocumentKind;
    text: string;
    /** true when the document did not exist and will be created on save */
    created: boolean;
}

export interface ImageInsertion {
    /** path of the image relative to the document */
    src: string;
    title: string;
    tooltip: string;
    caption: string;
    description: string;
    width?: number;
    height?: number;
}

const EXTENSIONS: { [ext: string]: DocumentKind } = {
    ".md": "markdown",
    ".markdown": "markdown",
    ".html": "html",
    ".htm": "html",
};

export function documentKind(file: string): DocumentKind | null {
    return EXTENSIONS[path.extname(file).toLowerCase()] || null;
}

function parsePositionText(text: string): Position | null {
    const match = /^\s*(\d+)\s*:\s*(\d+)\s*$/.exec(text);
    if (!match) {
        return null;
    }
    const line = parseInt(match[1], 10);
    const column = parseInt(match[2], 10);
    if (line < 1 || column < 1) {
        return null;
    }
    return { line, column };
}

export function parsePosition(text: string): Position {
    const position = parsePositionText(text);
    if (!position) {
        throw new Error(`Invalid position "${text}", expected LINE:COLUMN`);
    }
    return position;
}

export function parseSelection(text: string): Selection {
    const parts = text.split("-");
    const start = parts.length === 2 ? parsePositionText(parts[0]) : null;
    const end = parts.length === 2 ? parsePositionText(parts[1]) : null;
    if (!start || !end) {
        throw new Error(
            `Invalid selection "${text}", expected LINE:COLUMN-LINE:COLUMN`
        );
    }
    return { start, end };
}

/**
 * Character offset of a position. Columns past the end of a line stop at
 * the end of the line, lines past the end of the text at the end of the
 * text.
 */
export function offsetOf(text: string, position: Position): number {
    const lines = text.split("\n");
    if (position.line > lines.length) {
        return text.length;
    }
    let offset = 0;
    for (let i = 0; i < position.line - 1; i++) {
        offset += lines[i].length + 1;
    }
    return offset + Math.min(position.column - 1, lines[position.line - 1].length);
}

function selectionOffsets(text: string, selection: Selection): [number, number] {
    const a = offsetOf(text, selection.start);
    const b = offsetOf(text, selection.end);
    return a <= b ? [a, b] : [b, a];
}

export function selectedText(doc: TextDocument, selection?: Selection): string {
    if (!selection) {
        return "";
    }
    const [start, end] = selectionOffsets(doc.text, selection);
    return doc.text.substring(start, end);
}

/**
 * Opens a document for insertion. A file that cannot hold images gets a
 * new markdown document beside it instead, named NAME.horde.md.
 */
export async function openDocument(file: string): Promise<TextDocument> {
    let target = file;
    let kind = documentKind(file);
    if (!kind) {
        const parsed = path.parse(file);
        target = path.join(parsed.dir, `${parsed.name}.horde.md`);
        kind = "markdown";
    }
    if (!fs.existsSync(target)) {
        return { path: target, kind, text: "", created: true };
    }
    const text = await fs.promises.readFile(target, "utf-8");
    return { path: target, kind, text, created: false };
}

export function escapeHtml(value: string): string {
    return value
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;")
        .replace(/'/g, "&#39;");
}

function escapeMarkdownText(value: string): string {
    return value.replace(/([\\\[\]])/g, "\\$1").replace(/\n/g, " ");
}

// the caption is a paragraph of its own, inline html and emphasis stay literal
function escapeMarkdownCaption(value: string): string {
    return value
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/([\\`*_\[\]])/g, "\\$1")
        .replace(/\n/g, " ");
}

function escapeMarkdownTitle(value: string): string {
    return value.replace(/([\\"])/g, "\\$1").replace(/\n/g, " ");
}

// "--" cannot appear inside an HTML comment
function commentText(value: string): string {
    return value.replace(/--/g, "- -");
}

function toUrlPath(src: string): string {
    return src.split(path.sep).join("/").split("/").map(encodeURIComponent).join("/");
}

export function renderImage(kind: DocumentKind, image: ImageInsertion): string {
    const src = toUrlPath(image.src);
    if (kind === "markdown") {
        return [
            `![${escapeMarkdownText(image.title)}](${src} "${escapeMarkdownTitle(image.tooltip)}")`,
            escapeMarkdownCaption(image.caption),
            `<!-- ${commentText(image.description)} -->`,
        ].join("\n");
    }
    const attributes = [
        `src="${escapeHtml(src)}"`,
        `alt="${escapeHtml(image.title)}"`,
        `title="${escapeHtml(image.tooltip)}"`,
    ];
    if (image.width && image.height) {
        attributes.push(`width="${image.width}"`, `height="${image.height}"`);
    }
    attributes.push(
        `data-description="${escapeHtml(image.description).replace(/\n/g, "&#10;")}"`
    );
    return [
        "<figure>",
        `<img ${attributes.join(" ")}>`,
        `<figcaption>${escapeHtml(image.caption)}</figcaption>`,
        "</figure>",
    ].join("\n");
}

function isSelection(at: Selection | Position): at is Selection {
    return "start" in at;
}

/**
 * Replaces the selection, or inserts at the cursor, with the image and
 * its caption. Without a position the image goes at the end of the
 * document.
 */
export function insertImage(
    doc: TextDocument,
    image: ImageInsertion,
    at?: Selection | Position
): TextDocument {
    const rendered = renderImage(doc.kind, image);
    let start: number;
    let end: number;
    if (!at) {
        start = end = doc.text.length;
    } else if (isSelection(at)) {
        [start, end] = selectionOffsets(doc.text, at);
    } else {
        start = end = offsetOf(doc.text, at);
    }
    let before = doc.text.substring(0, start);
    const after = doc.text.substring(end);
    if (!at && before.length > 0 && !before.endsWith("\n")) {
        before += "\n";
    }
    const tail = !at && !after ? "\n" : "";
    return {
        ...doc,
        text: before + rendered + tail + after,
    };
}

export async function saveDocument(doc: TextDocument): Promise<void> {
    await fs.promises.mkdir(path.dirname(doc.path), { recursive: true });
    await fs.promises.writeFile(doc.path, doc.text);
}
