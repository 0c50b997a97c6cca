/**
 * Turns raw object bytes into clean text for chunking.
 *
 * Plain text, CSV and JSON are decoded as UTF-8, falling back to Windows-1252
 * for legacy encodings; Markdown is parsed with markdown-it and flattened to
 * its text content. PDF pages are read with pdfjs-dist and Word documents with
 * mammoth. Encrypted, corrupt or otherwise unreadable input fails with
 * UnsupportedFormat.
 */
import { UnsupportedFormat, errorMessage } from "@typesLocal/AppError";
import mammoth from "mammoth";
import MarkdownIt from "markdown-it";

const md = new MarkdownIt();

type MarkdownToken = ReturnType<MarkdownIt["parse"]>[number];

export const PDF_CONTENT_TYPE = "application/pdf";
export const DOCX_CONTENT_TYPE =
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

const EXTENSION_CONTENT_TYPES: Record<string, string> = {
  txt: "text/plain",
  text: "text/plain",
  md: "text/markdown",
  markdown: "text/markdown",
  csv: "text/csv",
  json: "application/json",
  pdf: PDF_CONTENT_TYPE,
  docx: DOCX_CONTENT_TYPE,
  zip: "application/zip",
};

const TEXT_CONTENT_TYPES = new Set([
  "text/plain",
  "text/markdown",
  "text/csv",
  "application/json",
]);

const BINARY_SIGNATURES: Array<{ prefix: number[]; label: string }> = [
  { prefix: [0x25, 0x50, 0x44, 0x46], label: "PDF" },
  { prefix: [0x50, 0x4b, 0x03, 0x04], label: "ZIP archive" },
  { prefix: [0x1f, 0x8b], label: "gzip archive" },
  { prefix: [0xd0, 0xcf, 0x11, 0xe0], label: "OLE2 compound file" },
];

export function inferContentType(key: string): string {
  const dot = key.lastIndexOf(".");
  const ext = dot >= 0 ? key.slice(dot + 1).toLowerCase() : "";
  return EXTENSION_CONTENT_TYPES[ext] ?? "application/octet-stream";
}

function baseType(contentType: string): string {
  return contentType.split(";")[0]?.trim().toLowerCase() ?? "";
}

function detectBinary(bytes: Uint8Array): string | undefined {
  const match = BINARY_SIGNATURES.find(({ prefix }) =>
    prefix.every((byte, i) => bytes[i] === byte)
  );
  if (match) {
    return match.label;
  }
  return bytes.includes(0) ? "binary data" : undefined;
}

/**
 * Strips control characters, unifies quotes and line endings, and collapses
 * runs of blank space while keeping paragraph breaks.
 */
export function cleanText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f-\u009f]/g, "")
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'")
    .replace(/[ \t]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function inlineText(token: MarkdownToken): string {
  return (token.children ?? [])
    .map((child) => {
      switch (child.type) {
        case "text":
        case "code_inline":
          return child.content;
        case "softbreak":
        case "hardbreak":
          return "\n";
        case "image":
          return child.content;
        default:
          return "";
      }
    })
    .join("");
}

export function markdownToText(raw: string): string {
  const blocks: string[] = [];

  for (const token of md.parse(raw, {})) {
    if (token.type === "inline") {
      blocks.push(inlineText(token));
    } else if (token.type === "fence" || token.type === "code_block") {
      blocks.push(token.content.trimEnd());
    }
  }

  return blocks.filter((block) => block.trim()).join("\n\n");
}

/** UTF-8 when the bytes are valid UTF-8, Windows-1252 (a Latin-1 superset) otherwise. */
export function decodeText(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return new TextDecoder("windows-1252").decode(bytes);
  }
}

/** Page texts joined by blank lines; pages without text are skipped. */
export async function pdfToText(bytes: Uint8Array): Promise<string> {
  // Loaded on first use; the legacy build is the one that runs under Node.
  const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs");

  let pdf: Awaited<ReturnType<typeof getDocument>["promise"]>;
  try {
    // pdfjs takes ownership of the buffer it is given.
    pdf = await getDocument({ data: new Uint8Array(bytes), isEvalSupported: false }).promise;
  } catch (error: unknown) {
    const encrypted = error instanceof Error && error.name === "PasswordException";
    throw new UnsupportedFormat(
      encrypted ? "PDF is password-protected" : `PDF could not be read: ${errorMessage(error)}`,
      { contentType: PDF_CONTENT_TYPE }
    );
  }

  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      const text = content.items
        .map((item) => ("str" in item ? item.str : ""))
        .join(" ");
      if (text.trim()) {
        pages.push(text);
      }
    }
    return pages.join("\n\n");
  } finally {
    await pdf.destroy();
  }
}

export async function docxToText(bytes: Uint8Array): Promise<string> {
  // Password-protected Word files are OLE2 containers, not ZIP packages.
  if (detectBinary(bytes) === "OLE2 compound file") {
    throw new UnsupportedFormat("Word document is password-protected or in the legacy .doc format", {
      contentType: DOCX_CONTENT_TYPE,
    });
  }

  try {
    const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
    return result.value;
  } catch (error: unknown) {
    throw new UnsupportedFormat(`Word document could not be read: ${errorMessage(error)}`, {
      contentType: DOCX_CONTENT_TYPE,
    });
  }
}

function decodeTextDocument(bytes: Uint8Array, type: string): string {
  const binary = detectBinary(bytes);
  if (binary) {
    throw new UnsupportedFormat(`Content declared as ${type} looks like ${binary}`, {
      contentType: type,
    });
  }

  const decoded = decodeText(bytes);
  return type === "text/markdown" ? markdownToText(decoded) : decoded;
}

export async function decodeDocument(bytes: Uint8Array, contentType: string): Promise<string> {
  const type = baseType(contentType);

  let raw: string;
  if (TEXT_CONTENT_TYPES.has(type)) {
    raw = decodeTextDocument(bytes, type);
  } else if (type === PDF_CONTENT_TYPE) {
    raw = await pdfToText(bytes);
  } else if (type === DOCX_CONTENT_TYPE) {
    raw = await docxToText(bytes);
  } else {
    throw new UnsupportedFormat(`Unsupported content type: ${type || "unknown"}`, {
      contentType: type,
    });
  }

  const text = cleanText(raw);
  if (!text) {
    throw new UnsupportedFormat("No text content extracted", { contentType: type });
  }

  return text;
}
