import { UnsupportedFormat } from "@typesLocal/AppError";
import { beforeEach, describe, expect, it, vi } from "vitest";

import {
  DOCX_CONTENT_TYPE,
  cleanText,
  decodeDocument,
  decodeText,
  inferContentType,
} from "../DocumentDecoder";

const mocks = vi.hoisted(() => ({
  getDocument: vi.fn(),
  extractRawText: vi.fn(),
}));

vi.mock("pdfjs-dist/legacy/build/pdf.mjs", () => ({ getDocument: mocks.getDocument }));
vi.mock("mammoth", () => ({ default: { extractRawText: mocks.extractRawText } }));

const encode = (text: string) => new TextEncoder().encode(text);

function fakePdf(pages: Array<Array<{ str: string } | { type: string }>>) {
  const destroy = vi.fn(async () => undefined);
  mocks.getDocument.mockImplementation(() => ({
    promise: Promise.resolve({
      numPages: pages.length,
      getPage: async (pageNumber: number) => ({
        getTextContent: async () => ({ items: pages[pageNumber - 1] ?? [] }),
      }),
      destroy,
    }),
  }));
  return destroy;
}

function failingPdf(name: string, message: string) {
  mocks.getDocument.mockImplementation(() => ({
    promise: Promise.reject(Object.assign(new Error(message), { name })),
  }));
}

beforeEach(() => {
  mocks.getDocument.mockReset();
  mocks.extractRawText.mockReset();
});

describe("inferContentType", () => {
  it("maps known extensions case-insensitively", () => {
    expect(inferContentType("uploads/guides/Setup.MD")).toBe("text/markdown");
    expect(inferContentType("uploads/data.csv")).toBe("text/csv");
    expect(inferContentType("uploads/report.pdf")).toBe("application/pdf");
    expect(inferContentType("uploads/memo.docx")).toBe(DOCX_CONTENT_TYPE);
  });

  it("falls back to octet-stream", () => {
    expect(inferContentType("uploads/blob.bin")).toBe("application/octet-stream");
    expect(inferContentType("uploads/README")).toBe("application/octet-stream");
  });
});

describe("cleanText", () => {
  it("normalizes line endings, quotes, control characters and spacing", () => {
    expect(cleanText("Hello\r\n“world”\u0007  again")).toBe('Hello\n"world" again');
  });

  it("keeps paragraph breaks but collapses longer blank runs", () => {
    expect(cleanText("one\n\n\n\ntwo \n three")).toBe("one\n\ntwo\nthree");
  });
});

describe("decodeText", () => {
  it("falls back to Windows-1252 for bytes that are not UTF-8", () => {
    expect(decodeText(new Uint8Array([0x63, 0x61, 0x66, 0xe9]))).toBe("café");
    expect(decodeText(encode("café"))).toBe("café");
  });
});

describe("decodeDocument", () => {
  it("flattens markdown to its text content", async () => {
    const markdown = "# Title\n\nSome *bold* text.\n\n```\ncode\n```\n";

    await expect(decodeDocument(encode(markdown), "text/markdown")).resolves.toBe(
      "Title\n\nSome bold text.\n\ncode"
    );
  });

  it("accepts a charset parameter on the content type", async () => {
    await expect(decodeDocument(encode("plain words"), "text/plain; charset=utf-8")).resolves.toBe(
      "plain words"
    );
  });

  it("keeps JSON as written", async () => {
    await expect(decodeDocument(encode('{"a": 1}'), "application/json")).resolves.toBe('{"a": 1}');
  });

  it("decodes legacy single-byte text", async () => {
    await expect(
      decodeDocument(new Uint8Array([0x63, 0x61, 0x66, 0xe9]), "text/plain")
    ).resolves.toBe("café");
  });

  it("rejects content types it cannot read", async () => {
    await expect(decodeDocument(encode("PK"), "application/zip")).rejects.toThrow(
      "Unsupported content type: application/zip"
    );
  });

  it("rejects binary bytes declared as text", async () => {
    await expect(decodeDocument(encode("%PDF-1.7 body"), "text/plain")).rejects.toThrow(
      "Content declared as text/plain looks like PDF"
    );
    await expect(
      decodeDocument(new Uint8Array([0x41, 0x00, 0x42]), "text/plain")
    ).rejects.toBeInstanceOf(UnsupportedFormat);
  });

  it("rejects documents with no text", async () => {
    await expect(decodeDocument(encode("   \n  "), "text/plain")).rejects.toThrow(
      "No text content extracted"
    );
  });
});

describe("decodeDocument for PDF", () => {
  it("joins the text of each page and skips empty pages", async () => {
    const destroy = fakePdf([
      [{ str: "Alpha" }, { str: "page" }],
      [],
      [{ str: "Beta" }, { type: "beginMarkedContent" }],
    ]);

    await expect(decodeDocument(encode("%PDF-1.7"), "application/pdf")).resolves.toBe(
      "Alpha page\n\nBeta"
    );
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it("reports password-protected files", async () => {
    failingPdf("PasswordException", "No password given");

    await expect(decodeDocument(encode("%PDF-1.7"), "application/pdf")).rejects.toThrow(
      "PDF is password-protected"
    );
  });

  it("reports corrupt files", async () => {
    failingPdf("InvalidPDFException", "Invalid PDF structure.");

    const error = await decodeDocument(encode("%PDF-1.7"), "application/pdf").catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(UnsupportedFormat);
    expect(error).toMatchObject({
      message: "PDF could not be read: Invalid PDF structure.",
      statusCode: 415,
      metadata: { contentType: "application/pdf" },
    });
  });

  it("rejects a PDF without any text layer", async () => {
    fakePdf([[], []]);

    await expect(decodeDocument(encode("%PDF-1.7"), "application/pdf")).rejects.toThrow(
      "No text content extracted"
    );
  });
});

describe("decodeDocument for Word", () => {
  const zipBytes = new Uint8Array([0x50, 0x4b, 0x03, 0x04, 0x14]);

  it("extracts the raw text of the document", async () => {
    mocks.extractRawText.mockResolvedValue({ value: "Heading\n\n\n\nBody text\n", messages: [] });

    await expect(decodeDocument(zipBytes, DOCX_CONTENT_TYPE)).resolves.toBe(
      "Heading\n\nBody text"
    );
    expect(mocks.extractRawText).toHaveBeenCalledWith({ buffer: Buffer.from(zipBytes) });
  });

  it("reports corrupt packages", async () => {
    mocks.extractRawText.mockRejectedValue(new Error("Can't find end of central directory"));

    await expect(decodeDocument(zipBytes, DOCX_CONTENT_TYPE)).rejects.toThrow(
      "Word document could not be read: Can't find end of central directory"
    );
  });

  it("rejects encrypted documents without parsing them", async () => {
    const ole2 = new Uint8Array([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1]);

    await expect(decodeDocument(ole2, DOCX_CONTENT_TYPE)).rejects.toThrow(
      "Word document is password-protected or in the legacy .doc format"
    );
    expect(mocks.extractRawText).not.toHaveBeenCalled();
  });
});
