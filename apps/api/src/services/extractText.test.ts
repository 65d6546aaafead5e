import PDFDocument from "pdfkit";
import { describe, expect, it } from "vitest";

import { InvalidDocumentError } from "./errors.js";
import { extractPages, extractPagesFromUpload, normalizeText } from "./extractText.js";

function makePdf(pages: string[]): Promise<Buffer> {
  const doc = new PDFDocument({ autoFirstPage: false });
  const chunks: Buffer[] = [];
  doc.on("data", (c: Buffer) => chunks.push(c));
  const done = new Promise<Buffer>((resolve) => {
    doc.on("end", () => resolve(Buffer.concat(chunks)));
  });
  for (const text of pages) {
    doc.addPage();
    if (text) doc.fontSize(12).text(text);
  }
  doc.end();
  return done;
}

const squash = (s: string) => s.replace(/\s+/g, "");

describe("extractPages", () => {
  it("returns text page by page", async () => {
    const pdf = await makePdf(["The capital of France is Paris.", "Photosynthesis happens in leaves."]);
    const pages = await extractPages(pdf);
    expect(pages).toHaveLength(2);
    expect(squash(pages[0])).toContain("ThecapitalofFranceisParis.");
    expect(squash(pages[1])).toContain("Photosynthesishappensinleaves.");
  });
});

describe("extractPagesFromUpload", () => {
  it("warns about pages without text", async () => {
    const pdf = await makePdf(["Only the first page has words.", ""]);
    const result = await extractPagesFromUpload({ buffer: pdf, originalname: "notes.pdf" });
    expect(result.mime).toBe("application/pdf");
    expect(result.pages[1]).toBe("");
    expect(result.warnings).toEqual(["1 of 2 pages had no extractable text and were skipped."]);
  });

  it("warns when no page has text", async () => {
    const pdf = await makePdf([""]);
    const result = await extractPagesFromUpload({ buffer: pdf });
    expect(result.pages).toEqual([""]);
    expect(result.warnings).toEqual(["PDF has no extractable text. If this is a scanned PDF, run OCR on it before uploading."]);
  });

  it("rejects an empty upload", async () => {
    await expect(extractPagesFromUpload({ buffer: Buffer.alloc(0) })).rejects.toThrow("Uploaded file is empty");
  });

  it("rejects files that are not PDFs", async () => {
    const err = await extractPagesFromUpload({ buffer: Buffer.from("just some notes"), originalname: "notes.txt" }).catch(
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(InvalidDocumentError);
    expect(err).toMatchObject({
      status: 400,
      code: "invalid_document",
      message: "Only PDF files are supported; got application/octet-stream (notes.txt)"
    });
  });
});

describe("normalizeText", () => {
  it("normalizes line endings and trailing spaces", () => {
    expect(normalizeText("  a  \r\nb\t\nc  ")).toBe("a\nb\nc");
  });
});
