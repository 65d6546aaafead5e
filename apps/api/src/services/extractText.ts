import { fileTypeFromBuffer } from "file-type";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";

import { InvalidDocumentError } from "./errors.js";

type UploadedFile = { buffer: Buffer; mimetype?: string; originalname?: string };

export type PageExtractionResult = { pages: string[]; warnings: string[]; mime: string };

export async function detectMime(bytes: Uint8Array): Promise<string> {
  const detected = await fileTypeFromBuffer(bytes).catch(() => undefined);
  return detected?.mime ?? "application/octet-stream";
}

/** Reads an upload and returns its text page by page, in page order. */
export async function extractPagesFromUpload(file: UploadedFile): Promise<PageExtractionResult> {
  if (!file.buffer || file.buffer.length === 0) throw new InvalidDocumentError("Uploaded file is empty");

  const mime = await detectMime(file.buffer);
  if (mime !== "application/pdf") {
    const name = file.originalname ? ` (${file.originalname})` : "";
    throw new InvalidDocumentError(`Only PDF files are supported; got ${mime}${name}`);
  }

  const pages = await extractPages(file.buffer);
  const warnings: string[] = [];
  const blank = pages.filter((p) => !p.trim()).length;
  if (pages.length > 0 && blank === pages.length) {
    warnings.push("PDF has no extractable text. If this is a scanned PDF, run OCR on it before uploading.");
  } else if (blank > 0) {
    warnings.push(`${blank} of ${pages.length} pages had no extractable text and were skipped.`);
  }
  return { pages, warnings, mime };
}

export async function extractPages(bytes: Uint8Array): Promise<string[]> {
  // pdf.js transfers the buffer it is given, so hand it a copy.
  const data = new Uint8Array(bytes);
  const loadingTask = getDocument({ data, isEvalSupported: false, useSystemFonts: false, verbosity: 0 });

  const doc = await loadingTask.promise.catch((err: unknown) => {
    throw new InvalidDocumentError(describePdfError(err), { cause: err });
  });

  try {
    const pages: string[] = [];
    for (let i = 1; i <= doc.numPages; i++) {
      const page = await doc.getPage(i);
      const content = await page.getTextContent();
      let text = "";
      for (const item of content.items) {
        if (!("str" in item)) continue;
        text += item.str;
        if (item.hasEOL) text += "\n";
      }
      pages.push(normalizeText(text));
      page.cleanup();
    }
    return pages;
  } finally {
    await doc.destroy();
  }
}

function describePdfError(err: unknown): string {
  const msg = err instanceof Error ? err.message : String(err);
  if (/xref/i.test(msg)) {
    return "PDF parsing failed (bad XRef entry). The PDF is likely corrupted or non-standard. Re-save/print-to-PDF and retry.";
  }
  if (/password/i.test(msg)) return "PDF is password protected.";
  return `PDF parsing failed. ${msg || "Unknown PDF error"}`;
}

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/[ \t]+\n/g, "\n").trim();
}
