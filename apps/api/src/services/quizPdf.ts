import PDFDocument from "pdfkit";

import { OPTION_KEYS, type NormalizedMcq } from "./mcqSchema.js";

type QuizPdfParams = { mcqs: Record<string, NormalizedMcq>; title?: string; sourceName?: string; createdAtIso?: string };

function render(build: (doc: PDFKit.PDFDocument) => void): Promise<Buffer> {
  const doc = new PDFDocument({ margin: 48 });
  const chunks: Buffer[] = [];
  doc.on("data", (c: Buffer) => chunks.push(c));
  const done = new Promise<Buffer>((resolve, reject) => {
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);
  });
  build(doc);
  doc.end();
  return done;
}

function header(doc: PDFKit.PDFDocument, title: string, params: QuizPdfParams) {
  doc.fontSize(18).text(title);
  doc.moveDown(0.5);
  doc.fontSize(10).fillColor("#555");
  if (params.sourceName) doc.text(`Source: ${params.sourceName}`);
  if (params.createdAtIso) doc.text(`Created: ${params.createdAtIso}`);
  doc.fillColor("#000");
  doc.moveDown();
}

function ordered(mcqs: Record<string, NormalizedMcq>): Array<[string, NormalizedMcq]> {
  return Object.entries(mcqs).sort(([a], [b]) => Number(a) - Number(b));
}

export function correctKey(mcq: NormalizedMcq): string {
  return OPTION_KEYS.find((k) => mcq.options[k] === mcq.correct)?.toUpperCase() ?? "?";
}

export function buildQuizPdf(params: QuizPdfParams): Promise<Buffer> {
  return render((doc) => {
    header(doc, params.title || "Multiple-Choice Quiz", params);
    for (const [id, q] of ordered(params.mcqs)) {
      doc.fontSize(11).text(`${id}. ${q.mcq}${q.difficulty ? ` (${q.difficulty})` : ""}`);
      doc.fontSize(10).fillColor("#333");
      for (const key of OPTION_KEYS) doc.text(`   ${key.toUpperCase()}. ${q.options[key]}`);
      doc.fillColor("#000");
      doc.moveDown(0.6);
    }
  });
}

export function buildAnswerKeyPdf(params: QuizPdfParams): Promise<Buffer> {
  return render((doc) => {
    header(doc, params.title ? `${params.title} - Answer Key` : "Answer Key", params);
    for (const [id, q] of ordered(params.mcqs)) {
      doc.fontSize(11).text(`${id}. ${q.mcq}`);
      doc.fontSize(10).fillColor("#333").text(`Answer: ${correctKey(q)}. ${q.correct}`);
      doc.fillColor("#000");
      doc.moveDown(0.4);
    }
  });
}
