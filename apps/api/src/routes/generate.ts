import express, { type Response } from "express";
import multer from "multer";
import { z } from "zod";

import { AppError, InvalidDocumentError, ProviderError, RequestAbortedError, ServiceNotReadyError } from "../services/errors.js";
import { extractPagesFromUpload } from "../services/extractText.js";
import type { GenerationResult, McqPipeline } from "../services/pipeline.js";
import { buildAnswerKeyPdf, buildQuizPdf } from "../services/quizPdf.js";

export const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 } });

// Multipart fields arrive as strings.
const formBoolean = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === "boolean" ? v : ["1", "true", "yes", "on"].includes(v.trim().toLowerCase())));

const optionalInt = z.preprocess((v) => (v === "" ? undefined : v), z.coerce.number().int().optional());

const CommonFieldsSchema = z.object({
  mode: z.enum(["rag", "per_page"]).default("rag"),
  questions_per_page: z.coerce.number().int().min(1).max(20).default(3),
  top_k: z.coerce.number().int().min(1).max(20).default(3),
  temperature: z.coerce.number().min(0).max(2).default(0.2),
  validate: formBoolean.default(false),
  seed: optionalInt,
  include_pdf: formBoolean.default(false)
});

export const GenerateBodySchema = CommonFieldsSchema.extend({
  n_questions: z.coerce.number().int().min(1).max(100).default(10)
});

export const DifficultyBodySchema = CommonFieldsSchema.extend({
  n_easy: z.coerce.number().int().min(0).max(50).default(3),
  n_medium: z.coerce.number().int().min(0).max(50).default(5),
  n_hard: z.coerce.number().int().min(0).max(50).default(2)
}).refine((b) => b.n_easy + b.n_medium + b.n_hard > 0, { message: "Request at least one question" });

type CommonFields = z.infer<typeof CommonFieldsSchema>;

export function createGenerateRouter(deps: { getPipeline: () => McqPipeline | null }) {
  const router = express.Router();

  const requirePipeline = () => {
    const pipeline = deps.getPipeline();
    if (!pipeline) throw new ServiceNotReadyError();
    return pipeline;
  };

  router.post("/generate", upload.single("file"), async (req, res) => {
    try {
      const parsed = GenerateBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request body", code: "invalid_request", details: parsed.error.flatten() });
      }
      const pipeline = requirePipeline();
      const extraction = await readUpload(req.file);
      const signal = abortOnClose(res);

      const result = await pipeline.generate(extraction.pages, {
        ...toRequest(parsed.data, signal),
        nQuestions: parsed.data.n_questions
      });
      return res.json(await respond(result, parsed.data, extraction, req.file?.originalname));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post("/generate-with-difficulty", upload.single("file"), async (req, res) => {
    try {
      const parsed = DifficultyBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request body", code: "invalid_request", details: parsed.error.flatten() });
      }
      const pipeline = requirePipeline();
      const extraction = await readUpload(req.file);
      const signal = abortOnClose(res);

      const result = await pipeline.generateWithDifficulty(extraction.pages, {
        ...toRequest(parsed.data, signal),
        counts: { easy: parsed.data.n_easy, medium: parsed.data.n_medium, hard: parsed.data.n_hard }
      });
      return res.json(await respond(result, parsed.data, extraction, req.file?.originalname));
    } catch (err) {
      return sendError(res, err);
    }
  });

  return router;
}

async function readUpload(file: Express.Multer.File | undefined) {
  if (!file) throw new InvalidDocumentError('Missing PDF upload (multipart field "file")');
  return extractPagesFromUpload(file);
}

function toRequest(fields: CommonFields, signal: AbortSignal) {
  return {
    mode: fields.mode,
    questionsPerPage: fields.questions_per_page,
    topK: fields.top_k,
    temperature: fields.temperature,
    validate: fields.validate,
    seed: fields.seed,
    signal
  };
}

// Aborts in-flight LLM work when the client disconnects before we answer.
function abortOnClose(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

async function respond(
  result: GenerationResult,
  fields: CommonFields,
  extraction: { warnings: string[] },
  sourceName?: string
) {
  const body: Record<string, unknown> = { ...result, warnings: extraction.warnings };
  if (fields.include_pdf && Object.keys(result.mcqs).length > 0) {
    const params = { mcqs: result.mcqs, sourceName, createdAtIso: new Date().toISOString() };
    body.quizPdfBase64 = (await buildQuizPdf(params)).toString("base64");
    body.answerKeyPdfBase64 = (await buildAnswerKeyPdf(params)).toString("base64");
  }
  return body;
}

export function sendError(res: Response, err: unknown) {
  if (err instanceof multer.MulterError) {
    const message = err.code === "LIMIT_FILE_SIZE" ? `File exceeds ${MAX_UPLOAD_BYTES / (1024 * 1024)} MB limit` : err.message;
    return res.status(400).json({ error: message, code: "invalid_document" });
  }

  if (err instanceof RequestAbortedError) {
    console.warn("[api] request aborted by client");
    if (res.headersSent || res.writableEnded) return;
    return res.status(err.status).json({ error: err.message, code: err.code });
  }

  if (err instanceof ProviderError) {
    // Provider bodies can contain keys, quotas or prompts: log them, never echo them.
    console.error(`[api] provider error: ${err.message} (status ${err.providerStatus}) ${err.detail}`);
    return res.status(err.status).json({
      error: "The question generation provider is unavailable. Try again later.",
      code: err.code
    });
  }

  if (err instanceof AppError) {
    return res.status(err.status).json({ error: err.message, code: err.code });
  }

  console.error(err);
  return res.status(500).json({ error: "Internal error" });
}
