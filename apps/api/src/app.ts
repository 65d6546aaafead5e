import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";

import { createGenerateRouter, sendError } from "./routes/generate.js";
import type { McqPipeline } from "./services/pipeline.js";

export type ServiceState = { pipeline: McqPipeline | null };

export function createApp(params: { state: ServiceState; webOrigin?: string }) {
  const app = express();
  app.use(cors({ origin: params.webOrigin ?? "*" }));
  app.use(express.json({ limit: "1mb" }));

  app.get("/healthz", (_req, res) => res.json({ ok: true, ready: params.state.pipeline !== null }));
  app.use("/api", createGenerateRouter({ getPipeline: () => params.state.pipeline }));

  // Errors thrown by middleware (multer limits, malformed JSON) end up here.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) return res.status(400).json({ error: "Malformed JSON body", code: "invalid_request" });
    return sendError(res, err);
  });

  return app;
}
