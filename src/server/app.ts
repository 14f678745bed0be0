import express, { Application, NextFunction, Request, RequestHandler, Response } from "express";
import { z, ZodError } from "zod";
import { describeError, RagEvalError } from "../modules/errors/errors";
import { loadDocumentUrl } from "../modules/ingest/document.loader";
import { Document } from "../modules/ingest/types";
import { Container } from "./container";

const askSchema = z.object({
  question: z.string().trim().min(1, "Field 'question' is required"),
  k: z.number().int().min(1).optional(),
  documentId: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

const ingestSchema = z
  .object({
    documents: z
      .array(
        z.object({
          id: z.string().trim().min(1),
          text: z.string(),
          sourceUri: z.string().optional(),
          metadata: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
        })
      )
      .default([]),
    urls: z.array(z.string().url()).default([]),
  })
  .refine((body) => body.documents.length + body.urls.length > 0, {
    message: "Provide at least one document or url",
  });

const runEvalSchema = z.object({
  datasetId: z.string().trim().min(1, "Field 'datasetId' is required"),
  config: z.record(z.unknown()).optional(),
});

const STATUS_BY_CODE: Record<string, number> = {
  CONFIGURATION_ERROR: 400,
  TEMPLATE_ERROR: 400,
  DATASET_ERROR: 400,
  RUN_NOT_FOUND: 404,
  RUN_IN_PROGRESS: 409,
  SYSTEMIC_RUN_ERROR: 422,
  RETRIEVAL_ERROR: 502,
  GENERATION_ERROR: 502,
  JUDGE_ERROR: 502,
  PROVIDER_TIMEOUT: 504,
};

export function statusForError(error: unknown): number {
  if (error instanceof ZodError) return 400;
  if (error instanceof RagEvalError) return STATUS_BY_CODE[error.code] ?? 500;
  return 500;
}

// Express 4 does not forward rejected promises to the error handler.
function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function createApp(container: Container): Application {
  const { pipeline, ingest, evals, config } = container;
  const app: Application = express();

  app.use(express.json({ limit: "5mb" }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.post(
    "/ask",
    route(async (req, res) => {
      const body = askSchema.parse(req.body);
      const result = await pipeline.ask(body.question, body.k ?? config.eval.k, {
        documentId: body.documentId,
        model: body.model ? { ...pipeline.defaultModel, model: body.model } : undefined,
      });
      res.json({ success: true, ...result });
    })
  );

  app.post(
    "/ingest",
    route(async (req, res) => {
      const body = ingestSchema.parse(req.body);
      const documents: Document[] = body.documents.map((doc) => ({
        id: doc.id,
        sourceUri: doc.sourceUri ?? `inline:${doc.id}`,
        rawText: doc.text,
        metadata: doc.metadata ?? {},
      }));
      for (const url of body.urls) {
        documents.push(await loadDocumentUrl(url));
      }

      const reports = await ingest.ingest(documents);
      res.json({ success: true, documents: reports });
    })
  );

  app.post(
    "/eval/runs",
    route(async (req, res) => {
      const body = runEvalSchema.parse(req.body);
      const runId = await evals.runEval(body.datasetId, body.config);
      res.status(202).json({ success: true, runId });
    })
  );

  app.get(
    "/eval/runs/:runId",
    route(async (req, res) => {
      res.json({ success: true, run: await evals.getRun(req.params.runId) });
    })
  );

  app.get(
    "/eval/runs/:runId/summary",
    route(async (req, res) => {
      res.json({ success: true, summary: await evals.getRunSummary(req.params.runId) });
    })
  );

  app.get(
    "/eval/runs/:runId/items",
    route(async (req, res) => {
      res.json({ success: true, items: await evals.getRunItems(req.params.runId) });
    })
  );

  app.post(
    "/eval/runs/:runId/cancel",
    route(async (req, res) => {
      const cancelled = await evals.cancelRun(req.params.runId);
      res.status(cancelled ? 202 : 409).json({ success: cancelled, cancelled });
    })
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusForError(error);
    if (status >= 500) console.error("Request failed:", error);

    if (error instanceof ZodError) {
      res.status(status).json({
        success: false,
        error: {
          code: "VALIDATION_ERROR",
          message: error.issues
            .map((issue) => `${issue.path.join(".") || "(body)"} ${issue.message}`)
            .join("; "),
        },
      });
      return;
    }
    res.status(status).json({ success: false, error: describeError(error) });
  });

  return app;
}
