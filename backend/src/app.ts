import cors from "cors";
import express from "express";
import type { ErrorRequestHandler, Express, Response } from "express";
import { createStandardPosition } from "@rookery/shared";
import type { PositionResponse } from "@rookery/shared";
import { MoveService } from "./moveService";
import type { ServiceResult } from "./moveService";

const respond = <T>(res: Response, result: ServiceResult<T>): void => {
  res.status(result.status).json(result.body);
};

const isBodyParseError = (error: unknown): boolean => error instanceof SyntaxError && "body" in error;

const handleError: ErrorRequestHandler = (error, _req, res, _next) => {
  if (isBodyParseError(error)) {
    res.status(400).json({ error: "Invalid request payload" });
    return;
  }
  console.error("Unhandled request error", error);
  res.status(500).json({ error: "Internal server error" });
};

export const createApp = (moveService: MoveService = new MoveService()): Express => {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/positions/standard", (_req, res) => {
    const body: PositionResponse = { pieces: createStandardPosition() };
    res.json(body);
  });

  app.post("/api/moves", (req, res) => {
    respond(res, moveService.legalMoves(req.body));
  });

  app.post("/api/moves/check", (req, res) => {
    respond(res, moveService.checkMove(req.body));
  });

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use(handleError);
  return app;
};
