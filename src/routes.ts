import { Router, Request, Response, NextFunction } from "express";
import { runPipeline } from "./orchestrator";
import { parsePipelineRequest } from "./parsers/request-schema";
import type { PipelineDependencies } from "./types";

export function createRoutes(deps: PipelineDependencies): Router {
  const router = Router();

  router.post("/search", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parsePipelineRequest(req.body);
      const payload = await runPipeline(deps, request);
      return res.json(payload);
    } catch (error) {
      return next(error);
    }
  });

  return router;
}
