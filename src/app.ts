import express, { type Request, type Response } from "express";

import type { ComplianceContext } from "./context.js";
import {
  postActivate,
  postCourse,
  postEvent,
  postExpire,
  postExtend,
  postParticipant,
  postReviewer,
  type EndpointResult,
} from "./endpoints.js";
import { toError } from "./errors.js";

type Handler = (req: Request) => Promise<EndpointResult<unknown>>;

export const createApp = (ctx: ComplianceContext): express.Express => {
  const app = express();
  app.use(express.json({ limit: "1mb" }));
  const logger = ctx.logger.child("http");

  const handle = (handler: Handler) => async (req: Request, res: Response) => {
    try {
      const result = await handler(req);
      res.status(result.status).json(result.body);
    } catch (error) {
      logger.error(`${req.method} ${req.path} failed`, error);
      res.status(500).json({ error: toError(error).message });
    }
  };

  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok" });
  });

  app.post("/events", handle((req) => postEvent(ctx, req.body)));
  app.post("/participants", handle((req) => postParticipant(ctx, req.body)));
  app.post("/reviewers", handle((req) => postReviewer(ctx, req.body)));
  app.post("/courses", handle((req) => postCourse(ctx, req.body)));
  app.post("/courses/:id/activate", handle((req) => postActivate(ctx, req.params.id, req.body)));
  app.post("/courses/:id/extend", handle((req) => postExtend(ctx, req.params.id, req.body)));
  app.post("/courses/:id/expire", handle((req) => postExpire(ctx, req.params.id)));

  return app;
};
