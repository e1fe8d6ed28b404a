import express, { type Express, type Request, type Response } from "express";
import { createServer, type Server } from "http";
import type { TimetableEngine } from "./engine";
import { NotFoundError, TimetableError, ValidationError } from "./errors";
import { currentUser, requireUser } from "./auth";
import { createLogger } from "./logger";

const log = createLogger("express");

type OutcomeStatus =
  | "ready"
  | "ok"
  | "committed"
  | "projected"
  | "saved"
  | "accepted"
  | "added"
  | "deleted"
  | "existing_active"
  | "forbidden"
  | "conflict"
  | "missing_groups"
  | "stale"
  | "rejected";

const STATUS_CODES: Record<OutcomeStatus, number> = {
  ready: 200,
  ok: 200,
  committed: 200,
  projected: 200,
  saved: 200,
  accepted: 200,
  added: 200,
  deleted: 200,
  existing_active: 202,
  forbidden: 403,
  conflict: 409,
  missing_groups: 409,
  stale: 409,
  rejected: 422,
};

function sendOutcome(res: Response, outcome: { status: OutcomeStatus }) {
  res.status(STATUS_CODES[outcome.status]).json(outcome);
}

function handleError(res: Response, error: unknown, action: string) {
  if (error instanceof ValidationError) {
    return res.status(400).json({ code: error.code, message: error.message, issues: error.issues });
  }
  if (error instanceof NotFoundError) {
    return res.status(404).json({ code: error.code, message: error.message });
  }
  if (error instanceof TimetableError) {
    return res.status(409).json({ code: error.code, message: error.message });
  }
  log.error(`Error ${action}:`, error);
  res.status(500).json({ message: `Failed to ${action}` });
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" ? value : undefined;
}

export function registerRoutes(app: Express, engine: TimetableEngine): Server {
  const router = express.Router();
  router.use(express.json());
  router.use(requireUser);

  // Schedule versions
  router.post("/versions", async (req, res) => {
    try {
      const version = await engine.createVersion(req.body, currentUser(req));
      res.status(201).json(version);
    } catch (error) {
      handleError(res, error, "create schedule version");
    }
  });

  router.get("/versions", async (req, res) => {
    try {
      res.json(await engine.listVersions(req.query));
    } catch (error) {
      handleError(res, error, "list schedule versions");
    }
  });

  // Must be registered before /versions/:id
  router.post("/versions/commit", async (req, res) => {
    try {
      sendOutcome(res, await engine.commit(req.body));
    } catch (error) {
      handleError(res, error, "commit schedule version");
    }
  });

  router.get("/versions/:id", async (req, res) => {
    try {
      res.json(await engine.getVersion(req.params.id));
    } catch (error) {
      handleError(res, error, "fetch schedule version");
    }
  });

  router.get("/versions/:id/replace-candidates", async (req, res) => {
    try {
      res.json(await engine.replaceCandidates(req.params.id));
    } catch (error) {
      handleError(res, error, "fetch replace candidates");
    }
  });

  router.get("/versions/:id/pre-commit", async (req, res) => {
    try {
      sendOutcome(res, await engine.preCommitCheck(req.params.id));
    } catch (error) {
      handleError(res, error, "check schedule version");
    }
  });

  router.post("/versions/:id/switch-as-pending", async (req, res) => {
    try {
      sendOutcome(res, await engine.switchAsPending(req.params.id));
    } catch (error) {
      handleError(res, error, "switch schedule version to pending");
    }
  });

  router.post("/versions/:id/project", async (req, res) => {
    try {
      const outcome = await engine.projectWeekday({ ...req.body, versionId: req.params.id }, currentUser(req));
      sendOutcome(res, outcome);
    } catch (error) {
      handleError(res, error, "project standard timetable");
    }
  });

  // Cards of a version
  router.get("/versions/:id/cards", async (req, res) => {
    try {
      res.json(await engine.getCurrentCards(req.params.id));
    } catch (error) {
      handleError(res, error, "fetch cards");
    }
  });

  router.post("/versions/:id/cards/bulk", async (req, res) => {
    try {
      const outcome = await engine.bulkAdd({ ...req.body, versionId: req.params.id }, currentUser(req));
      sendOutcome(res, outcome);
    } catch (error) {
      handleError(res, error, "add cards");
    }
  });

  router.post("/versions/:id/cards/bulk-delete", async (req, res) => {
    try {
      sendOutcome(res, await engine.bulkDelete({ ...req.body, versionId: req.params.id }));
    } catch (error) {
      handleError(res, error, "delete cards");
    }
  });

  router.get("/versions/:id/groups/:groupId/history", async (req, res) => {
    try {
      res.json(await engine.getHistory(req.params.id, req.params.groupId));
    } catch (error) {
      handleError(res, error, "fetch card history");
    }
  });

  // Single cards
  router.put("/cards/:id", async (req, res) => {
    try {
      const outcome = await engine.saveCard({ ...req.body, cardId: req.params.id }, currentUser(req));
      sendOutcome(res, outcome);
    } catch (error) {
      handleError(res, error, "save card");
    }
  });

  router.post("/cards/:id/accept", async (req, res) => {
    try {
      sendOutcome(res, await engine.acceptCard(req.params.id));
    } catch (error) {
      handleError(res, error, "accept card");
    }
  });

  router.post("/cards/:id/switch-as-edit", async (req, res) => {
    try {
      sendOutcome(res, await engine.switchAsEdit(req.params.id));
    } catch (error) {
      handleError(res, error, "switch card to edited");
    }
  });

  router.get("/cards/:id/content", async (req, res) => {
    try {
      res.json(await engine.getContent(req.params.id));
    } catch (error) {
      handleError(res, error, "fetch card content");
    }
  });

  // Standard template
  router.get("/template-actuality", async (req, res) => {
    try {
      const buildingId = Number(queryString(req, "buildingId"));
      res.json(await engine.checkTemplateActuality(buildingId));
    } catch (error) {
      handleError(res, error, "check template actuality");
    }
  });

  router.post("/standard-imports", async (req, res) => {
    try {
      const report = await engine.importStandard(req.body, currentUser(req));
      res.status(201).json(report);
    } catch (error) {
      handleError(res, error, "import standard timetable");
    }
  });

  app.use("/api/timetable", router);

  // Read-only and open to students, so no caller identity
  app.get("/api/public/timetable", async (req, res) => {
    try {
      res.json(await engine.getPublishedTimetable(req.query));
    } catch (error) {
      handleError(res, error, "fetch published timetable");
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
