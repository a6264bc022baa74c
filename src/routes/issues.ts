import { Router } from "express";
import { z } from "zod";
import type { Services } from "../container.js";
import { currentUser, requireAuth } from "../middleware/auth.js";
import { ISSUE_STATUSES, ISSUE_TYPES, PRIORITIES } from "../types.js";
import { parseIssueUpdates } from "../updates.js";
import { parseInput, queryInt } from "./validation.js";

const listQuery = z.object({
  projectId: z.string().optional(),
  assigneeId: z.string().optional(),
  reporterId: z.string().optional(),
  status: z.enum(ISSUE_STATUSES).optional(),
  issueType: z.enum(ISSUE_TYPES).optional(),
  skip: queryInt,
  limit: queryInt,
});

const createSchema = z.object({
  projectId: z.string(),
  title: z.string(),
  description: z.string().nullable().optional(),
  issueType: z.enum(ISSUE_TYPES).optional(),
  priority: z.enum(PRIORITIES).optional(),
  assigneeId: z.string().nullable().optional(),
});

const transitionSchema = z.object({ status: z.enum(ISSUE_STATUSES) });

const issueNumber = z.coerce.number().int().positive();

export function issueRoutes(services: Services): Router {
  const router = Router();
  router.use(requireAuth(services));

  router.get("/", async (req, res) => {
    const { skip, limit, ...filters } = parseInput(listQuery, req.query);
    const page = await services.issues.listIssues(filters, currentUser(req), { skip, limit });
    res.json({ issues: page.items, total: page.total, skip: page.skip, limit: page.limit });
  });

  router.post("/", async (req, res) => {
    const body = parseInput(createSchema, req.body);
    const issue = await services.issues.createIssue(body, currentUser(req));
    res.status(201).json(issue);
  });

  router.get("/projects/:id/kanban", async (req, res) => {
    res.json(await services.issues.getKanbanBoard(req.params.id, currentUser(req)));
  });

  router.get("/:id", async (req, res) => {
    res.json(await services.issues.getIssue(req.params.id, currentUser(req)));
  });

  router.get("/:projectKey/:number", async (req, res) => {
    const number = parseInput(issueNumber, req.params.number);
    res.json(
      await services.issues.getIssueByKey(req.params.projectKey, number, currentUser(req))
    );
  });

  router.put("/:id", async (req, res) => {
    const updates = parseIssueUpdates(req.body);
    res.json(await services.issues.updateIssue(req.params.id, updates, currentUser(req)));
  });

  router.put("/:id/status", async (req, res) => {
    const { status } = parseInput(transitionSchema, req.body);
    res.json(
      await services.issues.transitionIssueStatus(req.params.id, status, currentUser(req))
    );
  });

  router.delete("/:id", async (req, res) => {
    await services.issues.deleteIssue(req.params.id, currentUser(req));
    res.status(204).end();
  });

  return router;
}
