import { Router } from "express";
import { z } from "zod";
import type { Services } from "../container.js";
import { currentUser, requireAuth } from "../middleware/auth.js";
import { parseProjectUpdates } from "../updates.js";
import { parseInput } from "./validation.js";

const createSchema = z.object({
  name: z.string(),
  key: z.string(),
  description: z.string().nullable().optional(),
});

export function projectRoutes(services: Services): Router {
  const router = Router();
  router.use(requireAuth(services));

  router.get("/", async (req, res) => {
    const projects = await services.projects.listUserProjects(currentUser(req));
    res.json({ projects, total: projects.length });
  });

  router.post("/", async (req, res) => {
    const body = parseInput(createSchema, req.body);
    const project = await services.projects.createProject(body, currentUser(req));
    res.status(201).json(project);
  });

  router.get("/:id", async (req, res) => {
    res.json(await services.projects.getProject(req.params.id, currentUser(req)));
  });

  router.put("/:id", async (req, res) => {
    const updates = parseProjectUpdates(req.body);
    res.json(await services.projects.updateProject(req.params.id, updates, currentUser(req)));
  });

  router.delete("/:id", async (req, res) => {
    await services.projects.deleteProject(req.params.id, currentUser(req));
    res.status(204).end();
  });

  router.get("/:id/stats", async (req, res) => {
    res.json(await services.projects.getProjectStats(req.params.id, currentUser(req)));
  });

  return router;
}
