import { Router } from "express";
import { z } from "zod";
import { DEFAULT_WEEKS } from "../analyticsService.js";
import type { Services } from "../container.js";
import { currentUser, requireAuth } from "../middleware/auth.js";
import { idList, parseInput, queryInt } from "./validation.js";

const weeksQuery = z.object({ weeks: queryInt });
const projectsQuery = z.object({ projectIds: idList });

export function analyticsRoutes(services: Services): Router {
  const router = Router();
  router.use(requireAuth(services));

  router.get("/projects/:id/overview", async (req, res) => {
    res.json(await services.analytics.projectOverview(req.params.id, currentUser(req)));
  });

  router.get("/projects/:id/burndown", async (req, res) => {
    res.json(await services.analytics.burndown(req.params.id, currentUser(req)));
  });

  router.get("/velocity/:userId", async (req, res) => {
    const { weeks } = parseInput(weeksQuery, req.query);
    res.json(
      await services.analytics.userVelocity(
        req.params.userId,
        currentUser(req),
        weeks ?? DEFAULT_WEEKS
      )
    );
  });

  router.get("/team/velocity", async (req, res) => {
    const { weeks } = parseInput(weeksQuery, req.query);
    res.json(await services.analytics.teamVelocity(currentUser(req), weeks ?? DEFAULT_WEEKS));
  });

  router.get("/issues/aging", async (req, res) => {
    const { projectIds } = parseInput(projectsQuery, req.query);
    res.json(await services.analytics.agingReport(projectIds, currentUser(req)));
  });

  router.get("/issues/workload", async (req, res) => {
    const { projectIds } = parseInput(projectsQuery, req.query);
    res.json(await services.analytics.workload(projectIds, currentUser(req)));
  });

  return router;
}
