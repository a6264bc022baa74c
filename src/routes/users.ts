import { Router } from "express";
import { z } from "zod";
import type { Services } from "../container.js";
import { currentUser, requireAuth } from "../middleware/auth.js";
import { parseProfileUpdates } from "../updates.js";
import { toPublicUser } from "../userStore.js";
import { parseInput, queryInt } from "./validation.js";

const listQuery = z.object({
  skip: queryInt,
  limit: queryInt,
  search: z.string().optional(),
});

export function userRoutes(services: Services): Router {
  const router = Router();
  router.use(requireAuth(services));

  router.get("/", async (req, res) => {
    const query = parseInput(listQuery, req.query);
    const page = await services.users.listUsers(currentUser(req), query);
    res.json({
      users: page.items.map(toPublicUser),
      total: page.total,
      skip: page.skip,
      limit: page.limit,
    });
  });

  router.get("/me", (req, res) => {
    res.json(toPublicUser(currentUser(req)));
  });

  router.get("/:id", async (req, res) => {
    const user = await services.users.getUser(req.params.id, currentUser(req));
    res.json(toPublicUser(user));
  });

  router.put("/:id", async (req, res) => {
    const updates = parseProfileUpdates(req.body);
    const user = await services.users.updateProfile(req.params.id, updates, currentUser(req));
    res.json(toPublicUser(user));
  });

  router.post("/:id/deactivate", async (req, res) => {
    await services.users.deactivateUser(req.params.id, currentUser(req));
    res.status(204).end();
  });

  router.delete("/:id", async (req, res) => {
    await services.users.deleteUser(req.params.id, currentUser(req));
    res.status(204).end();
  });

  return router;
}
