import { Router } from "express";
import { z } from "zod";
import type { Services } from "../container.js";
import { currentUser, requireAuth } from "../middleware/auth.js";
import { toPublicUser } from "../userStore.js";
import { parseInput } from "./validation.js";

const credentialsSchema = z.object({
  email: z.string(),
  password: z.string(),
});

const registerSchema = credentialsSchema.extend({
  fullName: z.string(),
});

export function authRoutes(services: Services): Router {
  const router = Router();

  // Self-service accounts are always developers; roles change through PUT /api/users/:id.
  router.post("/register", async (req, res) => {
    const body = parseInput(registerSchema, req.body);
    const user = await services.users.registerUser(body);
    res.status(201).json({ ...services.tokens.issue(user), user: toPublicUser(user) });
  });

  router.post("/login", async (req, res) => {
    const { email, password } = parseInput(credentialsSchema, req.body);
    const { token, user } = await services.users.login(email, password);
    res.json({ ...token, user: toPublicUser(user) });
  });

  router.get("/me", requireAuth(services), (req, res) => {
    res.json(toPublicUser(currentUser(req)));
  });

  // Tokens are stateless; the client discards its copy.
  router.post("/logout", (_req, res) => {
    res.json({ message: "Successfully logged out" });
  });

  return router;
}
