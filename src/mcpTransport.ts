import { randomUUID } from "crypto";
import { Router } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { Services } from "./container.js";
import { ForbiddenError } from "./errors.js";
import { createMcpServer } from "./mcpServer.js";
import { currentUser, requireAuth } from "./middleware/auth.js";
import type { User } from "./types.js";

interface Session {
  transport: StreamableHTTPServerTransport;
  userId: string;
  /** Record resolved by the request currently being handled. */
  user: User;
}

/**
 * Streamable-HTTP MCP endpoint. A session belongs to the user who opened it;
 * later requests must present a token for the same user, and the tools act
 * with the user record that request resolved.
 */
export function mcpRoutes(services: Services): Router {
  const router = Router();
  const sessions = new Map<string, Session>();
  router.use(requireAuth(services));

  const existingSession = (sessionId: string | undefined, user: User): Session | null => {
    if (!sessionId) return null;
    const session = sessions.get(sessionId);
    if (!session) return null;
    if (session.userId !== user.id) {
      throw new ForbiddenError("Session belongs to another user");
    }
    session.user = user;
    return session;
  };

  // New or existing session
  router.post("/", async (req, res) => {
    const user = currentUser(req);
    const sessionId = req.header("mcp-session-id");
    const session = existingSession(sessionId, user);
    if (session) {
      await session.transport.handleRequest(req, res, req.body);
      return;
    }
    if (sessionId) {
      res.status(404).json({ error: "Session not found" });
      return;
    }

    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (newId) => {
        sessions.set(newId, opened);
        console.error(`[MCP] Session ${newId} opened for ${user.email}`);
      },
    });
    const opened: Session = { transport, userId: user.id, user };
    transport.onclose = () => {
      if (transport.sessionId) sessions.delete(transport.sessionId);
    };

    await createMcpServer(services, () => opened.user).connect(transport);
    await transport.handleRequest(req, res, req.body);
  });

  // SSE stream for server-initiated messages
  router.get("/", async (req, res) => {
    const session = existingSession(req.header("mcp-session-id"), currentUser(req));
    if (!session) {
      res.status(404).json({ error: "Session not found" });
      return;
    }
    await session.transport.handleRequest(req, res);
  });

  // Session termination
  router.delete("/", async (req, res) => {
    const sessionId = req.header("mcp-session-id");
    const session = existingSession(sessionId, currentUser(req));
    if (!sessionId || !session) {
      res.status(404).json({ error: "Session not found" });
      return;
    }
    await session.transport.handleRequest(req, res);
    sessions.delete(sessionId);
  });

  return router;
}
