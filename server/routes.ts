import type { Express, Response } from "express";
import { createServer, type Server } from "http";
import {
  askQuestionSchema,
  concernRequestSchema,
  concernStatusUpdateSchema,
  feedbackRequestSchema,
} from "@shared/schema";
import { requireUser } from "./auth";
import type { IdentityRequest } from "./auth/types";
import type { CivicAssistant } from "./llm/assistant";
import { chatMessageLimiter } from "./middleware/rateLimiter";
import { getDashboardSummary, toChatEntryView, toConcernView } from "./services/dashboard";
import { analyzeSentiment } from "./services/sentiment";
import type { IStorage } from "./storage";
import { describeError, logError, logInfo, sanitizeUserContent } from "./utils/logger";

export interface RouteDependencies {
  storage: IStorage;
  assistant: CivicAssistant;
}

function handleRouteError(res: Response, route: string, error: unknown, message: string) {
  logError("route_error", { route, error: describeError(error) });
  return res.status(500).json({ message });
}

export async function registerRoutes(app: Express, deps: RouteDependencies): Promise<Server> {
  const { storage, assistant } = deps;

  // Public: model readiness for load balancers and the status bar
  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", model: assistant.getStatus() });
  });

  // ============================================================
  // CHAT
  // ============================================================

  app.post("/api/chat/ask", requireUser, chatMessageLimiter, async (req: IdentityRequest, res) => {
    try {
      const parsed = askQuestionSchema.safeParse(req.body ?? {});
      if (!parsed.success || !parsed.data.question) {
        return res.status(400).json({ message: "Please enter a question." });
      }

      const { question } = parsed.data;
      const startTime = Date.now();
      const response = await assistant.generateResponse(question);

      const interaction = await storage.createChatInteraction({
        userId: req.user?.id ?? null,
        question,
        response,
      });

      logInfo("chat_answered", {
        userId: req.user?.id,
        question: sanitizeUserContent(question),
        durationMs: Date.now() - startTime,
      });

      const entry = toChatEntryView(interaction);
      return res.json({ question: entry.question, response: entry.response, timestamp: entry.timestamp });
    } catch (error) {
      return handleRouteError(res, "chat_ask", error, "Failed to answer question");
    }
  });

  app.get("/api/chat/history", requireUser, async (req: IdentityRequest, res) => {
    try {
      const userId = req.user?.id;
      const interactions = userId ? await storage.getChatInteractionsByUser(userId) : [];
      return res.json(interactions.map(toChatEntryView));
    } catch (error) {
      return handleRouteError(res, "chat_history", error, "Failed to fetch chat history");
    }
  });

  // ============================================================
  // FEEDBACK
  // ============================================================

  app.post("/api/feedback", requireUser, async (req: IdentityRequest, res) => {
    try {
      const parsed = feedbackRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success || !parsed.data.feedback) {
        return res.status(400).json({ message: "Please enter feedback text." });
      }

      const feedbackText = parsed.data.feedback;
      const sentiment = analyzeSentiment(feedbackText);

      await storage.createFeedbackEntry({
        userId: req.user?.id ?? null,
        text: feedbackText,
        sentiment,
      });

      logInfo("feedback_recorded", { userId: req.user?.id, sentiment });
      return res.json({ sentiment, feedbackText });
    } catch (error) {
      return handleRouteError(res, "feedback", error, "Failed to record feedback");
    }
  });

  // ============================================================
  // CONCERNS
  // ============================================================

  app.post("/api/concerns", requireUser, async (req: IdentityRequest, res) => {
    try {
      const parsed = concernRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success || !parsed.data.concern) {
        return res.status(400).json({ message: "Please enter your concern." });
      }

      const concern = await storage.createConcern({
        userId: req.user?.id ?? null,
        text: parsed.data.concern,
        status: "Open",
      });

      logInfo("concern_submitted", { userId: req.user?.id, concernId: concern.id });
      return res.status(201).json({ concernSubmitted: true, concern: toConcernView(concern) });
    } catch (error) {
      return handleRouteError(res, "concern_create", error, "Failed to submit concern");
    }
  });

  app.patch("/api/concerns/:id", requireUser, async (req: IdentityRequest, res) => {
    try {
      const parsed = concernStatusUpdateSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return res.status(400).json({
          message: `Invalid status: ${parsed.error.errors.map(e => e.message).join(", ")}`,
        });
      }

      const updated = await storage.updateConcernStatus(req.params.id, parsed.data.status);
      if (!updated) {
        return res.status(404).json({ message: "Concern not found" });
      }

      logInfo("concern_status_updated", { concernId: updated.id, status: updated.status });
      return res.json(toConcernView(updated));
    } catch (error) {
      return handleRouteError(res, "concern_update", error, "Failed to update concern");
    }
  });

  // ============================================================
  // DASHBOARD
  // ============================================================

  app.get("/api/dashboard", requireUser, async (_req: IdentityRequest, res) => {
    try {
      return res.json(await getDashboardSummary(storage));
    } catch (error) {
      return handleRouteError(res, "dashboard", error, "Failed to load dashboard");
    }
  });

  return createServer(app);
}
