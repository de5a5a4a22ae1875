import type { Express } from "express";
import { createServer, type Server } from "http";
import {
  angleCriteriaSchema,
  callSearchCriteriaSchema,
  costQuerySchema,
  dailyVolumeQuerySchema,
  explorerCriteriaSchema,
  northStarQuerySchema,
  promptQuerySchema,
  quoteCriteriaSchema,
  testimonialQuerySchema,
  topQuotesQuerySchema,
  transcriptSearchSchema,
  weeklyMetricsQuerySchema,
} from "@shared/criteria";
import {
  insertAngleFeedbackSchema,
  loginSchema,
  registerSchema,
  updateTestimonialStatusSchema,
} from "@shared/schema";
import type { AppServices } from "./container";
import { extractSessionToken, requireAdmin, requireSession, sessionOf } from "./middleware/auth";
import { getContext } from "./middleware/requestContext";
import { authRateLimit } from "./middleware/security";
import { commonSchemas, validate } from "./middleware/validation";
import { withRetry } from "./query/cachedQueryExecutor";
import { handleRouteError } from "./utils/errorHandler";

export async function registerRoutes(app: Express, services: AppServices): Promise<Server> {
  const { auth, sessions, calls, testimonials, angles, health } = services;
  const authenticated = requireSession(sessions);

  // ---- Auth ----

  app.post("/api/auth/register", authRateLimit, async (req, res) => {
    try {
      const input = registerSchema.parse(req.body);
      const user = await auth.register(input.email, input.password, input.displayName);
      res.status(201).json({ user });
    } catch (error) {
      handleRouteError(res, error, "Register");
    }
  });

  app.post("/api/auth/login", authRateLimit, async (req, res) => {
    try {
      const input = loginSchema.parse(req.body);
      const result = await auth.login(input.email, input.password);
      res.json({ user: result.user, token: result.token, expiresAt: result.expiresAt.toISOString() });
    } catch (error) {
      handleRouteError(res, error, "Login");
    }
  });

  app.post("/api/auth/logout", async (req, res) => {
    try {
      const token = extractSessionToken(req);
      if (token) {
        await auth.logout(token);
      }
      res.status(204).end();
    } catch (error) {
      handleRouteError(res, error, "Logout");
    }
  });

  app.get("/api/auth/me", authenticated, (req, res) => {
    const session = sessionOf(req);
    res.json({
      userId: session.userId,
      email: session.email,
      displayName: session.displayName,
      isAdmin: session.isAdmin,
      expiresAt: session.expiresAt.toISOString(),
    });
  });

  // ---- Dashboard reads ----

  app.get("/api/filters/options", authenticated, async (req, res) => {
    try {
      const options = await withRetry(() => calls.getFilterOptions({ signal: getContext(req).signal }));
      res.json({ ...options, columnGroups: calls.getColumnGroups() });
    } catch (error) {
      handleRouteError(res, error, "FilterOptions");
    }
  });

  app.post("/api/quotes", authenticated, async (req, res) => {
    try {
      const criteria = quoteCriteriaSchema.parse(req.body ?? {});
      res.json(await withRetry(() => calls.listQuotes(criteria, { signal: getContext(req).signal })));
    } catch (error) {
      handleRouteError(res, error, "Quotes");
    }
  });

  app.post("/api/calls/search", authenticated, async (req, res) => {
    try {
      const criteria = callSearchCriteriaSchema.parse(req.body ?? {});
      res.json(await withRetry(() => calls.searchCalls(criteria, { signal: getContext(req).signal })));
    } catch (error) {
      handleRouteError(res, error, "CallSearch");
    }
  });

  app.get("/api/calls/:id", authenticated, validate({ params: commonSchemas.id }), async (req, res) => {
    try {
      res.json(await withRetry(() => calls.getCallDetail(req.params.id, { signal: getContext(req).signal })));
    } catch (error) {
      handleRouteError(res, error, "CallDetail");
    }
  });

  app.get("/api/calls/:id/transcript", authenticated, validate({ params: commonSchemas.id }), async (req, res) => {
    try {
      const transcript = await withRetry(() => calls.getTranscript(req.params.id, { signal: getContext(req).signal }));
      res.json({ transcript });
    } catch (error) {
      handleRouteError(res, error, "Transcript");
    }
  });

  app.post("/api/explorer", authenticated, async (req, res) => {
    try {
      const criteria = explorerCriteriaSchema.parse(req.body ?? {});
      res.json(await withRetry(() => calls.explore(criteria, { signal: getContext(req).signal })));
    } catch (error) {
      handleRouteError(res, error, "Explorer");
    }
  });

  app.get("/api/transcripts/search", authenticated, async (req, res) => {
    try {
      const query = transcriptSearchSchema.parse(req.query);
      const results = await withRetry(() => calls.searchTranscripts(query, { signal: getContext(req).signal }));
      res.json({ results, count: results.length });
    } catch (error) {
      handleRouteError(res, error, "TranscriptSearch");
    }
  });

  app.get("/api/metrics/weekly", authenticated, async (req, res) => {
    try {
      const { days } = weeklyMetricsQuerySchema.parse(req.query);
      res.json(await withRetry(() => calls.getWeeklyMetrics(days, { signal: getContext(req).signal })));
    } catch (error) {
      handleRouteError(res, error, "WeeklyMetrics");
    }
  });

  app.get("/api/metrics/daily-volume", authenticated, async (req, res) => {
    try {
      const { days } = dailyVolumeQuerySchema.parse(req.query);
      res.json({ days: await withRetry(() => calls.getDailyVolume(days, { signal: getContext(req).signal })) });
    } catch (error) {
      handleRouteError(res, error, "DailyVolume");
    }
  });

  app.get("/api/metrics/north-star", authenticated, async (req, res) => {
    try {
      const { weeks } = northStarQuerySchema.parse(req.query);
      const signal = getContext(req).signal;
      const current = await withRetry(() => calls.getNorthStar({ signal }));
      const history = await withRetry(() => calls.getNorthStarHistory(weeks, { signal }));
      res.json({ ...current, history });
    } catch (error) {
      handleRouteError(res, error, "NorthStar");
    }
  });

  app.get("/api/quotes/top", authenticated, async (req, res) => {
    try {
      const { days, limit } = topQuotesQuerySchema.parse(req.query);
      res.json({ quotes: await withRetry(() => calls.getTopQuotes(days, limit, { signal: getContext(req).signal })) });
    } catch (error) {
      handleRouteError(res, error, "TopQuotes");
    }
  });

  app.get("/api/stats", authenticated, async (req, res) => {
    try {
      res.json(await withRetry(() => calls.getPipelineStats({ signal: getContext(req).signal })));
    } catch (error) {
      handleRouteError(res, error, "PipelineStats");
    }
  });

  // ---- Testimonial pipeline ----

  app.get("/api/testimonials", authenticated, async (req, res) => {
    try {
      const query = testimonialQuerySchema.parse(req.query);
      res.json(await withRetry(() => testimonials.list(query, { signal: getContext(req).signal })));
    } catch (error) {
      handleRouteError(res, error, "Testimonials");
    }
  });

  app.patch("/api/testimonials/:id/status", authenticated, validate({ params: commonSchemas.id }), async (req, res) => {
    try {
      const update = updateTestimonialStatusSchema.parse(req.body);
      await testimonials.updateStatus(req.params.id, update, sessionOf(req).email);
      res.json({ success: true });
    } catch (error) {
      handleRouteError(res, error, "TestimonialStatus");
    }
  });

  // ---- Angle bank ----

  app.post("/api/angles", authenticated, async (req, res) => {
    try {
      const criteria = angleCriteriaSchema.parse(req.body ?? {});
      res.json(await withRetry(() => angles.list(criteria, sessionOf(req).email, { signal: getContext(req).signal })));
    } catch (error) {
      handleRouteError(res, error, "Angles");
    }
  });

  app.post("/api/angles/:id/feedback", authenticated, validate({ params: commonSchemas.id }), async (req, res) => {
    try {
      const feedback = insertAngleFeedbackSchema.parse(req.body);
      await angles.recordFeedback(req.params.id, sessionOf(req).email, feedback);
      res.status(201).json({ success: true });
    } catch (error) {
      handleRouteError(res, error, "AngleFeedback");
    }
  });

  // ---- Admin ----

  app.get("/api/system/health", authenticated, requireAdmin(auth), async (req, res) => {
    try {
      res.json(await withRetry(() => health.getHealth({ signal: getContext(req).signal })));
    } catch (error) {
      handleRouteError(res, error, "SystemHealth");
    }
  });

  app.get("/api/system/costs", authenticated, requireAdmin(auth), async (req, res) => {
    try {
      const { days } = costQuerySchema.parse(req.query);
      res.json(await withRetry(() => health.getCostTracking(days, { signal: getContext(req).signal })));
    } catch (error) {
      handleRouteError(res, error, "CostTracking");
    }
  });

  app.get("/api/system/prompts", authenticated, requireAdmin(auth), async (req, res) => {
    try {
      const { active } = promptQuerySchema.parse(req.query);
      res.json({ prompts: await withRetry(() => health.getPromptLibrary(active, { signal: getContext(req).signal })) });
    } catch (error) {
      handleRouteError(res, error, "PromptLibrary");
    }
  });

  const httpServer = createServer(app);

  return httpServer;
}
