import type { Express, Request } from "express";
import { createServer, type Server } from "http";
import { parseISO, endOfDay } from "date-fns";
import type { MeetingRecord } from "@shared/schema";
import {
  analyzeAggregatedMeetings,
  analyzeMeeting,
  analyzeMeetings,
  buildDailyReport,
  buildWeeklyReport,
  defaultReportDate,
  type AnalysisOptions,
  type ReportDeps,
} from "./analysis";
import { analysisSchemas, commonSchemas, validate, type AnalysisOptionsInput } from "./middleware/validation";
import { handleRouteError, NotFoundError } from "./utils/errorHandler";

function toAnalysisOptions(input: AnalysisOptionsInput): AnalysisOptions {
  return {
    templateName: input.template,
    version: input.version,
    model: input.model,
    customInstructions: input.customInstructions,
    customPrompt: input.customPrompt,
  };
}

function routeParam(req: Request, name: string): string {
  const value = req.params[name];
  if (!value) {
    throw new NotFoundError(`Route parameter "${name}"`);
  }
  return value;
}

async function loadMeetings(deps: ReportDeps, ids: readonly string[]): Promise<MeetingRecord[]> {
  const meetings = await Promise.all(ids.map((id) => deps.storage.getMeeting(id)));
  const missing = ids.filter((_, i) => !meetings[i]);
  if (missing.length > 0) {
    throw new NotFoundError(`Meeting(s) ${missing.join(", ")}`);
  }
  return meetings.filter((meeting): meeting is MeetingRecord => meeting !== undefined);
}

export function registerRoutes(app: Express, deps: ReportDeps): Server {
  // Templates
  app.get("/api/templates", (_req, res) => {
    res.json(deps.registry.listTemplates());
  });

  app.get("/api/templates/:name/versions", validate({ params: commonSchemas.templateName }), (req, res) => {
    try {
      const name = routeParam(req, "name");
      const versions = deps.registry.listVersions(name).map((version) => ({
        version,
        ...deps.registry.getVersionInfo(name, version),
      }));
      res.json({ name, latestVersion: deps.registry.getLatestVersion(name), versions });
    } catch (error) {
      handleRouteError(res, error, "Templates");
    }
  });

  // Recordings and meetings
  app.post("/api/recordings", async (req, res) => {
    try {
      const input = analysisSchemas.recording.parse(req.body);
      const recording = await deps.storage.createRecording(input);
      res.status(201).json(recording);
    } catch (error) {
      handleRouteError(res, error, "Recordings");
    }
  });

  app.get("/api/meetings", async (req, res) => {
    try {
      const query = commonSchemas.meetingList.parse(req.query);
      const meetings = await deps.storage.listMeetings({
        from: query.from ? parseISO(query.from) : undefined,
        to: query.to ? endOfDay(parseISO(query.to)) : undefined,
        limit: query.limit,
      });
      res.json(meetings.map(({ id, title, date, participants }) => ({ id, title, date, participants })));
    } catch (error) {
      handleRouteError(res, error, "Meetings");
    }
  });

  app.get("/api/meetings/:id", validate({ params: commonSchemas.id }), async (req, res) => {
    try {
      const [meeting] = await loadMeetings(deps, [routeParam(req, "id")]);
      res.json(meeting);
    } catch (error) {
      handleRouteError(res, error, "Meetings");
    }
  });

  app.get("/api/meetings/:id/analyses", validate({ params: commonSchemas.id }), async (req, res) => {
    try {
      const analyses = await deps.storage.listAnalysisResults(routeParam(req, "id"));
      res.json(analyses);
    } catch (error) {
      handleRouteError(res, error, "Analyses");
    }
  });

  // Analysis
  app.post("/api/meetings/analyze", async (req, res) => {
    try {
      const input = analysisSchemas.analyzeBatch.parse(req.body);
      const meetings = await loadMeetings(deps, input.meetingIds);
      const results = await analyzeMeetings(meetings, deps, toAnalysisOptions(input));
      for (const result of results) {
        await deps.storage.saveAnalysisResult(result);
      }
      res.json({
        results,
        succeeded: results.filter((r) => r.status === "success").length,
        failed: results.filter((r) => r.status === "error").length,
      });
    } catch (error) {
      handleRouteError(res, error, "Analyze");
    }
  });

  app.post("/api/meetings/:id/analyze", validate({ params: commonSchemas.id }), async (req, res) => {
    try {
      const input = analysisSchemas.analyzeMeeting.parse(req.body ?? {});
      const [meeting] = await loadMeetings(deps, [routeParam(req, "id")]);
      const result = await analyzeMeeting(meeting, deps, toAnalysisOptions(input));
      await deps.storage.saveAnalysisResult(result);
      res.json(result);
    } catch (error) {
      handleRouteError(res, error, "Analyze");
    }
  });

  app.post("/api/reports/aggregate", async (req, res) => {
    try {
      const input = analysisSchemas.aggregate.parse(req.body);
      const meetings = await loadMeetings(deps, input.meetingIds);
      const result = await analyzeAggregatedMeetings(meetings, deps, {
        ...toAnalysisOptions(input),
        reportDate: input.reportDate,
      });
      await deps.storage.saveAnalysisResult(result);
      res.json(result);
    } catch (error) {
      handleRouteError(res, error, "Reports");
    }
  });

  app.post("/api/reports", async (req, res) => {
    try {
      const input = analysisSchemas.report.parse(req.body ?? {});
      const reportDate = input.reportDate ?? defaultReportDate(deps.now ? deps.now() : new Date());
      const build = input.kind === "weekly" ? buildWeeklyReport : buildDailyReport;
      const report = await build(reportDate, deps, {
        version: input.version,
        model: input.model,
        customInstructions: input.customInstructions,
      });
      res.json(report
        ? { report }
        : { report: null, message: `No meetings recorded for ${input.kind} report ${reportDate}` });
    } catch (error) {
      handleRouteError(res, error, "Reports");
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
