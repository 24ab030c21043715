/**
 * Validation Middleware
 *
 * Zod-based request validation for body, params, and query.
 * Failures are forwarded as ValidationError so routes answer 400.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodError, type ZodSchema } from "zod";
import { insertRecordingSchema } from "@shared/schema";
import { BATCH_CONSTANTS, STORAGE_CONSTANTS } from "../config/constants";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
  query?: ZodSchema;
}

/**
 * Creates a validation middleware that validates request parts against Zod schemas.
 *
 * @example
 * app.post("/api/meetings/:id/analyze",
 *   validate({ params: commonSchemas.id, body: analysisSchemas.analyzeMeeting }),
 *   async (req, res) => { ... }
 * );
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.query) {
        req.query = schemas.query.parse(req.query);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const messages = error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
        next(new ValidationError(messages));
      } else {
        next(error);
      }
    }
  };
}

const reportDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

// Shared by every analysis request
const analysisOptions = z.object({
  template: z.string().min(1).optional(),
  version: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  customInstructions: z.string().optional(),
  customPrompt: z.string().optional(),
});

export const commonSchemas = {
  id: z.object({
    id: z.string().min(1, "ID is required"),
  }),
  templateName: z.object({
    name: z.string().min(1, "Template name is required"),
  }),
  meetingList: z.object({
    from: reportDate.optional(),
    to: reportDate.optional(),
    limit: z.coerce.number().int().min(1).max(STORAGE_CONSTANTS.MAX_MEETING_LIMIT).optional(),
  }),
};

export const analysisSchemas = {
  recording: insertRecordingSchema,

  analyzeMeeting: analysisOptions,

  analyzeBatch: analysisOptions.extend({
    meetingIds: z.array(z.string().min(1)).min(1, "At least one meeting ID is required").max(BATCH_CONSTANTS.MAX_BATCH_MEETINGS),
  }),

  aggregate: analysisOptions.extend({
    meetingIds: z.array(z.string().min(1)).min(1, "At least one meeting ID is required").max(BATCH_CONSTANTS.MAX_BATCH_MEETINGS),
    reportDate: reportDate.optional(),
  }),

  report: z.object({
    kind: z.enum(["daily", "weekly"]).default("daily"),
    reportDate: reportDate.optional(),
    version: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    customInstructions: z.string().optional(),
  }),
};

export type AnalysisOptionsInput = z.infer<typeof analysisOptions>;
export type AnalyzeBatchInput = z.infer<typeof analysisSchemas.analyzeBatch>;
export type AggregateInput = z.infer<typeof analysisSchemas.aggregate>;
export type ReportInput = z.infer<typeof analysisSchemas.report>;
export type MeetingListQuery = z.infer<typeof commonSchemas.meetingList>;
