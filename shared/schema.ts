import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, jsonb, integer, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Raw meeting documents as they arrive from the recording store.
// Two field-naming schemes exist; server/transcript/records.ts adapts both.
export const canonicalMeetingDocumentSchema = z.object({
  _id: z.union([z.string(), z.number()]).optional(),
  id: z.union([z.string(), z.number()]).optional(),
  title: z.string().min(1),
  date: z.string().nullable().optional(),
  participants: z.array(z.string()).optional(),
  transcript: z.string(),
});

// Google Drive export: the transcript sits inside `content` after a marker line
export const driveMeetingDocumentSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  createdTime: z.string().optional(),
  modifiedTime: z.string().optional(),
  content: z.string(),
});

export type CanonicalMeetingDocument = z.infer<typeof canonicalMeetingDocumentSchema>;
export type DriveMeetingDocument = z.infer<typeof driveMeetingDocumentSchema>;

export const recordings = pgTable("recordings", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  document: jsonb("document").$type<CanonicalMeetingDocument | DriveMeetingDocument>().notNull(),
  meetingDate: timestamp("meeting_date"), // copied out of the document for range queries
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => ({
  meetingDateIdx: index("recordings_meeting_date_idx").on(table.meetingDate),
}));

export const meetingAnalyses = pgTable("meeting_analyses", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  scope: text("scope").$type<AnalysisScope>().notNull(),
  meetingIds: text("meeting_ids").array().notNull(),
  status: text("status").$type<AnalysisStatus>().notNull(),
  analysis: text("analysis"),
  structuredAnalysis: jsonb("structured_analysis").$type<StructuredReport>(),
  error: text("error"),
  errorKind: text("error_kind").$type<AnalysisErrorKind>(),
  participantStats: jsonb("participant_stats").$type<Record<string, ParticipantStats>>().notNull(),
  totalStatements: integer("total_statements").notNull(),
  templateUsed: text("template_used").notNull(),
  templateVersion: text("template_version"), // null for custom prompts
  modelUsed: text("model_used").notNull(),
  reportDate: text("report_date"), // YYYY-MM-DD for daily/weekly reports
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => ({
  reportDateIdx: index("meeting_analyses_report_date_idx").on(table.reportDate),
}));

export const insertRecordingSchema = createInsertSchema(recordings).omit({
  createdAt: true,
  meetingDate: true,
}).extend({
  document: z.union([canonicalMeetingDocumentSchema, driveMeetingDocumentSchema]),
});

export type InsertRecording = z.infer<typeof insertRecordingSchema>;
export type Recording = typeof recordings.$inferSelect;

export type InsertMeetingAnalysis = typeof meetingAnalyses.$inferInsert;
export type MeetingAnalysis = typeof meetingAnalyses.$inferSelect;

// Pipeline types

export type MeetingRecord = {
  id: string;
  title: string;
  date: string | null; // YYYY-MM-DD or full ISO timestamp, null when unknown
  participants?: string[];
  transcript: string;
};

export type Statement = {
  timestamp: string | null;
  speaker: string;
  text: string;
  wordCount: number;
};

export type ParticipantStats = {
  speakCount: number;
  totalWords: number;
  timestamps: (string | null)[];
  statements: string[];
};

export type AggregatedParticipantStats = ParticipantStats & {
  meetingsAttended: number;
};

export type ParticipantSummary = {
  name: string;
  speakCount: number;
  totalWords: number;
  meetingsAttended: number;
  participationRate: number;
  wordShare: number;
  averageStatementsPerMeeting: number;
};

// Participant entry as reported by JSON templates, after reconciliation with computed counts
export type ReportParticipant = {
  name: string;
  speak_count: number;
  word_count: number;
  speaking_percentage: number;
  [key: string]: unknown;
};

export type StructuredReport = {
  participants?: ReportParticipant[];
  [key: string]: unknown;
};

export type AnalysisScope = "meeting" | "aggregate" | "daily" | "weekly";
export type AnalysisStatus = "success" | "error";
export type AnalysisErrorKind = "model_call_failed" | "model_timeout" | "internal";

export type AnalysisOutcome =
  | { status: "success"; analysis: string; structuredAnalysis?: StructuredReport }
  | { status: "error"; error: string; errorKind: AnalysisErrorKind };

export type AnalysisMetadata<TStats extends ParticipantStats> = {
  participantStats: Record<string, TStats>;
  totalStatements: number;
  templateUsed: string;
  templateVersion: string | null;
  modelUsed: string;
  timestamp: string;
};

export type AnalysisResult = AnalysisOutcome & AnalysisMetadata<ParticipantStats> & {
  meetingId: string;
  title: string;
  meetingDate: string | null;
};

export type AggregateAnalysisResult = AnalysisOutcome & AnalysisMetadata<AggregatedParticipantStats> & {
  scope: Exclude<AnalysisScope, "meeting">;
  meetingIds: string[];
  meetingTitles: string[];
  dateRange: { start: string; end: string } | null;
  reportDate: string | null;
  participantSummary: ParticipantSummary[];
};
