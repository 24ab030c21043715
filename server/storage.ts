import {
  type AggregateAnalysisResult,
  type AnalysisResult,
  type InsertMeetingAnalysis,
  type InsertRecording,
  type MeetingAnalysis,
  type MeetingRecord,
  type Recording,
  meetingAnalyses as meetingAnalysesTable,
  recordings as recordingsTable,
} from "@shared/schema";
import { randomUUID } from "crypto";
import { parseISO, isValid } from "date-fns";
import { and, arrayContains, asc, desc, eq, gte, lte, sql as drizzleSql } from "drizzle-orm";
import { getDb, type Database } from "./db";
import { STORAGE_CONSTANTS } from "./config/constants";
import { adaptMeetingDocument } from "./transcript/records";

export type MeetingQuery = {
  from?: Date;
  to?: Date;
  /** null returns every meeting in the range */
  limit?: number | null;
};

export interface IStorage {
  // Recordings (raw meeting documents)
  createRecording(recording: InsertRecording): Promise<Recording>;
  getMeeting(id: string): Promise<MeetingRecord | undefined>;
  listMeetings(query?: MeetingQuery): Promise<MeetingRecord[]>;

  // Analysis results
  saveAnalysisResult(result: AnalysisResult | AggregateAnalysisResult): Promise<MeetingAnalysis>;
  listAnalysisResults(meetingId: string): Promise<MeetingAnalysis[]>;
}

function toStoredDate(date: string | null): Date | null {
  if (!date) return null;
  const parsed = parseISO(date);
  return isValid(parsed) ? parsed : null;
}

function prepareRecording(insert: InsertRecording): { id: string; record: MeetingRecord } {
  const fallbackId = insert.id ?? randomUUID();
  const record = adaptMeetingDocument(insert.document, fallbackId);
  return { id: insert.id ?? record.id, record };
}

function toMeetingRecord(recording: Recording): MeetingRecord {
  return { ...adaptMeetingDocument(recording.document, recording.id), id: recording.id };
}

export function toAnalysisRow(result: AnalysisResult | AggregateAnalysisResult): InsertMeetingAnalysis {
  const target = "meetingId" in result
    ? { scope: "meeting" as const, meetingIds: [result.meetingId], reportDate: null }
    : { scope: result.scope, meetingIds: result.meetingIds, reportDate: result.reportDate };

  return {
    ...target,
    status: result.status,
    analysis: result.status === "success" ? result.analysis : null,
    structuredAnalysis: result.status === "success" ? result.structuredAnalysis ?? null : null,
    error: result.status === "error" ? result.error : null,
    errorKind: result.status === "error" ? result.errorKind : null,
    participantStats: result.participantStats,
    totalStatements: result.totalStatements,
    templateUsed: result.templateUsed,
    templateVersion: result.templateVersion,
    modelUsed: result.modelUsed,
  };
}

export class MemStorage implements IStorage {
  private recordings: Map<string, Recording>;
  private analyses: Map<string, MeetingAnalysis>;

  constructor() {
    this.recordings = new Map();
    this.analyses = new Map();
  }

  async createRecording(insert: InsertRecording): Promise<Recording> {
    const { id, record } = prepareRecording(insert);
    const recording: Recording = {
      id,
      document: insert.document,
      meetingDate: toStoredDate(record.date),
      createdAt: new Date(),
    };
    this.recordings.set(id, recording);
    return recording;
  }

  async getMeeting(id: string): Promise<MeetingRecord | undefined> {
    const recording = this.recordings.get(id);
    return recording ? toMeetingRecord(recording) : undefined;
  }

  async listMeetings(query: MeetingQuery = {}): Promise<MeetingRecord[]> {
    const limit = query.limit === undefined ? STORAGE_CONSTANTS.DEFAULT_MEETING_LIMIT : query.limit;
    const { from, to } = query;

    return Array.from(this.recordings.values())
      .filter((r) => {
        if (!from && !to) return true;
        if (!r.meetingDate) return false;
        if (from && r.meetingDate < from) return false;
        if (to && r.meetingDate > to) return false;
        return true;
      })
      .sort((a, b) => {
        if (!a.meetingDate || !b.meetingDate) {
          return (a.meetingDate ? 0 : 1) - (b.meetingDate ? 0 : 1);
        }
        return a.meetingDate.getTime() - b.meetingDate.getTime();
      })
      .slice(0, limit ?? undefined)
      .map(toMeetingRecord);
  }

  async saveAnalysisResult(result: AnalysisResult | AggregateAnalysisResult): Promise<MeetingAnalysis> {
    const row = toAnalysisRow(result);
    const id = randomUUID();
    const stored: MeetingAnalysis = {
      id,
      scope: row.scope,
      meetingIds: row.meetingIds,
      status: row.status,
      analysis: row.analysis ?? null,
      structuredAnalysis: row.structuredAnalysis ?? null,
      error: row.error ?? null,
      errorKind: row.errorKind ?? null,
      participantStats: row.participantStats,
      totalStatements: row.totalStatements,
      templateUsed: row.templateUsed,
      templateVersion: row.templateVersion ?? null,
      modelUsed: row.modelUsed,
      reportDate: row.reportDate ?? null,
      createdAt: new Date(),
    };
    this.analyses.set(id, stored);
    return stored;
  }

  async listAnalysisResults(meetingId: string): Promise<MeetingAnalysis[]> {
    return Array.from(this.analyses.values())
      .filter((a) => a.meetingIds.includes(meetingId))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }
}

export class DbStorage implements IStorage {
  private db: Database;

  constructor(db: Database = getDb()) {
    this.db = db;
  }

  async createRecording(insert: InsertRecording): Promise<Recording> {
    const { id, record } = prepareRecording(insert);
    const results = await this.db
      .insert(recordingsTable)
      .values({ id, document: insert.document, meetingDate: toStoredDate(record.date) })
      .returning();
    return results[0];
  }

  async getMeeting(id: string): Promise<MeetingRecord | undefined> {
    const results = await this.db
      .select()
      .from(recordingsTable)
      .where(eq(recordingsTable.id, id))
      .limit(1);
    return results[0] ? toMeetingRecord(results[0]) : undefined;
  }

  async listMeetings(query: MeetingQuery = {}): Promise<MeetingRecord[]> {
    const limit = query.limit === undefined ? STORAGE_CONSTANTS.DEFAULT_MEETING_LIMIT : query.limit;
    const rows = this.db
      .select()
      .from(recordingsTable)
      .where(and(
        query.from ? gte(recordingsTable.meetingDate, query.from) : undefined,
        query.to ? lte(recordingsTable.meetingDate, query.to) : undefined,
      ))
      .orderBy(drizzleSql`${recordingsTable.meetingDate} ASC NULLS LAST`, asc(recordingsTable.createdAt));
    const results = limit === null ? await rows : await rows.limit(limit);
    return results.map(toMeetingRecord);
  }

  async saveAnalysisResult(result: AnalysisResult | AggregateAnalysisResult): Promise<MeetingAnalysis> {
    const results = await this.db
      .insert(meetingAnalysesTable)
      .values(toAnalysisRow(result))
      .returning();
    return results[0];
  }

  async listAnalysisResults(meetingId: string): Promise<MeetingAnalysis[]> {
    return this.db
      .select()
      .from(meetingAnalysesTable)
      .where(arrayContains(meetingAnalysesTable.meetingIds, [meetingId]))
      .orderBy(desc(meetingAnalysesTable.createdAt));
  }
}

function createStorage(): IStorage {
  if (process.env.DATABASE_URL) {
    return new DbStorage();
  }
  console.log("[Storage] DATABASE_URL not set, using in-memory storage");
  return new MemStorage();
}

export const storage: IStorage = createStorage();
