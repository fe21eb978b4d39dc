import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";

export const assessments = sqliteTable(
  "assessments",
  {
    id: text("id").primaryKey(),
    taskId: text("task_id"),
    exploitAgentUrl: text("exploit_agent_url").notNull(),
    requestJson: text("request_json").notNull(),
    difficulty: text("difficulty").notNull(),
    status: text("status").notNull(),
    winner: text("winner"),
    resultJson: text("result_json"),
    errorMessage: text("error_message"),
    startedAt: integer("started_at").notNull(),
    endedAt: integer("ended_at"),
  },
  (table) => [index("assessments_started_at_idx").on(table.startedAt)],
);

export const assessmentEvents = sqliteTable(
  "assessment_events",
  {
    id: integer("id", { mode: "number" }).primaryKey({ autoIncrement: true }),
    assessmentId: text("assessment_id").notNull(),
    seq: integer("seq").notNull(),
    eventType: text("event_type").notNull(),
    payloadJson: text("payload_json").notNull(),
    createdAt: integer("created_at").notNull(),
  },
  (table) => [
    uniqueIndex("assessment_events_assessment_seq_idx").on(table.assessmentId, table.seq),
    index("assessment_events_assessment_id_id_idx").on(table.assessmentId, table.id),
  ],
);

export type AssessmentRow = typeof assessments.$inferSelect;
