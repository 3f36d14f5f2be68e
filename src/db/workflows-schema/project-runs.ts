import { pgTable, uuid, varchar, timestamp, jsonb, index, serial, foreignKey } from "drizzle-orm/pg-core";
import type { FailureReport, Project } from "../../shared/types.js";
import { projectState } from "./enums.js";

// -----------------------------------------------------------------------------
// Project Runs Table - one row per project, holding its latest snapshot
// -----------------------------------------------------------------------------

export const projectRuns = pgTable("project_runs", {
  projectId: uuid("project_id").primaryKey().notNull(),
  slug: varchar("slug", { length: 160 }).notNull(),
  state: projectState().default('planning').notNull(),
  lastTransition: varchar("last_transition", { length: 60 }).notNull(),
  snapshot: jsonb().$type<Project>().notNull(),
  failure: jsonb().$type<FailureReport>(),
  capturedAt: timestamp("captured_at", { withTimezone: true, mode: 'string' }).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true, mode: 'string' }).defaultNow().notNull(),
}, (table) => [
  index("project_runs_state_idx").on(table.state),
  index("project_runs_created_at_idx").on(table.createdAt),
]);

// -----------------------------------------------------------------------------
// Project Run Transitions Table - one row per stage transition
// -----------------------------------------------------------------------------

export const projectRunTransitions = pgTable("project_run_transitions", {
  id: serial().primaryKey(),
  projectId: uuid("project_id").notNull(),
  transition: varchar("transition", { length: 60 }).notNull(),
  state: projectState().notNull(),
  capturedAt: timestamp("captured_at", { withTimezone: true, mode: 'string' }).notNull(),
}, (table) => [
  foreignKey({
    columns: [table.projectId],
    foreignColumns: [projectRuns.projectId],
    name: "project_run_transitions_project_id_project_runs_project_id_fk"
  }).onDelete("cascade"),
  index("project_run_transitions_project_id_idx").on(table.projectId),
]);

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type InsertProjectRun = typeof projectRuns.$inferInsert;
export type SelectProjectRun = typeof projectRuns.$inferSelect;
export type InsertProjectRunTransition = typeof projectRunTransitions.$inferInsert;
