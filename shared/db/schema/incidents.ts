import {
  pgTable,
  pgEnum,
  text,
  boolean,
  doublePrecision,
  jsonb,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import { createInsertSchema } from 'drizzle-zod';
import { z } from 'zod';
import type { EntityBag, IncidentMetadata } from 'backend/services/threat-analysis/types';

export const severityEnum = pgEnum('incident_severity', [
  'critical',
  'high',
  'medium',
  'low',
  'info',
]);

export const incidentStatusEnum = pgEnum('incident_status', [
  'detected',
  'analyzing',
  'pending',
  'investigating',
  'confirmed',
  'dismissed',
]);

// One row per candidate that passed dedup, with the confirmation decision it received
export const incidents = pgTable('incidents', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  description: text('description').notNull(),
  keywords: jsonb('keywords').$type<string[]>().notNull().default([]),
  severity: severityEnum('severity').notNull(),
  status: incidentStatusEnum('status').notNull().default('detected'),
  confidenceScore: doublePrecision('confidence_score').notNull(),
  riskScore: doublePrecision('risk_score').notNull(), // 0-10
  sentimentScore: doublePrecision('sentiment_score').notNull(),
  sourceUrls: jsonb('source_urls').$type<string[]>().notNull().default([]),
  entities: jsonb('entities').$type<EntityBag>().notNull().default({}),
  incidentMetadata: jsonb('incident_metadata').$type<IncidentMetadata>().notNull(),
  confirmed: boolean('confirmed').notNull().default(false),
  confirmationScore: doublePrecision('confirmation_score').notNull().default(0),
  explanation: text('explanation').notNull().default(''),
  createdAt: timestamp('created_at', { withTimezone: false }).notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: false }).notNull(),
}, (table) => ({
  createdAtIdx: index('incidents_created_at_idx').on(table.createdAt),
}));

export const insertIncidentSchema = createInsertSchema(incidents, {
  confidenceScore: (schema) => schema.confidenceScore.min(0).max(1),
  riskScore: (schema) => schema.riskScore.min(0).max(10),
  sentimentScore: (schema) => schema.sentimentScore.min(-1).max(1),
});

export type IncidentRow = typeof incidents.$inferSelect;
export type InsertIncident = typeof incidents.$inferInsert;
export type ValidatedIncident = z.infer<typeof insertIncidentSchema>;
