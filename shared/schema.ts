import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp } from "drizzle-orm/pg-core";
import { z } from "zod";

export const SENTIMENTS = ["Positive", "Neutral", "Negative"] as const;
export type Sentiment = (typeof SENTIMENTS)[number];

export const CONCERN_STATUSES = ["Open", "In Progress", "Resolved"] as const;
export type ConcernStatus = (typeof CONCERN_STATUSES)[number];

// ============================================================
// PORTAL TABLES
// ============================================================

// Portal accounts: only authenticated accounts reach chat, feedback and concerns
export const portalUsers = pgTable("portal_users", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  username: text("username").notNull().unique(),
  passwordHash: text("password_hash").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  lastLoginAt: timestamp("last_login_at"),
});

// One row per answered chat question
export const chatInteractions = pgTable("chat_interactions", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: varchar("user_id").references(() => portalUsers.id),
  question: text("question").notNull(),
  response: text("response").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const feedbackEntries = pgTable("feedback_entries", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: varchar("user_id").references(() => portalUsers.id),
  text: text("text").notNull(),
  sentiment: text("sentiment").$type<Sentiment>().notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const concerns = pgTable("concerns", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  userId: varchar("user_id").references(() => portalUsers.id),
  text: text("text").notNull(),
  status: text("status").$type<ConcernStatus>().notNull().default("Open"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// Types
export type PortalUser = typeof portalUsers.$inferSelect;
export type InsertPortalUser = typeof portalUsers.$inferInsert;

export type ChatInteraction = typeof chatInteractions.$inferSelect;
export type InsertChatInteraction = typeof chatInteractions.$inferInsert;

export type FeedbackEntry = typeof feedbackEntries.$inferSelect;
export type InsertFeedbackEntry = typeof feedbackEntries.$inferInsert;

export type Concern = typeof concerns.$inferSelect;
export type InsertConcern = typeof concerns.$inferInsert;

// ============================================================
// API REQUEST SCHEMAS
// ============================================================

export const loginRequestSchema = z.object({
  username: z.string().default("").transform((s) => s.trim()),
  password: z.string().default("").transform((s) => s.trim()),
});

export const askQuestionSchema = z.object({
  question: z.string().default("").transform((s) => s.trim()),
});

export const feedbackRequestSchema = z.object({
  feedback: z.string().default("").transform((s) => s.trim()),
});

export const concernRequestSchema = z.object({
  concern: z.string().default("").transform((s) => s.trim()),
});

export const concernStatusUpdateSchema = z.object({
  status: z.enum(CONCERN_STATUSES),
});

// ============================================================
// API RESPONSE TYPES
// ============================================================

export interface SentimentCounts {
  positive: number;
  neutral: number;
  negative: number;
}

export interface ChatEntryView {
  id: string;
  question: string;
  response: string;
  timestamp: string; // "YYYY-MM-DD HH:mm:ss", server-local
}

export interface ConcernView {
  id: string;
  text: string;
  status: ConcernStatus;
  timestamp: string;
}

export interface DashboardSummary {
  sentimentData: SentimentCounts;
  recentConcerns: ConcernView[];
  totalInteractions: number;
}
