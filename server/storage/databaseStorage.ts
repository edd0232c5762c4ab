/**
 * Postgres-backed storage (drizzle over Neon serverless)
 */

import type {
  ChatInteraction,
  Concern,
  ConcernStatus,
  FeedbackEntry,
  InsertChatInteraction,
  InsertConcern,
  InsertFeedbackEntry,
  InsertPortalUser,
  PortalUser,
  SentimentCounts,
} from "@shared/schema";
import { sentimentKey } from "../services/sentiment";
import { createDb, desc, eq, schema, sql, type Database } from "./db";
import type { IStorage } from "./types";

export class DatabaseStorage implements IStorage {
  private readonly db: Database;

  constructor(connectionString: string) {
    this.db = createDb(connectionString);
  }

  // ============================================================
  // PORTAL ACCOUNTS
  // ============================================================

  async createUser(user: InsertPortalUser): Promise<PortalUser> {
    const [result] = await this.db.insert(schema.portalUsers).values(user).returning();
    return result;
  }

  async getUserById(id: string): Promise<PortalUser | undefined> {
    const [result] = await this.db
      .select()
      .from(schema.portalUsers)
      .where(eq(schema.portalUsers.id, id));
    return result;
  }

  async getUserByUsername(username: string): Promise<PortalUser | undefined> {
    const [result] = await this.db
      .select()
      .from(schema.portalUsers)
      .where(eq(schema.portalUsers.username, username));
    return result;
  }

  async updateUserLastLogin(id: string): Promise<void> {
    await this.db
      .update(schema.portalUsers)
      .set({ lastLoginAt: new Date() })
      .where(eq(schema.portalUsers.id, id));
  }

  // ============================================================
  // CHAT HISTORY
  // ============================================================

  async createChatInteraction(interaction: InsertChatInteraction): Promise<ChatInteraction> {
    const [result] = await this.db.insert(schema.chatInteractions).values(interaction).returning();
    return result;
  }

  async getChatInteractionsByUser(userId: string): Promise<ChatInteraction[]> {
    return await this.db
      .select()
      .from(schema.chatInteractions)
      .where(eq(schema.chatInteractions.userId, userId))
      .orderBy(desc(schema.chatInteractions.createdAt));
  }

  async countChatInteractions(): Promise<number> {
    const [result] = await this.db
      .select({ total: sql<number>`count(*)::int` })
      .from(schema.chatInteractions);
    return result?.total ?? 0;
  }

  // ============================================================
  // FEEDBACK
  // ============================================================

  async createFeedbackEntry(entry: InsertFeedbackEntry): Promise<FeedbackEntry> {
    const [result] = await this.db.insert(schema.feedbackEntries).values(entry).returning();
    return result;
  }

  async getSentimentCounts(): Promise<SentimentCounts> {
    const rows = await this.db
      .select({
        sentiment: schema.feedbackEntries.sentiment,
        total: sql<number>`count(*)::int`,
      })
      .from(schema.feedbackEntries)
      .groupBy(schema.feedbackEntries.sentiment);

    const counts: SentimentCounts = { positive: 0, neutral: 0, negative: 0 };
    for (const row of rows) {
      counts[sentimentKey(row.sentiment)] += row.total;
    }
    return counts;
  }

  // ============================================================
  // CONCERNS
  // ============================================================

  async createConcern(concern: InsertConcern): Promise<Concern> {
    const [result] = await this.db.insert(schema.concerns).values(concern).returning();
    return result;
  }

  async getRecentConcerns(limit: number): Promise<Concern[]> {
    if (limit <= 0) {
      return [];
    }
    const rows = await this.db
      .select()
      .from(schema.concerns)
      .orderBy(desc(schema.concerns.createdAt))
      .limit(limit);
    return rows.reverse();
  }

  async updateConcernStatus(id: string, status: ConcernStatus): Promise<Concern | undefined> {
    const [result] = await this.db
      .update(schema.concerns)
      .set({ status, updatedAt: new Date() })
      .where(eq(schema.concerns.id, id))
      .returning();
    return result;
  }
}
