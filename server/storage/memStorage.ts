/**
 * In-process storage, used when DATABASE_URL is not set and in tests.
 * Contents are lost on restart.
 */

import { v4 as uuidv4 } from "uuid";
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
import type { IStorage } from "./types";

export class MemStorage implements IStorage {
  private readonly users = new Map<string, PortalUser>();
  private readonly chatInteractions: ChatInteraction[] = [];
  private readonly feedbackEntries: FeedbackEntry[] = [];
  private readonly concerns: Concern[] = [];

  async createUser(user: InsertPortalUser): Promise<PortalUser> {
    const created: PortalUser = {
      id: user.id ?? uuidv4(),
      username: user.username,
      passwordHash: user.passwordHash,
      createdAt: user.createdAt ?? new Date(),
      lastLoginAt: user.lastLoginAt ?? null,
    };
    this.users.set(created.id, created);
    return created;
  }

  async getUserById(id: string): Promise<PortalUser | undefined> {
    return this.users.get(id);
  }

  async getUserByUsername(username: string): Promise<PortalUser | undefined> {
    return Array.from(this.users.values()).find((user) => user.username === username);
  }

  async updateUserLastLogin(id: string): Promise<void> {
    const user = this.users.get(id);
    if (user) {
      this.users.set(id, { ...user, lastLoginAt: new Date() });
    }
  }

  async createChatInteraction(interaction: InsertChatInteraction): Promise<ChatInteraction> {
    const created: ChatInteraction = {
      id: interaction.id ?? uuidv4(),
      userId: interaction.userId ?? null,
      question: interaction.question,
      response: interaction.response,
      createdAt: interaction.createdAt ?? new Date(),
    };
    this.chatInteractions.push(created);
    return created;
  }

  async getChatInteractionsByUser(userId: string): Promise<ChatInteraction[]> {
    return this.chatInteractions.filter((entry) => entry.userId === userId).reverse();
  }

  async countChatInteractions(): Promise<number> {
    return this.chatInteractions.length;
  }

  async createFeedbackEntry(entry: InsertFeedbackEntry): Promise<FeedbackEntry> {
    const created: FeedbackEntry = {
      id: entry.id ?? uuidv4(),
      userId: entry.userId ?? null,
      text: entry.text,
      sentiment: entry.sentiment,
      createdAt: entry.createdAt ?? new Date(),
    };
    this.feedbackEntries.push(created);
    return created;
  }

  async getSentimentCounts(): Promise<SentimentCounts> {
    const counts: SentimentCounts = { positive: 0, neutral: 0, negative: 0 };
    for (const entry of this.feedbackEntries) {
      counts[sentimentKey(entry.sentiment)] += 1;
    }
    return counts;
  }

  async createConcern(concern: InsertConcern): Promise<Concern> {
    const now = new Date();
    const created: Concern = {
      id: concern.id ?? uuidv4(),
      userId: concern.userId ?? null,
      text: concern.text,
      status: concern.status ?? "Open",
      createdAt: concern.createdAt ?? now,
      updatedAt: concern.updatedAt ?? now,
    };
    this.concerns.push(created);
    return created;
  }

  async getRecentConcerns(limit: number): Promise<Concern[]> {
    return limit > 0 ? this.concerns.slice(-limit) : [];
  }

  async updateConcernStatus(id: string, status: ConcernStatus): Promise<Concern | undefined> {
    const index = this.concerns.findIndex((concern) => concern.id === id);
    if (index === -1) {
      return undefined;
    }
    const updated: Concern = { ...this.concerns[index], status, updatedAt: new Date() };
    this.concerns[index] = updated;
    return updated;
  }
}
