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

export interface IStorage {
  // Portal account operations
  createUser(user: InsertPortalUser): Promise<PortalUser>;
  getUserById(id: string): Promise<PortalUser | undefined>;
  getUserByUsername(username: string): Promise<PortalUser | undefined>;
  updateUserLastLogin(id: string): Promise<void>;

  // Chat history operations
  createChatInteraction(interaction: InsertChatInteraction): Promise<ChatInteraction>;
  /** Newest first */
  getChatInteractionsByUser(userId: string): Promise<ChatInteraction[]>;
  countChatInteractions(): Promise<number>;

  // Feedback operations
  createFeedbackEntry(entry: InsertFeedbackEntry): Promise<FeedbackEntry>;
  getSentimentCounts(): Promise<SentimentCounts>;

  // Concern operations
  createConcern(concern: InsertConcern): Promise<Concern>;
  /** The last `limit` concerns, oldest of them first */
  getRecentConcerns(limit: number): Promise<Concern[]>;
  updateConcernStatus(id: string, status: ConcernStatus): Promise<Concern | undefined>;
}
