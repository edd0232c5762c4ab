import type {
  ChatEntryView,
  ChatInteraction,
  Concern,
  ConcernView,
  DashboardSummary,
} from "@shared/schema";
import type { IStorage } from "../storage";
import { formatTimestamp } from "../utils/timestamps";

export const RECENT_CONCERNS_LIMIT = 10;

export function toChatEntryView(interaction: ChatInteraction): ChatEntryView {
  return {
    id: interaction.id,
    question: interaction.question,
    response: interaction.response,
    timestamp: formatTimestamp(interaction.createdAt),
  };
}

export function toConcernView(concern: Concern): ConcernView {
  return {
    id: concern.id,
    text: concern.text,
    status: concern.status,
    timestamp: formatTimestamp(concern.createdAt),
  };
}

export async function getDashboardSummary(storage: IStorage): Promise<DashboardSummary> {
  const [sentimentData, recentConcerns, totalInteractions] = await Promise.all([
    storage.getSentimentCounts(),
    storage.getRecentConcerns(RECENT_CONCERNS_LIMIT),
    storage.countChatInteractions(),
  ]);

  return {
    sentimentData,
    recentConcerns: recentConcerns.map(toConcernView),
    totalInteractions,
  };
}
