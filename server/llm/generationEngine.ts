import { DEFAULT_GENERATION_SETTINGS, type GenerationSettings } from "../config/model";
import { describeError, logDebug, logError, sanitizeUserContent, truncate } from "../utils/logger";
import type { LoadedModelState, ModelState } from "./types";

export const MODEL_NOT_READY_MESSAGE =
  "I'm currently setting up my AI capabilities. Please try again in a moment.";

export const TECHNICAL_DIFFICULTIES_MESSAGE =
  "I’m having technical difficulties right now. Please try again later.";

const ANSWER_MARKER = "Answer:";

export class GenerationTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Generation did not finish within ${timeoutMs}ms`);
    this.name = "GenerationTimeoutError";
  }
}

export function buildPrompt(question: string): string {
  return [
    "You are a helpful AI assistant for a government citizen engagement platform.",
    "Provide clear, accurate, and helpful information about government services, policies, and civic processes.",
    "",
    `Question: ${question}`,
    "",
    ANSWER_MARKER,
  ].join("\n");
}

/**
 * Returns the trimmed text after the last "Answer:" marker, or the decoded
 * text unchanged when the marker is missing.
 */
export function extractAnswer(decoded: string): string {
  const index = decoded.lastIndexOf(ANSWER_MARKER);
  if (index === -1) {
    return decoded;
  }
  return decoded.slice(index + ANSWER_MARKER.length).trim();
}

async function withTimeout<T>(pending: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new GenerationTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([pending, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

async function runGeneration(
  question: string,
  state: LoadedModelState,
  settings: GenerationSettings,
): Promise<string> {
  const { tokenizer, model } = state.handle;

  const prompt = tokenizer.truncate(buildPrompt(question), settings.maxInputTokens);
  const decoded = await model.generate(prompt, {
    maxNewTokens: settings.maxNewTokens,
    temperature: settings.temperature,
    doSample: settings.doSample,
    repetitionPenalty: settings.repetitionPenalty,
    padTokenId: tokenizer.eosTokenId,
  });

  logDebug("generation_decoded", { modelId: state.modelId, decoded: truncate(decoded, 500) });
  return extractAnswer(decoded);
}

/**
 * Answers `question` with the loaded model. Resolves to a placeholder when no
 * model is loaded, and to the technical-difficulties message when generation
 * fails or times out. Never rejects.
 */
export async function generate(
  question: string,
  state: ModelState,
  settings: GenerationSettings = DEFAULT_GENERATION_SETTINGS,
): Promise<string> {
  if (state.status === "absent") {
    return MODEL_NOT_READY_MESSAGE;
  }

  const startTime = Date.now();

  try {
    const pending = runGeneration(question, state, settings);
    const answer = settings.timeoutMs > 0
      ? await withTimeout(pending, settings.timeoutMs)
      : await pending;

    logDebug("generation_completed", {
      modelId: state.modelId,
      question: sanitizeUserContent(question),
      durationMs: Date.now() - startTime,
      answerLength: answer.length,
    });
    return answer;
  } catch (error) {
    logError("generation_failed", {
      modelId: state.modelId,
      device: state.device,
      question: sanitizeUserContent(question),
      durationMs: Date.now() - startTime,
      error: describeError(error),
    });
    return TECHNICAL_DIFFICULTIES_MESSAGE;
  }
}
