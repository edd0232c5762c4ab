import type { ModelDtype } from "../config/model";

export type DeviceSelection = "accelerated" | "cpu";

export type ModelRole = "preferred" | "fallback";

export interface SamplingOptions {
  maxNewTokens: number;
  temperature: number;
  doSample: boolean;
  repetitionPenalty: number;
  padTokenId: number | null;
}

export interface PromptTokenizer {
  readonly eosTokenId: number | null;
  /** Keeps the first `maxTokens` tokens of `text`. */
  truncate(text: string, maxTokens: number): string;
}

export interface CausalLanguageModel {
  /**
   * Samples a continuation of `prompt`. Resolves to the decoded sequence
   * (prompt included) with special tokens stripped.
   */
  generate(prompt: string, options: SamplingOptions): Promise<string>;
}

/**
 * Tokenizer and weights of one model. Both halves always come from the same
 * loader call.
 */
export interface ModelHandle {
  readonly tokenizer: PromptTokenizer;
  readonly model: CausalLanguageModel;
}

export interface LoadRequest {
  modelId: string;
  device: DeviceSelection;
  dtype: ModelDtype;
  cacheDir: string;
  localFilesOnly: boolean;
}

export interface ModelLoader {
  load(request: LoadRequest): Promise<ModelHandle>;
}

export type DeviceProbe = () => Promise<DeviceSelection>;

export interface LoadedModelState {
  readonly status: "loaded";
  readonly handle: ModelHandle;
  readonly device: DeviceSelection;
  readonly modelId: string;
  readonly role: ModelRole;
}

export interface AbsentModelState {
  readonly status: "absent";
}

export type ModelState = LoadedModelState | AbsentModelState;

export const ABSENT_MODEL: AbsentModelState = Object.freeze({ status: "absent" });

export interface ModelStatus {
  ready: boolean;
  modelId: string | null;
  role: ModelRole | null;
  device: DeviceSelection | null;
}
