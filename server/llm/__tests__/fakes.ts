import type {
  CausalLanguageModel,
  LoadRequest,
  ModelHandle,
  ModelLoader,
  PromptTokenizer,
  SamplingOptions,
} from "../types";

export class FakeTokenizer implements PromptTokenizer {
  readonly truncateCalls: Array<{ text: string; maxTokens: number }> = [];

  constructor(readonly eosTokenId: number | null = 50256) {}

  truncate(text: string, maxTokens: number): string {
    this.truncateCalls.push({ text, maxTokens });
    return text;
  }
}

export type Reply = (prompt: string) => Promise<string>;

export class FakeModel implements CausalLanguageModel {
  readonly calls: Array<{ prompt: string; options: SamplingOptions }> = [];

  constructor(private readonly reply: Reply) {}

  generate(prompt: string, options: SamplingOptions): Promise<string> {
    this.calls.push({ prompt, options });
    return this.reply(prompt);
  }
}

/** Echoes the prompt followed by `answer`, the way a causal model decodes. */
export function echoReply(answer: string): Reply {
  return async (prompt) => `${prompt} ${answer}`;
}

export function createHandle(reply: Reply = echoReply("Visit the clerk's office."), eosTokenId: number | null = 50256) {
  const tokenizer = new FakeTokenizer(eosTokenId);
  const model = new FakeModel(reply);
  const handle: ModelHandle = { tokenizer, model };
  return { handle, tokenizer, model };
}

/**
 * Loads whatever `outcomes` maps the model id to; ids without an entry fail.
 */
export class FakeLoader implements ModelLoader {
  readonly requests: LoadRequest[] = [];

  constructor(private readonly outcomes: Record<string, ModelHandle> = {}) {}

  async load(request: LoadRequest): Promise<ModelHandle> {
    this.requests.push(request);
    const handle = this.outcomes[request.modelId];
    if (!handle) {
      throw new Error(`cannot load ${request.modelId}`);
    }
    return handle;
  }
}
