/**
 * Local LLM loader: Hugging Face Transformers.js (ONNX Runtime for Node)
 *
 * The library is imported lazily so a missing or broken native runtime
 * surfaces as a load failure, which the resolver turns into the fallback
 * path instead of a crash at import time.
 */

import { logDebug } from "../utils/logger";
import type {
  CausalLanguageModel,
  DeviceSelection,
  LoadRequest,
  ModelHandle,
  ModelLoader,
  PromptTokenizer,
  SamplingOptions,
} from "./types";

const RUNTIME_DEVICES = {
  accelerated: "cuda",
  cpu: "cpu",
} as const satisfies Record<DeviceSelection, string>;

export interface PipelineGenerationOptions {
  max_new_tokens: number;
  temperature: number;
  do_sample: boolean;
  repetition_penalty: number;
  pad_token_id?: number;
}

/**
 * The part of a text-generation pipeline used here: the callable generator
 * and its tokenizer.
 */
export interface GenerationPipeline {
  (text: string, options: PipelineGenerationOptions): Promise<unknown>;
  readonly tokenizer: {
    encode(text: string, options: { add_special_tokens: boolean }): number[];
    decode(ids: number[], options: { skip_special_tokens: boolean }): string;
  };
}

function readTokenId(source: object, key: string): number | null {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "number" ? value : null;
}

/**
 * Pulls the decoded sequence out of a text-generation pipeline result,
 * which is a list (or list of lists) of `{ generated_text }`.
 */
export function readGeneratedText(output: unknown): string {
  const first: unknown = Array.isArray(output) ? output[0] : output;
  const single: unknown = Array.isArray(first) ? first[0] : first;

  if (typeof single === "object" && single !== null && "generated_text" in single) {
    const text = single.generated_text;
    if (typeof text === "string") {
      return text;
    }
  }
  throw new Error("Text generation returned no generated_text");
}

export class PipelineTokenizer implements PromptTokenizer {
  readonly eosTokenId: number | null;

  constructor(private readonly generator: GenerationPipeline) {
    this.eosTokenId = readTokenId(generator.tokenizer, "eos_token_id");
  }

  // Special tokens count against the budget; the pipeline adds them back.
  truncate(text: string, maxTokens: number): string {
    const ids = this.generator.tokenizer.encode(text, { add_special_tokens: true });
    if (ids.length <= maxTokens) {
      return text;
    }
    return this.generator.tokenizer.decode(ids.slice(0, maxTokens), { skip_special_tokens: true });
  }
}

export class PipelineModel implements CausalLanguageModel {
  constructor(private readonly generator: GenerationPipeline) {}

  async generate(prompt: string, options: SamplingOptions): Promise<string> {
    const generationOptions: PipelineGenerationOptions = {
      max_new_tokens: options.maxNewTokens,
      temperature: options.temperature,
      do_sample: options.doSample,
      repetition_penalty: options.repetitionPenalty,
    };
    if (options.padTokenId !== null) {
      generationOptions.pad_token_id = options.padTokenId;
    }
    return readGeneratedText(await this.generator(prompt, generationOptions));
  }
}

export class TransformersModelLoader implements ModelLoader {
  async load(request: LoadRequest): Promise<ModelHandle> {
    const { env, pipeline } = await import("@huggingface/transformers");

    env.cacheDir = request.cacheDir;
    env.allowRemoteModels = !request.localFilesOnly;

    logDebug("model_load_requested", {
      modelId: request.modelId,
      device: RUNTIME_DEVICES[request.device],
      dtype: request.dtype,
    });

    const generator = await pipeline("text-generation", request.modelId, {
      device: RUNTIME_DEVICES[request.device],
      dtype: request.dtype,
      cache_dir: request.cacheDir,
      local_files_only: request.localFilesOnly,
    });

    return {
      tokenizer: new PipelineTokenizer(generator),
      model: new PipelineModel(generator),
    };
  }
}
