import { z } from "zod";

export const ACCELERATED_DTYPES = ["q4", "q4f16", "bnb4", "q8", "fp16"] as const;
export const CPU_DTYPES = ["fp32", "fp16", "q8"] as const;
export const DEVICE_PREFERENCES = ["auto", "cpu", "accelerated"] as const;

export type AcceleratedDtype = (typeof ACCELERATED_DTYPES)[number];
export type CpuDtype = (typeof CPU_DTYPES)[number];
export type ModelDtype = AcceleratedDtype | CpuDtype;
export type DevicePreference = (typeof DEVICE_PREFERENCES)[number];

export const DEFAULT_PREFERRED_MODEL_ID = "onnx-community/granite-3.0-2b-instruct";
export const DEFAULT_FALLBACK_MODEL_ID = "Xenova/distilgpt2";

export interface GenerationSettings {
  /** Prompt tokens kept before generation; longer prompts are cut from the end. */
  maxInputTokens: number;
  maxNewTokens: number;
  temperature: number;
  repetitionPenalty: number;
  doSample: boolean;
  /** 0 disables the timeout. */
  timeoutMs: number;
}

export interface ModelConfig {
  preferredModelId: string;
  fallbackModelId: string;
  device: DevicePreference;
  acceleratedDtype: AcceleratedDtype;
  cpuDtype: CpuDtype;
  cacheDir: string;
  localFilesOnly: boolean;
  generation: GenerationSettings;
}

export const DEFAULT_GENERATION_SETTINGS: GenerationSettings = {
  maxInputTokens: 512,
  maxNewTokens: 150,
  temperature: 0.7,
  repetitionPenalty: 1.1,
  doSample: true,
  timeoutMs: 120_000,
};

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const modelEnvSchema = z.object({
  PREFERRED_MODEL_ID: z.string().min(1).default(DEFAULT_PREFERRED_MODEL_ID),
  FALLBACK_MODEL_ID: z.string().min(1).default(DEFAULT_FALLBACK_MODEL_ID),
  MODEL_DEVICE: z.enum(DEVICE_PREFERENCES).default("auto"),
  MODEL_ACCELERATED_DTYPE: z.enum(ACCELERATED_DTYPES).default("q4f16"),
  MODEL_CPU_DTYPE: z.enum(CPU_DTYPES).default("fp32"),
  MODEL_CACHE_DIR: z.string().min(1).default("./.model-cache"),
  MODEL_LOCAL_FILES_ONLY: booleanFlag,
  GEN_MAX_INPUT_TOKENS: z.coerce.number().int().positive().default(DEFAULT_GENERATION_SETTINGS.maxInputTokens),
  GEN_MAX_NEW_TOKENS: z.coerce.number().int().positive().default(DEFAULT_GENERATION_SETTINGS.maxNewTokens),
  GEN_TEMPERATURE: z.coerce.number().positive().default(DEFAULT_GENERATION_SETTINGS.temperature),
  GEN_REPETITION_PENALTY: z.coerce.number().positive().default(DEFAULT_GENERATION_SETTINGS.repetitionPenalty),
  GEN_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(DEFAULT_GENERATION_SETTINGS.timeoutMs),
});

/**
 * Reads the model and sampling configuration from the environment.
 * Empty strings count as unset.
 *
 * @throws ZodError naming the offending variable when a value is invalid
 */
export function getModelConfig(env: NodeJS.ProcessEnv = process.env): ModelConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = modelEnvSchema.parse(present);

  return {
    preferredModelId: parsed.PREFERRED_MODEL_ID,
    fallbackModelId: parsed.FALLBACK_MODEL_ID,
    device: parsed.MODEL_DEVICE,
    acceleratedDtype: parsed.MODEL_ACCELERATED_DTYPE,
    cpuDtype: parsed.MODEL_CPU_DTYPE,
    cacheDir: parsed.MODEL_CACHE_DIR,
    localFilesOnly: parsed.MODEL_LOCAL_FILES_ONLY,
    generation: {
      maxInputTokens: parsed.GEN_MAX_INPUT_TOKENS,
      maxNewTokens: parsed.GEN_MAX_NEW_TOKENS,
      temperature: parsed.GEN_TEMPERATURE,
      repetitionPenalty: parsed.GEN_REPETITION_PENALTY,
      doSample: DEFAULT_GENERATION_SETTINGS.doSample,
      timeoutMs: parsed.GEN_TIMEOUT_MS,
    },
  };
}
