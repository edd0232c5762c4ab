import type { ModelConfig } from "../config/model";
import { describeError, logError, logInfo, logWarn } from "../utils/logger";
import { generate, MODEL_NOT_READY_MESSAGE } from "./generationEngine";
import { initialize } from "./modelResolver";
import { TransformersModelLoader } from "./transformersLoader";
import {
  ABSENT_MODEL,
  type DeviceProbe,
  type ModelLoader,
  type ModelState,
  type ModelStatus,
} from "./types";

export interface CivicAssistantOptions {
  loader?: ModelLoader;
  probe?: DeviceProbe;
}

/**
 * Owns the single ModelState of the process. The state is resolved once
 * and is read-only afterwards, so concurrent requests share it without locking.
 */
export class CivicAssistant {
  private readonly loader: ModelLoader;
  private readonly probe?: DeviceProbe;
  private initialization: Promise<ModelState> | null = null;
  private state: ModelState = ABSENT_MODEL;

  constructor(private readonly config: ModelConfig, options: CivicAssistantOptions = {}) {
    this.loader = options.loader ?? new TransformersModelLoader();
    this.probe = options.probe;
  }

  /**
   * Loads the preferred or fallback model. Runs once; later calls share the
   * first result. Resolves to true iff some model is loaded.
   */
  async initializeModel(): Promise<boolean> {
    if (!this.initialization) {
      logInfo("assistant_initializing");
      this.initialization = initialize(this.config, this.loader, this.probe).then((state) => {
        this.state = state;
        return state;
      });
    }

    const state = await this.initialization;
    return state.status === "loaded";
  }

  /**
   * Answers a citizen question. Waits for an in-flight initialization;
   * answers with the not-ready placeholder if initialization never started.
   */
  async generateResponse(question: string): Promise<string> {
    if (!this.initialization) {
      logWarn("generation_before_init");
      return MODEL_NOT_READY_MESSAGE;
    }

    const state = await this.initialization;
    return generate(question, state, this.config.generation);
  }

  getStatus(): ModelStatus {
    if (this.state.status === "absent") {
      return { ready: false, modelId: null, role: null, device: null };
    }
    return {
      ready: true,
      modelId: this.state.modelId,
      role: this.state.role,
      device: this.state.device,
    };
  }
}

/**
 * Startup wrapper: initialization problems are logged, never fatal.
 */
export async function initializeAssistant(assistant: CivicAssistant): Promise<boolean> {
  try {
    const initialized = await assistant.initializeModel();
    if (!initialized) {
      logWarn("assistant_degraded", { message: "Running with fallback or dummy responses only." });
    }
    return initialized;
  } catch (error) {
    logError("assistant_init_error", {
      error: describeError(error),
      message: "Continuing with dummy responses...",
    });
    return false;
  }
}
