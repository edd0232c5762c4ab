/**
 * Model Resolver
 *
 * Produces the process-wide ModelState once at startup:
 * - preferred model, quantized on an accelerated device, full precision on CPU
 * - on any failure, the small fallback model on the same device
 * - on a second failure, the absent state
 *
 * Nothing here throws. Every failure is logged and folded into the returned state.
 */

import type { ModelConfig, ModelDtype } from "../config/model";
import { describeError, logError, logInfo, logWarn } from "../utils/logger";
import { resolveDevice } from "./hardwareProbe";
import {
  ABSENT_MODEL,
  type DeviceProbe,
  type DeviceSelection,
  type LoadRequest,
  type LoadedModelState,
  type ModelLoader,
  type ModelRole,
  type ModelState,
} from "./types";

export type ResolverConfig = Pick<
  ModelConfig,
  "preferredModelId" | "fallbackModelId" | "device" | "acceleratedDtype" | "cpuDtype" | "cacheDir" | "localFilesOnly"
>;

function preferredDtype(config: ResolverConfig, device: DeviceSelection): ModelDtype {
  return device === "accelerated" ? config.acceleratedDtype : config.cpuDtype;
}

function buildRequest(
  config: ResolverConfig,
  modelId: string,
  device: DeviceSelection,
  dtype: ModelDtype,
): LoadRequest {
  return {
    modelId,
    device,
    dtype,
    cacheDir: config.cacheDir,
    localFilesOnly: config.localFilesOnly,
  };
}

async function attemptLoad(
  loader: ModelLoader,
  request: LoadRequest,
  role: ModelRole,
): Promise<LoadedModelState> {
  const startTime = Date.now();
  const handle = await loader.load(request);

  logInfo(role === "preferred" ? "model_preferred_loaded" : "model_fallback_loaded", {
    modelId: request.modelId,
    device: request.device,
    dtype: request.dtype,
    durationMs: Date.now() - startTime,
  });

  const state: LoadedModelState = {
    status: "loaded",
    handle,
    device: request.device,
    modelId: request.modelId,
    role,
  };
  return Object.freeze(state);
}

async function safeResolveDevice(config: ResolverConfig, probe: DeviceProbe | undefined): Promise<DeviceSelection> {
  try {
    return await resolveDevice(config.device, probe);
  } catch (error) {
    logWarn("hardware_probe_failed", { error: describeError(error) });
    return "cpu";
  }
}

export async function initialize(
  config: ResolverConfig,
  loader: ModelLoader,
  probe?: DeviceProbe,
): Promise<ModelState> {
  logInfo("model_init_started", {
    preferredModelId: config.preferredModelId,
    fallbackModelId: config.fallbackModelId,
  });

  const device = await safeResolveDevice(config, probe);

  try {
    return await attemptLoad(
      loader,
      buildRequest(config, config.preferredModelId, device, preferredDtype(config, device)),
      "preferred",
    );
  } catch (error) {
    logWarn("model_preferred_failed", {
      modelId: config.preferredModelId,
      device,
      error: describeError(error),
    });
  }

  logInfo("model_fallback_started", { modelId: config.fallbackModelId, device });

  try {
    return await attemptLoad(
      loader,
      buildRequest(config, config.fallbackModelId, device, "fp32"),
      "fallback",
    );
  } catch (error) {
    logError("model_fallback_failed", {
      modelId: config.fallbackModelId,
      device,
      error: describeError(error),
    });
  }

  logWarn("model_init_absent", { message: "Running with dummy responses only." });
  return ABSENT_MODEL;
}
