import { execFile } from "node:child_process";
import { access } from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import { promisify } from "node:util";
import type { DevicePreference } from "../config/model";
import { describeError, logDebug, logInfo, logWarn } from "../utils/logger";
import type { DeviceProbe, DeviceSelection } from "./types";

const COMMAND_TIMEOUT_MS = 10_000;
const execFileAsync = promisify(execFile);

// Shipped by onnxruntime-node only where its install step fetched the CUDA build
const CUDA_PROVIDER_LIBRARIES: Partial<Record<NodeJS.Platform, string>> = {
  linux: "libonnxruntime_providers_cuda.so",
  win32: "onnxruntime_providers_cuda.dll",
};

export interface AcceleratorInfo {
  name: string;
  memoryMiB: number;
}

/**
 * Parses `nvidia-smi --query-gpu=name,memory.total --format=csv,noheader`
 * output, e.g. "NVIDIA A10G, 23028 MiB". Blank lines are skipped.
 */
export function parseAcceleratorList(output: string): AcceleratorInfo[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => {
      const [name, memory = ""] = line.split(",").map((part) => part.trim());
      const match = memory.match(/(\d+(?:\.\d+)?)/);
      return {
        name,
        memoryMiB: match ? Number.parseFloat(match[1]) : 0,
      };
    });
}

/** Resolves to the raw accelerator listing; rejects when no driver answers. */
export type AcceleratorQuery = () => Promise<string>;

export async function runNvidiaSmi(): Promise<string> {
  const { stdout } = await execFileAsync(
    "nvidia-smi",
    ["--query-gpu=name,memory.total", "--format=csv,noheader"],
    { timeout: COMMAND_TIMEOUT_MS },
  );
  return stdout;
}

async function queryAccelerators(query: AcceleratorQuery): Promise<AcceleratorInfo[] | null> {
  try {
    return parseAcceleratorList(await query());
  } catch (error) {
    logWarn("hardware_probe_query_failed", { error: describeError(error) });
    return null;
  }
}

/** Resolves to true when the inference runtime can execute on CUDA. */
export type CudaRuntimeCheck = () => Promise<boolean>;

/**
 * Looks for the CUDA execution provider beside onnxruntime-node's native
 * binding, e.g. `bin/napi-v3/linux/x64/libonnxruntime_providers_cuda.so`.
 */
export async function cudaProviderInstalled(): Promise<boolean> {
  const library = CUDA_PROVIDER_LIBRARIES[process.platform];
  if (!library) {
    return false;
  }

  try {
    const entry = createRequire(import.meta.url).resolve("onnxruntime-node");
    const packageRoot = path.resolve(path.dirname(entry), "..");
    await access(path.join(packageRoot, "bin", "napi-v3", process.platform, process.arch, library));
    return true;
  } catch (error) {
    logDebug("hardware_probe_cuda_provider_lookup_failed", { error: describeError(error) });
    return false;
  }
}

/**
 * Picks the compute device for inference. Never throws: a failed or empty
 * accelerator query, or a runtime without CUDA support, means CPU.
 */
export async function detectDevice(
  query: AcceleratorQuery = runNvidiaSmi,
  hasCudaRuntime: CudaRuntimeCheck = cudaProviderInstalled,
): Promise<DeviceSelection> {
  const accelerators = await queryAccelerators(query);

  if (!accelerators || accelerators.length === 0) {
    logInfo("hardware_probe_cpu", { reason: accelerators ? "no_accelerator_listed" : "query_failed" });
    return "cpu";
  }

  if (!(await hasCudaRuntime())) {
    logInfo("hardware_probe_cpu", {
      reason: "cuda_runtime_missing",
      accelerators: accelerators.map((a) => a.name),
    });
    return "cpu";
  }

  logInfo("hardware_probe_accelerated", {
    accelerators: accelerators.map((a) => `${a.name} (${a.memoryMiB} MiB)`),
  });
  return "accelerated";
}

/**
 * Applies the MODEL_DEVICE override before falling back to the probe.
 */
export function resolveDevice(
  preference: DevicePreference,
  probe: DeviceProbe = () => detectDevice(),
): Promise<DeviceSelection> {
  if (preference === "auto") {
    return probe();
  }
  logInfo("hardware_probe_overridden", { device: preference });
  return Promise.resolve(preference);
}
