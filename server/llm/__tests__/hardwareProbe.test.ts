import { describe, it, expect, vi } from "vitest";
import { cudaProviderInstalled, detectDevice, parseAcceleratorList, resolveDevice } from "../hardwareProbe";

describe("parseAcceleratorList", () => {
  it("should parse one accelerator per line", () => {
    expect(parseAcceleratorList("NVIDIA A10G, 23028 MiB\nTesla T4, 15360 MiB\n")).toEqual([
      { name: "NVIDIA A10G", memoryMiB: 23028 },
      { name: "Tesla T4", memoryMiB: 15360 },
    ]);
  });

  it("should skip blank lines", () => {
    expect(parseAcceleratorList("\n  \n")).toEqual([]);
  });

  it("should report zero memory when the size is missing", () => {
    expect(parseAcceleratorList("Unknown Device")).toEqual([{ name: "Unknown Device", memoryMiB: 0 }]);
  });
});

describe("detectDevice", () => {
  const cudaAvailable = async () => true;

  it("should select the accelerated device when one is listed and CUDA is usable", async () => {
    expect(await detectDevice(async () => "NVIDIA L4, 23034 MiB\n", cudaAvailable)).toBe("accelerated");
  });

  it("should select the CPU when a GPU is listed but the runtime has no CUDA provider", async () => {
    const hasCudaRuntime = vi.fn(async () => false);

    expect(await detectDevice(async () => "NVIDIA T4, 15360 MiB\n", hasCudaRuntime)).toBe("cpu");
    expect(hasCudaRuntime).toHaveBeenCalledOnce();
  });

  it("should not check the runtime when no GPU is listed", async () => {
    const hasCudaRuntime = vi.fn(async () => true);

    expect(await detectDevice(async () => "", hasCudaRuntime)).toBe("cpu");
    expect(hasCudaRuntime).not.toHaveBeenCalled();
  });

  it("should select the CPU when the query fails", async () => {
    const query = vi.fn(async (): Promise<string> => {
      throw new Error("spawn nvidia-smi ENOENT");
    });

    expect(await detectDevice(query, cudaAvailable)).toBe("cpu");
    expect(query).toHaveBeenCalledOnce();
  });
});

describe("resolveDevice", () => {
  it("should run the probe for auto", async () => {
    const probe = vi.fn(async () => "accelerated" as const);

    expect(await resolveDevice("auto", probe)).toBe("accelerated");
    expect(probe).toHaveBeenCalledOnce();
  });

  it("should honor a pinned device without probing", async () => {
    const probe = vi.fn(async () => "cpu" as const);

    expect(await resolveDevice("accelerated", probe)).toBe("accelerated");
    expect(probe).not.toHaveBeenCalled();
  });
});

describe("cudaProviderInstalled", () => {
  it("should report no CUDA support when the CUDA build was not installed", async () => {
    // Installs skip the CUDA download, so only the CPU binaries are present
    expect(await cudaProviderInstalled()).toBe(false);
  });
});
