import { describe, it, expect, vi } from "vitest";
import { getModelConfig } from "../../config/model";
import { CivicAssistant, initializeAssistant } from "../assistant";
import { MODEL_NOT_READY_MESSAGE } from "../generationEngine";
import type { LoadRequest, ModelHandle, ModelLoader } from "../types";
import { createHandle, echoReply, FakeLoader } from "./fakes";

const config = getModelConfig({
  PREFERRED_MODEL_ID: "test/preferred",
  FALLBACK_MODEL_ID: "test/fallback",
  MODEL_DEVICE: "cpu",
});

describe("CivicAssistant", () => {
  it("should answer with the not-ready placeholder before initialization", async () => {
    const loader = new FakeLoader();
    const assistant = new CivicAssistant(config, { loader });

    expect(await assistant.generateResponse("Hello?")).toBe(MODEL_NOT_READY_MESSAGE);
    expect(loader.requests).toEqual([]);
  });

  it("should report readiness and answer once the preferred model loads", async () => {
    const { handle } = createHandle(echoReply("Call 311."));
    const assistant = new CivicAssistant(config, { loader: new FakeLoader({ "test/preferred": handle }) });

    expect(await assistant.initializeModel()).toBe(true);
    expect(assistant.getStatus()).toEqual({
      ready: true,
      modelId: "test/preferred",
      role: "preferred",
      device: "cpu",
    });
    expect(await assistant.generateResponse("Who fixes potholes?")).toBe("Call 311.");
  });

  it("should load only once when initialized repeatedly", async () => {
    const { handle } = createHandle();
    const loader = new FakeLoader({ "test/preferred": handle });
    const assistant = new CivicAssistant(config, { loader });

    const results = await Promise.all([assistant.initializeModel(), assistant.initializeModel()]);
    await assistant.initializeModel();

    expect(results).toEqual([true, true]);
    expect(loader.requests).toHaveLength(1);
  });

  it("should wait for an in-flight initialization before answering", async () => {
    const { handle } = createHandle(echoReply("Ready now."));
    let release: (value: ModelHandle) => void = () => undefined;
    const pendingHandle = new Promise<ModelHandle>((resolve) => {
      release = resolve;
    });
    const loader: ModelLoader = {
      load: (_request: LoadRequest) => pendingHandle,
    };
    const assistant = new CivicAssistant(config, { loader });

    const initialized = assistant.initializeModel();
    const answer = assistant.generateResponse("Are you there?");
    release(handle);

    expect(await answer).toBe("Ready now.");
    expect(await initialized).toBe(true);
  });

  it("should report not ready when neither model loads", async () => {
    const assistant = new CivicAssistant(config, { loader: new FakeLoader() });

    expect(await assistant.initializeModel()).toBe(false);
    expect(assistant.getStatus()).toEqual({ ready: false, modelId: null, role: null, device: null });
    expect(await assistant.generateResponse("Anything")).toBe(MODEL_NOT_READY_MESSAGE);
  });
});

describe("initializeAssistant", () => {
  it("should resolve to false instead of throwing when initialization throws", async () => {
    const assistant = new CivicAssistant(config, { loader: new FakeLoader() });
    vi.spyOn(assistant, "initializeModel").mockRejectedValue(new Error("unexpected"));

    expect(await initializeAssistant(assistant)).toBe(false);
  });

  it("should resolve to true when a model loads", async () => {
    const { handle } = createHandle();
    const assistant = new CivicAssistant(config, { loader: new FakeLoader({ "test/fallback": handle }) });

    expect(await initializeAssistant(assistant)).toBe(true);
    expect(assistant.getStatus().role).toBe("fallback");
  });
});
