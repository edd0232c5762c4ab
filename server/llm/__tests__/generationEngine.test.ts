import { describe, it, expect } from "vitest";
import { DEFAULT_GENERATION_SETTINGS } from "../../config/model";
import {
  buildPrompt,
  extractAnswer,
  generate,
  MODEL_NOT_READY_MESSAGE,
  TECHNICAL_DIFFICULTIES_MESSAGE,
} from "../generationEngine";
import { ABSENT_MODEL, type LoadedModelState, type ModelHandle } from "../types";
import { createHandle, echoReply } from "./fakes";

function loadedState(handle: ModelHandle): LoadedModelState {
  return { status: "loaded", handle, device: "cpu", modelId: "test/model", role: "preferred" };
}

describe("buildPrompt", () => {
  it("should wrap the question in the civic assistant frame", () => {
    expect(buildPrompt("How do I renew my passport?")).toBe(
      "You are a helpful AI assistant for a government citizen engagement platform.\n" +
        "Provide clear, accurate, and helpful information about government services, policies, and civic processes.\n" +
        "\n" +
        "Question: How do I renew my passport?\n" +
        "\n" +
        "Answer:"
    );
  });
});

describe("extractAnswer", () => {
  it("should return the trimmed text after the marker", () => {
    expect(extractAnswer("Question: x\n\nAnswer:   Go to city hall.  \n")).toBe("Go to city hall.");
  });

  it("should use the last marker when the model repeats it", () => {
    expect(extractAnswer("Answer: first\nAnswer: second")).toBe("second");
  });

  it("should return the decoded text unchanged when the marker is missing", () => {
    expect(extractAnswer("  no marker here ")).toBe("  no marker here ");
  });

  it("should return an empty string when nothing follows the marker", () => {
    expect(extractAnswer("Answer:")).toBe("");
  });
});

describe("generate", () => {
  it("should answer with the not-ready placeholder when no model is loaded", async () => {
    expect(await generate("When is trash pickup?", ABSENT_MODEL)).toBe(MODEL_NOT_READY_MESSAGE);
  });

  it("should answer with the not-ready placeholder for an empty question without a model", async () => {
    expect(await generate("", ABSENT_MODEL)).toBe(MODEL_NOT_READY_MESSAGE);
  });

  it("should return the continuation after the prompt's answer marker", async () => {
    const { handle } = createHandle(echoReply("You can register online or at the clerk's office."));

    const answer = await generate("How do I register to vote?", loadedState(handle));

    expect(answer).toBe("You can register online or at the clerk's office.");
  });

  it("should truncate the prompt to the configured input budget", async () => {
    const { handle, tokenizer } = createHandle();

    await generate("Where do I pay a parking ticket?", loadedState(handle));

    expect(tokenizer.truncateCalls).toEqual([
      { text: buildPrompt("Where do I pay a parking ticket?"), maxTokens: 512 },
    ]);
  });

  it("should sample with the configured settings and the end-of-sequence token as padding", async () => {
    const { handle, model } = createHandle();

    await generate("What are the library hours?", loadedState(handle));

    expect(model.calls).toHaveLength(1);
    expect(model.calls[0].prompt).toBe(buildPrompt("What are the library hours?"));
    expect(model.calls[0].options).toEqual({
      maxNewTokens: 150,
      temperature: 0.7,
      doSample: true,
      repetitionPenalty: 1.1,
      padTokenId: 50256,
    });
  });

  it("should pass no padding token when the tokenizer has none", async () => {
    const { handle, model } = createHandle(echoReply("ok"), null);

    await generate("Question?", loadedState(handle));

    expect(model.calls[0].options.padTokenId).toBeNull();
  });

  it("should return the technical-difficulties message when generation fails", async () => {
    const { handle } = createHandle(async () => {
      throw new Error("out of memory");
    });

    expect(await generate("Any question", loadedState(handle))).toBe(TECHNICAL_DIFFICULTIES_MESSAGE);
  });

  it("should return the technical-difficulties message when generation times out", async () => {
    const { handle } = createHandle(() => new Promise<string>(() => undefined));

    const answer = await generate("Slow question", loadedState(handle), {
      ...DEFAULT_GENERATION_SETTINGS,
      timeoutMs: 10,
    });

    expect(answer).toBe(TECHNICAL_DIFFICULTIES_MESSAGE);
  });

  it("should wait without a limit when the timeout is disabled", async () => {
    const { handle } = createHandle(
      (prompt) => new Promise<string>((resolve) => setTimeout(() => resolve(`${prompt} Done.`), 20))
    );

    const answer = await generate("Question", loadedState(handle), {
      ...DEFAULT_GENERATION_SETTINGS,
      timeoutMs: 0,
    });

    expect(answer).toBe("Done.");
  });
});
