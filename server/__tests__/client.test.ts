import { describe, it, expect } from "vitest";
import { createGenerate, detectProvider, withTimeout } from "../llm/client";
import { ModelCallError, ModelTimeoutError } from "../utils/errorHandler";

describe("detectProvider", () => {
  it("routes registered and prefixed models", () => {
    expect(detectProvider("gpt-4o")).toBe("openai");
    expect(detectProvider("gemini-2.0-flash")).toBe("gemini");
    expect(detectProvider("gemini-1.5-pro")).toBe("gemini");
    expect(detectProvider("claude-3-7-sonnet-latest")).toBe("claude");
  });

  it("rejects unknown models", () => {
    expect(() => detectProvider("llama-3")).toThrow('Unknown model "llama-3"');
  });
});

describe("withTimeout", () => {
  it("resolves when the promise settles first", async () => {
    await expect(withTimeout(Promise.resolve("done"), 50, () => new Error("late"))).resolves.toBe("done");
  });

  it("rejects with the timeout error", async () => {
    const never = new Promise<string>(() => {});
    await expect(withTimeout(never, 10, () => new ModelTimeoutError("m", 10))).rejects.toBeInstanceOf(ModelTimeoutError);
  });
});

describe("createGenerate", () => {
  it("wraps provider failures as model call errors", async () => {
    const generate = createGenerate({ timeoutMs: 1000 });
    await expect(generate("hello", "llama-3")).rejects.toBeInstanceOf(ModelCallError);
  });
});
