import { describe, expect, it } from "vitest";
import type { AgentRequest } from "../../src/agents/adapter.js";
import { FunctionAdapter } from "../../src/agents/function-adapter.js";

const request = (description: string): AgentRequest => ({
  taskId: "task-1",
  description,
  role: "implementer",
  thinking: "none",
  thinkingBudget: 0,
  modelClass: "economy",
});

describe("FunctionAdapter", () => {
  it("treats a returned string as successful output", async () => {
    const adapter = new FunctionAdapter({ name: "echo", fn: async (req) => `echoed: ${req.description}` });

    const result = await adapter.execute(request("hello"), new AbortController().signal);

    expect(adapter.type).toBe("function");
    expect(result).toEqual({ success: true, output: "echoed: hello" });
  });

  it("passes a full response through", async () => {
    const adapter = new FunctionAdapter({
      name: "metered",
      fn: async () => ({ success: false, output: "partial", error: "quota", tokensUsed: 12 }),
    });
    await expect(adapter.execute(request("hello"), new AbortController().signal)).resolves.toEqual({
      success: false,
      output: "partial",
      error: "quota",
      tokensUsed: 12,
    });
  });

  it("lets a thrown error reach the caller", async () => {
    const adapter = new FunctionAdapter({
      name: "failing",
      fn: async () => {
        throw new Error("boom");
      },
    });
    await expect(adapter.execute(request("hello"), new AbortController().signal)).rejects.toThrow("boom");
  });

  it("hands the abort signal to the function", async () => {
    const controller = new AbortController();
    const adapter = new FunctionAdapter({
      name: "cancellable",
      fn: (_req, signal) =>
        new Promise((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(new Error("stopped")), { once: true });
        }),
    });

    const pending = adapter.execute(request("hello"), controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow("stopped");
  });

  it("declares the roles it serves", () => {
    const adapter = new FunctionAdapter({ name: "checker", fn: async () => "ok", roles: ["validator"] });
    expect(adapter.roles).toEqual(["validator"]);
  });
});
