import { describe, it, expect } from "vitest";
import { consoleLogger, resolveNotebookConfig } from "@/notebook/core/config";

describe("resolveNotebookConfig", () => {
  it("fills every default", () => {
    const resolved = resolveNotebookConfig();
    expect(resolved.language).toBe("python");
    expect(resolved.format).toEqual({ enabled: true, trailingBlankLines: 0 });
    expect(resolved.undo).toEqual({ captureTimeout: 0 });
    expect(resolved.logger).toBe(consoleLogger);
    expect(resolved.generateId()).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  it("keeps overrides and clamps a negative trailing blank count", () => {
    const resolved = resolveNotebookConfig({
      language: "julia",
      format: { enabled: false, trailingBlankLines: -2 },
      undo: { captureTimeout: 500 },
      generateId: () => "fixed",
    });
    expect(resolved.language).toBe("julia");
    expect(resolved.format).toEqual({ enabled: false, trailingBlankLines: 0 });
    expect(resolved.undo.captureTimeout).toBe(500);
    expect(resolved.generateId()).toBe("fixed");
  });

  it("defaults the scheduler to a microtask", async () => {
    const ran: string[] = [];
    resolveNotebookConfig().schedule(() => ran.push("task"));
    expect(ran).toEqual([]);
    await Promise.resolve();
    expect(ran).toEqual(["task"]);
  });
});
