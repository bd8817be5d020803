import { describe, it, expect } from "vitest";
import { NoopSyncProvider } from "../src/infrastructure/NoopSyncProvider.js";

describe("NoopSyncProvider", () => {
  it("stays notConfigured and refuses every operation", async () => {
    const provider = new NoopSyncProvider("/boards/home");
    await provider.checkConfiguration();

    expect(provider.directory).toBe("/boards/home");
    expect(provider.status).toEqual({ kind: "notConfigured" });
    expect(await provider.sync()).toEqual({ ok: false, error: { kind: "notConfigured" } });
    expect(await provider.push()).toEqual({ ok: false, error: { kind: "notConfigured" } });
    expect(await provider.pull()).toEqual({ ok: false, error: { kind: "notConfigured" } });
    expect(await provider.hasLocalChanges()).toBe(false);
  });
});
