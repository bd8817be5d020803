import { describe, it, expect } from "vitest";
import { readServerSettings } from "../src/settings.js";

describe("readServerSettings", () => {
  it("defaults to the working directory with git sync and watching on", () => {
    expect(readServerSettings({}, "/work")).toEqual({
      ok: true,
      value: { directory: "/work", sync: "git", syncIntervalMs: 60000, watch: true },
    });
  });

  it("resolves the board directory against the working directory", () => {
    const relative = readServerSettings({ PLAINBOARD_DIR: "boards/home" }, "/work");
    const absolute = readServerSettings({ PLAINBOARD_DIR: "/srv/board" }, "/work");

    expect(relative.ok && relative.value.directory).toBe("/work/boards/home");
    expect(absolute.ok && absolute.value.directory).toBe("/srv/board");
  });

  it("reads sync mode, interval and watch flag", () => {
    const settings = readServerSettings(
      { PLAINBOARD_SYNC: "none", PLAINBOARD_SYNC_INTERVAL_MS: "0", PLAINBOARD_WATCH: "false" },
      "/work"
    );

    expect(settings).toEqual({
      ok: true,
      value: { directory: "/work", sync: "none", syncIntervalMs: 0, watch: false },
    });
  });

  it("names the offending variable", () => {
    const sync = readServerSettings({ PLAINBOARD_SYNC: "svn" }, "/work");
    const interval = readServerSettings({ PLAINBOARD_SYNC_INTERVAL_MS: "soon" }, "/work");
    const watch = readServerSettings({ PLAINBOARD_WATCH: "yes" }, "/work");

    expect(!sync.ok && sync.error).toMatch(/^PLAINBOARD_SYNC: /);
    expect(!interval.ok && interval.error).toMatch(/^PLAINBOARD_SYNC_INTERVAL_MS: /);
    expect(!watch.ok && watch.error).toMatch(/^PLAINBOARD_WATCH: /);
  });
});
