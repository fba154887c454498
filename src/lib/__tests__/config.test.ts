import { describe, it, expect, vi, afterEach } from "vitest";
import { loadEngineConfig, DEFAULT_ENGINE_CONFIG } from "../config";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("loadEngineConfig", () => {
  it("returns defaults for an empty environment", () => {
    expect(loadEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(DEFAULT_ENGINE_CONFIG).toEqual({ timeZone: null, weekNumbering: "iso", badgeLogging: false });
  });

  it("reads overrides from the environment", () => {
    const config = loadEngineConfig({
      MUGSHOT_TIME_ZONE: " Europe/Paris ",
      MUGSHOT_WEEK_NUMBERING: "US",
      MUGSHOT_BADGE_LOGGING: "true",
    });
    expect(config).toEqual({ timeZone: "Europe/Paris", weekNumbering: "us", badgeLogging: true });
  });

  it("treats a blank time zone as unset", () => {
    expect(loadEngineConfig({ MUGSHOT_TIME_ZONE: "  " }).timeZone).toBeNull();
  });

  it("only enables logging for truthy flags", () => {
    expect(loadEngineConfig({ MUGSHOT_BADGE_LOGGING: "1" }).badgeLogging).toBe(true);
    expect(loadEngineConfig({ MUGSHOT_BADGE_LOGGING: "yes" }).badgeLogging).toBe(true);
    expect(loadEngineConfig({ MUGSHOT_BADGE_LOGGING: "0" }).badgeLogging).toBe(false);
    expect(loadEngineConfig({ MUGSHOT_BADGE_LOGGING: "off" }).badgeLogging).toBe(false);
  });

  it("falls back to ISO weeks and warns on an unknown numbering", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(loadEngineConfig({ MUGSHOT_WEEK_NUMBERING: "lunar" }).weekNumbering).toBe("iso");
    expect(warn).toHaveBeenCalledWith('[config] Unknown MUGSHOT_WEEK_NUMBERING "lunar", using "iso"');
  });
});
