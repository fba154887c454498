// Engine configuration — environment overrides merged over defaults.
// Read once per call site; nothing here is cached.

export type WeekNumbering = "iso" | "us";

export interface EngineConfig {
  timeZone: string | null;        // null = host time zone
  weekNumbering: WeekNumbering;
  badgeLogging: boolean;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  timeZone: null,
  weekNumbering: "iso",
  badgeLogging: false,
};

export type EnvSource = Record<string, string | undefined>;

function parseWeekNumbering(raw: string | undefined): WeekNumbering {
  if (!raw) return DEFAULT_ENGINE_CONFIG.weekNumbering;
  const value = raw.trim().toLowerCase();
  if (value === "iso" || value === "us") return value;
  console.warn(`[config] Unknown MUGSHOT_WEEK_NUMBERING "${raw}", using "${DEFAULT_ENGINE_CONFIG.weekNumbering}"`);
  return DEFAULT_ENGINE_CONFIG.weekNumbering;
}

function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const value = raw.trim().toLowerCase();
  return value === "1" || value === "true" || value === "yes";
}

/** Load engine settings from the environment, falling back to defaults */
export function loadEngineConfig(env: EnvSource = process.env): EngineConfig {
  const timeZone = env.MUGSHOT_TIME_ZONE?.trim();
  return {
    ...DEFAULT_ENGINE_CONFIG,
    timeZone: timeZone ? timeZone : DEFAULT_ENGINE_CONFIG.timeZone,
    weekNumbering: parseWeekNumbering(env.MUGSHOT_WEEK_NUMBERING),
    badgeLogging: parseFlag(env.MUGSHOT_BADGE_LOGGING, DEFAULT_ENGINE_CONFIG.badgeLogging),
  };
}
