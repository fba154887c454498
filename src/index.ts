// Public entry — badge engine, journal stats and visit row transforms

export * from "./types/visit";
export * from "./lib/calendar";
export * from "./lib/config";
export * from "./lib/journalStats";
export * from "./lib/journal";
export * from "./lib/badges";
export * from "./lib/sync/types";
export * from "./lib/sync/transforms";
