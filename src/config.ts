import { readFileSync } from "node:fs";

export interface Env {
  TFL_APP_KEY?: string;
  TFL_APP_KEY_FILE?: string;
  TFL_BASE_URL?: string;
  TFL_USER_AGENT?: string;
  PORT?: string;
  DEMO_STATION?: string;
  TRANSPORT_MODE?: string;
  MAX_JOURNEYS?: string;
  STATION_COLUMN_WIDTH?: string;
}

export interface TflSettings {
  appKey: string;
  baseUrl: string;
  userAgent: string;
}

export interface AppSettings {
  tfl: TflSettings;
  port: number;
  demoStation: string;
  mode: string;
  maxJourneys: number;
  stationColumnWidth: number;
}

export type KeyFileReader = (path: string) => string | undefined;

export const readKeyFile: KeyFileReader = (path) => {
  try {
    return readFileSync(path, "utf8");
  } catch (error) {
    console.info(`[config] could not read ${path}: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
};

export function loadSettings(env: Env, readKey: KeyFileReader = readKeyFile): Readonly<AppSettings> {
  const appKey = (env.TFL_APP_KEY || readKey(env.TFL_APP_KEY_FILE ?? "app_key.txt") || "").trim();
  if (!appKey) {
    throw new Error("Missing TFL_APP_KEY (or an app key file named by TFL_APP_KEY_FILE)");
  }

  const tfl: TflSettings = Object.freeze({
    appKey,
    baseUrl: env.TFL_BASE_URL ?? "https://api.tfl.gov.uk",
    userAgent: env.TFL_USER_AGENT ?? "tube-timetable/1.0"
  });

  return Object.freeze({
    tfl,
    port: parsePositiveInt(env.PORT, 8080),
    demoStation: env.DEMO_STATION ?? "Richmond",
    mode: env.TRANSPORT_MODE ?? "tube",
    maxJourneys: parseNonNegativeInt(env.MAX_JOURNEYS, 200),
    stationColumnWidth: parsePositiveInt(env.STATION_COLUMN_WIDTH, 50)
  });
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/** 0 is allowed and means "no limit" for the journey count. */
function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}
