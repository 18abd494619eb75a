import type {
  DisambiguationOption,
  IntervalGroup,
  Journey,
  LineRef,
  NamedStop,
  Schedule,
  StopMatch,
  StopInterval,
  StopNode,
  TimetableResult,
  TimetableRoute
} from "../models";
import { UpstreamUnavailable } from "../errors";
import type { TimetableRequest, TransitProvider } from "./types";

export interface FetchResponse {
  status: number;
  ok: boolean;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: { headers: Record<string, string> }) => Promise<FetchResponse>;

export interface TflOptions {
  appKey: string;
  baseUrl: string;
  userAgent: string;
  fetch?: FetchLike;
}

type UnknownRecord = Record<string, unknown>;

export class TflProvider implements TransitProvider {
  readonly name = "TfL";

  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: TflOptions) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async searchStopPoints(query: string, mode: string): Promise<StopMatch[]> {
    const url = this.buildUrl(`/StopPoint/Search/${encodeURIComponent(query.trim())}`);
    url.searchParams.set("modes", mode);
    url.searchParams.set("includeHubs", "false");

    const payload = await this.fetchJson(url);
    if (!isRecord(payload)) {
      return [];
    }
    const matches: StopMatch[] = [];
    for (const item of asArray(payload.matches)) {
      if (!isRecord(item)) {
        continue;
      }
      const id = asString(item.id);
      if (!id) {
        continue;
      }
      matches.push({ id, name: asString(item.name) ?? id });
    }
    return matches;
  }

  async getStopPoints(ids: string[]): Promise<StopNode[]> {
    const url = this.buildUrl(`/StopPoint/${ids.map(encodeURIComponent).join(",")}`);
    const payload = await this.fetchJson(url);
    if (!Array.isArray(payload)) {
      // A single id gets a bare object back instead of an array.
      throw new UpstreamUnavailable(`TfL returned a non-array StopPoint payload for ${ids.join(",")}`);
    }
    return payload.filter(isRecord).map(parseStopNode);
  }

  async getTimetable(request: TimetableRequest): Promise<TimetableResult> {
    const base = `/Line/${encodeURIComponent(request.lineId)}/Timetable/${encodeURIComponent(request.fromStopPointId)}`;
    const path = request.toStopPointId ? `${base}/to/${encodeURIComponent(request.toStopPointId)}` : base;
    const url = this.buildUrl(path);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const payload = await this.fetchJson(url);
    if (!isRecord(payload)) {
      return { kind: "empty" };
    }
    return parseTimetableResult(payload, request);
  }

  private buildUrl(path: string): URL {
    const url = new URL(path, this.options.baseUrl);
    url.searchParams.set("app_key", this.options.appKey);
    return url;
  }

  private async fetchJson(url: URL): Promise<unknown> {
    let response: FetchResponse;
    let text: string;
    try {
      response = await this.fetchImpl(url.toString(), {
        headers: {
          Accept: "application/json",
          "User-Agent": this.options.userAgent
        }
      });
      text = await response.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[tfl] GET ${url.pathname} failed: ${message}`);
      throw new UpstreamUnavailable(`TfL request failed for ${url.pathname}: ${message}`);
    }

    console.info(`[tfl] GET ${url.pathname} -> ${response.status}`);
    console.info(`[tfl] response body: ${text.slice(0, 500)}`);

    if (!response.ok) {
      throw new UpstreamUnavailable(
        `TfL error ${response.status}: ${text.slice(0, 200) || "<empty>"}`,
        response.status
      );
    }

    try {
      return JSON.parse(text);
    } catch {
      console.error("[tfl] Failed to parse JSON", text.slice(0, 200));
      throw new UpstreamUnavailable(`TfL returned invalid JSON: ${text.slice(0, 200)}`, response.status);
    }
  }
}

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function asString(value: unknown): string | undefined {
  if (typeof value === "string" && value.length) {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

function toNumber(value: unknown, fallback = 0): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

function records(value: unknown): UnknownRecord[] {
  return asArray(value).filter(isRecord);
}

function parseStopNode(record: UnknownRecord): StopNode {
  const id = asString(record.id) ?? asString(record.naptanId) ?? "";
  const lines: LineRef[] = [];
  for (const line of records(record.lines)) {
    const lineId = asString(line.id);
    if (lineId) {
      lines.push({ id: lineId, name: asString(line.name) ?? lineId });
    }
  }
  return {
    id,
    naptanId: asString(record.naptanId),
    name: asString(record.commonName) ?? asString(record.name) ?? id,
    children: records(record.children).map(parseStopNode),
    lines
  };
}

function parseNamedStops(value: unknown): NamedStop[] {
  const stops: NamedStop[] = [];
  for (const item of records(value)) {
    const id = asString(item.id);
    if (id) {
      stops.push({ id, name: asString(item.name) ?? "" });
    }
  }
  return stops;
}

function parseJourney(record: UnknownRecord): Journey {
  return {
    hour: asString(record.hour) ?? "",
    minute: asString(record.minute) ?? "",
    intervalId: Math.trunc(toNumber(record.intervalId))
  };
}

function parseIntervalGroup(record: UnknownRecord): IntervalGroup {
  const intervals: StopInterval[] = [];
  for (const interval of records(record.intervals)) {
    const stopId = asString(interval.stopId);
    if (stopId) {
      intervals.push({ stopId, timeToArrival: toNumber(interval.timeToArrival) });
    }
  }
  return { id: asString(record.id) ?? "", intervals };
}

function parseSchedule(record: UnknownRecord): Schedule {
  return {
    name: asString(record.name) ?? "",
    knownJourneys: records(record.knownJourneys).map(parseJourney)
  };
}

function parseRoute(record: UnknownRecord): TimetableRoute {
  return {
    stationIntervals: records(record.stationIntervals).map(parseIntervalGroup),
    schedules: records(record.schedules).map(parseSchedule)
  };
}

function parseDisambiguation(record: UnknownRecord): DisambiguationOption[] {
  const options: DisambiguationOption[] = [];
  for (const option of records(record.disambiguationOptions)) {
    const uri = asString(option.uri);
    if (uri) {
      options.push({ description: asString(option.description) ?? uri, uri });
    }
  }
  return options;
}

export function parseTimetableResult(payload: UnknownRecord, request: TimetableRequest): TimetableResult {
  const timetable = payload.timetable;
  if (isRecord(timetable)) {
    return {
      kind: "timetable",
      response: {
        lineId: asString(payload.lineId) ?? request.lineId,
        lineName: asString(payload.lineName) ?? request.lineId,
        departureStopId: asString(timetable.departureStopId) ?? request.fromStopPointId,
        routes: records(timetable.routes).map(parseRoute),
        stops: parseNamedStops(payload.stops),
        stations: parseNamedStops(payload.stations)
      }
    };
  }
  if (isRecord(payload.disambiguation)) {
    return { kind: "disambiguation", options: parseDisambiguation(payload.disambiguation) };
  }
  return { kind: "empty" };
}
