import type { AppSettings } from "./config";
import { AmbiguousQuery, NoScheduleData, NoStopsFound, UpstreamUnavailable } from "./errors";
import { renderTimetable } from "./formatter";
import { buildErrorPage, buildSearchPage, buildTimetablePage, timetableLink } from "./pages";
import type { TransitProvider } from "./providers/types";
import type { StopResolver } from "./resolver";
import { fetchTimetable } from "./timetable/query";

export interface HandlerContext {
  settings: Readonly<AppSettings>;
  provider: TransitProvider;
  resolver: StopResolver;
}

export interface HttpReply {
  status: number;
  headers: Record<string, string>;
  body: string;
}

const HTML = { "Content-Type": "text/html; charset=utf-8" };

export async function handleRequest(method: string, url: URL, context: HandlerContext): Promise<HttpReply> {
  if (method !== "GET") {
    return { status: 405, headers: { "Content-Type": "text/plain", Allow: "GET" }, body: "Method not allowed" };
  }

  switch (url.pathname) {
    case "/":
      return handleSearch(url, context);
    case "/demo":
      return handleDemo(context);
    case "/timetable":
      return handleTimetable(url, context);
    case "/healthz":
      return { status: 200, headers: { "Content-Type": "text/plain" }, body: "ok" };
    default:
      return htmlError(404, `Nothing here: ${url.pathname}`);
  }
}

async function handleSearch(url: URL, context: HandlerContext): Promise<HttpReply> {
  const query = (url.searchParams.get("q") ?? "").trim();
  if (!query) {
    return { status: 200, headers: HTML, body: buildSearchPage("") };
  }

  try {
    const pairs = await context.resolver.resolve(query, context.settings.mode);
    return { status: 200, headers: HTML, body: buildSearchPage(query, { pairs }) };
  } catch (error) {
    console.error(`[server] search for "${query}" failed`, error);
    return { status: 200, headers: HTML, body: buildSearchPage(query, { error: describeError(error) }) };
  }
}

async function handleDemo(context: HandlerContext): Promise<HttpReply> {
  const station = context.settings.demoStation;
  try {
    const pairs = await context.resolver.resolve(station, context.settings.mode);
    const [pair] = pairs;
    if (!pair) {
      throw new NoStopsFound(station);
    }
    return { status: 302, headers: { Location: timetableLink(pair) }, body: "" };
  } catch (error) {
    return errorReply(error, `Error getting lines and stops for ${station}`);
  }
}

async function handleTimetable(url: URL, context: HandlerContext): Promise<HttpReply> {
  const lineId = url.searchParams.get("line_id") ?? "";
  const stopPointId = url.searchParams.get("stop_point_id") ?? "";
  const toStopPointId = url.searchParams.get("to_stop_point_id") || undefined;

  if (!lineId || !stopPointId) {
    return htmlError(400, "Missing line_id or stop_point_id");
  }

  try {
    const fromStopPointId = await context.resolver.resolvePlatformId(stopPointId);
    const response = await fetchTimetable(
      context.provider,
      { lineId, fromStopPointId, toStopPointId },
      context.settings.tfl.baseUrl
    );
    const grid = renderTimetable(response, context.settings.maxJourneys, context.settings.stationColumnWidth);
    return { status: 200, headers: HTML, body: buildTimetablePage(stopPointId, grid) };
  } catch (error) {
    return errorReply(error, "Error getting timetable");
  }
}

export function statusFor(error: unknown): number {
  if (error instanceof NoStopsFound || error instanceof NoScheduleData) {
    return 404;
  }
  if (error instanceof AmbiguousQuery) {
    return 409;
  }
  if (error instanceof UpstreamUnavailable) {
    return 502;
  }
  return 500;
}

function errorReply(error: unknown, summary: string): HttpReply {
  const status = statusFor(error);
  console.error(`[server] ${summary} (${status})`, error);
  return htmlError(status, `${summary}: ${describeError(error)}`);
}

function htmlError(status: number, message: string): HttpReply {
  return { status, headers: HTML, body: buildErrorPage(status, message) };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
