import type { AppSettings } from "../config";
import type {
  IntervalGroup,
  Journey,
  StopMatch,
  StopNode,
  TimetableResponse,
  TimetableResult
} from "../models";
import type { TimetableRequest, TransitProvider } from "../providers/types";

export function stopNode(
  id: string,
  { children = [], lines = [], naptanId }: { children?: StopNode[]; lines?: string[]; naptanId?: string } = {}
): StopNode {
  return {
    id,
    naptanId,
    name: id,
    children,
    lines: lines.map((line) => ({ id: line, name: line }))
  };
}

/** Serves stop points from a fixed map, in the order they are asked for. */
export class FakeProvider implements TransitProvider {
  readonly name = "Fake";

  readonly searchStopPoints = jest.fn(async (_query: string, _mode: string): Promise<StopMatch[]> => []);

  readonly getStopPoints = jest.fn(async (ids: string[]): Promise<StopNode[]> =>
    ids.flatMap((id) => {
      const node = this.nodes.get(id);
      return node ? [node] : [];
    })
  );

  readonly getTimetable = jest.fn(async (_request: TimetableRequest): Promise<TimetableResult> => ({ kind: "empty" }));

  private readonly nodes = new Map<string, StopNode>();

  constructor(nodes: StopNode[] = []) {
    for (const node of nodes) {
      this.nodes.set(node.id, node);
    }
  }
}

export function journey(hour: string, minute: string, intervalId: number): Journey {
  return { hour, minute, intervalId };
}

export function group(id: string, offsets: Record<string, number>): IntervalGroup {
  return {
    id,
    intervals: Object.entries(offsets).map(([stopId, timeToArrival]) => ({ stopId, timeToArrival }))
  };
}

export function timetableResponse(overrides: Partial<TimetableResponse> = {}): TimetableResponse {
  return {
    lineId: "district",
    lineName: "District",
    departureStopId: "DEP",
    routes: [],
    stops: [],
    stations: [],
    ...overrides
  };
}

export function testSettings(overrides: Partial<AppSettings> = {}): AppSettings {
  return {
    tfl: { appKey: "test-key", baseUrl: "https://api.tfl.gov.uk", userAgent: "tube-timetable-test" },
    port: 8080,
    demoStation: "Richmond",
    mode: "tube",
    maxJourneys: 200,
    stationColumnWidth: 20,
    ...overrides
  };
}

export function silenceConsole(): void {
  jest.spyOn(console, "info").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
}
