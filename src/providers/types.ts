import type { StopMatch, StopNode, TimetableResult } from "../models";

export interface TimetableRequest {
  lineId: string;
  fromStopPointId: string;
  toStopPointId?: string;
  query?: Record<string, string>;
}

export interface TransitProvider {
  name: string;
  searchStopPoints(query: string, mode: string): Promise<StopMatch[]>;
  /** Batch lookup. Callers must pass at least two ids; see `padSingleton`. */
  getStopPoints(ids: string[]): Promise<StopNode[]>;
  getTimetable(request: TimetableRequest): Promise<TimetableResult>;
}
