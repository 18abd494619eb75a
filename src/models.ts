export interface LineRef {
  id: string;
  name: string;
}

export interface StopNode {
  id: string;
  naptanId?: string;
  name: string;
  children: StopNode[];
  lines: LineRef[];
}

export interface StopMatch {
  id: string;
  name: string;
}

export interface LineAttachment {
  lineId: string;
  stopPointId: string;
}

export interface Journey {
  hour: string;
  minute: string;
  intervalId: number;
}

export interface StopInterval {
  stopId: string;
  timeToArrival: number;
}

export interface IntervalGroup {
  id: string;
  intervals: StopInterval[];
}

export interface Schedule {
  name: string;
  knownJourneys: Journey[];
}

export interface TimetableRoute {
  stationIntervals: IntervalGroup[];
  schedules: Schedule[];
}

export interface NamedStop {
  id: string;
  name: string;
}

export interface TimetableResponse {
  lineId: string;
  lineName: string;
  departureStopId: string;
  routes: TimetableRoute[];
  stops: NamedStop[];
  stations: NamedStop[];
}

export interface DisambiguationOption {
  description: string;
  uri: string;
}

export type TimetableResult =
  | { kind: "timetable"; response: TimetableResponse }
  | { kind: "disambiguation"; options: DisambiguationOption[] }
  | { kind: "empty" };

/** A render row: a stop that has been given its position in the grid. */
export interface Stop {
  id: string;
  name: string;
}

export interface TimetableModel {
  lineName: string;
  departureStopId: string;
  scheduleName: string;
  stops: Stop[];
  intervals: Map<number, Map<string, number>>;
  /** Id of the route's first interval group, used when a journey names an unknown one. */
  firstIntervalId?: number;
  journeys: Journey[];
}
