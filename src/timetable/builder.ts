import type { Journey, TimetableModel, TimetableResponse, Stop } from "../models";
import { NoScheduleData, UnresolvedInterval } from "../errors";
import { parseLenientInt } from "./arrival";

export const STATION_ONLY_SUFFIX = " [S]";

export function buildTimetableModel(response: TimetableResponse): TimetableModel {
  // First route with a schedule wins; the requested direction is not matched.
  const route = response.routes.find((candidate) => candidate.schedules.length > 0);
  if (!route) {
    throw new NoScheduleData(
      response.routes.length ? "No schedules found in any route" : "No timetable data available"
    );
  }
  const schedule = route.schedules[0];

  const stationNames = new Map<string, string>();
  for (const stop of response.stops) {
    stationNames.set(stop.id, stop.name);
  }
  for (const station of response.stations) {
    if (!stationNames.has(station.id)) {
      stationNames.set(station.id, `${station.name}${STATION_ONLY_SUFFIX}`);
    }
  }
  const nameOf = (id: string): string => stationNames.get(id) || id;

  const departureStopId = response.departureStopId;
  const stops: Stop[] = [{ id: departureStopId, name: nameOf(departureStopId) }];
  const seen = new Set<string>([departureStopId]);
  const intervals = new Map<number, Map<string, number>>();

  for (const group of route.stationIntervals) {
    const offsets = new Map<string, number>([[departureStopId, 0]]);
    for (const interval of group.intervals) {
      offsets.set(interval.stopId, interval.timeToArrival);
      if (!seen.has(interval.stopId)) {
        seen.add(interval.stopId);
        stops.push({ id: interval.stopId, name: nameOf(interval.stopId) });
      }
    }
    intervals.set(parseLenientInt(group.id), offsets);
  }

  const firstGroup = route.stationIntervals[0];

  return {
    lineName: response.lineName,
    departureStopId,
    scheduleName: schedule.name,
    stops,
    intervals,
    firstIntervalId: firstGroup ? parseLenientInt(firstGroup.id) : undefined,
    journeys: schedule.knownJourneys
  };
}

/**
 * Offsets for the journey's interval group, or the route's first group when the
 * journey names one that does not exist.
 */
export function offsetsFor(model: TimetableModel, journey: Journey): Map<string, number> {
  const offsets =
    model.intervals.get(journey.intervalId) ??
    (model.firstIntervalId === undefined ? undefined : model.intervals.get(model.firstIntervalId));
  if (!offsets) {
    throw new UnresolvedInterval(journey.intervalId);
  }
  return offsets;
}
