import { NoScheduleData, UnresolvedInterval } from "../errors";
import { group, journey, timetableResponse } from "../testing/fixtures";
import { buildTimetableModel, offsetsFor } from "./builder";

describe("buildTimetableModel", () => {
  const weekday = journey("10", "00", 1);
  const response = timetableResponse({
    stops: [
      { id: "DEP", name: "Departure" },
      { id: "A", name: "Alpha" },
      { id: "B", name: "Bravo" }
    ],
    stations: [
      { id: "A", name: "Alpha Station" },
      { id: "C", name: "Charlie" }
    ],
    routes: [
      { stationIntervals: [group("9", { Z: 1 })], schedules: [] },
      {
        stationIntervals: [group("1", { A: 5, B: 12 }), group("2", { C: 3, A: 8 })],
        schedules: [
          { name: "Monday - Friday", knownJourneys: [weekday] },
          { name: "Saturday", knownJourneys: [journey("11", "00", 2)] }
        ]
      }
    ]
  });

  it("uses the first schedule of the first route that has one", () => {
    const model = buildTimetableModel(response);

    expect(model.scheduleName).toBe("Monday - Friday");
    expect(model.journeys).toEqual([weekday]);
    expect(model.intervals.has(9)).toBe(false);
    expect(model.firstIntervalId).toBe(1);
  });

  it("orders stops by first appearance with the departure stop first", () => {
    const model = buildTimetableModel(response);

    expect(model.stops.map((stop) => stop.id)).toEqual(["DEP", "A", "B", "C"]);
  });

  it("prefers stop names and marks names known only from stations", () => {
    const model = buildTimetableModel(response);

    expect(model.stops.map((stop) => stop.name)).toEqual(["Departure", "Alpha", "Bravo", "Charlie [S]"]);
  });

  it("gives the departure stop offset zero in every interval group", () => {
    const model = buildTimetableModel(response);

    expect(Array.from(model.intervals.keys())).toEqual([1, 2]);
    expect(Object.fromEntries(model.intervals.get(1) ?? [])).toEqual({ DEP: 0, A: 5, B: 12 });
    expect(Object.fromEntries(model.intervals.get(2) ?? [])).toEqual({ DEP: 0, C: 3, A: 8 });
  });

  it("has one row per distinct stop across all interval groups", () => {
    const model = buildTimetableModel(
      timetableResponse({
        routes: [
          {
            stationIntervals: [group("1", { A: 1, B: 2 }), group("2", { B: 2, C: 3 }), group("3", { A: 1, C: 3, D: 4 })],
            schedules: [{ name: "Daily", knownJourneys: [] }]
          }
        ]
      })
    );

    expect(model.stops.map((stop) => stop.id)).toEqual(["DEP", "A", "B", "C", "D"]);
  });

  it("falls back to the stop id when no name is known", () => {
    const model = buildTimetableModel(
      timetableResponse({
        routes: [{ stationIntervals: [group("1", { X: 4 })], schedules: [{ name: "Daily", knownJourneys: [] }] }]
      })
    );

    expect(model.stops).toEqual([
      { id: "DEP", name: "DEP" },
      { id: "X", name: "X" }
    ]);
  });

  it("reads a malformed interval id as zero", () => {
    const model = buildTimetableModel(
      timetableResponse({
        routes: [{ stationIntervals: [group("first", { X: 4 })], schedules: [{ name: "Daily", knownJourneys: [] }] }]
      })
    );

    expect(model.firstIntervalId).toBe(0);
    expect(model.intervals.get(0)?.get("X")).toBe(4);
  });

  it("throws NoScheduleData when there are no routes", () => {
    expect(() => buildTimetableModel(timetableResponse())).toThrow(
      new NoScheduleData("No timetable data available")
    );
  });

  it("throws NoScheduleData when no route has a schedule", () => {
    const empty = timetableResponse({ routes: [{ stationIntervals: [group("1", { A: 1 })], schedules: [] }] });

    expect(() => buildTimetableModel(empty)).toThrow(NoScheduleData);
    expect(() => buildTimetableModel(empty)).toThrow("No schedules found in any route");
  });
});

describe("offsetsFor", () => {
  const model = buildTimetableModel(
    timetableResponse({
      routes: [
        {
          stationIntervals: [group("1", { A: 5 }), group("2", { A: 8, B: 15 })],
          schedules: [{ name: "Daily", knownJourneys: [] }]
        }
      ]
    })
  );

  it("returns the journey's own interval group", () => {
    expect(offsetsFor(model, journey("08", "00", 2)).get("B")).toBe(15);
  });

  it("falls back to the first interval group for an unknown id", () => {
    const offsets = offsetsFor(model, journey("08", "00", 3));

    expect(Object.fromEntries(offsets)).toEqual({ DEP: 0, A: 5 });
  });

  it("throws UnresolvedInterval when the route has no interval groups", () => {
    const bare = buildTimetableModel(
      timetableResponse({ routes: [{ stationIntervals: [], schedules: [{ name: "Daily", knownJourneys: [] }] }] })
    );

    expect(() => offsetsFor(bare, journey("08", "00", 3))).toThrow(UnresolvedInterval);
  });
});
