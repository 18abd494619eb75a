import type { Journey, TimetableModel, TimetableResponse } from "./models";
import { UnresolvedInterval } from "./errors";
import { calculateArrivalTime } from "./timetable/arrival";
import { buildTimetableModel, offsetsFor } from "./timetable/builder";

const TRAIN_COLUMN_WIDTH = 10;
const COLUMN_SEPARATOR = " | ";
const ELLIPSIS = "...";

export const MISSING_STOP = "---";
export const UNRESOLVED_INTERVAL = "err";

export function renderTimetable(response: TimetableResponse, maxJourneys: number, columnWidth: number): string {
  const model = buildTimetableModel(response);
  return formatTimetable(model, model.journeys, maxJourneys, columnWidth);
}

export function formatTimetable(
  model: TimetableModel,
  journeys: Journey[],
  maxJourneys: number,
  stationColumnWidth: number
): string {
  const shown = maxJourneys > 0 ? journeys.slice(0, maxJourneys) : journeys;

  const lines: string[] = [
    `Timetable for ${model.lineName} at ${model.departureStopId}`,
    "",
    `Schedule: ${model.scheduleName}`,
    formatRow("Station", shown.map((_, index) => `Train ${index + 1}`), stationColumnWidth),
    "-".repeat(stationColumnWidth + shown.length * (TRAIN_COLUMN_WIDTH + COLUMN_SEPARATOR.length))
  ];

  for (const stop of model.stops) {
    const cells = shown.map((journey) => formatCell(model, journey, stop.id));
    lines.push(formatRow(truncateName(stop.name, stationColumnWidth), cells, stationColumnWidth));
  }

  return `${lines.join("\n")}\n`;
}

function formatRow(label: string, cells: string[], stationColumnWidth: number): string {
  return (
    label.padEnd(stationColumnWidth) +
    cells.map((cell) => `${COLUMN_SEPARATOR}${cell.padEnd(TRAIN_COLUMN_WIDTH)}`).join("")
  );
}

function formatCell(model: TimetableModel, journey: Journey, stopId: string): string {
  let offsets: Map<string, number>;
  try {
    offsets = offsetsFor(model, journey);
  } catch (error) {
    if (error instanceof UnresolvedInterval) {
      return UNRESOLVED_INTERVAL;
    }
    throw error;
  }
  const offset = offsets.get(stopId);
  if (offset === undefined) {
    return MISSING_STOP;
  }
  return calculateArrivalTime(journey.hour, journey.minute, offset);
}

export function truncateName(name: string, width: number): string {
  if (name.length <= width) {
    return name;
  }
  if (width < ELLIPSIS.length) {
    return ELLIPSIS.slice(0, Math.max(0, width));
  }
  return `${name.slice(0, width - ELLIPSIS.length)}${ELLIPSIS}`;
}
