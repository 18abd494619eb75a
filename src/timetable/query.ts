import type { TimetableResponse } from "../models";
import { AmbiguousQuery, NoScheduleData } from "../errors";
import type { TimetableRequest, TransitProvider } from "../providers/types";

/**
 * Fetches a timetable, following the first disambiguation option once when the
 * upstream cannot tell which timetable was meant.
 */
export async function fetchTimetable(
  provider: TransitProvider,
  request: TimetableRequest,
  baseUrl = "https://api.tfl.gov.uk"
): Promise<TimetableResponse> {
  let result = await provider.getTimetable(request);

  if (result.kind === "disambiguation") {
    const [option] = result.options;
    if (!option) {
      throw new AmbiguousQuery(`Timetable for ${request.lineId} at ${request.fromStopPointId} is ambiguous`);
    }
    console.info(`[timetable] following disambiguation option "${option.description}"`);
    const query: Record<string, string> = { ...request.query };
    new URL(option.uri, baseUrl).searchParams.forEach((value, key) => {
      query[key] = value;
    });
    result = await provider.getTimetable({ ...request, query });
  }

  switch (result.kind) {
    case "timetable":
      return result.response;
    case "disambiguation":
      throw new AmbiguousQuery(
        `Timetable for ${request.lineId} at ${request.fromStopPointId} is still ambiguous`,
        result.options.map((option) => option.description)
      );
    case "empty":
      throw new NoScheduleData(`No timetable payload received for ${request.lineId} at ${request.fromStopPointId}`);
  }
}
