export class TimetableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimetableError";
  }
}

export class NoScheduleData extends TimetableError {
  constructor(message = "No route in the timetable has a schedule") {
    super(message);
    this.name = "NoScheduleData";
  }
}

export class NoStopsFound extends TimetableError {
  constructor(query: string) {
    super(`No lines or stops found for ${query}`);
    this.name = "NoStopsFound";
  }
}

export class UpstreamUnavailable extends TimetableError {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "UpstreamUnavailable";
  }
}

export class AmbiguousQuery extends TimetableError {
  constructor(
    message: string,
    public readonly options: string[] = []
  ) {
    super(message);
    this.name = "AmbiguousQuery";
  }
}

export class UnresolvedInterval extends TimetableError {
  constructor(public readonly intervalId: number) {
    super(`Interval ${intervalId} is not defined and the route has no interval groups`);
    this.name = "UnresolvedInterval";
  }
}
