import type { LineAttachment } from "./models";

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function titleCase(value: string): string {
  return value.replace(/\b[a-z]/g, (letter) => letter.toUpperCase());
}

export function timetableLink(pair: LineAttachment): string {
  const params = new URLSearchParams({ line_id: pair.lineId, stop_point_id: pair.stopPointId });
  return `/timetable?${params.toString()}`;
}

function layout(title: string, body: string): string {
  return `<html><head><title>${escapeHtml(title)}</title></head><body>${body}</body></html>`;
}

function searchForm(query: string): string {
  return (
    "<h1>TfL Timetable Search</h1>" +
    "<form method='GET' action='/'>" +
    `<input type='text' name='q' value='${escapeHtml(query)}' placeholder='Enter station name...'>` +
    "<button type='submit'>Search</button>" +
    "</form>"
  );
}

export function buildSearchPage(query: string, result?: { pairs: LineAttachment[] } | { error: string }): string {
  const parts = [searchForm(query)];

  if (result && "error" in result) {
    parts.push(`<p style='color:red'>Error: ${escapeHtml(result.error)}</p>`);
  } else if (result && !result.pairs.length) {
    parts.push(`<p>No results found for '${escapeHtml(query)}'</p>`);
  } else if (result) {
    const items = result.pairs.map(
      (pair) =>
        `<li><a href='${escapeHtml(timetableLink(pair))}'>${escapeHtml(titleCase(pair.lineId))} Line at Stop ${escapeHtml(pair.stopPointId)}</a></li>`
    );
    parts.push(`<h2>Results for '${escapeHtml(query)}'</h2>`, `<ul>${items.join("")}</ul>`);
  }

  return layout("TfL Timetable Search", parts.join(""));
}

export function buildTimetablePage(stopPointId: string, grid: string): string {
  return layout(
    `Timetable for ${stopPointId}`,
    `<h1>Timetable for ${escapeHtml(stopPointId)}</h1><pre>${escapeHtml(grid)}</pre>`
  );
}

export function buildErrorPage(status: number, message: string): string {
  return layout(`Error ${status}`, `<h1>Error ${status}</h1><p>${escapeHtml(message)}</p>`);
}
