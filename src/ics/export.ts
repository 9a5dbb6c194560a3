// ── ICS calendar export ───────────────────────────────────────────────────────
// Encodes event records as an iCalendar (.ics) document via the ics package.
// All instants go in and come out as UTC ("20230814T010000Z").

import type { EventAttributes } from "ics";
import { createEvents } from "ics";

import { CalendarEncodeError } from "../errors";
import type { EventRecord, Result } from "../types";
import { err, ok } from "../types";

export const PRODUCT_ID = "timetable-ics";

export interface EncodeOptions {
  /** X-WR-CALNAME shown by calendar apps when the file is imported */
  calName?: string;
}

/** Map one event record onto the ics package's event shape. */
export function toEventAttributes(event: EventRecord): EventAttributes {
  const attributes: EventAttributes = {
    uid: event.uid,
    title: event.summary,
    start: event.start.getTime(),
    startInputType: "utc",
    startOutputType: "utc",
    end: event.end.getTime(),
    endInputType: "utc",
    endOutputType: "utc",
    created: event.created.getTime(),
    categories: [event.category],
    status: "CONFIRMED",
    busyStatus: "BUSY",
  };
  if (event.location !== undefined) attributes.location = event.location;
  return attributes;
}

/** Render all events as one .ics document. */
export function encodeCalendar(
  events: readonly EventRecord[],
  options: EncodeOptions = {},
): Result<string, CalendarEncodeError> {
  const { error, value } = createEvents(events.map(toEventAttributes), {
    productId: PRODUCT_ID,
    ...(options.calName === undefined ? {} : { calName: options.calName }),
  });

  if (error || value === undefined) {
    return err(new CalendarEncodeError(error?.message ?? "no output produced"));
  }
  return ok(value);
}
