import type { TimeZone } from "@/core/types/schedule";
import { pad2, toZoned } from "./zoned-time";

/**
 * Broadcast title in the local time of the campus, e.g.
 * "Fishers // 01-04-2025 // 04:00 PM".
 */
export function formatBroadcastTitle(campusName: string, instant: Date, timeZone: TimeZone): string {
  const local = toZoned(instant, timeZone);
  const meridiem = local.hour < 12 ? "AM" : "PM";
  const hour12 = local.hour % 12 === 0 ? 12 : local.hour % 12;
  const date = `${pad2(local.month)}-${pad2(local.day)}-${local.year}`;
  return `${campusName} // ${date} // ${pad2(hour12)}:${pad2(local.minute)} ${meridiem}`;
}
