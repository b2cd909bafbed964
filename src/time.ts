// Time Resolver — noon/midnight, H:MM:SS, H:MM[am|pm], H[am|pm].

import { Temporal } from "@js-temporal/polyfill";
import { DatebookError } from "./error.js";

export interface TimeContext {
  /** The owning date is the reference date. */
  today: boolean;
  /** Current wall-clock time; picks the half of the 12-hour clock. */
  now: Temporal.PlainTime;
  /** When false every undesignated time is read as 24h. */
  infer12h: boolean;
}

const FULL = /^(\d{1,2})[:.](\d{2})[:.](\d{2})$/;
const CLOCK = /^(\d{1,2})(?:[:.](\d{2}))?(am|pm)?$/;

/**
 * Resolve a time token to a 24h clock time.
 *
 * `H:MM:SS` is always literal. Without an am/pm designation, hours 1-12 on
 * today's date follow the half of the day `now` falls in (unless inference
 * is disabled); any other date, and hours 0 or 13-23, read as 24h.
 */
export function resolveTime(token: string, ctx: TimeContext): Temporal.PlainTime {
  const word = token.trim().toLowerCase();

  if (word === "midnight") return clockTime(0, 0, 0, token);
  if (word === "noon") return clockTime(12, 0, 0, token);

  const full = FULL.exec(word);
  if (full !== null) {
    return clockTime(Number(full[1]), Number(full[2]), Number(full[3]), token);
  }

  const clock = CLOCK.exec(word);
  if (clock === null) {
    throw new DatebookError("invalidTime", `cannot parse time '${token}'`);
  }

  const hour = Number(clock[1]);
  const minute = clock[2] === undefined ? 0 : Number(clock[2]);
  const designation = clock[3];

  if (designation !== undefined) {
    if (hour < 1 || hour > 12) {
      throw new DatebookError(
        "invalidTime",
        `hour must be 1-12 with ${designation} in '${token}'`,
      );
    }
    return clockTime((hour % 12) + (designation === "pm" ? 12 : 0), minute, 0, token);
  }

  if (ctx.today && ctx.infer12h && hour >= 1 && hour <= 12) {
    const pm = ctx.now.hour >= 12;
    return clockTime((hour % 12) + (pm ? 12 : 0), minute, 0, token);
  }

  return clockTime(hour, minute, 0, token);
}

function clockTime(
  hour: number,
  minute: number,
  second: number,
  token: string,
): Temporal.PlainTime {
  if (hour > 23 || minute > 59 || second > 59) {
    throw new DatebookError("invalidTime", `time out of range in '${token}'`);
  }
  return Temporal.PlainTime.from({ hour, minute, second });
}
