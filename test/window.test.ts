import { describe, expect, it } from "vitest";
import { parseDuration } from "../src/duration.js";
import {
  inQueryWindow,
  inWell,
  isNotificationDue,
  notificationOf,
  queryWindow,
} from "../src/window.js";
import { NOW, itemOf, zoned } from "./helpers.js";

const WELL = parseDuration("60s");

describe("inWell", () => {
  it("reports instants within the well on either side", () => {
    const item = itemOf("today at 10:00 Call");
    expect(inWell(item, zoned("2024-03-01T09:59:00"), WELL)).toBe(true);
    expect(inWell(item, zoned("2024-03-01T10:01:00"), WELL)).toBe(true);
    expect(inWell(item, zoned("2024-03-01T10:01:01"), WELL)).toBe(false);
    expect(inWell(item, zoned("2024-03-01T09:58:59"), WELL)).toBe(false);
  });

  it("reports spans that overlap the well", () => {
    const item = itemOf("today from 10:00 to 11:00 Meeting");
    expect(inWell(item, zoned("2024-03-01T10:30:00"), WELL)).toBe(true);
    expect(inWell(item, zoned("2024-03-01T11:00:59"), WELL)).toBe(true);
    expect(inWell(item, zoned("2024-03-01T11:01:01"), WELL)).toBe(false);
  });

  it("covers the whole day for all-day items", () => {
    const item = itemOf("today all day Holiday");
    expect(inWell(item, zoned("2024-03-01T23:30:00"), WELL)).toBe(true);
    expect(inWell(item, zoned("2024-03-02T00:01:01"), WELL)).toBe(false);
  });
});

describe("queryWindow", () => {
  it("reaches back from today's midnight and ahead to a midnight", () => {
    const window = queryWindow(NOW, parseDuration("30d"));
    expect(window.from.toString()).toBe("2024-01-31T00:00:00");
    expect(window.to.toString()).toBe("2024-03-31T00:00:00");
  });

  it("includes items starting inside the window", () => {
    const window = queryWindow(NOW, parseDuration("30d"));
    expect(inQueryWindow(itemOf("3/31 all day Edge"), window)).toBe(true);
    expect(inQueryWindow(itemOf("3/31 at 8 Late"), window)).toBe(false);
    expect(inQueryWindow(itemOf("1/31 at 0:00 Early"), window)).toBe(true);
    expect(inQueryWindow(itemOf("1/30 at 23:59 Earlier"), window)).toBe(false);
  });
});

describe("notifications", () => {
  it("computes the reminder time", () => {
    const notification = notificationOf(itemOf("today at 10:00 notify 30m Call"));
    expect(notification?.start.toString()).toBe("2024-03-01T10:00:00");
    expect(notification?.notifyAt.toString()).toBe("2024-03-01T09:30:00");
    expect(notificationOf(itemOf("today at 10:00 Call"))).toBeNull();
  });

  it("is due from the reminder time until the start", () => {
    const item = itemOf("today at 10:00 notify 30m Call");
    expect(isNotificationDue(item, zoned("2024-03-01T09:29:59"))).toBe(false);
    expect(isNotificationDue(item, zoned("2024-03-01T09:30:00"))).toBe(true);
    expect(isNotificationDue(item, zoned("2024-03-01T09:59:59"))).toBe(true);
    expect(isNotificationDue(item, zoned("2024-03-01T10:00:00"))).toBe(false);
  });

  it("is not due once notified or completed", () => {
    const at = zoned("2024-03-01T09:45:00");
    expect(isNotificationDue(itemOf("today at 10:00 notify 30m Call", NOW, { notified: true }), at)).toBe(false);
    expect(isNotificationDue(itemOf("today at 10:00 notify 30m Call", NOW, { completed: true }), at)).toBe(false);
  });
});
