import { describe, expect, test } from "vitest";
import { Timeline } from "../../src/model/timeline";

interface Point {
  savedAt: Date;
  value: number;
}

const point = (ms: number, value = ms): Point => ({ savedAt: new Date(ms), value });

describe("Timeline", () => {
  test("keeps entries ordered by savedAt regardless of insert order", () => {
    const timeline = new Timeline([point(30), point(10), point(20)]);
    expect(timeline.values().map((p) => p.value)).toEqual([10, 20, 30]);
    expect([...timeline].map((p) => p.value)).toEqual([10, 20, 30]);
    expect(timeline.size).toBe(3);
    expect(timeline.last()?.value).toBe(30);
  });

  test("set replaces the entry at an existing timestamp", () => {
    const timeline = new Timeline([point(10, 1)]);
    timeline.set(point(10, 2));
    expect(timeline.size).toBe(1);
    expect(timeline.get(new Date(10))?.value).toBe(2);
  });

  test("get returns undefined for a missing timestamp", () => {
    expect(new Timeline([point(10)]).get(new Date(11))).toBeUndefined();
  });

  test("neighbours are strictly before and after", () => {
    const timeline = new Timeline([point(10), point(20), point(30)]);
    const around = (ms: number) => {
      const { previous, next } = timeline.neighbours(new Date(ms));
      return [previous?.value, next?.value];
    };
    expect(around(20)).toEqual([10, 30]);
    expect(around(25)).toEqual([20, 30]);
    expect(around(5)).toEqual([undefined, 10]);
    expect(around(30)).toEqual([20, undefined]);
    expect(around(40)).toEqual([30, undefined]);
  });

  test("an empty timeline has no neighbours and no last entry", () => {
    const timeline = new Timeline<Point>();
    expect(timeline.neighbours(new Date(0))).toEqual({ previous: undefined, next: undefined });
    expect(timeline.last()).toBeUndefined();
  });

  test("clone is independent of later inserts", () => {
    const timeline = new Timeline([point(10)]);
    const copy = timeline.clone();
    timeline.set(point(20));
    expect(copy.size).toBe(1);
    expect(timeline.size).toBe(2);
  });
});
