import { describe, expect, test } from "vitest";
import { bucketKey, isoWeekKey, planRetention, sortNewestFirst } from "../../../src/core/cleanup/retention";
import { IntegrityError } from "../../../src/utils/errors";
import { dailyRecords, makeRecord, NO_RETENTION } from "../../helpers/config";

function ids(records: ReadonlyArray<{ id: string }>): string[] {
  return records.map((r) => r.id);
}

describe("retention", () => {
  describe("isoWeekKey", () => {
    test("uses the ISO week-numbering year", () => {
      expect(isoWeekKey(new Date("2024-01-01T12:00:00Z"))).toBe("2024-W01");
      expect(isoWeekKey(new Date("2021-01-03T12:00:00Z"))).toBe("2020-W53");
      expect(isoWeekKey(new Date("2024-12-30T12:00:00Z"))).toBe("2025-W01");
    });
  });

  describe("bucketKey", () => {
    const date = new Date("2024-03-05T23:30:00Z");

    test.each([
      ["daily", "2024-03-05"],
      ["weekly", "2024-W10"],
      ["monthly", "2024-03"],
      ["yearly", "2024"],
    ] as const)("%s bucket is %s", (tier, expected) => {
      expect(bucketKey(tier, date)).toBe(expected);
    });
  });

  describe("sortNewestFirst", () => {
    test("orders by creation time and breaks ties by id", () => {
      const records = [
        makeRecord({ id: "a", created_at: "2024-01-01T00:00:00Z" }),
        makeRecord({ id: "c", created_at: "2024-01-02T00:00:00Z" }),
        makeRecord({ id: "b", created_at: "2024-01-01T00:00:00Z" }),
      ];

      expect(ids(sortNewestFirst(records))).toEqual(["c", "b", "a"]);
    });

    test("rejects an unparseable timestamp", () => {
      expect(() => sortNewestFirst([makeRecord({ id: "x", created_at: "yesterday" })])).toThrow(IntegrityError);
    });
  });

  describe("planRetention", () => {
    test("keeps the newest daily backups and deletes the rest", () => {
      const records = dailyRecords(10);

      const plan = planRetention(records, { ...NO_RETENTION, keepDaily: 7, minBackups: 3 });

      expect(ids(plan.keep)).toEqual(["day-10", "day-09", "day-08", "day-07", "day-06", "day-05", "day-04"]);
      expect(ids(plan.delete)).toEqual(["day-03", "day-02", "day-01"]);
      expect(plan.delete.reduce((sum, r) => sum + r.size_bytes, 0)).toBe(600);
      expect(plan.minimumShortfall).toBe(0);
    });

    test("keeps everything when fewer backups exist than the minimum", () => {
      const records = dailyRecords(2);

      const plan = planRetention(records, { ...NO_RETENTION, minBackups: 3 });

      expect(ids(plan.keep)).toEqual(["day-02", "day-01"]);
      expect(plan.delete).toEqual([]);
      expect(plan.minimumShortfall).toBe(1);
      expect(plan.decisions.map((d) => d.keptBy)).toEqual(["minimum", "minimum"]);
    });

    test("tops up the keep-set with the newest remaining backups", () => {
      const records = ["01", "02", "03", "04", "05"].map((hour) =>
        makeRecord({ id: `h${hour}`, created_at: `2024-02-01T${hour}:00:00Z` }),
      );

      const plan = planRetention(records, { ...NO_RETENTION, keepDaily: 1, minBackups: 3 });

      expect(plan.decisions.map((d) => [d.backup.id, d.keptBy])).toEqual([
        ["h05", "daily"],
        ["h04", "minimum"],
        ["h03", "minimum"],
        ["h02", null],
        ["h01", null],
      ]);
    });

    test("later tiers skip buckets already covered by kept backups", () => {
      // 2024-01-01 is a Monday, so weeks are Jan 1-7, 8-14 and 15-21
      const records = dailyRecords(20);

      const plan = planRetention(records, { ...NO_RETENTION, keepDaily: 3, keepWeekly: 2, keepMonthly: 1 });

      expect(plan.decisions.filter((d) => d.keep).map((d) => [d.backup.id, d.keptBy])).toEqual([
        ["day-20", "daily"],
        ["day-19", "daily"],
        ["day-18", "daily"],
        ["day-14", "weekly"],
        ["day-07", "weekly"],
      ]);
    });

    test("keeps the newest backup of each month", () => {
      const records = [
        makeRecord({ id: "jan", created_at: "2024-01-31T02:00:00Z" }),
        makeRecord({ id: "feb", created_at: "2024-02-15T02:00:00Z" }),
        makeRecord({ id: "mar-early", created_at: "2024-03-01T02:00:00Z" }),
        makeRecord({ id: "mar-late", created_at: "2024-03-10T02:00:00Z" }),
      ];

      const plan = planRetention(records, { ...NO_RETENTION, keepMonthly: 3 });

      expect(ids(plan.keep)).toEqual(["mar-late", "feb", "jan"]);
      expect(ids(plan.delete)).toEqual(["mar-early"]);
    });

    test("keeps the newest backup of each year", () => {
      const records = [
        makeRecord({ id: "y22", created_at: "2022-06-01T02:00:00Z" }),
        makeRecord({ id: "y23-jan", created_at: "2023-01-01T02:00:00Z" }),
        makeRecord({ id: "y23-dec", created_at: "2023-12-31T02:00:00Z" }),
      ];

      const plan = planRetention(records, { ...NO_RETENTION, keepYearly: 2 });

      expect(ids(plan.keep)).toEqual(["y23-dec", "y22"]);
    });

    test("a record kept by several tiers counts once toward the minimum", () => {
      const records = dailyRecords(3);

      const plan = planRetention(records, {
        ...NO_RETENTION,
        keepDaily: 1,
        keepWeekly: 1,
        keepMonthly: 1,
        keepYearly: 1,
        minBackups: 2,
      });

      expect(plan.decisions.map((d) => d.keptBy)).toEqual(["daily", "minimum", null]);
    });

    test("breaks ties between identical timestamps by id", () => {
      const records = [
        makeRecord({ id: "aaa", created_at: "2024-05-01T02:00:00Z" }),
        makeRecord({ id: "bbb", created_at: "2024-05-01T02:00:00Z" }),
      ];

      const plan = planRetention(records, { ...NO_RETENTION, keepDaily: 1 });

      expect(ids(plan.keep)).toEqual(["bbb"]);
      expect(ids(plan.delete)).toEqual(["aaa"]);
    });

    test("is a pure function of its input", () => {
      const records = dailyRecords(6);
      const snapshot = structuredClone(records);
      const policy = { ...NO_RETENTION, keepDaily: 2, keepWeekly: 1, minBackups: 1 };

      const first = planRetention(records, policy);
      const second = planRetention(records, policy);

      expect(records).toEqual(snapshot);
      expect(ids(first.keep)).toEqual(ids(second.keep));
      expect(ids(first.delete)).toEqual(ids(second.delete));
    });

    test("an empty policy deletes everything", () => {
      const plan = planRetention(dailyRecords(3), NO_RETENTION);
      expect(plan.keep).toEqual([]);
      expect(plan.delete).toHaveLength(3);
    });

    test("an empty history yields an empty plan", () => {
      const plan = planRetention([], { ...NO_RETENTION, keepDaily: 7, minBackups: 2 });
      expect(plan).toEqual({ decisions: [], keep: [], delete: [], minimumShortfall: 2 });
    });
  });
});
