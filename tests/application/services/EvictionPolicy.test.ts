import { applyEvictionPolicies, totalDropped } from "../../../src/application/services/EvictionPolicy";
import { LogRecords } from "../../../src/domain/entities/LogRecord";
import { makeRecord } from "../../helpers/fixtures";

describe("applyEvictionPolicies", () => {
  const now = Date.parse("2024-06-01T00:00:00.000Z");
  const day = 24 * 3600;
  const noLimits = { maxLogEntrySize: null, maxLogSize: null, retentionPeriod: null };

  const numbered = (count: number) =>
    Array.from({ length: count }, (_, index) => makeRecord({ textPayload: `record-${index}` }));

  it("should keep everything when all limits are disabled", () => {
    const batch = numbered(3);

    const outcome = applyEvictionPolicies(batch, noLimits, now);

    expect(outcome.survivors).toEqual(batch);
    expect(outcome.dropped).toEqual({ oversized: 0, overflow: 0, expired: 0 });
  });

  describe("per-entry size", () => {
    it("should drop records over the entry limit wherever they are", () => {
      const small = makeRecord({ textPayload: "ok" });
      const large = makeRecord({ textPayload: "x".repeat(500) });
      const limit = LogRecords.serializedSize(small);

      const outcome = applyEvictionPolicies(
        [large, small, large, small],
        { ...noLimits, maxLogEntrySize: limit },
        now
      );

      expect(outcome.survivors).toEqual([small, small]);
      expect(outcome.dropped.oversized).toBe(2);
    });

    it("should keep a record exactly at the limit", () => {
      const record = makeRecord();

      const outcome = applyEvictionPolicies(
        [record],
        { ...noLimits, maxLogEntrySize: LogRecords.serializedSize(record) },
        now
      );

      expect(outcome.survivors).toEqual([record]);
    });
  });

  describe("total size", () => {
    it("should drop the oldest records until the batch fits", () => {
      const batch = numbered(5);
      const size = LogRecords.serializedSize(batch[0]);

      const outcome = applyEvictionPolicies(batch, { ...noLimits, maxLogSize: size * 3 }, now);

      expect(outcome.survivors).toEqual(batch.slice(2));
      expect(outcome.dropped.overflow).toBe(2);
    });

    it("should drop one more record when the cap falls one byte short", () => {
      const batch = numbered(5);
      const size = LogRecords.serializedSize(batch[0]);

      const outcome = applyEvictionPolicies(batch, { ...noLimits, maxLogSize: size * 3 - 1 }, now);

      expect(outcome.survivors).toEqual(batch.slice(3));
      expect(outcome.dropped.overflow).toBe(3);
    });

    it("should only count records that passed the entry limit", () => {
      const batch = numbered(3);
      const size = LogRecords.serializedSize(batch[0]);
      const huge = makeRecord({ textPayload: "y".repeat(1000) });

      const outcome = applyEvictionPolicies(
        [huge, ...batch],
        { ...noLimits, maxLogEntrySize: size, maxLogSize: size * 3 },
        now
      );

      expect(outcome.survivors).toEqual(batch);
      expect(outcome.dropped).toEqual({ oversized: 1, overflow: 0, expired: 0 });
    });
  });

  describe("retention", () => {
    const retentionPeriod = 30 * day;

    it("should drop a record one second past the retention period", () => {
      const old = makeRecord({ timestamp: new Date(now - (retentionPeriod + 1) * 1000).toISOString() });

      const outcome = applyEvictionPolicies([old], { ...noLimits, retentionPeriod }, now);

      expect(outcome.survivors).toEqual([]);
      expect(outcome.dropped.expired).toBe(1);
    });

    it("should keep a record one second inside the retention period", () => {
      const recent = makeRecord({ timestamp: new Date(now - (retentionPeriod - 1) * 1000).toISOString() });

      const outcome = applyEvictionPolicies([recent], { ...noLimits, retentionPeriod }, now);

      expect(outcome.survivors).toEqual([recent]);
    });

    it("should never drop a record without a timestamp", () => {
      const undated = makeRecord();

      const outcome = applyEvictionPolicies([undated], { ...noLimits, retentionPeriod: 1 }, now);

      expect(outcome.survivors).toEqual([undated]);
      expect(outcome.dropped.expired).toBe(0);
    });
  });

  it("should sum the dropped counts", () => {
    expect(totalDropped({ oversized: 1, overflow: 2, expired: 3 })).toBe(6);
  });
});
