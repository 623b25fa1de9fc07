import { SettingsStore } from "../../../src/application/services/SettingsStore";
import { DEFAULT_SHIPPER_SETTINGS } from "../../../src/application/interfaces/ShipperSettings";
import { Severity } from "../../../src/domain/value-objects/Severity";

describe("SettingsStore", () => {
  it("should start from the defaults", () => {
    const store = new SettingsStore();

    expect(store.get()).toEqual(DEFAULT_SHIPPER_SETTINGS);
    expect(store.get()).toEqual({
      maxLogEntrySize: 256000,
      maxLogSize: 10000000,
      retentionPeriod: 2592000,
      uploadInterval: 3600,
      signalingSeverity: Severity.CRITICAL,
      includeSourceLocation: true,
      defaultLogLevel: Severity.INFO,
      forcedLogLevel: null,
    });
  });

  it("should swap in a new frozen snapshot on update", () => {
    const store = new SettingsStore({ maxLogSize: 1000 });
    const before = store.get();

    const after = store.update({ maxLogSize: null, uploadInterval: 60 });

    expect(before.maxLogSize).toBe(1000);
    expect(after).not.toBe(before);
    expect(after.maxLogSize).toBeNull();
    expect(after.uploadInterval).toBe(60);
    expect(Object.isFrozen(after)).toBe(true);
  });

  it("should notify listeners with the next and previous snapshots", () => {
    const store = new SettingsStore();
    const listener = jest.fn();
    store.onChange(listener);

    store.update({ uploadInterval: 10 });

    expect(listener).toHaveBeenCalledWith(
      expect.objectContaining({ uploadInterval: 10 }),
      expect.objectContaining({ uploadInterval: 3600 })
    );

    store.offChange(listener);
    store.update({ uploadInterval: 20 });
    expect(listener).toHaveBeenCalledTimes(1);
  });
});
