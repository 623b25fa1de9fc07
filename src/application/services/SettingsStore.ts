import { EventEmitter } from "events";
import {
  DEFAULT_SHIPPER_SETTINGS,
  ShipperSettings,
} from "../interfaces/ShipperSettings";

/**
 * Holds the current settings as one frozen snapshot. Updates build a new
 * snapshot and swap it in, so readers never see a half-applied change.
 */
export class SettingsStore extends EventEmitter {
  private current: Readonly<ShipperSettings>;

  constructor(initial: Partial<ShipperSettings> = {}) {
    super();
    this.current = Object.freeze({ ...DEFAULT_SHIPPER_SETTINGS, ...initial });
  }

  public get(): Readonly<ShipperSettings> {
    return this.current;
  }

  public update(changes: Partial<ShipperSettings>): Readonly<ShipperSettings> {
    const previous = this.current;
    this.current = Object.freeze({ ...previous, ...changes });
    this.emit("change", this.current, previous);
    return this.current;
  }

  public onChange(
    callback: (next: Readonly<ShipperSettings>, previous: Readonly<ShipperSettings>) => void
  ): void {
    this.on("change", callback);
  }

  public offChange(
    callback: (next: Readonly<ShipperSettings>, previous: Readonly<ShipperSettings>) => void
  ): void {
    this.off("change", callback);
  }
}
