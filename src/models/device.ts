/**
 * Device catalog built from ingested manuals
 */

export interface DeviceCategory {
  /** Device type, e.g. "TV" or "Washing Machine" */
  device_type: string;

  /** Brands seen for this device type, sorted */
  brands: string[];

  /** Models per brand, sorted */
  models: Record<string, string[]>;

  /** ISO 8601 timestamp of the last update */
  updated_at: string;
}
