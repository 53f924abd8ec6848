/**
 * Threshold overrides stored in the `risk_thresholds` table.
 * The newest row wins; NULL columns fall back to the environment.
 */

import type { RiskThresholds } from "../../config/env";
import type { Queryable } from "./client";
import { toNullableNumber, type NumericColumn } from "./mappers";

interface RiskThresholdsRow {
  client_exposure_threshold: NumericColumn | null;
  symbol_exposure_threshold: NumericColumn | null;
  velocity_threshold: number | null;
  velocity_window_seconds: number | null;
  anomaly_stddev_threshold: NumericColumn | null;
}

export class ThresholdRepository {
  constructor(private readonly db: Queryable) {}

  /**
   * Overrides from the newest row, or an empty object when the table is empty
   */
  async read(): Promise<Partial<RiskThresholds>> {
    const result = await this.db.query<RiskThresholdsRow>(
      `SELECT client_exposure_threshold, symbol_exposure_threshold, velocity_threshold,
              velocity_window_seconds, anomaly_stddev_threshold
       FROM risk_thresholds
       ORDER BY updated_at DESC, id DESC
       LIMIT 1`
    );
    const row = result.rows[0];
    if (!row) return {};

    const overrides: Partial<RiskThresholds> = {};
    const clientExposure = toNullableNumber(row.client_exposure_threshold);
    const symbolExposure = toNullableNumber(row.symbol_exposure_threshold);
    const anomaly = toNullableNumber(row.anomaly_stddev_threshold);

    if (clientExposure !== null) overrides.clientExposureThreshold = clientExposure;
    if (symbolExposure !== null) overrides.symbolExposureThreshold = symbolExposure;
    if (row.velocity_threshold !== null) overrides.velocityThreshold = row.velocity_threshold;
    if (row.velocity_window_seconds !== null) overrides.velocityWindowSeconds = row.velocity_window_seconds;
    if (anomaly !== null) overrides.anomalyStdDevThreshold = anomaly;

    return overrides;
  }
}

export function createThresholdRepository(db: Queryable): ThresholdRepository {
  return new ThresholdRepository(db);
}
