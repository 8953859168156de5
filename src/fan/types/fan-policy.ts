/**
 * FanPolicy Interface
 *
 * Tunables for the GPU fan controller: polling, hysteresis thresholds,
 * duty curve, hand-off conditions and device filtering.
 */

export interface Thresholds {
  /** Aggregate temperature at or above which manual control is taken */
  enterManualC: number;
  /** Aggregate temperature at or below which control returns to the BMC */
  exitManualC: number;
  /** Curve floor: at or below this temperature the minimum duty applies */
  curveMinC: number;
  /** Curve ceiling: at or above this temperature the maximum duty applies */
  curveMaxC: number;
  minDutyPct: number;
  maxDutyPct: number;
}

export interface TemperatureRange {
  min: number;
  max: number;
}

export interface FanPolicy {
  monitoring: {
    /** Polling interval in seconds */
    interval: number;
    /** Upper bound for a single external tool call, in seconds */
    commandTimeout: number;
    /** Consecutive telemetry failures tolerated before giving up */
    maxConsecutiveFailures: number;
  };

  thresholds: Thresholds;

  handoff: {
    /** Seconds the aggregate must stay at or below exitManualC before hand-off */
    delay: number;
    /** Hand-off also requires utilization at or below this percentage */
    idleUtilization?: number;
  };

  devices: {
    /** GPU indices excluded from aggregation */
    ignore: number[];
    /** Readings outside this range are discarded */
    sanityRange?: TemperatureRange;
  };

  actuator: {
    /** Additional attempts after a failed mid-run actuator command */
    retries: number;
    /** Delay before the first retry in milliseconds (doubles per attempt) */
    retryDelay: number;
  };

  tools: {
    nvidiaSmi: string;
    ipmitool: string;
  };
}
