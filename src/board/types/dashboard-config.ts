/**
 * DashboardConfig Interface
 *
 * Runtime settings for sampling, logging and privileged control helpers.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type AcceleratorStrategyPreference = 'auto' | 'sysfs' | 'vendor';

export interface DashboardConfig {
  /** Filesystem root every pseudo-file path is resolved under */
  sysRoot: string;

  /** Interactive loop tick interval in milliseconds */
  tickIntervalMs: number;

  /** Delay between the two ticks of a one-shot snapshot in milliseconds */
  statsIntervalMs: number;

  logging: {
    level: LogLevel;
    /** Append JSON log lines to this file */
    file?: string;
    /** Mirror log lines to stderr (never used while the dashboard is drawn) */
    stderr: boolean;
  };

  accelerator: {
    strategy: AcceleratorStrategyPreference;
    /** Firmware (L4T) major version from which the vendor tool is used */
    vendorMinMajor: number;
    /** Vendor management tool executable */
    vendorTool: string;
    /** Timeout for one vendor tool invocation in milliseconds */
    vendorTimeoutMs: number;
  };

  control: {
    /** Run privileged helpers through `sudo -n` */
    useSudo: boolean;
    /** Performance profile helper (nvpmodel) */
    profileHelper: string;
    /** Boost helper (jetson_clocks) */
    boostHelper: string;
  };
}
