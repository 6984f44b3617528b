export const HUMIDITY_QUEUE = "humidity";
export const REFRESH_DATASET_JOB = "refresh-dataset";
export const REFRESH_DATASET_CRON_ID = "humidity-refresh-cron";

/** Five minutes past midnight, after the operating-timezone day rolls over */
export const REFRESH_DATASET_CRON = "5 0 * * *";

export interface RefreshDatasetJobData {
  /** Rebuild even if today's dataset is already cached */
  force?: boolean;
}
