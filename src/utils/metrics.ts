/**
 * CloudWatch Metrics Utilities
 *
 * Provides functions to emit custom CloudWatch metrics for ledger writes
 * and bulk imports. Emission is skipped unless METRICS_ENABLED=true.
 */

import {
  CloudWatchClient,
  PutMetricDataCommand,
  MetricDatum,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import { loadEnvironmentConfig } from '../config/environment';
import { log, LogLevel } from './logger';

/**
 * CloudWatch client instance
 * Reused across invocations for connection pooling
 */
const cloudWatchClient = new CloudWatchClient({
  region: loadEnvironmentConfig().awsRegion,
});

/**
 * Namespace for custom metrics
 */
const METRIC_NAMESPACE = 'Syndicate/Ledger';

/**
 * Metric names
 */
export enum MetricName {
  LEDGER_WRITE_LATENCY = 'LedgerWriteLatency',
  IMPORT_BATCH_DURATION = 'ImportBatchDuration',
  IMPORT_ROWS_PROCESSED = 'ImportRowsProcessed',
  IMPORT_BATCH_FAILURE = 'ImportBatchFailure',
}

/**
 * Metric units
 */
export const MetricUnit = {
  MILLISECONDS: StandardUnit.Milliseconds,
  COUNT: StandardUnit.Count,
} as const;

export type MetricUnit = (typeof MetricUnit)[keyof typeof MetricUnit];

/**
 * Metric dimensions for filtering and grouping
 */
export interface MetricDimensions {
  season_id?: string;
  entry_kind?: string;
  operation_type?: string;
  [key: string]: string | undefined;
}

/**
 * Emit a custom CloudWatch metric
 *
 * @param metricName - Name of the metric
 * @param value - Metric value
 * @param unit - Metric unit (Milliseconds, Count, etc.)
 * @param dimensions - Optional dimensions for filtering
 */
export async function emitMetric(
  metricName: MetricName,
  value: number,
  unit: MetricUnit,
  dimensions?: MetricDimensions
): Promise<void> {
  if (!loadEnvironmentConfig().metricsEnabled) {
    return;
  }

  try {
    const metricData: MetricDatum = {
      MetricName: metricName,
      Value: value,
      Unit: unit,
      Timestamp: new Date(),
    };

    if (dimensions) {
      metricData.Dimensions = Object.entries(dimensions).flatMap(([name, dimensionValue]) =>
        dimensionValue === undefined ? [] : [{ Name: name, Value: dimensionValue }]
      );
    }

    const command = new PutMetricDataCommand({
      Namespace: METRIC_NAMESPACE,
      MetricData: [metricData],
    });

    await cloudWatchClient.send(command);
  } catch (error) {
    // Metrics should not break the ledger flow
    log(LogLevel.WARN, 'Failed to emit CloudWatch metric', {
      metric_name: metricName,
      value,
      unit,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}

/**
 * Emit ledger write latency metric, one datum per entry kind
 */
export async function emitLedgerWriteLatency(
  seasonId: string,
  entryKind: string,
  latencyMs: number
): Promise<void> {
  await emitMetric(
    MetricName.LEDGER_WRITE_LATENCY,
    latencyMs,
    MetricUnit.MILLISECONDS,
    {
      season_id: seasonId,
      entry_kind: entryKind,
      operation_type: 'ledger_write',
    }
  );
}

/**
 * Emit the row count and outcome of an import batch
 *
 * Successful batches report the number of rows written; failed batches
 * report a single failure count.
 */
export async function emitImportOutcome(
  seasonId: string,
  rowsProcessed: number,
  success: boolean
): Promise<void> {
  if (success) {
    await emitMetric(MetricName.IMPORT_ROWS_PROCESSED, rowsProcessed, MetricUnit.COUNT, {
      season_id: seasonId,
      operation_type: 'import',
    });
    return;
  }

  await emitMetric(MetricName.IMPORT_BATCH_FAILURE, 1, MetricUnit.COUNT, {
    season_id: seasonId,
    operation_type: 'import',
  });
}

/**
 * Measure and emit duration for an async operation
 *
 * @param operation - Async operation to measure
 * @param metricName - Name of the metric to emit
 * @param dimensions - Optional dimensions for the metric
 * @returns Result of the operation
 */
export async function measureDuration<T>(
  operation: () => Promise<T>,
  metricName: MetricName,
  dimensions?: MetricDimensions
): Promise<T> {
  const startTime = Date.now();

  try {
    const result = await operation();
    await emitMetric(metricName, Date.now() - startTime, MetricUnit.MILLISECONDS, dimensions);
    return result;
  } catch (error) {
    // Emit metric even on error to track failed operation duration
    await emitMetric(metricName, Date.now() - startTime, MetricUnit.MILLISECONDS, {
      ...dimensions,
      error: 'true',
    });

    throw error;
  }
}
