import type { AggregationOptions, CostGroup, ExecutionRecord, RankMetric } from './types/cost.types.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const MS_PER_HOUR = 60 * 60 * 1000;

export const MAX_LOOKBACK_DAYS = 30;

/**
 * Credit multiplier per warehouse size tier. Sizes not listed weigh 1.
 */
export const WAREHOUSE_SIZE_WEIGHTS: Readonly<Record<string, number>> = {
  'X-Small': 1,
  Small: 2,
  Medium: 4,
  Large: 8,
  'X-Large': 16,
  '2X-Large': 32
};

export function sizeWeight(size: string | null | undefined): number {
  if (!size) return 1;
  return WAREHOUSE_SIZE_WEIGHTS[size] ?? 1;
}

/**
 * Hours-based normalization: milliseconds / 3,600,000 × size weight.
 */
export function computeCostFactor(totalElapsedMs: number, warehouseSize: string | null | undefined): number {
  return (totalElapsedMs / MS_PER_HOUR) * sizeWeight(warehouseSize);
}

export function metricValue(group: Pick<CostGroup, 'totalElapsedTime' | 'costFactor'>, metric: RankMetric): number {
  return metric === 'cost_factor' ? group.costFactor : group.totalElapsedTime;
}

interface GroupBucket {
  warehouseName: string;
  userName: string;
  databaseName: string | null;
  schemaName: string | null;
  count: number;
  totalElapsedTime: number;
  minStartTime: Date;
  maxEndTime: Date | null;
  spilledLocal: number;
  spilledRemote: number;
  sample: ExecutionRecord;
}

type EligibleRecord = ExecutionRecord & { warehouseName: string; startTime: Date };

function assertOptions(options: AggregationOptions): void {
  const { lookbackDays, topPerWarehouse, limit } = options;
  if (!Number.isInteger(lookbackDays) || lookbackDays < 1 || lookbackDays > MAX_LOOKBACK_DAYS) {
    throw new RangeError(`lookbackDays must be an integer between 1 and ${MAX_LOOKBACK_DAYS}, got ${lookbackDays}`);
  }
  if (!Number.isInteger(topPerWarehouse) || topPerWarehouse < 1) {
    throw new RangeError(`topPerWarehouse must be a positive integer, got ${topPerWarehouse}`);
  }
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }
}

function isEligible(
  record: ExecutionRecord,
  windowStart: number,
  windowEnd: number,
  requireExecutionTime: boolean
): record is EligibleRecord {
  if (record.warehouseName == null) return false;
  if (record.executionStatus !== 'SUCCESS') return false;
  if (!record.startTime) return false;

  const started = record.startTime.getTime();
  if (Number.isNaN(started) || started < windowStart || started > windowEnd) return false;

  if (requireExecutionTime && !((record.executionTime ?? 0) > 0)) return false;
  return true;
}

function groupKey(record: EligibleRecord, options: AggregationOptions): string {
  const parts: Array<string | null> = [record.warehouseName, record.userName];
  if (options.grouping === 'warehouse_user_schema') {
    parts.push(record.databaseName, record.schemaName);
  }
  return JSON.stringify(parts);
}

function openBucket(record: EligibleRecord, options: AggregationOptions): GroupBucket {
  const extended = options.grouping === 'warehouse_user_schema';
  return {
    warehouseName: record.warehouseName,
    userName: record.userName,
    databaseName: extended ? record.databaseName : null,
    schemaName: extended ? record.schemaName : null,
    count: 0,
    totalElapsedTime: 0,
    minStartTime: record.startTime,
    maxEndTime: null,
    spilledLocal: 0,
    spilledRemote: 0,
    sample: record
  };
}

function addToBucket(bucket: GroupBucket, record: EligibleRecord): void {
  bucket.count += 1;
  bucket.totalElapsedTime += record.totalElapsedTime;
  bucket.spilledLocal += record.bytesSpilledToLocalStorage;
  bucket.spilledRemote += record.bytesSpilledToRemoteStorage;

  if (record.startTime < bucket.minStartTime) {
    bucket.minStartTime = record.startTime;
  }
  if (record.endTime && (!bucket.maxEndTime || record.endTime > bucket.maxEndTime)) {
    bucket.maxEndTime = record.endTime;
  }

  // Strictly greater: the first record seen keeps the sample on ties
  if (record.totalElapsedTime > bucket.sample.totalElapsedTime) {
    bucket.sample = record;
  }
}

function toCostGroup(bucket: GroupBucket): CostGroup {
  const warehouseSize = bucket.sample.warehouseSize;
  return {
    warehouseName: bucket.warehouseName,
    warehouseSize,
    userName: bucket.userName,
    databaseName: bucket.databaseName,
    schemaName: bucket.schemaName,
    queryCount: bucket.count,
    sampleQueryId: bucket.sample.queryId,
    sampleQueryText: bucket.sample.queryText,
    minStartTime: bucket.minStartTime,
    maxEndTime: bucket.maxEndTime,
    totalElapsedTime: bucket.totalElapsedTime,
    durationSeconds: bucket.totalElapsedTime / 1000,
    durationHours: bucket.totalElapsedTime / MS_PER_HOUR,
    costFactor: computeCostFactor(bucket.totalElapsedTime, warehouseSize),
    bytesSpilledToLocalStorage: bucket.spilledLocal,
    bytesSpilledToRemoteStorage: bucket.spilledRemote,
    rank: 0
  };
}

/**
 * Aggregate execution records into the ranked leaderboard of most expensive
 * warehouse/user groups.
 *
 * Groups are ranked within their warehouse by the chosen metric (ROW_NUMBER
 * semantics), cut at `topPerWarehouse`, then sorted globally by the metric.
 * Ties, both for the sample query and for ranks, resolve to input order, so
 * results are reproducible only for a stable record order.
 */
export function aggregateExpensiveQueries(
  records: readonly ExecutionRecord[],
  options: AggregationOptions
): CostGroup[] {
  assertOptions(options);

  const now = (options.now ?? new Date()).getTime();
  const windowStart = now - options.lookbackDays * MS_PER_DAY;
  const requireExecutionTime = options.requireExecutionTime ?? false;

  const buckets = new Map<string, GroupBucket>();
  for (const record of records) {
    if (!isEligible(record, windowStart, now, requireExecutionTime)) continue;

    const key = groupKey(record, options);
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = openBucket(record, options);
      buckets.set(key, bucket);
    }
    addToBucket(bucket, record);
  }

  const partitions = new Map<string, CostGroup[]>();
  for (const bucket of buckets.values()) {
    const group = toCostGroup(bucket);
    const partition = partitions.get(group.warehouseName);
    if (partition) {
      partition.push(group);
    } else {
      partitions.set(group.warehouseName, [group]);
    }
  }

  const byMetricDesc = (a: CostGroup, b: CostGroup): number =>
    metricValue(b, options.metric) - metricValue(a, options.metric);

  const retained: CostGroup[] = [];
  for (const partition of partitions.values()) {
    partition.sort(byMetricDesc);
    partition.forEach((group, index) => {
      group.rank = index + 1;
    });
    retained.push(...partition.filter((group) => group.rank <= options.topPerWarehouse));
  }

  retained.sort(byMetricDesc);
  return options.limit === undefined ? retained : retained.slice(0, options.limit);
}
