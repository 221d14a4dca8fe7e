export const METRIC_NAMES = [
  'power',
  'ber',
  'snr',
  'dgd',
  'qfactor',
  'chromatic_dispersion',
  'carrier_offset'
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

/** `null` marks a reading the equipment did not report as a finite number. */
export type MetricValue = number | null;

export type InstantaneousMetrics = Record<MetricName, MetricValue>;

export interface RangeTriple {
  low: MetricValue;
  median: MetricValue;
  high: MetricValue;
}

export type BinnedMetrics = Record<MetricName, RangeTriple>;

export interface MeasurementSet {
  instantaneous: InstantaneousMetrics;
  fifteenMinuteBin: BinnedMetrics;
}

export interface NodeReading {
  node: string;
  measurements: MeasurementSet;
}

export interface TimestampSnapshot {
  epochSeconds: number;
  timestamp: Date;
  readings: readonly NodeReading[];
}

export interface Lab {
  readonly name: string;
  readonly snapshots: readonly TimestampSnapshot[];
}

/**
 * One (timestamp, lab) occurrence decoded from a snapshot file, with every
 * node reading listed under that lab entry.
 */
export interface SnapshotRecord {
  epochSeconds: number;
  timestamp: Date;
  lab: string;
  readings: NodeReading[];
}

export interface SnapshotEntry {
  timestamp: Date;
  lab: string;
  node: string;
  measurements: MeasurementSet;
}

export interface RangeViolation {
  epochSeconds: number;
  lab: string;
  node: string;
  metric: MetricName;
  range: RangeTriple;
}

export type ParsedSnapshotFile =
  | { status: 'empty' }
  | { status: 'parsed'; records: SnapshotRecord[]; rangeViolations: RangeViolation[] };

export interface IngestModel {
  readonly labs: readonly Lab[];
  readonly labNames: ReadonlySet<string>;
  readonly nodeNames: ReadonlyMap<string, ReadonlySet<string>>;
}

export type IngestPhase = 'idle' | 'connecting' | 'listing' | 'fetching' | 'parsing' | 'merging' | 'closed';

export type IngestStopReason = 'completed' | 'file-limit' | 'transport-error';

export interface IngestRunSummary {
  directory: string;
  filesListed: number;
  filesFetched: number;
  filesMerged: number;
  filesEmpty: number;
  filesFailed: number;
  snapshotsMerged: number;
  stopReason: IngestStopReason;
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
}

export interface IngestRunResult {
  model: IngestModel;
  summary: IngestRunSummary;
}
