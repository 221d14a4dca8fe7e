import {
  METRIC_NAMES,
  type IngestModel,
  type MetricName,
  type MetricValue,
  type NodeReading,
  type TimestampSnapshot
} from './types';

export interface MeasurementRow {
  lab: string;
  timestamp: string;
  epochSeconds: number;
  node: string;
  metric: MetricName;
  value: MetricValue;
  low: MetricValue;
  median: MetricValue;
  high: MetricValue;
}

export interface LabSummary {
  lab: string;
  nodes: string[];
  snapshots: number;
  readings: number;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
}

/** One row per (lab, snapshot, node, metric), in model order. */
export function flattenModel(model: IngestModel): MeasurementRow[] {
  const rows: MeasurementRow[] = [];
  for (const lab of model.labs) {
    for (const snapshot of lab.snapshots) {
      const timestamp = snapshot.timestamp.toISOString();
      for (const reading of snapshot.readings) {
        const { instantaneous, fifteenMinuteBin } = reading.measurements;
        for (const metric of METRIC_NAMES) {
          rows.push({
            lab: lab.name,
            timestamp,
            epochSeconds: snapshot.epochSeconds,
            node: reading.node,
            metric,
            value: instantaneous[metric],
            ...fifteenMinuteBin[metric]
          });
        }
      }
    }
  }
  return rows;
}

function toNodeEntry(reading: NodeReading): Record<string, unknown> {
  const { instantaneous, fifteenMinuteBin } = reading.measurements;
  return {
    [reading.node]: {
      instantaneous: { ...instantaneous },
      fifteen_minute_bin: Object.fromEntries(METRIC_NAMES.map((metric) => [metric, { ...fifteenMinuteBin[metric] }]))
    }
  };
}

/** Rebuilds the on-disk snapshot layout for a single lab snapshot. */
export function toSnapshotDocument(lab: string, snapshot: TimestampSnapshot): Record<string, unknown> {
  return {
    [String(snapshot.epochSeconds)]: [{ [lab]: snapshot.readings.map(toNodeEntry) }]
  };
}

export function summarizeLabs(model: IngestModel): LabSummary[] {
  return model.labs.map((lab) => {
    const nodes = Array.from(model.nodeNames.get(lab.name) ?? []).sort();
    const first = lab.snapshots[0];
    const last = lab.snapshots[lab.snapshots.length - 1];
    return {
      lab: lab.name,
      nodes,
      snapshots: lab.snapshots.length,
      readings: lab.snapshots.reduce((total, snapshot) => total + snapshot.readings.length, 0),
      firstTimestamp: first ? first.timestamp.toISOString() : null,
      lastTimestamp: last ? last.timestamp.toISOString() : null
    };
  });
}
