import { isMap, isScalar, parseDocument, Scalar, visit, type Node } from 'yaml';
import { z } from 'zod';
import { ParseError, describeError } from './errors';
import {
  METRIC_NAMES,
  type MeasurementSet,
  type MetricValue,
  type NodeReading,
  type ParsedSnapshotFile,
  type RangeViolation,
  type SnapshotEntry,
  type SnapshotRecord
} from './types';

function toMetricValue(value: unknown): MetricValue {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

// The key has to be present; its value may be anything and degrades to null.
const metricValueSchema = z
  .unknown()
  .refine((value) => value !== undefined, { message: 'Required' })
  .transform(toMetricValue);

const rangeSchema = z.object({
  low: metricValueSchema,
  median: metricValueSchema,
  high: metricValueSchema
});

const instantaneousSchema = z.object({
  power: metricValueSchema,
  ber: metricValueSchema,
  snr: metricValueSchema,
  dgd: metricValueSchema,
  qfactor: metricValueSchema,
  chromatic_dispersion: metricValueSchema,
  carrier_offset: metricValueSchema
});

const fifteenMinuteBinSchema = z.object({
  power: rangeSchema,
  ber: rangeSchema,
  snr: rangeSchema,
  dgd: rangeSchema,
  qfactor: rangeSchema,
  chromatic_dispersion: rangeSchema,
  carrier_offset: rangeSchema
});

const measurementSchema = z
  .object({
    instantaneous: instantaneousSchema,
    fifteen_minute_bin: fifteenMinuteBinSchema
  })
  .transform(
    (payload): MeasurementSet => ({
      instantaneous: payload.instantaneous,
      fifteenMinuteBin: payload.fifteen_minute_bin
    })
  );

function toPlainValue(value: unknown): unknown {
  if (value instanceof Map) {
    return Object.fromEntries(Array.from(value, ([key, entry]) => [String(key), toPlainValue(entry)]));
  }
  if (Array.isArray(value)) {
    return value.map(toPlainValue);
  }
  return value;
}

const NOT_JSON_ANCHOR = 'anchors and aliases are not allowed';

function nodeSyntaxProblem(node: Node): string | null {
  if (node.anchor) {
    return NOT_JSON_ANCHOR;
  }
  if (node.comment || node.commentBefore) {
    return 'comments are not allowed';
  }
  return null;
}

/** Returns the first construct YAML accepts but JSON does not, if any. */
function findNonJsonSyntax(root: Node): string | null {
  const problems: string[] = [];
  const report = (problem: string | null) => {
    if (problem === null) {
      return undefined;
    }
    problems.push(problem);
    return visit.BREAK;
  };

  visit(root, {
    Alias: () => report(NOT_JSON_ANCHOR),
    Map: (_, map) => report(map.flow ? nodeSyntaxProblem(map) : 'block mappings are not allowed'),
    Seq: (_, seq) => report(seq.flow ? nodeSyntaxProblem(seq) : 'block sequences are not allowed'),
    Pair: (_, pair) => {
      if (!isScalar(pair.key) || pair.key.type !== Scalar.QUOTE_DOUBLE) {
        return report('mapping keys must be double-quoted strings');
      }
      return report(pair.value === null ? 'mapping keys must have a value' : null);
    },
    Scalar: (_, scalar) => {
      if (scalar.type === Scalar.QUOTE_DOUBLE) {
        return report(nodeSyntaxProblem(scalar));
      }
      const { value } = scalar;
      const isJsonLiteral =
        scalar.type === Scalar.PLAIN && (value === null || typeof value === 'number' || typeof value === 'boolean');
      return report(isJsonLiteral ? nodeSyntaxProblem(scalar) : 'strings must be double-quoted');
    }
  });

  return problems[0] ?? null;
}

/**
 * Decodes the raw JSON text into ordered top-level entries. The YAML parser
 * runs with its JSON schema and every non-JSON construct is rejected; unlike
 * JSON.parse it keeps integer-like keys such as epoch seconds in the order
 * they were written. A repeated key keeps its first position and last value.
 */
function decodeDocument(raw: string): Array<[string, unknown]> {
  const document = parseDocument(raw, { schema: 'json', uniqueKeys: false });
  const diagnostics = [...document.errors, ...document.warnings];
  if (diagnostics.length > 0) {
    throw new ParseError(
      `Snapshot content could not be decoded: ${diagnostics[0].message}`,
      diagnostics.map((diagnostic) => diagnostic.message)
    );
  }
  const root = document.contents;
  if (!isMap(root)) {
    throw new ParseError('Snapshot document must map timestamps to lab entries');
  }
  const problem = document.commentBefore || document.comment ? 'comments are not allowed' : findNonJsonSyntax(root);
  if (problem !== null) {
    throw new ParseError(`Snapshot content is not valid JSON: ${problem}`);
  }

  let contents: unknown;
  try {
    contents = document.toJS({ mapAsMap: true });
  } catch (error) {
    throw new ParseError(`Snapshot content could not be decoded: ${describeError(error)}`, null, { cause: error });
  }
  if (!(contents instanceof Map)) {
    throw new ParseError('Snapshot document must map timestamps to lab entries');
  }
  return Array.from(contents, ([key, value]): [string, unknown] => [String(key), value]);
}

function singleKeyEntry(value: unknown, description: string): [string, unknown] {
  if (!(value instanceof Map)) {
    throw new ParseError(`${description} must be a mapping with a single key`);
  }
  if (value.size !== 1) {
    throw new ParseError(`${description} must have exactly one key, found ${value.size}`);
  }
  const [[key, entry]] = Array.from(value);
  return [String(key), entry];
}

function expectList(value: unknown, description: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ParseError(`${description} must be a list`);
  }
  return value;
}

const DECIMAL_NUMBER = /^[+-]?\d+(\.\d+)?([eE][+-]?\d+)?$/;

function parseEpochSeconds(key: string): number {
  const trimmed = key.trim();
  const epochSeconds = DECIMAL_NUMBER.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (!Number.isFinite(epochSeconds) || Number.isNaN(new Date(epochSeconds * 1000).getTime())) {
    throw new ParseError(`Snapshot timestamp "${key}" is not a valid number of epoch seconds`);
  }
  return epochSeconds;
}

function parseNodeReading(value: unknown, lab: string, key: string): NodeReading {
  const [node, payload] = singleKeyEntry(value, `Node entry in lab "${lab}" at ${key}`);
  const result = measurementSchema.safeParse(toPlainValue(payload));
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ParseError(
      `Node "${node}" in lab "${lab}" at ${key} has invalid measurements (${location}${issue.message})`,
      result.error.issues
    );
  }
  return { node, measurements: result.data };
}

function collectRangeViolations(record: SnapshotRecord): RangeViolation[] {
  const violations: RangeViolation[] = [];
  for (const reading of record.readings) {
    for (const metric of METRIC_NAMES) {
      const range = reading.measurements.fifteenMinuteBin[metric];
      const { low, median, high } = range;
      if (low === null || median === null || high === null) {
        continue;
      }
      if (low > median || median > high) {
        violations.push({ epochSeconds: record.epochSeconds, lab: record.lab, node: reading.node, metric, range });
      }
    }
  }
  return violations;
}

/**
 * Decodes one snapshot file. Whitespace-only content is reported as empty;
 * anything that does not match the snapshot layout throws a ParseError so the
 * caller can skip the whole file.
 */
export function parseSnapshotFile(raw: string): ParsedSnapshotFile {
  if (raw.trim().length === 0) {
    return { status: 'empty' };
  }

  const records: SnapshotRecord[] = [];
  for (const [key, labEntries] of decodeDocument(raw)) {
    const epochSeconds = parseEpochSeconds(key);
    for (const labEntry of expectList(labEntries, `Lab entries at ${key}`)) {
      const [lab, nodeEntries] = singleKeyEntry(labEntry, `Lab entry at ${key}`);
      const readings = expectList(nodeEntries, `Node entries of lab "${lab}" at ${key}`).map((nodeEntry) =>
        parseNodeReading(nodeEntry, lab, key)
      );
      records.push({ epochSeconds, timestamp: new Date(epochSeconds * 1000), lab, readings });
    }
  }

  return { status: 'parsed', records, rangeViolations: records.flatMap(collectRangeViolations) };
}

export function flattenSnapshotRecords(records: readonly SnapshotRecord[]): SnapshotEntry[] {
  return records.flatMap((record) =>
    record.readings.map((reading) => ({
      timestamp: record.timestamp,
      lab: record.lab,
      node: reading.node,
      measurements: reading.measurements
    }))
  );
}
