import { TransportError } from '../src/errors';
import type { CommandOutput, RemoteSession } from '../src/session';
import { METRIC_NAMES, type MetricName } from '../src/types';

export type MetricOverrides = Partial<Record<MetricName, unknown>>;

export function instantaneousPayload(base: number, overrides: MetricOverrides = {}): Record<string, unknown> {
  const payload: Record<string, unknown> = {};
  METRIC_NAMES.forEach((metric, index) => {
    payload[metric] = base + index;
  });
  return { ...payload, ...overrides };
}

export function binPayload(base: number, overrides: MetricOverrides = {}): Record<string, unknown> {
  const payload: Record<string, unknown> = {};
  METRIC_NAMES.forEach((metric, index) => {
    payload[metric] = { low: base + index - 1, median: base + index, high: base + index + 1 };
  });
  return { ...payload, ...overrides };
}

/** Overrides set to `undefined` drop the metric once the entry is serialized. */
export function nodeEntry(
  node: string,
  base: number,
  overrides: MetricOverrides = {},
  binOverrides: MetricOverrides = {}
): Record<string, unknown> {
  return {
    [node]: {
      instantaneous: instantaneousPayload(base, overrides),
      fifteen_minute_bin: binPayload(base, binOverrides)
    }
  };
}

export function snapshotFile(timestamp: string, labs: Record<string, Array<Record<string, unknown>>>): string {
  const labEntries = Object.entries(labs).map(([lab, nodes]) => ({ [lab]: nodes }));
  return JSON.stringify({ [timestamp]: labEntries }, null, 2);
}

/** A flow mapping whose anchors expand to `width ** levels` entries when resolved. */
export function aliasExpansionDocument(levels = 7, width = 10): string {
  const entries = [`"a": &a [${Array.from({ length: width }, () => '1').join(', ')}]`];
  for (let level = 1; level < levels; level += 1) {
    const name = String.fromCharCode(97 + level);
    const previous = String.fromCharCode(96 + level);
    entries.push(`"${name}": &${name} [${Array.from({ length: width }, () => `*${previous}`).join(', ')}]`);
  }
  return `{${entries.join(', ')}}`;
}

export type FakeFile = string | TransportError;

/**
 * In-process stand-in for an SSH session serving `ls` and `cat` from a fixed
 * directory listing.
 */
export class FakeRemoteSession implements RemoteSession {
  readonly commands: string[] = [];
  closeCalls = 0;
  private readonly files: Map<string, FakeFile>;
  private readonly listing: string;
  private readonly listingError: TransportError | null;

  constructor(files: Array<[string, FakeFile]>, options: { listing?: string; listingError?: TransportError } = {}) {
    this.files = new Map(files);
    this.listing = options.listing ?? files.map(([name]) => `${name}\n`).join('');
    this.listingError = options.listingError ?? null;
  }

  get fetchedFiles(): string[] {
    return this.commands
      .map((command) => /&& cat '(.*)'$/.exec(command))
      .flatMap((match) => (match ? [match[1]] : []));
  }

  async execute(command: string): Promise<CommandOutput> {
    this.commands.push(command);
    if (command.endsWith('&& ls')) {
      if (this.listingError) {
        throw this.listingError;
      }
      return { stdout: this.listing, stderr: '', exitCode: 0 };
    }
    const match = /&& cat '(.*)'$/.exec(command);
    const file = match ? this.files.get(match[1]) : undefined;
    if (file === undefined) {
      return { stdout: '', stderr: 'cat: no such file', exitCode: 1 };
    }
    if (file instanceof TransportError) {
      throw file;
    }
    return { stdout: file, stderr: '', exitCode: 0 };
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}
