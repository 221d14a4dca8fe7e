import path from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtemp } from 'node:fs/promises';
import { METRIC_NAMES, type CommandOutput, type RemoteSession } from '@fiberwatch/optical-ingest';

export async function createTempDir(prefix = 'fiberwatch-cli-test-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export function snapshotDocument(timestamp: string, lab: string, nodes: string[]): string {
  const nodeEntries = nodes.map((node, nodeIndex) => ({
    [node]: {
      instantaneous: Object.fromEntries(METRIC_NAMES.map((metric, index) => [metric, nodeIndex * 10 + index])),
      fifteen_minute_bin: Object.fromEntries(
        METRIC_NAMES.map((metric, index) => [metric, { low: index - 1, median: index, high: index + 1 }])
      )
    }
  }));
  return JSON.stringify({ [timestamp]: [{ [lab]: nodeEntries }] });
}

export class StubSession implements RemoteSession {
  readonly commands: string[] = [];
  closeCalls = 0;

  constructor(private readonly files: Record<string, string>) {}

  async execute(command: string): Promise<CommandOutput> {
    this.commands.push(command);
    if (command.endsWith('&& ls')) {
      return { stdout: Object.keys(this.files).join('\n'), stderr: '', exitCode: 0 };
    }
    const match = /&& cat '(.*)'$/.exec(command);
    return { stdout: match ? this.files[match[1]] ?? '' : '', stderr: '', exitCode: 0 };
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}
