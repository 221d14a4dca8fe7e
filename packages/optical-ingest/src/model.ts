import type { IngestModel, SnapshotRecord, TimestampSnapshot } from './types';

type LabState = {
  name: string;
  snapshots: TimestampSnapshot[];
  nodes: Set<string>;
};

/**
 * Accumulates decoded snapshot records into the lab / timestamp / node
 * hierarchy. Labs are unique by name and keep their snapshots in the order
 * the records arrived; nothing is sorted or merged by timestamp.
 */
export class IngestModelBuilder {
  private readonly labs: LabState[] = [];
  private readonly labsByName = new Map<string, LabState>();
  private readonly labNames = new Set<string>();
  private readonly nodeNames = new Map<string, Set<string>>();

  get labCount(): number {
    return this.labs.length;
  }

  merge(records: readonly SnapshotRecord[]): number {
    for (const record of records) {
      const lab = this.ensureLab(record.lab);
      lab.snapshots.push({
        epochSeconds: record.epochSeconds,
        timestamp: record.timestamp,
        readings: [...record.readings]
      });
      for (const reading of record.readings) {
        lab.nodes.add(reading.node);
      }
    }
    return records.length;
  }

  build(): IngestModel {
    return {
      labs: this.labs.map(({ name, snapshots }) => ({ name, snapshots })),
      labNames: this.labNames,
      nodeNames: this.nodeNames
    };
  }

  private ensureLab(name: string): LabState {
    const existing = this.labsByName.get(name);
    if (existing) {
      return existing;
    }
    const lab: LabState = { name, snapshots: [], nodes: new Set<string>() };
    this.labs.push(lab);
    this.labsByName.set(name, lab);
    this.labNames.add(name);
    this.nodeNames.set(name, lab.nodes);
    return lab;
  }
}
