import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
  flattenModel,
  summarizeLabs,
  type IngestModel,
  type IngestRunResult,
  type IngestRunSummary,
  type LabSummary
} from '@fiberwatch/optical-ingest';

export interface IngestReport {
  summary: IngestRunSummary;
  labs: LabSummary[];
}

const STOP_REASON_LABELS: Record<IngestRunSummary['stopReason'], string> = {
  completed: 'all listed files processed',
  'file-limit': 'file limit reached',
  'transport-error': 'remote session failed'
};

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function buildReport(result: IngestRunResult): IngestReport {
  return { summary: result.summary, labs: summarizeLabs(result.model) };
}

export function formatReport(report: IngestReport): string[] {
  const { summary } = report;
  const lines = [
    `Ingested ${plural(summary.snapshotsMerged, 'snapshot')} from ${plural(summary.filesMerged, 'file')} in ${summary.directory} (${STOP_REASON_LABELS[summary.stopReason]})`,
    `Files: ${summary.filesListed} listed, ${summary.filesFetched} fetched, ${summary.filesEmpty} empty, ${summary.filesFailed} malformed`,
    `Elapsed: ${(summary.elapsedMs / 1000).toFixed(1)}s`
  ];
  if (report.labs.length === 0) {
    lines.push('No lab data collected.');
    return lines;
  }
  for (const lab of report.labs) {
    const nodes = lab.nodes.length > 0 ? lab.nodes.join(', ') : 'none';
    lines.push(`  ${lab.lab}: ${plural(lab.snapshots, 'snapshot')}, ${plural(lab.readings, 'reading')}; nodes: ${nodes}`);
  }
  return lines;
}

/** Writes one JSON object per line; returns the number of rows written. */
export async function writeRowsFile(filePath: string, model: IngestModel): Promise<number> {
  const rows = flattenModel(model);
  const body = rows.map((row) => `${JSON.stringify(row)}\n`).join('');
  await writeFile(path.resolve(process.cwd(), filePath), body, 'utf8');
  return rows.length;
}
