import type { Logger } from 'pino';
import { listSnapshotFiles, readSnapshotFile } from './catalog';
import { ParseError, TransportError } from './errors';
import { createSilentLogger } from './logger';
import { IngestModelBuilder } from './model';
import { parseSnapshotFile } from './parser';
import { withRemoteSession, type RemoteSession, type SessionConnector } from './session';
import { Throttle, type SleepFunction } from './throttle';
import type { IngestPhase, IngestRunResult, IngestRunSummary, IngestStopReason, ParsedSnapshotFile } from './types';

export interface IngestRunOptions {
  connector: SessionConnector;
  directory: string;
  fetchDelayMs?: number;
  maxFiles?: number;
  sleep?: SleepFunction;
  logger?: Logger;
  onPhase?: (phase: IngestPhase) => void;
}

type RunCounters = Omit<IngestRunSummary, 'directory' | 'stopReason' | 'startedAt' | 'finishedAt' | 'elapsedMs'>;

export async function runIngestion(options: IngestRunOptions): Promise<IngestRunResult> {
  const logger = options.logger ?? createSilentLogger();
  const { directory } = options;
  const throttle = new Throttle({ delayMs: options.fetchDelayMs, maxFiles: options.maxFiles, sleep: options.sleep });
  const builder = new IngestModelBuilder();
  const counters: RunCounters = {
    filesListed: 0,
    filesFetched: 0,
    filesMerged: 0,
    filesEmpty: 0,
    filesFailed: 0,
    snapshotsMerged: 0
  };
  const startedAt = new Date();

  let phase: IngestPhase = 'idle';
  const enter = (next: IngestPhase) => {
    if (next === phase) {
      return;
    }
    phase = next;
    logger.trace({ phase }, 'Ingestion phase changed');
    options.onPhase?.(next);
  };

  const enumerate = async (session: RemoteSession): Promise<IngestStopReason> => {
    enter('listing');
    let filenames: string[];
    try {
      filenames = await listSnapshotFiles(session, directory);
    } catch (err) {
      if (err instanceof TransportError) {
        logger.warn({ err, directory }, 'Listing snapshot files failed; nothing was ingested');
        return 'transport-error';
      }
      throw err;
    }
    counters.filesListed = filenames.length;
    logger.info({ directory, files: filenames.length }, 'Listed snapshot files');

    for (const filename of filenames) {
      if (!(await throttle.acquire())) {
        logger.info(
          { maxFiles: throttle.maxFiles, remaining: filenames.length - throttle.filesProcessed },
          'File limit reached; stopping enumeration'
        );
        return 'file-limit';
      }

      enter('fetching');
      let content: string;
      try {
        content = await readSnapshotFile(session, directory, filename);
      } catch (err) {
        if (err instanceof TransportError) {
          logger.warn({ err, filename }, 'Fetching snapshot file failed; returning the data collected so far');
          return 'transport-error';
        }
        throw err;
      }
      counters.filesFetched += 1;

      enter('parsing');
      let parsed: ParsedSnapshotFile;
      try {
        parsed = parseSnapshotFile(content);
      } catch (err) {
        if (err instanceof ParseError) {
          counters.filesFailed += 1;
          logger.warn({ err, filename }, 'Skipping malformed snapshot file');
          continue;
        }
        throw err;
      }
      if (parsed.status === 'empty') {
        counters.filesEmpty += 1;
        logger.debug({ filename }, 'Skipping empty snapshot file');
        continue;
      }
      for (const violation of parsed.rangeViolations) {
        logger.debug({ filename, ...violation }, 'Fifteen minute bin range is out of order');
      }

      enter('merging');
      counters.snapshotsMerged += builder.merge(parsed.records);
      counters.filesMerged += 1;
      logger.debug({ filename, snapshots: parsed.records.length }, 'Merged snapshot file');
    }
    return 'completed';
  };

  enter('connecting');
  let connected = false;
  let stopReason: IngestStopReason;
  try {
    stopReason = await withRemoteSession(options.connector, (session) => {
      connected = true;
      return enumerate(session);
    });
  } finally {
    if (connected) {
      enter('closed');
    }
  }

  const finishedAt = new Date();
  const summary: IngestRunSummary = {
    directory,
    ...counters,
    stopReason,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    elapsedMs: finishedAt.getTime() - startedAt.getTime()
  };
  logger.info({ ...summary, labs: builder.labCount }, 'Ingestion finished');

  return { model: builder.build(), summary };
}
