import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ConnectionError, TransportError } from '../src/errors';
import { runIngestion, type IngestRunOptions } from '../src/pipeline';
import type { CommandOutput } from '../src/session';
import type { IngestPhase } from '../src/types';
import { FakeRemoteSession, aliasExpansionDocument, nodeEntry, snapshotFile, type FakeFile } from './helpers';

const DIRECTORY = '/data/optical';

function run(session: FakeRemoteSession, overrides: Partial<IngestRunOptions> = {}) {
  return runIngestion({
    connector: async () => session,
    directory: DIRECTORY,
    sleep: async () => undefined,
    ...overrides
  });
}

function numberedFiles(count: number): Array<[string, FakeFile]> {
  return Array.from({ length: count }, (_, index): [string, FakeFile] => [
    `snapshot-${index}.json`,
    snapshotFile(String(1700000000 + index * 900), { [`lab-${index % 2}`]: [nodeEntry(`node-${index}`, index)] })
  ]);
}

test('merges well-formed files and skips empty and malformed ones', async () => {
  const sleeps: number[] = [];
  const session = new FakeRemoteSession([
    ['a.json', snapshotFile('1700000000', { 'lab-1': [nodeEntry('node-a', 10)] })],
    ['b.json', '   \n'],
    ['c.json', '{"1700000900": [{"lab-1": '],
    ['d.json', snapshotFile('1700001800', { 'lab-1': [nodeEntry('node-b', 20)], 'lab-2': [nodeEntry('node-c', 30)] })]
  ]);

  const { model, summary } = await run(session, { sleep: async (ms) => void sleeps.push(ms) });

  assert.deepEqual(
    model.labs.map((lab) => [lab.name, lab.snapshots.map((snapshot) => snapshot.epochSeconds)]),
    [
      ['lab-1', [1700000000, 1700001800]],
      ['lab-2', [1700001800]]
    ]
  );
  assert.deepEqual([...model.labNames], ['lab-1', 'lab-2']);
  assert.deepEqual([...(model.nodeNames.get('lab-1') ?? [])], ['node-a', 'node-b']);
  assert.equal(summary.filesListed, 4);
  assert.equal(summary.filesFetched, 4);
  assert.equal(summary.filesMerged, 2);
  assert.equal(summary.filesEmpty, 1);
  assert.equal(summary.filesFailed, 1);
  assert.equal(summary.snapshotsMerged, 3);
  assert.equal(summary.stopReason, 'completed');
  assert.equal(summary.directory, DIRECTORY);
  assert.deepEqual(sleeps, [1500, 1500, 1500, 1500]);
  assert.equal(session.closeCalls, 1);
});

test('skips a file with expanding aliases and keeps ingesting', async () => {
  const session = new FakeRemoteSession([
    ['a.json', aliasExpansionDocument()],
    ['b.json', snapshotFile('1700000000', { 'lab-1': [nodeEntry('node-a', 10)] })]
  ]);

  const { model, summary } = await run(session);

  assert.equal(summary.stopReason, 'completed');
  assert.equal(summary.filesFailed, 1);
  assert.equal(summary.filesMerged, 1);
  assert.deepEqual(
    model.labs.map((lab) => lab.name),
    ['lab-1']
  );
  assert.equal(session.closeCalls, 1);
});

test('stops at the file ceiling with the model of the first files', async () => {
  const files = numberedFiles(8);
  const limited = new FakeRemoteSession(files);
  const reference = new FakeRemoteSession(files.slice(0, 3));

  const limitedRun = await run(limited, { maxFiles: 3 });
  const referenceRun = await run(reference);

  assert.deepEqual(limited.fetchedFiles, ['snapshot-0.json', 'snapshot-1.json', 'snapshot-2.json']);
  assert.equal(limitedRun.summary.stopReason, 'file-limit');
  assert.equal(limitedRun.summary.filesFetched, 3);
  assert.deepEqual(limitedRun.model, referenceRun.model);
  assert.equal(limited.closeCalls, 1);
});

test('completes normally when the listing matches the ceiling exactly', async () => {
  const session = new FakeRemoteSession(numberedFiles(3));

  const { summary } = await run(session, { maxFiles: 3 });

  assert.equal(summary.stopReason, 'completed');
  assert.equal(summary.filesFetched, 3);
});

test('returns the partial model when a fetch fails at the transport level', async () => {
  const files = numberedFiles(4);
  files[2] = ['snapshot-2.json', new TransportError("cd '/data/optical' && cat 'snapshot-2.json'", 'Channel open failure')];
  const session = new FakeRemoteSession(files);

  const { model, summary } = await run(session);

  assert.deepEqual(session.fetchedFiles, ['snapshot-0.json', 'snapshot-1.json', 'snapshot-2.json']);
  assert.equal(summary.stopReason, 'transport-error');
  assert.equal(summary.filesFetched, 2);
  assert.equal(summary.filesMerged, 2);
  assert.deepEqual(
    model.labs.map((lab) => lab.name),
    ['lab-0', 'lab-1']
  );
  assert.equal(session.closeCalls, 1);
});

test('returns an empty model when the listing fails at the transport level', async () => {
  const session = new FakeRemoteSession(numberedFiles(2), {
    listingError: new TransportError("cd '/data/optical' && ls", 'Channel open failure')
  });

  const { model, summary } = await run(session);

  assert.equal(summary.stopReason, 'transport-error');
  assert.equal(summary.filesListed, 0);
  assert.equal(model.labs.length, 0);
  assert.equal(session.closeCalls, 1);
});

test('an empty listing finishes without fetching anything', async () => {
  const session = new FakeRemoteSession([], { listing: '' });

  const { model, summary } = await run(session);

  assert.equal(summary.stopReason, 'completed');
  assert.equal(summary.filesFetched, 0);
  assert.equal(model.labs.length, 0);
  assert.deepEqual(session.commands, ["cd '/data/optical' && ls"]);
});

test('propagates connection failures without entering the closed phase', async () => {
  const phases: IngestPhase[] = [];

  await assert.rejects(
    runIngestion({
      connector: async () => {
        throw new ConnectionError('monitor.example.test', 'Connection to collector@monitor.example.test failed');
      },
      directory: DIRECTORY,
      onPhase: (phase) => phases.push(phase)
    }),
    ConnectionError
  );
  assert.deepEqual(phases, ['connecting']);
});

test('reports each phase of a run in order', async () => {
  const phases: IngestPhase[] = [];
  const session = new FakeRemoteSession(numberedFiles(1));

  await run(session, { onPhase: (phase) => phases.push(phase) });

  assert.deepEqual(phases, ['connecting', 'listing', 'fetching', 'parsing', 'merging', 'closed']);
});

class FailingSession extends FakeRemoteSession {
  async execute(command: string): Promise<CommandOutput> {
    if (command.includes('&& cat')) {
      throw new Error('unexpected failure');
    }
    return super.execute(command);
  }
}

test('closes the session before rethrowing unexpected errors', async () => {
  const session = new FailingSession(numberedFiles(2));

  await assert.rejects(run(session), /unexpected failure/);
  assert.equal(session.closeCalls, 1);
});
