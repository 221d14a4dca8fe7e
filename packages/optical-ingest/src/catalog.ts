import type { RemoteSession } from './session';

export function quoteShellArgument(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Splits `ls` output the way line readers do: a final terminator does not yield an empty name. */
export function splitListing(output: string): string[] {
  if (output.length === 0) {
    return [];
  }
  const lines = output.split(/\r\n|\n|\r/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export async function listSnapshotFiles(session: RemoteSession, directory: string): Promise<string[]> {
  const { stdout } = await session.execute(`cd ${quoteShellArgument(directory)} && ls`);
  return splitListing(stdout);
}

export async function readSnapshotFile(session: RemoteSession, directory: string, filename: string): Promise<string> {
  const { stdout } = await session.execute(
    `cd ${quoteShellArgument(directory)} && cat ${quoteShellArgument(filename)}`
  );
  return stdout;
}
