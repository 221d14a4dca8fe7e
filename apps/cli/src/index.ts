#!/usr/bin/env node

import { Command } from 'commander';
import { registerIngestCommand, type IngestCommandDependencies } from './commands/ingest';

export function createProgram(dependencies: IngestCommandDependencies = {}): Command {
  const program = new Command();

  program
    .name('fiberwatch')
    .description('Optical signal telemetry ingestion')
    .version('0.1.0');

  registerIngestCommand(program, dependencies);

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
