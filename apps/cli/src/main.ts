#!/usr/bin/env node
import { reportUnhandledError, runCli } from './application/cli';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  });
}

main().catch((error) => reportUnhandledError(error));
