#!/usr/bin/env node
import { envCredentials, playsConfig } from './config';
import { runCli } from './cli';

const start = async () => {
  const exitCode = await runCli(process.argv.slice(2), {
    config: playsConfig,
    credentials: envCredentials,
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
  });
  process.exitCode = exitCode;
};

start().catch((error: unknown) => {
  process.stderr.write(`Unexpected failure: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
  process.exitCode = 1;
});
