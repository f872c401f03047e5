#!/usr/bin/env node
import { createProcessDependencies, runCli } from './run';

process.exitCode = await runCli(
  process.argv.slice(2),
  createProcessDependencies(),
);
