#!/usr/bin/env node
import { runCli } from './cli';

async function main() {
  process.exitCode = await runCli(process.argv);
}

void main();
