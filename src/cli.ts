#!/usr/bin/env node
import { readFile, writeFile } from 'fs/promises';
import { CliIO, createProgram } from './commands';
import { loadConfig } from './config';
import { isNotebookError } from './errors';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Local files, with `-` or no path meaning the standard streams
 */
export const nodeIO: CliIO = {
  async readText(path) {
    return path === undefined || path === '-' ? readStdin() : readFile(path, 'utf8');
  },
  async writeText(text, path) {
    if (path === undefined || path === '-') {
      process.stdout.write(text);
      return;
    }
    await writeFile(path, text, 'utf8');
  },
};

function reportError(error: unknown): void {
  if (isNotebookError(error)) {
    console.error(`error: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
}

if (require.main === module) {
  createProgram(nodeIO, loadConfig()).parseAsync(process.argv).catch(reportError);
}
