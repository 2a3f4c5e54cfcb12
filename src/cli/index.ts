#!/usr/bin/env node
import { env } from '../config/env.js';
import { createServices, type Services } from '../lib/services.js';
import { AppError } from '../lib/errors.js';
import { runCli } from './program.js';

function main(): number {
  const io = {
    stdout: (text: string) => process.stdout.write(`${text}\n`),
    stderr: (text: string) => process.stderr.write(`${text}\n`),
  };

  let services: Services;
  try {
    services = createServices();
  } catch (error) {
    if (error instanceof AppError) {
      io.stderr(`Error: ${error.message}`);
      for (const detail of error.details ?? []) {
        io.stderr(`  ${detail.field}: ${detail.message}`);
      }
      return error.exitCode;
    }
    throw error;
  }

  return runCli(process.argv.slice(2), { services, io, showDisclaimer: env.SHOW_DISCLAIMER });
}

process.exitCode = main();
