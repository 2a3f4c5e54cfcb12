import type { Services } from '../lib/services.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliContext {
  services: Services;
  io: CliIO;
  showDisclaimer: boolean;
}

export interface Command {
  name: string;
  summary: string;
  /** Option lines shown by `<command> --help`. */
  usage: string[];
  /** Returns the process exit code. */
  run(args: string[], ctx: CliContext): number;
}
