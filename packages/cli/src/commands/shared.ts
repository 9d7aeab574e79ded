import { InvalidArgumentError } from 'commander';

/**
 * Options declared on the root program
 */
export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
};

export type Output = {
  log(line: string): void;
  error(line: string): void;
};

export const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line)
};

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}
