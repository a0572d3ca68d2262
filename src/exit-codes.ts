/** Process exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  SERVER_FAILURE: 3,
  IO_FAILURE: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exit(code: number, message?: string): never {
  if (message) process.stderr.write(`${message}\n`);
  process.exit(code);
}
