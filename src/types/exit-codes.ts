/**
 * Standard exit codes for the CLI
 */
export const ExitCode = {
  SUCCESS: 0,
  /** Unexpected/unhandled error */
  UNEXPECTED_ERROR: 1,
  /** Invalid CLI usage */
  USAGE_ERROR: 2,
  /** Unknown project or invalid configuration */
  CONFIG_ERROR: 3,
  /** A one-shot run stopped on a Manager question */
  INPUT_REQUIRED: 4,
  /** The session ended with the engine in ERROR */
  ENGINE_ERROR: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return 'Successful execution';
    case ExitCode.UNEXPECTED_ERROR:
      return 'Unexpected or unhandled error';
    case ExitCode.USAGE_ERROR:
      return 'Invalid CLI usage';
    case ExitCode.CONFIG_ERROR:
      return 'Unknown project or invalid configuration';
    case ExitCode.INPUT_REQUIRED:
      return 'The Manager is waiting for user input';
    case ExitCode.ENGINE_ERROR:
      return 'Session ended with the engine in an error state';
  }
}
