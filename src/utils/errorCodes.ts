export const errorCodes = {
  DAEMON_UNAVAILABLE: 'DAEMON_UNAVAILABLE',
  NO_CONNECTIVITY: 'NO_CONNECTIVITY',
  MISSING_HOME_REFERENCE: 'MISSING_HOME_REFERENCE',
  INVALID_HOME_REFERENCE: 'INVALID_HOME_REFERENCE',
  NO_CANDIDATE_RELAYS: 'NO_CANDIDATE_RELAYS',
  COMMAND_FAILED: 'COMMAND_FAILED',
  CONNECTION_TIMEOUT: 'CONNECTION_TIMEOUT',
} as const;

export type ErrorCode = keyof typeof errorCodes;

export const errorMessages: Record<ErrorCode, string> = {
  [errorCodes.DAEMON_UNAVAILABLE]: 'Mullvad daemon not running',
  [errorCodes.NO_CONNECTIVITY]: 'No internet connection',
  [errorCodes.MISSING_HOME_REFERENCE]: 'Home location not set up',
  [errorCodes.INVALID_HOME_REFERENCE]: 'Home location file is malformed',
  [errorCodes.NO_CANDIDATE_RELAYS]: 'No relays found for country',
  [errorCodes.COMMAND_FAILED]: 'Mullvad command failed',
  [errorCodes.CONNECTION_TIMEOUT]: 'Connection timed out',
};

/**
 * Fatal error of a single invocation. `code` is stable and safe to match on,
 * `message` is what the user sees and defaults to the message of the code.
 */
export class RelayCycleError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? errorMessages[code], options);
    this.name = 'RelayCycleError';
    this.code = code;
  }
}

export const isRelayCycleError = (error: unknown): error is RelayCycleError =>
  error instanceof RelayCycleError;
