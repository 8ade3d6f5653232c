/**
 * Process exit codes. Failed transfers of single chart versions do not
 * change the exit code of a completed run.
 *
 * @see https://nodejs.org/api/process.html#process_exit_codes
 */
export const ExitCode = {
	Success: 0,
	FatalError: 1,
	EndpointUnavailable: 2,
	InvalidArgument: 9,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
