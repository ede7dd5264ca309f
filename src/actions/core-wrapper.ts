/**
 * Wrapper module for the GitHub Actions core library.
 * All terminal output of the image finder goes through here: results on standard output,
 * diagnostics on standard error so that piped output stays parseable.
 */
import * as core from '@actions/core';
import * as os from 'os';

function writeDiagnostic(severity: string, message: string): void {
  process.stderr.write(`${severity}: ${message}${os.EOL}`);
}

/**
 * Writes a line to standard output.
 *
 * @param message - Message to log at info level
 */
export function info(message: string): void {
  core.info(message);
}

/**
 * Writes a warning line to standard error.
 *
 * @param message - Message to log at warning level
 */
export function warning(message: string): void {
  writeDiagnostic('Warning', message);
}

/**
 * Writes a debug line to standard error.
 * Only emitted when debug logging is enabled (`RUNNER_DEBUG=1`).
 *
 * @param message - Message to log at debug level
 */
export function debug(message: string): void {
  if (core.isDebug()) {
    writeDiagnostic('Debug', message);
  }
}

/**
 * Reports a fatal error on standard error and sets the process exit code to 1.
 *
 * @param message - Error message
 */
export function setFailed(message: string): void {
  writeDiagnostic('Error', message);
  process.exitCode = core.ExitCode.Failure;
}
