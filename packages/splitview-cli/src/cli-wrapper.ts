/**
 * CLI Command Wrapper with Error Boundary
 * Runs commands through the core error boundary and turns failures into
 * exit codes
 */

import { createErrorContext, globalErrorBoundary, isCLIError } from 'splitview-core';

const cliErrorBoundary = globalErrorBoundary;

// Exit code for errors that escape every boundary
const CRITICAL_EXIT_CODE = 4;

export interface CommandContext {
  operation?: string;
  filePath?: string;
  additionalInfo?: Record<string, unknown>;
}

export type ExitFn = (code: number) => never;

function exitCodeOf(error: unknown): number {
  return isCLIError(error) ? error.exitCode : CRITICAL_EXIT_CODE;
}

/**
 * Execute a CLI command with error handling; failures are reported and the
 * process exits with the error's code
 */
export async function executeCLICommand<T>(
  commandName: string,
  operation: () => Promise<T>,
  context?: CommandContext,
  exit: ExitFn = process.exit
): Promise<T> {
  const errorContext = createErrorContext(
    commandName,
    context?.operation,
    context?.filePath,
    context?.additionalInfo
  );

  try {
    return await cliErrorBoundary.executeCommand(commandName, operation, errorContext);
  } catch (error) {
    return exit(exitCodeOf(error));
  }
}

/**
 * Execute a synchronous CLI command with error handling
 */
export function executeCLICommandSync<T>(
  commandName: string,
  operation: () => T,
  context?: CommandContext,
  exit: ExitFn = process.exit
): T {
  const errorContext = createErrorContext(
    commandName,
    context?.operation,
    context?.filePath,
    context?.additionalInfo
  );

  try {
    return cliErrorBoundary.executeCommandSync(commandName, operation, errorContext);
  } catch (error) {
    return exit(exitCodeOf(error));
  }
}

/**
 * Handle uncaught exceptions and unhandled rejections
 */
export function setupGlobalErrorHandlers(): void {
  process.on('uncaughtException', (error) => {
    console.error('💥 Uncaught Exception:');

    try {
      cliErrorBoundary.handleError(cliErrorBoundary.normalizeError(error, 'global'));
    } catch (handlingError) {
      console.error('💥 Fatal error while handling uncaught exception:', handlingError);
      console.error('Original error:', error);
    }

    process.exit(CRITICAL_EXIT_CODE);
  });

  process.on('unhandledRejection', (reason) => {
    console.error('💥 Unhandled Promise Rejection:');

    try {
      const error = reason instanceof Error ? reason : new Error(String(reason));
      cliErrorBoundary.handleError(cliErrorBoundary.normalizeError(error, 'global'));
    } catch (handlingError) {
      console.error('💥 Fatal error while handling unhandled rejection:', handlingError);
      console.error('Original reason:', reason);
    }

    process.exit(CRITICAL_EXIT_CODE);
  });
}

export function setDebugMode(enabled: boolean): void {
  cliErrorBoundary.setDebugMode(enabled);
}
