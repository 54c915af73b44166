import { test, expect, describe, beforeEach, afterEach, vi } from 'vitest';
import {
  ErrorBoundary,
  ErrorCategory,
  ErrorSeverity,
  FileSystemError,
  ConfigurationError,
  TerminalError,
  globalErrorBoundary,
  createErrorContext,
  isCLIError
} from './error-boundary';
import type { CLIError } from './error-boundary';

async function captureError(run: () => Promise<unknown>): Promise<CLIError> {
  try {
    await run();
  } catch (error) {
    if (isCLIError(error)) return error;
    throw error;
  }
  throw new Error('expected the command to fail');
}

describe('ErrorBoundary', () => {
  let errorBoundary: ErrorBoundary;
  let consoleOutput: string[] = [];

  beforeEach(() => {
    errorBoundary = new ErrorBoundary();
    consoleOutput = [];

    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      consoleOutput.push(args.join(' '));
    });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Error Categorization', () => {
    test('should categorize file system errors correctly', async () => {
      const cliError = await captureError(() =>
        errorBoundary.executeCommand('test', () => {
          throw new Error('ENOENT: no such file or directory');
        })
      );

      expect(cliError.category).toBe(ErrorCategory.FILE_SYSTEM);
      expect(cliError.severity).toBe(ErrorSeverity.MEDIUM);
      expect(cliError.recoverySuggestions.length).toBeGreaterThan(0);
    });

    test('should categorize FileSystemError by name', async () => {
      const cliError = await captureError(() =>
        errorBoundary.executeCommand('test', () => {
          throw new FileSystemError('Root missing', '/tmp/x');
        })
      );

      expect(cliError.category).toBe(ErrorCategory.FILE_SYSTEM);
      expect(cliError.originalError).toBeInstanceOf(FileSystemError);
    });

    test('should categorize permission errors correctly', async () => {
      const cliError = await captureError(() =>
        errorBoundary.executeCommand('test', () => {
          throw new Error('EACCES: permission denied');
        })
      );

      expect(cliError.category).toBe(ErrorCategory.PERMISSION);
      expect(cliError.severity).toBe(ErrorSeverity.HIGH);
    });

    test('should categorize configuration errors correctly', async () => {
      const cliError = await captureError(() =>
        errorBoundary.executeCommand('test', () => {
          throw new ConfigurationError('Invalid configuration: bad');
        })
      );

      expect(cliError.category).toBe(ErrorCategory.CONFIGURATION);
      expect(cliError.recoverySuggestions.some(s => s.command === 'splitview config --show')).toBe(true);
    });

    test('should categorize raw mode failures as terminal errors', async () => {
      const cliError = await captureError(() =>
        errorBoundary.executeCommand('test', () => {
          throw new Error('Raw mode is not supported on the current process.stdin');
        })
      );

      expect(cliError.category).toBe(ErrorCategory.TERMINAL);
      expect(cliError.severity).toBe(ErrorSeverity.HIGH);
      expect(cliError.exitCode).toBe(3);
    });

    test('should categorize TerminalError by name', () => {
      const cliError = errorBoundary.normalizeError(new TerminalError('no tty'), 'test');
      expect(cliError.category).toBe(ErrorCategory.TERMINAL);
    });

    test('should prefer the error name over message patterns', () => {
      const underConfig = errorBoundary.normalizeError(
        new FileSystemError('Root directory not found: /home/u/.config/ioccc', '/home/u/.config/ioccc'),
        'view'
      );
      expect(underConfig.category).toBe(ErrorCategory.FILE_SYSTEM);
      expect(underConfig.exitCode).toBe(2);

      const underDenied = errorBoundary.normalizeError(
        new FileSystemError('Root directory not found: /srv/access-denied'),
        'view'
      );
      expect(underDenied.category).toBe(ErrorCategory.FILE_SYSTEM);
      expect(underDenied.exitCode).toBe(2);

      const configNamingAFile = errorBoundary.normalizeError(
        new ConfigurationError('Invalid configuration: file is not valid JSON'),
        'view'
      );
      expect(configNamingAFile.category).toBe(ErrorCategory.CONFIGURATION);
    });

    test('should categorize validation errors correctly', async () => {
      const cliError = await captureError(() =>
        errorBoundary.executeCommand('test', () => {
          throw new Error('Invalid input format');
        })
      );

      expect(cliError.category).toBe(ErrorCategory.VALIDATION);
      expect(cliError.severity).toBe(ErrorSeverity.LOW);
      expect(cliError.exitCode).toBe(1);
    });

    test('should categorize unknown errors correctly', async () => {
      const cliError = await captureError(() =>
        errorBoundary.executeCommand('test', () => {
          throw new Error('Something unexpected happened');
        })
      );

      expect(cliError.category).toBe(ErrorCategory.UNKNOWN);
      expect(cliError.severity).toBe(ErrorSeverity.MEDIUM);
      expect(cliError.exitCode).toBe(2);
    });

    test('should handle non-Error objects', async () => {
      const cliError = await captureError(() =>
        errorBoundary.executeCommand('test', () => {
          throw 'String error';
        })
      );

      expect(cliError.category).toBe(ErrorCategory.UNKNOWN);
      expect(cliError.message).toBe('String error');
    });

    test('should pass CLIErrors through unchanged', () => {
      const first = errorBoundary.normalizeError(new Error('EPERM'), 'inner');
      expect(errorBoundary.normalizeError(first, 'outer')).toBe(first);
    });
  });

  describe('Context Handling', () => {
    test('should include context in error', async () => {
      const context = createErrorContext('test-command', 'test-operation', '/test/path', { extra: 'info' });

      const cliError = await captureError(() =>
        errorBoundary.executeCommand('test-command', () => {
          throw new Error('Test error');
        }, context)
      );

      expect(cliError.context).toEqual(context);
    });

    test('should display the error and its context', async () => {
      const context = createErrorContext('test-command', 'test-operation', '/test/path');

      await captureError(() =>
        errorBoundary.executeCommand('test-command', () => {
          throw new Error('Test error');
        }, context)
      );

      expect(consoleOutput[0]).toBe('❌ Unknown Error: Test error');
      expect(consoleOutput).toContain('\n📍 Context:');
      expect(consoleOutput).toContain('   command: test-command');
      expect(consoleOutput).toContain('   operation: test-operation');
      expect(consoleOutput).toContain('   filePath: /test/path');
    });
  });

  describe('Debug Mode', () => {
    test('should show debug information when enabled', async () => {
      errorBoundary.setDebugMode(true);

      await captureError(() =>
        errorBoundary.executeCommand('test', () => {
          throw new Error('Original error message');
        })
      );

      expect(consoleOutput).toContain('\n🔍 Debug information:');
      expect(consoleOutput).toContain('   Error type: Error');
    });

    test('should not show debug information when disabled', async () => {
      await captureError(() =>
        errorBoundary.executeCommand('test', () => {
          throw new Error('Original error message');
        })
      );

      expect(consoleOutput).not.toContain('\n🔍 Debug information:');
    });
  });

  test('should handle synchronous commands', () => {
    let caught: unknown;
    try {
      errorBoundary.executeCommandSync('test', () => {
        throw new Error('Sync error');
      });
    } catch (error) {
      caught = error;
    }

    expect(isCLIError(caught)).toBe(true);
    expect(isCLIError(caught) && caught.message).toBe('Sync error');
  });

  test('should return the result when the command succeeds', async () => {
    expect(await errorBoundary.executeCommand('test', async () => 42)).toBe(42);
    expect(errorBoundary.executeCommandSync('test', () => 'ok')).toBe('ok');
    expect(consoleOutput).toEqual([]);
  });

  test('should call custom error handlers', async () => {
    const handler = vi.fn();
    errorBoundary.registerErrorHandler(ErrorCategory.FILE_SYSTEM, handler);

    await captureError(() =>
      errorBoundary.executeCommand('test', () => {
        throw new FileSystemError('Root directory not found: assets');
      })
    );

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[0].category).toBe(ErrorCategory.FILE_SYSTEM);
  });
});

describe('Utility Functions', () => {
  test('should create error context correctly', () => {
    const context = createErrorContext('test-command', 'test-op', '/test/file', { key: 'value' });

    expect(context.command).toBe('test-command');
    expect(context.operation).toBe('test-op');
    expect(context.filePath).toBe('/test/file');
    expect(context.additionalInfo).toEqual({ key: 'value' });
  });

  test('should provide global error boundary instance', () => {
    expect(globalErrorBoundary).toBeInstanceOf(ErrorBoundary);
  });
});
