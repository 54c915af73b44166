/**
 * Error Boundary System for CLI Commands
 * Provides standardized error handling, categorization, and recovery suggestions
 */

export enum ErrorCategory {
  FILE_SYSTEM = 'file_system',
  PERMISSION = 'permission',
  CONFIGURATION = 'configuration',
  VALIDATION = 'validation',
  TERMINAL = 'terminal',
  UNKNOWN = 'unknown'
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export interface ErrorContext {
  command?: string;
  operation?: string;
  filePath?: string;
  additionalInfo?: Record<string, unknown>;
}

export interface RecoverySuggestion {
  action: string;
  description: string;
  command?: string;
}

export interface CLIError extends Error {
  category: ErrorCategory;
  severity: ErrorSeverity;
  context?: ErrorContext;
  recoverySuggestions: RecoverySuggestion[];
  exitCode: number;
  originalError?: Error;
}

export class FileSystemError extends Error {
  constructor(message: string, public readonly filePath?: string) {
    super(message);
    this.name = 'FileSystemError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class TerminalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TerminalError';
  }
}

export function isCLIError(value: unknown): value is CLIError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'category' in value &&
    'exitCode' in value &&
    typeof value.exitCode === 'number'
  );
}

const NAMED_CATEGORIES = new Map<string, ErrorCategory>([
  ['TerminalError', ErrorCategory.TERMINAL],
  ['ConfigurationError', ErrorCategory.CONFIGURATION],
  ['PermissionError', ErrorCategory.PERMISSION],
  ['FileSystemError', ErrorCategory.FILE_SYSTEM],
  ['ValidationError', ErrorCategory.VALIDATION]
]);

const CATEGORY_SEVERITY: Record<ErrorCategory, ErrorSeverity> = {
  [ErrorCategory.TERMINAL]: ErrorSeverity.HIGH,
  [ErrorCategory.CONFIGURATION]: ErrorSeverity.MEDIUM,
  [ErrorCategory.PERMISSION]: ErrorSeverity.HIGH,
  [ErrorCategory.FILE_SYSTEM]: ErrorSeverity.MEDIUM,
  [ErrorCategory.VALIDATION]: ErrorSeverity.LOW,
  [ErrorCategory.UNKNOWN]: ErrorSeverity.MEDIUM
};

export class ErrorBoundary {
  private debugMode: boolean = false;
  private errorHandlers: Map<ErrorCategory, (error: CLIError) => void> = new Map();

  constructor(debugMode: boolean = false) {
    this.debugMode = debugMode;
    this.setupDefaultHandlers();
  }

  /**
   * Enable or disable debug mode
   */
  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
  }

  /**
   * Wrap a command execution with error boundary
   */
  async executeCommand<T>(
    command: string,
    operation: () => Promise<T>,
    context?: ErrorContext
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      const cliError = this.normalizeError(error, command, context);
      this.handleError(cliError);
      throw cliError; // Re-throw for caller to handle exit
    }
  }

  /**
   * Wrap a synchronous command execution with error boundary
   */
  executeCommandSync<T>(
    command: string,
    operation: () => T,
    context?: ErrorContext
  ): T {
    try {
      return operation();
    } catch (error) {
      const cliError = this.normalizeError(error, command, context);
      this.handleError(cliError);
      throw cliError;
    }
  }

  /**
   * Normalize any error into a CLIError
   */
  public normalizeError(
    error: unknown,
    command: string,
    context?: ErrorContext
  ): CLIError {
    if (isCLIError(error)) {
      return error;
    }

    const baseContext = { ...context, command };

    if (error instanceof Error) {
      const category = this.categorize(error);
      return this.createCLIError(
        error.message,
        category,
        CATEGORY_SEVERITY[category],
        baseContext,
        error
      );
    }

    // Handle non-Error objects
    const errorMessage = typeof error === 'string' ? error : 'Unknown error occurred';
    return this.createCLIError(
      errorMessage,
      ErrorCategory.UNKNOWN,
      ErrorSeverity.MEDIUM,
      baseContext
    );
  }

  /**
   * Pick a category by error name first; message patterns only decide for
   * errors that carry no known name
   */
  private categorize(error: Error): ErrorCategory {
    const named = NAMED_CATEGORIES.get(error.name);
    if (named) return named;

    if (this.isTerminalError(error)) return ErrorCategory.TERMINAL;
    if (this.isConfigurationError(error)) return ErrorCategory.CONFIGURATION;
    if (this.isPermissionError(error)) return ErrorCategory.PERMISSION;
    if (this.isFileSystemError(error)) return ErrorCategory.FILE_SYSTEM;
    if (this.isValidationError(error)) return ErrorCategory.VALIDATION;
    return ErrorCategory.UNKNOWN;
  }

  /**
   * Create a CLIError with appropriate recovery suggestions
   */
  private createCLIError(
    message: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context?: ErrorContext,
    originalError?: Error
  ): CLIError {
    return {
      name: 'CLIError',
      message,
      category,
      severity,
      context,
      recoverySuggestions: this.generateRecoverySuggestions(category),
      exitCode: this.getExitCode(severity),
      originalError,
      stack: originalError?.stack
    };
  }

  /**
   * Handle an error with appropriate logging and user feedback
   */
  public handleError(error: CLIError): void {
    const handler = this.errorHandlers.get(error.category);
    if (handler) {
      handler(error);
    }

    this.displayError(error);

    if (this.debugMode) {
      this.logErrorDetails(error);
    }
  }

  /**
   * Display error to user in a user-friendly format
   */
  private displayError(error: CLIError): void {
    const icon = this.getErrorIcon(error.severity);
    const categoryLabel = this.getCategoryLabel(error.category);

    console.error(`${icon} ${categoryLabel}: ${error.message}`);

    if (error.recoverySuggestions.length > 0) {
      console.error('\n💡 Recovery suggestions:');
      error.recoverySuggestions.forEach((suggestion, index) => {
        console.error(`   ${index + 1}. ${suggestion.description}`);
        if (suggestion.command) {
          console.error(`      Command: ${suggestion.command}`);
        }
      });
    }

    if (error.context && Object.keys(error.context).length > 0) {
      console.error('\n📍 Context:');
      Object.entries(error.context).forEach(([key, value]) => {
        if (value !== undefined && value !== null) {
          const shown = typeof value === 'object' ? JSON.stringify(value) : String(value);
          console.error(`   ${key}: ${shown}`);
        }
      });
    }

    if (this.debugMode && error.originalError) {
      console.error('\n🔍 Debug information:');
      console.error(`   Error type: ${error.originalError.constructor.name}`);
      if (error.originalError.stack) {
        console.error(`   Stack trace: ${error.originalError.stack.split('\n')[1]?.trim() || 'No stack trace'}`);
      }
    }
  }

  private logErrorDetails(error: CLIError): void {
    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      category: error.category,
      severity: error.severity,
      message: error.message,
      context: error.context,
      originalError: error.originalError ? {
        name: error.originalError.name,
        message: error.originalError.message,
        stack: error.originalError.stack
      } : null
    };

    console.error(`[DEBUG] ${timestamp}: ${JSON.stringify(logEntry, null, 2)}`);
  }

  /**
   * Generate recovery suggestions based on error category
   */
  private generateRecoverySuggestions(category: ErrorCategory): RecoverySuggestion[] {
    switch (category) {
      case ErrorCategory.FILE_SYSTEM:
        return [
          {
            action: 'check_path',
            description: 'Verify the directory exists and is readable',
            command: 'ls -la <root>'
          },
          {
            action: 'pass_root',
            description: 'Pass the directory to browse explicitly',
            command: 'splitview ./path/to/directory'
          }
        ];

      case ErrorCategory.PERMISSION:
        return [
          {
            action: 'check_permissions',
            description: 'Check file/directory permissions',
            command: 'ls -la'
          }
        ];

      case ErrorCategory.CONFIGURATION:
        return [
          {
            action: 'check_config',
            description: 'Verify your configuration file exists and is valid',
            command: 'splitview config --show'
          },
          {
            action: 'locate_config',
            description: 'Find the configuration file to edit or remove it',
            command: 'splitview config --path'
          }
        ];

      case ErrorCategory.VALIDATION:
        return [
          {
            action: 'check_input',
            description: 'Verify your input parameters are correct',
            command: 'splitview --help'
          }
        ];

      case ErrorCategory.TERMINAL:
        return [
          {
            action: 'use_tty',
            description: 'Run the viewer from an interactive terminal, not through a pipe'
          },
          {
            action: 'check_term',
            description: 'Check that TERM is set to a terminal type that supports raw mode',
            command: 'echo $TERM'
          }
        ];

      default:
        return [
          {
            action: 'enable_debug',
            description: 'Re-run with debug logging and check the log file',
            command: 'splitview --debug'
          },
          {
            action: 'get_help',
            description: 'Get help or report the issue',
            command: 'splitview --help'
          }
        ];
    }
  }

  /**
   * Get appropriate exit code based on error severity
   */
  private getExitCode(severity: ErrorSeverity): number {
    switch (severity) {
      case ErrorSeverity.LOW:
        return 1;
      case ErrorSeverity.MEDIUM:
        return 2;
      case ErrorSeverity.HIGH:
        return 3;
      case ErrorSeverity.CRITICAL:
        return 4;
      default:
        return 1;
    }
  }

  private getErrorIcon(severity: ErrorSeverity): string {
    switch (severity) {
      case ErrorSeverity.LOW:
        return '⚠️';
      case ErrorSeverity.MEDIUM:
        return '❌';
      case ErrorSeverity.HIGH:
        return '🚨';
      case ErrorSeverity.CRITICAL:
        return '💥';
      default:
        return '❌';
    }
  }

  private getCategoryLabel(category: ErrorCategory): string {
    switch (category) {
      case ErrorCategory.FILE_SYSTEM:
        return 'File System Error';
      case ErrorCategory.PERMISSION:
        return 'Permission Error';
      case ErrorCategory.CONFIGURATION:
        return 'Configuration Error';
      case ErrorCategory.VALIDATION:
        return 'Validation Error';
      case ErrorCategory.TERMINAL:
        return 'Terminal Error';
      default:
        return 'Unknown Error';
    }
  }

  /**
   * Error type detection methods
   */
  private isTerminalError(error: Error): boolean {
    return (
      error.message.includes('Raw mode is not supported') ||
      error.message.includes('not a TTY')
    );
  }

  private isPermissionError(error: Error): boolean {
    return (
      error.message.includes('permission') ||
      error.message.includes('denied') ||
      error.message.includes('EACCES') ||
      error.message.includes('EPERM')
    );
  }

  private isFileSystemError(error: Error): boolean {
    return (
      error.message.includes('file') ||
      error.message.includes('directory') ||
      error.message.includes('ENOENT') ||
      error.message.includes('EISDIR') ||
      error.message.includes('ENOTDIR') ||
      error.message.includes('no such file')
    );
  }

  private isConfigurationError(error: Error): boolean {
    return (
      error.message.includes('config') ||
      error.message.includes('configuration') ||
      error.message.includes('settings')
    );
  }

  private isValidationError(error: Error): boolean {
    return (
      error.message.includes('invalid') ||
      error.message.includes('required') ||
      error.message.includes('format') ||
      error.message.includes('schema') ||
      error.message.includes('validation')
    );
  }

  /**
   * Setup default error handlers for each category
   */
  private setupDefaultHandlers(): void {
    this.errorHandlers.set(ErrorCategory.TERMINAL, () => {
      console.warn('Terminal error detected - the viewer needs an interactive terminal');
    });

    this.errorHandlers.set(ErrorCategory.PERMISSION, () => {
      console.warn('Permission error detected - check file and directory permissions');
    });
  }

  /**
   * Register a custom error handler for a specific category
   */
  registerErrorHandler(category: ErrorCategory, handler: (error: CLIError) => void): void {
    this.errorHandlers.set(category, handler);
  }
}

/**
 * Global error boundary instance
 */
export const globalErrorBoundary = new ErrorBoundary();

/**
 * Utility function to create error context
 */
export function createErrorContext(
  command: string,
  operation?: string,
  filePath?: string,
  additionalInfo?: Record<string, unknown>
): ErrorContext {
  return {
    command,
    operation,
    filePath,
    additionalInfo
  };
}
