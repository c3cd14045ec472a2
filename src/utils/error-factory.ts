// src/utils/error-factory.ts

import {
  CommandError,
  CommandLockedError,
  ExecutionError,
  LockError,
  errorCode,
} from './errors.js';

export interface CommandDiagnostic {
  commandId: string;
  message: string;
  suggestion?: string;
}

export class ErrorFactory {
  /**
   * Normalizes any failure of an invocation into the diagnostic the dispatcher prints.
   */
  static createDiagnostic(error: unknown, commandId: string): CommandDiagnostic {
    const failure = error instanceof CommandError ? error : new ExecutionError(commandId, error);
    const diagnostic: CommandDiagnostic = {
      commandId: failure.commandId,
      message: failure.message,
    };

    const suggestion = this.getSuggestion(failure);
    if (suggestion) {
      diagnostic.suggestion = suggestion;
    }

    return diagnostic;
  }

  /**
   * Message line, plus an indented hint line when there is one.
   */
  static formatDiagnostic(diagnostic: CommandDiagnostic): string {
    const lines = [diagnostic.message];
    if (diagnostic.suggestion) {
      lines.push(`  Hint: ${diagnostic.suggestion}`);
    }
    return lines.join('\n') + '\n';
  }

  private static getSuggestion(error: CommandError): string | undefined {
    if (error instanceof CommandLockedError) {
      return 'Another instance of this command is running. Try again once it has finished.';
    }

    if (error instanceof LockError) {
      const code = errorCode(error.cause);
      if (code === 'EACCES' || code === 'EPERM') {
        return 'Check write permissions on the lock directory.';
      }
      if (code === 'ENOENT') {
        return 'The lock directory does not exist. Create it or point the lock at another directory.';
      }
      return undefined;
    }

    return undefined;
  }
}
