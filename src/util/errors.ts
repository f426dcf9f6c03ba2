// Errors whose message can be shown to a player as-is.
export class UserError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UserError';
  }
}

export class SettingsError extends UserError {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}

export function userMessage(err: unknown): string {
  return err instanceof UserError ? err.message : 'Something went wrong. Try again.';
}
