export class LoginError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = 'LoginError';
  }
}

export class NavigationError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = 'NavigationError';
  }
}

export class PersistenceError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export class ModelError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = 'ModelError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Faults that end a single query's run without stopping the whole session
export function isQueryFatal(error: unknown): error is LoginError | NavigationError {
  return error instanceof LoginError || error instanceof NavigationError;
}
