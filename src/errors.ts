/**
 * Error classes shared by the poller
 */

// ============================================================================
// Custom Error Classes
// ============================================================================

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  details?: string[];

  constructor(message: string, details?: string[]) {
    super(message);
    this.name = "ConfigError";
    this.details = details;
  }
}

export class CatalogError extends Error {
  code = "CATALOG_ERROR" as const;

  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

export class FetchError extends Error {
  code = "FETCH_ERROR" as const;
  status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "FetchError";
    this.status = status;
  }
}

export class PayloadShapeError extends Error {
  code = "PAYLOAD_SHAPE" as const;

  constructor(message: string) {
    super(message);
    this.name = "PayloadShapeError";
  }
}

export class AuthError extends Error {
  code = "AUTH_ERROR" as const;

  constructor(message: string) {
    super(message);
    this.name = "AuthError";
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
