// src/services/errors.ts — error taxonomy shared by the core and its adapters

export type RecipeErrorCode =
  | 'EMBEDDING_UNAVAILABLE'
  | 'STORE_UNAVAILABLE'
  | 'SEARCH_UNAVAILABLE'
  | 'FETCH_TIMEOUT'
  | 'FETCH_ERROR'
  | 'PROVIDER_TIMEOUT'
  | 'PROVIDER_ERROR'
  | 'INVALID_QUERY'
  | 'CONFIG_INVALID';

export class RecipeServiceError extends Error {
  readonly code: RecipeErrorCode;

  constructor(code: RecipeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class EmbeddingUnavailableError extends RecipeServiceError {
  constructor(message = 'Embedding provider unavailable', options?: { cause?: unknown }) {
    super('EMBEDDING_UNAVAILABLE', message, options);
  }
}

export class StoreUnavailableError extends RecipeServiceError {
  constructor(message = 'Vector store unavailable', options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', message, options);
  }
}

export class SearchUnavailableError extends RecipeServiceError {
  constructor(message = 'Web search unavailable', options?: { cause?: unknown }) {
    super('SEARCH_UNAVAILABLE', message, options);
  }
}

export class FetchTimeoutError extends RecipeServiceError {
  constructor(url: string, timeoutMs: number) {
    super('FETCH_TIMEOUT', `Fetching ${url} exceeded ${timeoutMs}ms`);
  }
}

export class FetchError extends RecipeServiceError {
  constructor(url: string, reason: string, options?: { cause?: unknown }) {
    super('FETCH_ERROR', `Fetching ${url} failed: ${reason}`, options);
  }
}

export class ProviderTimeoutError extends RecipeServiceError {
  constructor(provider: string, timeoutMs: number) {
    super('PROVIDER_TIMEOUT', `Provider ${provider} exceeded ${timeoutMs}ms`);
  }
}

export class ProviderError extends RecipeServiceError {
  constructor(provider: string, reason: string, options?: { cause?: unknown }) {
    super('PROVIDER_ERROR', `Provider ${provider} failed: ${reason}`, options);
  }
}

export class InvalidQueryError extends RecipeServiceError {
  readonly issues: Array<{ path: string; message: string }>;

  constructor(issues: Array<{ path: string; message: string }>) {
    super('INVALID_QUERY', `Invalid query: ${issues.map((i) => `${i.path || '(root)'} ${i.message}`).join('; ')}`);
    this.issues = issues;
  }
}

export class ConfigInvalidError extends RecipeServiceError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
