/**
 * Errors raised by the GitHub and Gemini services. Each one carries the
 * message shown to the user; `cause` keeps the underlying failure for logs.
 */
export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidUrlError extends AppError {
  constructor(url: string) {
    super(`Invalid GitHub URL "${url}". Format: https://github.com/owner/repo`);
  }
}

export class NotFoundError extends AppError {
  constructor(what: string, options?: { cause?: unknown }) {
    super(`${what} was not found or is not accessible. Check the URL, or provide a token for private repositories.`, options);
  }
}

export class RateLimitError extends AppError {
  readonly resetAt: Date | null;

  constructor(resetAt: Date | null) {
    super(
      resetAt
        ? `GitHub API rate limit exceeded. It resets at ${resetAt.toISOString()}; a personal access token raises the limit.`
        : 'GitHub API rate limit exceeded. A personal access token raises the limit.'
    );
    this.resetAt = resetAt;
  }
}

export class NetworkError extends AppError {
  // HTTP status of the failed response, null when the request never completed
  readonly status: number | null;

  constructor(service: string, options?: { cause?: unknown; status?: number }) {
    super(
      options?.status
        ? `${service} responded with HTTP ${options.status}. Try again later.`
        : `Could not reach ${service}. Check your connection and try again.`,
      options
    );
    this.status = options?.status ?? null;
  }
}

export class ResponseShapeError extends AppError {
  constructor(endpoint: string, options?: { cause?: unknown }) {
    super(`Unexpected response from ${endpoint}.`, options);
  }
}

export class AuthError extends AppError {
  constructor(options?: { cause?: unknown }) {
    super('The Gemini API key is missing or invalid. Set GEMINI_API_KEY and restart the app.', options);
  }
}

export class QuotaError extends AppError {
  constructor(options?: { cause?: unknown }) {
    super('The Gemini API quota is exhausted. Wait a moment before asking again.', options);
  }
}

export class ContextTooLargeError extends AppError {
  readonly size: number | null;

  constructor(size: number | null, options?: { cause?: unknown }) {
    super(
      'The code is too large for the model\'s context window. Select a single file to analyze and ask again.',
      options
    );
    this.size = size;
  }
}

export const describeError = (err: unknown): string => {
  if (err instanceof AppError) return err.message;
  if (err instanceof Error && err.message) return `Error: ${err.message}`;
  return 'Something went wrong. Please try again.';
};
