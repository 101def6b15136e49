import { HttpFailure } from '../transport/http-transport.js';
import { ApiError, NotFoundError } from './categories.js';

/**
 * Extracts the server's error strings from a failure body.
 *
 * Returns the `errors` list when the body has one, otherwise a JSON dump of
 * the body as a single entry. An empty or non-JSON body yields `undefined`.
 */
function bodyErrors(body: string): { errors: string[]; text: string } | undefined {
  if (body.trim() === '') {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }

  if (typeof parsed === 'object' && parsed !== null && 'errors' in parsed && Array.isArray(parsed.errors)) {
    const errors = parsed.errors.map((entry: unknown) => String(entry));
    return { errors, text: errors.join(', ') };
  }
  return { errors: [], text: JSON.stringify(parsed) };
}

/**
 * Inspects a raised failure and returns a classified API error when it is an
 * HTTP failure the client understands: one carrying an explicit error object,
 * or a status of 400 or above. Anything else is returned unchanged.
 */
export function classifyError(failure: unknown): unknown {
  if (!(failure instanceof HttpFailure)) {
    return failure;
  }
  if (!failure.error && failure.status < 400) {
    return failure;
  }

  let errors: string[];
  let text: string;
  if (failure.error) {
    errors = [failure.error.message];
    text = failure.error.message;
  } else {
    const parsed = bodyErrors(failure.body);
    errors = parsed?.errors ?? [];
    text = parsed?.text || `HTTP ${failure.status}`;
  }

  const options = {
    message: `Vault API server errors: ${text}`,
    errors,
    cause: failure,
  };
  if (failure.status === 404) {
    return new NotFoundError(options);
  }
  return new ApiError({ ...options, status: failure.status });
}
