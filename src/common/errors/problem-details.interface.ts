/**
 * RFC 7807 Problem Details body returned for every error response.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc7807
 */
export interface ProblemDetails {
  /** Machine-readable problem type, e.g. "VALIDATION_ERROR", "UPSTREAM_PROVIDER_ERROR". */
  type: string;
  /** Short human-readable summary of the problem type. */
  title: string;
  status: number;
  /** Explanation specific to this occurrence. */
  detail: string;
  /** Request path the problem occurred on. */
  instance?: string;
}

export interface ValidationProblemDetails extends ProblemDetails {
  errors: FieldError[];
}

/**
 * Field-level validation error. Nested fields use dot notation,
 * e.g. "originLocation.latitude".
 */
export interface FieldError {
  field: string;
  code?: string;
  message: string;
}
