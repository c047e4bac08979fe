/**
 * Machine-readable failure kinds for the estimation pipeline.
 * None of these abort an estimation; they mark a single approach (or the
 * whole aggregate) as unable to produce a price.
 */
export enum EstimationErrorKind {
  INPUT_MISSING = 'input_missing',
  GEOCODING_FAILURE = 'geocoding_failure',
  UPSTREAM_UNAVAILABLE = 'upstream_unavailable',
  INSUFFICIENT_DATA = 'insufficient_data',
  AGGREGATION_EMPTY = 'aggregation_empty'
}

export interface EstimationError {
  kind: EstimationErrorKind;
  message: string;
}

export function estimationError(kind: EstimationErrorKind, message: string): EstimationError {
  return { kind, message };
}

// Upstream (market data API) failures. Caught inside MarketDataSource and
// replaced by fallback values.
export class UpstreamUnavailableError extends Error {
  constructor(public readonly operation: string, message: string) {
    super(message);
    this.name = 'UpstreamUnavailableError';
  }
}

// Dispatch-level failures (unknown ids, bad arguments) raised by tool handlers
export class ToolError extends Error {
  constructor(
    public readonly tool: string,
    message: string,
    public readonly status = 400
  ) {
    super(message);
    this.name = 'ToolError';
  }
}
