/**
 * Bridge Forecast Errors
 *
 * Every failure in the flow-to-depth engine surfaces as a BridgeForecastError
 * with a stable code. Nothing in the engine substitutes a default value for a
 * failure: a clamped or invented depth could hide real flood risk.
 */

export type BridgeForecastErrorCode =
  | 'INVALID_CURVE'
  | 'INVALID_RECORD'
  | 'UNKNOWN_BRIDGE'
  | 'EMPTY_FORECAST'
  | 'INVALID_FORECAST'
  | 'PROVIDER_UNAVAILABLE';

export class BridgeForecastError extends Error {
  constructor(
    message: string,
    public readonly code: BridgeForecastErrorCode,
    public readonly retryable: boolean = false,
    public readonly legacyCode?: string
  ) {
    super(message);
    this.name = 'BridgeForecastError';
  }
}

export function isBridgeForecastError(error: unknown): error is BridgeForecastError {
  return error instanceof BridgeForecastError;
}

export function invalidCurve(message: string): BridgeForecastError {
  return new BridgeForecastError(message, 'INVALID_CURVE');
}

export function invalidRecord(message: string): BridgeForecastError {
  return new BridgeForecastError(message, 'INVALID_RECORD');
}

export function unknownBridge(bridgeId: string): BridgeForecastError {
  return new BridgeForecastError(
    `No bridge record found for ${bridgeId}`,
    'UNKNOWN_BRIDGE',
    false,
    '005'
  );
}

export function emptyForecast(): BridgeForecastError {
  return new BridgeForecastError('Forecast contains no flow values', 'EMPTY_FORECAST');
}

export function providerUnavailable(message: string): BridgeForecastError {
  return new BridgeForecastError(message, 'PROVIDER_UNAVAILABLE', true);
}
