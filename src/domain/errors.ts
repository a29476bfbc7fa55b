/**
 * Error taxonomy of the market-data service. `code` doubles as the
 * JSON-RPC error code on the wire.
 */
export class MarketDataError extends Error {
  constructor(message: string, public readonly code: number) {
    super(message);
    this.name = 'MarketDataError';
  }
}

/** Unknown asset identifier */
export class InvalidAssetError extends MarketDataError {
  constructor(public readonly asset: string) {
    super(`Invalid asset: ${asset}`, -32001);
    this.name = 'InvalidAssetError';
  }
}

/** Malformed pair, e.g. the same asset on both sides */
export class InvalidPairError extends MarketDataError {
  constructor(asset1: string, asset2: string) {
    super(`Invalid asset pair: ${asset1}/${asset2}`, -32002);
    this.name = 'InvalidPairError';
  }
}

/** Out-of-range request parameter, rejected before any query */
export class InvalidParameterError extends MarketDataError {
  constructor(public readonly param: string, message: string) {
    super(`Invalid ${param}: ${message}`, -32602);
    this.name = 'InvalidParameterError';
  }
}

/** A recorded asset change does not match the data it claims to describe */
export class DataIntegrityFault extends MarketDataError {
  constructor(message: string, public readonly asset?: string) {
    super(asset ? `Data integrity fault (${asset}): ${message}` : `Data integrity fault: ${message}`, -32003);
    this.name = 'DataIntegrityFault';
  }
}

/**
 * Record store or ledger daemon call failed
 */
export class UpstreamUnavailableError extends MarketDataError {
  constructor(
    public readonly upstream: 'record-store' | 'ledger',
    message: string,
    public readonly originalError?: unknown
  ) {
    super(`${upstream} unavailable: ${message}`, -32004);
    this.name = 'UpstreamUnavailableError';
  }
}
