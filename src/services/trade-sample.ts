import { TradeSample } from '../types';

/**
 * Build an immutable trade sample. Throws on non-finite or non-positive price/quantity.
 */
export function createTradeSample(timestamp: number, price: number, quantity: number): TradeSample {
  if (!Number.isFinite(timestamp)) {
    throw new Error(`Invalid timestamp value: ${timestamp}`);
  }
  if (!Number.isFinite(price) || price <= 0) {
    throw new Error(`Invalid price value: ${price}`);
  }
  if (!Number.isFinite(quantity) || quantity <= 0) {
    throw new Error(`Invalid quantity value: ${quantity}`);
  }

  return Object.freeze({
    timestamp,
    price,
    quantity,
    notional: price * quantity,
  });
}
