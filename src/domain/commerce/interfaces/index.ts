/**
 * Barrel export for commerce domain interfaces
 */

export * from './payment-gateway.interface';
export * from './webhook-verifier.interface';
