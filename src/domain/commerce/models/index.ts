/**
 * Barrel export for commerce domain models
 */

export * from './order-status.model';
export * from './payment-status.model';
