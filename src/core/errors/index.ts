export * from './commerce.errors';
export * from './domain.errors';
