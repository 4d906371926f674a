export * from './interfaces';
export * from './mappers/intent-status.mapper';
export * from './models';
