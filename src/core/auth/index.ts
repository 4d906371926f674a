export * from './auth.decorators';
export * from './caller.interface';
export * from './permissions';
export * from './permissions.guard';
