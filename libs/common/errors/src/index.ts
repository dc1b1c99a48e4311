export * from './error-codes';
export * from './portal-error';
export * from './errors-factory';
export * from './portal-error.filter';
