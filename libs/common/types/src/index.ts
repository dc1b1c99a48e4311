export * from './auth.types';
export * from './result';
