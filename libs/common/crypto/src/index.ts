export * from './crypto.module';
export * from './password.service';
export * from './token-hash.service';
