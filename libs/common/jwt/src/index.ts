export * from './jwt.module';
export * from './jwt.types';
export * from './credential-signer.service';
