/**
 * Portal JWT Module
 * Provides the access credential signer
 */

import { Module } from '@nestjs/common';
import { JwtModule as NestJwtModule } from '@nestjs/jwt';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CredentialSigner } from './credential-signer.service';

@Module({
  imports: [
    ConfigModule,
    NestJwtModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const secret = config.get<string>('jwtSecret');

        if (!secret) {
          throw new Error('JWT secret is required. Set JWT_SECRET in environment');
        }

        return {
          secret,
          signOptions: {
            // exp is always set explicitly in claims; a default expiresIn
            // here would conflict with it
            algorithm: 'HS256',
          },
        };
      },
    }),
  ],
  providers: [CredentialSigner],
  exports: [CredentialSigner],
})
export class JwtModule {}
