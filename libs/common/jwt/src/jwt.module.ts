/**
 * ContactBook JWT Module
 * Provides token issuing/verification
 */

import { Module } from '@nestjs/common';
import { JwtModule as NestJwtModule } from '@nestjs/jwt';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { JwtService } from './jwt.service';
import { isJwtAlgorithm } from './jwt.types';

@Module({
  imports: [
    ConfigModule,
    NestJwtModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const secret = config.get<string>('secretKey');
        const algorithm = config.get<string>('algorithm');

        if (!secret) {
          throw new Error('JWT secret is required. Set SECRET_KEY in environment');
        }
        if (!isJwtAlgorithm(algorithm)) {
          throw new Error('JWT algorithm is required. Set ALGORITHM to HS256, HS384 or HS512');
        }

        return {
          secret,
          // NOTE: no expiresIn here - exp is always set explicitly in claims
          signOptions: { algorithm },
          verifyOptions: { algorithms: [algorithm] },
        };
      },
    }),
  ],
  providers: [JwtService],
  exports: [JwtService],
})
export class JwtModule {}
