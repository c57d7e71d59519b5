/**
 * ContactBook Password Service
 * Argon2id password hashing
 */

import { Injectable, Logger } from '@nestjs/common';
import * as argon2 from 'argon2';

@Injectable()
export class PasswordService {
  private readonly logger = new Logger(PasswordService.name);

  /**
   * Hash password using Argon2id
   * - time_cost: 2
   * - memory_cost: 65536 (64 MB)
   * - parallelism: 1
   * - hash_length: 32
   * - salt_length: 16 (random, generated per call)
   */
  async hash(password: string): Promise<string> {
    try {
      return await argon2.hash(password, {
        type: argon2.argon2id,
        timeCost: 2,
        memoryCost: 65536, // 64 MB
        parallelism: 1,
        hashLength: 32,
        saltLength: 16,
      });
    } catch (error) {
      this.logger.error(`Password hashing failed: ${describe(error)}`);
      throw new Error('Password hashing failed');
    }
  }

  /**
   * Verify password against an Argon2 encoded hash.
   * argon2 compares digests in constant time; login relies on a malformed
   * or foreign digest yielding false rather than an exception.
   */
  async verify(hash: string, password: string): Promise<boolean> {
    try {
      return await argon2.verify(hash, password);
    } catch (error) {
      this.logger.warn(`Password verification failed: ${describe(error)}`);
      return false;
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
