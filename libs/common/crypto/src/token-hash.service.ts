/**
 * ContactBook Token Hash Service
 * SHA-256 digests used as cache keys so raw tokens never reach the store
 */

import { Injectable } from '@nestjs/common';
import * as crypto from 'crypto';

@Injectable()
export class TokenHashService {
  hash(token: string): string {
    return crypto.createHash('sha256').update(token).digest('hex');
  }
}
