import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as crypto from 'crypto';

/**
 * Opaque bearer tokens. A token is random hex; sessions store its SHA-256 digest,
 * so a lookup is a single indexed query instead of a hash comparison per row.
 */
@Injectable()
export class TokenService {
  constructor(private configService: ConfigService) {}

  generateToken(): { token: string; hash: string } {
    const tokenLength = this.configService.getOrThrow<number>('auth.session.tokenLength');
    const token = crypto.randomBytes(tokenLength).toString('hex');
    return { token, hash: this.hashToken(token) };
  }

  hashToken(token: string): string {
    return crypto.createHash('sha256').update(token).digest('hex');
  }

  /**
   * Cheap shape check done before any Redis or database lookup.
   */
  validateTokenFormat(token: string): boolean {
    const expectedLength = this.configService.getOrThrow<number>('auth.session.tokenLength') * 2;
    return token.length === expectedLength && /^[a-f0-9]+$/i.test(token);
  }
}
