/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt behind PasswordHasher keeps the rest of the app free of hashing details.
 * - The decoy hash is generated lazily with the SAME cost factor, so a decoy
 *   comparison costs what a real one costs.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 */

import bcrypt from 'bcrypt';
import { randomBytes } from 'node:crypto';
import type { PasswordHasher } from './password-hasher';

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;
  private decoyHash: Promise<string> | null = null;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }

  async verifyAgainstDecoy(plain: string): Promise<false> {
    this.decoyHash ??= bcrypt.hash(randomBytes(16).toString('hex'), this.cost);
    await bcrypt.compare(plain, await this.decoyHash);
    return false;
  }
}
