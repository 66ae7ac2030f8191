/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Services should depend on an interface (DIP), not bcrypt directly.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 * - await hasher.verifyAgainstDecoy(password)   // when there is no stored hash to compare
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;

  /**
   * Spends the same work as verify() against an internal decoy hash and always
   * resolves false. Login calls this for unknown emails so both failure paths
   * take comparable time.
   */
  verifyAgainstDecoy(plain: string): Promise<false>;
}
