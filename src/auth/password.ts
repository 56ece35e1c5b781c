import bcrypt from 'bcrypt';

export const DEFAULT_SALT_ROUNDS = 12;

/**
 * Salted bcrypt digest of `password`. A fresh salt is generated per call,
 * so hashing the same password twice gives two different digests.
 */
export async function hashPassword(password: string, rounds: number = DEFAULT_SALT_ROUNDS): Promise<string> {
  const salt = await bcrypt.genSalt(rounds);
  return bcrypt.hash(password, salt);
}

/**
 * Check a plain-text password against a digest from hashPassword().
 */
export async function isValid(hashed: string, password: string): Promise<boolean> {
  return bcrypt.compare(password, hashed);
}
