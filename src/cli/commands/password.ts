import { hashPassword, isValid } from '../../auth/password.js';
import type { LineWriter } from '../../types.js';

/**
 * Print a salted digest of `password`.
 */
export async function runHash(password: string, rounds: number, output: LineWriter = process.stdout): Promise<number> {
  output.write(`${await hashPassword(password, rounds)}\n`);
  return 0;
}

/**
 * @returns Exit code (0=valid, 1=invalid)
 */
export async function runVerify(digest: string, password: string, output: LineWriter = process.stdout): Promise<number> {
  const valid = await isValid(digest, password);
  output.write(valid ? 'valid\n' : 'invalid\n');
  return valid ? 0 : 1;
}
