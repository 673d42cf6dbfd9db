/**
 * One-way password hashing. `verify` resolves false rather than throwing on
 * a malformed digest.
 */
export interface IHashingService {
  hash(password: string): Promise<string>;
  verify(password: string, digest: string): Promise<boolean>;
}
