import { createHash } from 'node:crypto';

import type { RuleRegistration } from '../registry/rule-registry.js';

import { toJsonSafe } from './json-safe.js';

type IdentityFields = Pick<RuleRegistration, 'rule' | 'args' | 'options'>;

export function registrationSignature(registration: IdentityFields): string {
  const args = JSON.stringify(toJsonSafe(registration.args, 'hash'));
  const options = JSON.stringify(toJsonSafe(registration.options, 'hash'));
  return `${registration.rule}(${args}, ${options})`;
}

/**
 * SHA-1 over the signatures of the registrations, in order. The empty
 * registry hashes to the digest of no input.
 */
export function computeUid(registrations: readonly IdentityFields[]): string {
  const hash = createHash('sha1');
  for (const registration of registrations) {
    hash.update(registrationSignature(registration));
  }
  return hash.digest('hex');
}

export function uidHashCode(uid: string): number {
  return Number.parseInt(uid.slice(0, 8), 16);
}
