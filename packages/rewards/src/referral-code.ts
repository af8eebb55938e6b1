/**
 * Referral code generation.
 *
 * Codes are short and human-typable: uppercase letters and digits
 * without the look-alikes I, O, 0 and 1. The alphabet has 32 symbols,
 * so mapping a random byte with `% 32` carries no bias.
 */

import { randomBytes } from "node:crypto";

export const REFERRAL_CODE_ALPHABET = "ABCDEFGHJKLMNPQRSTUVWXYZ23456789";
export const REFERRAL_CODE_LENGTH = 8;

export function generateReferralCode(
  length: number = REFERRAL_CODE_LENGTH,
): string {
  const bytes = randomBytes(length);
  let code = "";
  for (const byte of bytes) {
    code += REFERRAL_CODE_ALPHABET.charAt(byte % REFERRAL_CODE_ALPHABET.length);
  }
  return code;
}

/**
 * Canonical form of a code typed by a person: trimmed and uppercased.
 */
export function normalizeReferralCode(value: string): string {
  return value.trim().toUpperCase();
}
