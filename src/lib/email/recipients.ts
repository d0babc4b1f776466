import { z } from 'zod';

const addressSchema = z.string().email();

/**
 * Split a comma-separated recipient string. Order and duplicates are kept;
 * blank entries are dropped.
 */
export function parseRecipients(value: string): string[] {
  return value
    .split(',')
    .map((address) => address.trim())
    .filter((address) => address.length > 0);
}

export function isValidAddress(address: string): boolean {
  return addressSchema.safeParse(address).success;
}

/**
 * One issue per invalid address, empty when all pass
 */
export function validateRecipients(recipients: readonly string[]): string[] {
  if (recipients.length === 0) {
    return ['receiver_email must name at least one address'];
  }

  return recipients
    .filter((address) => !isValidAddress(address))
    .map((address) => `Invalid recipient address: ${address}`);
}
