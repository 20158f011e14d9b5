/**
 * Address syntax validation.
 *
 * The pool only needs to know that an address is well-formed; canonical
 * formatting and checksums belong to the host. Addresses take the shape
 * `<prefix>1<data>`: a lowercase prefix, the separator "1", then 6–90
 * lowercase alphanumerics.
 */

import type { Address } from "@matchpool/types";

export type AddressValidator = (address: Address) => boolean;

const ANY_PREFIX = "[a-z]{1,20}";

/**
 * Build a validator. With a prefix, only addresses under that prefix pass.
 */
export function createAddressValidator(prefix?: string): AddressValidator {
  if (prefix !== undefined && !/^[a-z]{1,20}$/.test(prefix)) {
    throw new Error(`Invalid address prefix "${prefix}": expected 1-20 lowercase letters`);
  }
  const pattern = new RegExp(`^${prefix ?? ANY_PREFIX}1[0-9a-z]{6,90}$`);
  return (address) => typeof address === "string" && pattern.test(address);
}
