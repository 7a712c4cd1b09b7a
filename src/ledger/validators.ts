import bs58 from 'bs58';

export type AddressValidator = (raw: string) => boolean;

const ETH_ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const SOL_PUBLIC_KEY_BYTES = 32;

export function validateEth(raw: string): boolean {
  return ETH_ADDRESS_RE.test(raw);
}

export function validateSol(raw: string): boolean {
  try {
    return bs58.decode(raw).length === SOL_PUBLIC_KEY_BYTES;
  } catch {
    // not base58
    return false;
  }
}

const validators = new Map<string, AddressValidator>([
  ['eth', validateEth],
  ['sol', validateSol],
]);

export function registerValidator(type: string, predicate: AddressValidator) {
  validators.set(type, predicate);
}

export function ledgerTypes(): string[] {
  return Array.from(validators.keys());
}

export function isLedgerType(text: string): boolean {
  return validators.has(text);
}

/** False for unknown or unset ledger types; never throws. */
export function validate(ledgerType: string | null | undefined, raw: string): boolean {
  if (!ledgerType) return false;
  const predicate = validators.get(ledgerType);
  if (!predicate) return false;
  try {
    return predicate(raw);
  } catch {
    return false;
  }
}
