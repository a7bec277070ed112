import { PolicyTerms } from '../domain/entities/Policy';

export const DEFAULT_DELAY_THRESHOLD_SECONDS = 4 * 60 * 60;
export const DEFAULT_PREMIUM = 10000000000000000n; // 0.01 ether in wei
export const DEFAULT_CLAIM_AMOUNT = 50000000000000000n; // 0.05 ether in wei

/** Terms applied to newly opened policies; loaded once at start-up. */
export type InsuranceConfig = Readonly<PolicyTerms>;

function parseAmount(name: string, raw: string | undefined, fallback: bigint): bigint {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`${name} must be a non-negative integer amount, got "${raw}"`);
  }
  return BigInt(raw.trim());
}

function parseSeconds(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative whole number of seconds, got "${raw}"`);
  }
  return value;
}

export function loadInsuranceConfig(env: NodeJS.ProcessEnv = process.env): InsuranceConfig {
  const config: PolicyTerms = {
    delayThreshold: parseSeconds('DEFAULT_DELAY_THRESHOLD_SECONDS', env.DEFAULT_DELAY_THRESHOLD_SECONDS, DEFAULT_DELAY_THRESHOLD_SECONDS),
    premium: parseAmount('DEFAULT_PREMIUM', env.DEFAULT_PREMIUM, DEFAULT_PREMIUM),
    claimAmount: parseAmount('DEFAULT_CLAIM_AMOUNT', env.DEFAULT_CLAIM_AMOUNT, DEFAULT_CLAIM_AMOUNT)
  };
  return Object.freeze(config);
}
