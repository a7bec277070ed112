import { logger } from '../infrastructure/logging/Logger';
import { loadInsuranceConfig } from './insuranceConfig';

interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

const SETTLEMENT_MODES = ['memory', 'ethereum'];

/**
 * Validates the environment the server needs to start.
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!env.JWT_ACCESS_SECRET) {
    errors.push('Missing critical environment variable: JWT_ACCESS_SECRET');
  }

  try {
    loadInsuranceConfig(env);
  } catch (error) {
    errors.push(error instanceof Error ? error.message : String(error));
  }

  const settlementMode = env.SETTLEMENT_MODE || 'memory';
  if (!SETTLEMENT_MODES.includes(settlementMode)) {
    errors.push(`Unknown SETTLEMENT_MODE: ${settlementMode}. Valid options: ${SETTLEMENT_MODES.join(', ')}`);
  }

  if (settlementMode === 'ethereum') {
    if (!env.ETHEREUM_RPC_URL) {
      errors.push('ETHEREUM_RPC_URL is required when SETTLEMENT_MODE is ethereum');
    }
    if (!env.SETTLEMENT_VAULT_ADDRESS) {
      errors.push('SETTLEMENT_VAULT_ADDRESS is required when SETTLEMENT_MODE is ethereum');
    }
    if (env.SETTLEMENT_MOCK_MODE !== 'true') {
      if (!env.SETTLEMENT_PRIVATE_KEY_ENCRYPTED) {
        errors.push('SETTLEMENT_PRIVATE_KEY_ENCRYPTED is required for live on-chain settlement');
      }
      if (!env.ENCRYPTION_KEY || env.ENCRYPTION_KEY.length < 32) {
        errors.push('ENCRYPTION_KEY must be at least 32 characters long');
      }
    }
  }

  if (env.SETTLEMENT_MEMORY_FLOAT && !/^\d+$/.test(env.SETTLEMENT_MEMORY_FLOAT)) {
    errors.push(`SETTLEMENT_MEMORY_FLOAT must be a non-negative integer amount, got "${env.SETTLEMENT_MEMORY_FLOAT}"`);
  }

  if (env.USE_MONGODB === 'true' && !env.MONGODB_URI) {
    errors.push('MONGODB_URI is required when USE_MONGODB is true');
  }

  if (env.PORT) {
    const port = parseInt(env.PORT, 10);
    if (isNaN(port) || port < 1 || port > 65535) {
      warnings.push(`Invalid PORT value: ${env.PORT}. Using default 3000.`);
    }
  }

  if (env.MONITORING_INTERVAL) {
    const interval = parseInt(env.MONITORING_INTERVAL, 10);
    if (isNaN(interval) || interval < 1000) {
      warnings.push(`Invalid MONITORING_INTERVAL: ${env.MONITORING_INTERVAL}. Should be >= 1000ms.`);
    }
  }

  if (settlementMode === 'memory' && env.NODE_ENV === 'production') {
    warnings.push('SETTLEMENT_MODE=memory in production: payouts only move funds in process memory');
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Logs environment validation results and exits if critical errors found
 */
export function validateAndExitOnErrors(): void {
  logger.info('Validating environment configuration...');

  const result = validateEnvironment();

  result.warnings.forEach(warning => {
    logger.warn(`Environment warning: ${warning}`);
  });

  result.errors.forEach(error => {
    logger.error(`Environment error: ${error}`);
  });

  if (!result.isValid) {
    logger.error('Environment validation failed. Cannot start server.');
    process.exit(1);
  }

  logger.info('Environment validation passed.');

  const terms = loadInsuranceConfig();
  logger.info('Current configuration:', {
    NODE_ENV: process.env.NODE_ENV || 'development',
    PORT: process.env.PORT || '3000',
    USE_MONGODB: process.env.USE_MONGODB || 'false',
    SETTLEMENT_MODE: process.env.SETTLEMENT_MODE || 'memory',
    MONITORING_INTERVAL: process.env.MONITORING_INTERVAL || '60000ms',
    POLICY_TERMS: {
      delayThreshold: terms.delayThreshold,
      premium: terms.premium.toString(),
      claimAmount: terms.claimAmount.toString()
    }
  });
}
