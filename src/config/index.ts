/**
 * Canonical configuration module for the vesting ledger
 *
 * Single source of truth for environment variable access. Runtime code reads
 * configuration through the typed getters exported here.
 *
 * - Fail fast: invalid configuration throws one error listing every issue
 * - Centralized validation: all env vars validated with Zod schemas
 * - Typed getters: getRequired* throws when unset, getOptional* returns undefined
 *
 * Calling code is responsible for loading .env files (via env/index.ts)
 * BEFORE the first getter call.
 */

import { z } from 'zod';

// ============================================================================
// Configuration Schema
// ============================================================================

const addressSchema = z.string().regex(/^0x[a-fA-F0-9]{40}$/, 'must be a 0x-prefixed 20-byte hex address');

/**
 * Schedule store configuration schema
 */
const storeSchema = z.object({
  // VESTING_STORE: Backing store for schedules
  VESTING_STORE: z.enum(['memory', 'sqlite']).default('sqlite'),

  // VESTING_DB_PATH: SQLite database file (ignored by the memory store)
  VESTING_DB_PATH: z.string().min(1).default('./data/vesting.db'),

  // MAX_SCHEDULES_PER_BENEFICIARY: Upper bound on schedules per beneficiary.
  // Claim and recovery iterate the whole list, so this bounds their cost.
  MAX_SCHEDULES_PER_BENEFICIARY: z.coerce.number().int().positive().default(100),
});

/**
 * Administration configuration schema
 */
const adminSchema = z.object({
  // ADMIN_ADDRESS: Initial administrator identity
  ADMIN_ADDRESS: addressSchema.optional(),

  // RECOVERY_ADDRESS: Initial recovery account for swept allocations
  RECOVERY_ADDRESS: addressSchema.optional(),
});

/**
 * Token configuration schema
 */
const tokenSchema = z.object({
  // TOKEN_DECIMALS: Display decimals for amounts in logs and CLI output
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),

  // TOKEN_ADDRESS: ERC-20 contract; when unset the CLI uses an offline ledger
  TOKEN_ADDRESS: addressSchema.optional(),

  // CUSTODY_PRIVATE_KEY: Key of the account holding committed tokens
  CUSTODY_PRIVATE_KEY: z.string()
    .regex(/^0x[a-fA-F0-9]{64}$/, 'CUSTODY_PRIVATE_KEY must be a 66-character hex string with 0x prefix')
    .optional(),

  // RPC_URL: JSON-RPC endpoint for the ERC-20 ledger
  RPC_URL: z.string().url('RPC_URL must be a valid HTTP/HTTPS URL').optional(),

  // TX_CONFIRMATIONS: Confirmations to wait for before a transfer counts as done
  TX_CONFIRMATIONS: z.coerce.number().int().positive().default(1),
});

/**
 * Development and testing configuration schema
 */
const devTestingSchema = z.object({
  // NODE_ENV: Node environment (development, production, test)
  NODE_ENV: z.enum(['development', 'production', 'test']).optional(),

  // VITEST: Set by Vitest test runner
  VITEST: z.string().optional().transform((v) => v === 'true'),
});

/**
 * Complete configuration schema
 */
const configSchema = z.object({
  ...storeSchema.shape,
  ...adminSchema.shape,
  ...tokenSchema.shape,
  ...devTestingSchema.shape,
});

export type VestingConfig = z.infer<typeof configSchema>;

// ============================================================================
// Internal Configuration Loading
// ============================================================================

let _config: VestingConfig | null = null;

/**
 * Validate a raw environment record. Exported for tests and for callers that
 * assemble configuration from somewhere other than process.env.
 */
export function parseConfig(env: Record<string, string | undefined>): VestingConfig {
  // Empty strings count as unset so a blank line in .env does not fail validation
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const field = issue.path.join('.');
      return `  - ${field}: ${issue.message}`;
    }).join('\n');

    throw new Error(
      `Configuration validation failed:\n${issues}\n\n` +
      `See .env.template for the supported environment variables.`
    );
  }
  return result.data;
}

/**
 * Get validated configuration (loads and caches on first call)
 * In test mode (VITEST=true), always re-read to pick up dynamic env var changes
 */
function getConfig(): VestingConfig {
  const isTestMode = process.env.VITEST === 'true';
  if (!_config || isTestMode) {
    _config = parseConfig(process.env);
  }
  return _config;
}

/**
 * Reset configuration cache (for testing only)
 *
 * @internal
 */
export function resetConfigForTests(): void {
  _config = null;
}

// ============================================================================
// Public API: Store Configuration
// ============================================================================

export function getStoreType(): 'memory' | 'sqlite' {
  return getConfig().VESTING_STORE;
}

export function getDatabasePath(): string {
  return getConfig().VESTING_DB_PATH;
}

export function getMaxSchedulesPerBeneficiary(): number {
  return getConfig().MAX_SCHEDULES_PER_BENEFICIARY;
}

// ============================================================================
// Public API: Administration
// ============================================================================

export function getOptionalAdminAddress(): string | undefined {
  return getConfig().ADMIN_ADDRESS;
}

export function getRequiredAdminAddress(): string {
  const value = getOptionalAdminAddress();
  if (!value) {
    throw new Error('ADMIN_ADDRESS is required but not configured');
  }
  return value;
}

export function getOptionalRecoveryAddress(): string | undefined {
  return getConfig().RECOVERY_ADDRESS;
}

// ============================================================================
// Public API: Token
// ============================================================================

export function getTokenDecimals(): number {
  return getConfig().TOKEN_DECIMALS;
}

export function getOptionalTokenAddress(): string | undefined {
  return getConfig().TOKEN_ADDRESS;
}

export function getRequiredCustodyPrivateKey(): string {
  const value = getConfig().CUSTODY_PRIVATE_KEY;
  if (!value) {
    throw new Error('CUSTODY_PRIVATE_KEY is required when TOKEN_ADDRESS is set');
  }
  return value;
}

export function getRequiredRpcUrl(): string {
  const value = getConfig().RPC_URL;
  if (!value) {
    throw new Error('RPC_URL is required when TOKEN_ADDRESS is set');
  }
  return value;
}

export function getTxConfirmations(): number {
  return getConfig().TX_CONFIRMATIONS;
}
