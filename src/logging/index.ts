import pino from 'pino';
import { formatUnits } from 'ethers';
import { buildLogger } from './factory.js';

const { logger: rootLogger, flush, flushSync } = buildLogger();

export const logger = rootLogger;

export async function flushLogger(): Promise<void> {
  await flush();
}

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}

function withHelpers<T extends pino.Logger, H extends Record<string, unknown>>(child: T, helpers: H): T & H {
  return Object.assign(child, helpers);
}

const baseVestingLogger = createChildLogger('VESTING');
export const vestingLogger = withHelpers(baseVestingLogger, {
  created(beneficiary: string, index: number, totalAmount: bigint) {
    baseVestingLogger.info(
      { beneficiary, index, totalAmount: totalAmount.toString() },
      'Vesting schedule created',
    );
  },
  claimed(beneficiary: string, amount: bigint, schedules: number) {
    baseVestingLogger.info({ beneficiary, amount: amount.toString(), schedules }, 'Unlocked tokens claimed');
  },
  recovered(beneficiary: string, amount: bigint, recoveryAccount: string) {
    baseVestingLogger.warn(
      { beneficiary, amount: amount.toString(), recoveryAccount },
      'Unclaimed allocation recovered',
    );
  },
  rejected(operation: string, code: string, context: Record<string, unknown> = {}) {
    baseVestingLogger.warn({ operation, code, ...context }, `${operation} rejected: ${code}`);
  },
});

export const storeLogger = createChildLogger('STORE');

const baseTokenLogger = createChildLogger('TOKEN');
export const tokenLogger = withHelpers(baseTokenLogger, {
  transferFailed(direction: 'in' | 'out', counterparty: string, amount: bigint, reason: string) {
    baseTokenLogger.error(
      { direction, counterparty, amount: amount.toString(), reason },
      'Token transfer failed',
    );
  },
});

export const configLogger = createChildLogger('CONFIG');

export const cliLogger = createChildLogger('CLI');

export function serializeError(err: Error | unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return {
      type: err.name,
      message: err.message,
      ...(code ? { code } : {}),
      stack: err.stack,
    };
  }
  return { message: String(err) };
}

export function formatTokenAmount(amount: bigint, decimals: number = 18): string {
  const formatted = formatUnits(amount, decimals);
  if (formatted.includes('.')) {
    return formatted.replace(/\.?0+$/, '');
  }
  return formatted;
}

// Date covers ±8.64e15 ms around the epoch
const MAX_DATE_SECONDS = 8_640_000_000_000n;

/**
 * ISO-8601 for unix seconds; timestamps beyond what Date can hold are
 * rendered as raw seconds.
 */
export function formatTimestamp(seconds: bigint): string {
  if (seconds > MAX_DATE_SECONDS || seconds < -MAX_DATE_SECONDS) {
    return `${seconds}s`;
  }
  return new Date(Number(seconds) * 1000).toISOString();
}

export function exitWithCode(
  code: 0 | 1 | 2,
  message: string,
  error?: Error
): never {
  switch (code) {
    case 0:
      logger.info({ exitCode: code }, message);
      break;
    case 1:
      logger.fatal({ exitCode: code, error: error ? serializeError(error) : undefined }, message);
      break;
    case 2:
      configLogger.fatal(
        { exitCode: code, error: error ? serializeError(error) : undefined },
        `Configuration Error: ${message}`,
      );
      break;
  }

  flushSync();
  process.exit(code);
}
