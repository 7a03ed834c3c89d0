#!/usr/bin/env node
/**
 * Vesting Ledger CLI
 *
 * Usage:
 *   npx tsx src/cli.ts status <beneficiary> [timestamp]
 *   npx tsx src/cli.ts preview <beneficiary> [timestamp]
 *   npx tsx src/cli.ts create <beneficiary> <amount> <upfrontPercent> <cliffTime> <rampEnd>
 *   npx tsx src/cli.ts claim <beneficiary>
 *   npx tsx src/cli.ts recover <beneficiary>
 *   npx tsx src/cli.ts solvency
 */

import './env/index.js';
import { parseUnits } from 'ethers';
import { getRequiredAdminAddress, getTokenDecimals } from './config/index.js';
import {
  cliLogger,
  exitWithCode,
  flushLogger,
  formatTimestamp,
  formatTokenAmount,
  serializeError,
} from './logging/index.js';
import { createVestingRuntime, type VestingRuntime } from './vesting/bootstrap.js';
import { isVestingError } from './vesting/errors.js';

type Command = 'status' | 'preview' | 'create' | 'claim' | 'recover' | 'solvency' | 'help';

const COMMANDS: readonly Command[] = ['status', 'preview', 'create', 'claim', 'recover', 'solvency', 'help'];
const MUTATING: ReadonlySet<Command> = new Set<Command>(['create', 'claim', 'recover']);

interface CLIArgs {
  command: Command;
  args: string[];
}

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

function parseArgs(argv: string[]): CLIArgs {
  const [first, ...rest] = argv;

  if (!first || first === '--help' || first === '-h') {
    return { command: 'help', args: [] };
  }

  if (!isCommand(first)) {
    console.error(`Unknown command: ${first}`);
    return { command: 'help', args: [] };
  }

  return { command: first, args: rest };
}

function printHelp(): void {
  console.log(`
Vesting Ledger CLI - Manage token vesting schedules

Usage:
  vesting-ledger <command> [arguments]

Commands:
  status <beneficiary> [timestamp]       Show every schedule and its unlock state
  preview <beneficiary> [timestamp]      Show what a claim would pay
  create <beneficiary> <amount> <upfrontPercent> <cliffTime> <rampEnd>
                                         Commit tokens from ADMIN_ADDRESS into a new schedule
  claim <beneficiary>                    Pay out unlocked tokens to the beneficiary
  recover <beneficiary>                  Sweep all unclaimed tokens to RECOVERY_ADDRESS
  solvency                               Compare custody balance with outstanding allocations
  help                                   Show this help message

Amounts are in whole tokens (TOKEN_DECIMALS applies); times are unix seconds.
create, claim and recover need TOKEN_ADDRESS, RPC_URL and CUSTODY_PRIVATE_KEY.
`);
}

function requireArg(args: string[], position: number, name: string): string {
  const value = args[position];
  if (value === undefined || value === '') {
    throw new Error(`Missing argument <${name}>`);
  }
  return value;
}

function parseTimestamp(value: string, name: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new Error(`<${name}> must be a unix timestamp in seconds, got "${value}"`);
  }
  return BigInt(value);
}

function parsePercent(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`<upfrontPercent> must be a whole number, got "${value}"`);
  }
  return Number(value);
}

async function commandStatus(runtime: VestingRuntime, args: string[]): Promise<void> {
  const decimals = getTokenDecimals();
  const at = args[1] === undefined ? undefined : parseTimestamp(args[1], 'timestamp');
  const summary = await runtime.service.getVestingSummary(requireArg(args, 0, 'beneficiary'), at);
  const schedules = await runtime.service.getSchedules(summary.beneficiary);

  console.log(`\nBeneficiary: ${summary.beneficiary}`);
  console.log(`As of:       ${formatTimestamp(summary.asOf)}\n`);

  if (summary.schedules.length === 0) {
    console.log('No schedules.\n');
    return;
  }

  console.log(
    '#'.padEnd(4) +
    'Total'.padEnd(16) +
    'Claimed'.padEnd(16) +
    'Claimable'.padEnd(16) +
    'Locked'.padEnd(16) +
    'Ramp',
  );
  for (const status of summary.schedules) {
    const schedule = schedules[status.index];
    const ramp = schedule
      ? `${formatTimestamp(schedule.rampStart)} → ${formatTimestamp(schedule.rampEnd)}`
      : '';
    console.log(
      String(status.index).padEnd(4) +
      formatTokenAmount(status.total, decimals).padEnd(16) +
      formatTokenAmount(status.claimed, decimals).padEnd(16) +
      formatTokenAmount(status.claimable, decimals).padEnd(16) +
      formatTokenAmount(status.locked, decimals).padEnd(16) +
      ramp,
    );
  }

  console.log(
    `\nTotal ${formatTokenAmount(summary.total, decimals)}, ` +
    `claimed ${formatTokenAmount(summary.claimed, decimals)}, ` +
    `claimable ${formatTokenAmount(summary.claimable, decimals)}\n`,
  );
}

async function commandPreview(runtime: VestingRuntime, args: string[]): Promise<void> {
  const at = args[1] === undefined ? undefined : parseTimestamp(args[1], 'timestamp');
  const amount = await runtime.service.previewClaimable(requireArg(args, 0, 'beneficiary'), at);
  console.log(formatTokenAmount(amount, getTokenDecimals()));
}

async function commandCreate(runtime: VestingRuntime, args: string[]): Promise<void> {
  const index = await runtime.service.createSchedule(getRequiredAdminAddress(), {
    beneficiary: requireArg(args, 0, 'beneficiary'),
    totalAmount: parseUnits(requireArg(args, 1, 'amount'), getTokenDecimals()),
    upfrontPercent: parsePercent(requireArg(args, 2, 'upfrontPercent')),
    cliffTime: parseTimestamp(requireArg(args, 3, 'cliffTime'), 'cliffTime'),
    rampEnd: parseTimestamp(requireArg(args, 4, 'rampEnd'), 'rampEnd'),
  });
  console.log(`Created schedule #${index}`);
}

async function commandClaim(runtime: VestingRuntime, args: string[]): Promise<void> {
  const paid = await runtime.service.claim(requireArg(args, 0, 'beneficiary'));
  console.log(`Claimed ${formatTokenAmount(paid, getTokenDecimals())}`);
}

async function commandRecover(runtime: VestingRuntime, args: string[]): Promise<void> {
  const recovered = await runtime.service.recover(getRequiredAdminAddress(), requireArg(args, 0, 'beneficiary'));
  console.log(`Recovered ${formatTokenAmount(recovered, getTokenDecimals())}`);
}

async function commandSolvency(runtime: VestingRuntime): Promise<void> {
  const decimals = getTokenDecimals();
  const { outstanding, custody, surplus } = await runtime.service.getSolvency();
  console.log(`Outstanding: ${formatTokenAmount(outstanding, decimals)}`);
  console.log(`Custody:     ${formatTokenAmount(custody, decimals)}${runtime.onchain ? '' : ' (in-memory ledger)'}`);
  console.log(`Surplus:     ${formatTokenAmount(surplus, decimals)}`);
}

async function run(runtime: VestingRuntime, { command, args }: CLIArgs): Promise<void> {
  switch (command) {
    case 'status':
      return commandStatus(runtime, args);
    case 'preview':
      return commandPreview(runtime, args);
    case 'create':
      return commandCreate(runtime, args);
    case 'claim':
      return commandClaim(runtime, args);
    case 'recover':
      return commandRecover(runtime, args);
    case 'solvency':
      return commandSolvency(runtime);
    case 'help':
      return printHelp();
  }
}

async function main(): Promise<void> {
  const cliArgs = parseArgs(process.argv.slice(2));
  if (cliArgs.command === 'help') {
    printHelp();
    return;
  }

  let runtime: VestingRuntime;
  try {
    runtime = await createVestingRuntime();
  } catch (error) {
    exitWithCode(2, error instanceof Error ? error.message : String(error));
  }

  if (MUTATING.has(cliArgs.command) && !runtime.onchain) {
    await runtime.store.close();
    exitWithCode(2, `${cliArgs.command} needs TOKEN_ADDRESS, RPC_URL and CUSTODY_PRIVATE_KEY`);
  }

  try {
    await run(runtime, cliArgs);
  } catch (error) {
    if (isVestingError(error)) {
      console.error(`${error.code}: ${error.message}`);
    } else {
      cliLogger.error({ error: serializeError(error) }, 'Command failed');
    }
    process.exitCode = 1;
  } finally {
    await runtime.store.close();
    await flushLogger();
  }
}

main().catch((error: unknown) => {
  exitWithCode(1, 'Unexpected CLI failure', error instanceof Error ? error : new Error(String(error)));
});
