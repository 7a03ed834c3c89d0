import {
  getMaxSchedulesPerBeneficiary,
  getOptionalRecoveryAddress,
  getOptionalTokenAddress,
  getRequiredAdminAddress,
  getRequiredCustodyPrivateKey,
  getRequiredRpcUrl,
  getTxConfirmations,
} from '../config/index.js';
import { configLogger } from '../logging/index.js';
import type { Clock } from './clock.js';
import type { VestingEventSink } from './events.js';
import { ScheduleStoreFactory, type IScheduleStore } from './store/index.js';
import { Erc20TokenLedger, InMemoryTokenLedger, type ITokenLedger } from './token/index.js';
import { VestingService } from './VestingService.js';

export interface VestingRuntime {
  service: VestingService;
  store: IScheduleStore;
  token: ITokenLedger;
  /** False when no TOKEN_ADDRESS is configured and transfers are simulated in memory */
  onchain: boolean;
}

export interface RuntimeOverrides {
  store?: IScheduleStore;
  token?: ITokenLedger;
  clock?: Clock;
  events?: VestingEventSink;
}

function createTokenLedgerFromConfig(): { token: ITokenLedger; onchain: boolean } {
  const tokenAddress = getOptionalTokenAddress();
  if (!tokenAddress) {
    configLogger.info('TOKEN_ADDRESS not set, using in-memory token ledger');
    return { token: new InMemoryTokenLedger(), onchain: false };
  }

  const token = Erc20TokenLedger.fromPrivateKey(getRequiredCustodyPrivateKey(), getRequiredRpcUrl(), {
    tokenAddress,
    confirmations: getTxConfirmations(),
  });
  return { token, onchain: true };
}

/**
 * Wire a VestingService from validated configuration. The store is
 * initialized before the service is returned.
 */
export async function createVestingRuntime(overrides: RuntimeOverrides = {}): Promise<VestingRuntime> {
  const store = overrides.store ?? ScheduleStoreFactory.createFromConfig();
  await store.initialize();

  const { token, onchain } = overrides.token
    ? { token: overrides.token, onchain: false }
    : createTokenLedgerFromConfig();

  const service = new VestingService({
    store,
    token,
    administrator: getRequiredAdminAddress(),
    recoveryAccount: getOptionalRecoveryAddress() ?? null,
    maxSchedulesPerBeneficiary: getMaxSchedulesPerBeneficiary(),
    clock: overrides.clock,
    events: overrides.events,
  });

  return { service, store, token, onchain };
}
