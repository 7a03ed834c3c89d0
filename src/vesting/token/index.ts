export type { ITokenLedger } from './ITokenLedger.js';
export { InMemoryTokenLedger } from './InMemoryTokenLedger.js';
export type { TransferDirection, TransferHook, TransferRecord } from './InMemoryTokenLedger.js';
export { Erc20TokenLedger } from './Erc20TokenLedger.js';
export type { Erc20Contract, Erc20LedgerConfig, SubmittedTransfer, TransferReceipt } from './Erc20TokenLedger.js';
