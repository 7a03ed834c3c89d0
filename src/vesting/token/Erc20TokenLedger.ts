/**
 * ERC-20 backed token ledger
 *
 * Custody is the account behind the signer. Committing tokens pulls them
 * with transferFrom (the administrator must have approved the custody
 * account beforehand); payouts use transfer.
 *
 * A transfer that never left (rejected on submit) or was mined and
 * reverted reports `false`. A transfer that was broadcast but whose
 * confirmation could not be observed throws `TransferUnconfirmed` with the
 * transaction hash instead, since it may still be mined.
 */

import { ethers, isError } from 'ethers';
import { serializeError, tokenLogger } from '../../logging/index.js';
import { VestingError } from '../errors.js';
import type { ITokenLedger } from './ITokenLedger.js';

const ERC20_ABI = [
  'function balanceOf(address owner) view returns (uint256)',
  'function transfer(address to, uint256 amount) returns (bool)',
  'function transferFrom(address from, address to, uint256 amount) returns (bool)',
];

export interface TransferReceipt {
  status: number | null;  // 1 = success, 0 = reverted
  blockNumber: number;
  gasUsed: bigint;
}

export interface SubmittedTransfer {
  hash: string;
  wait(confirmations?: number): Promise<TransferReceipt | null>;
}

/**
 * The slice of an ERC-20 contract the ledger calls
 */
export interface Erc20Contract {
  balanceOf(owner: string): Promise<unknown>;
  transfer(to: string, amount: bigint): Promise<SubmittedTransfer>;
  transferFrom(from: string, to: string, amount: bigint): Promise<SubmittedTransfer>;
}

export interface Erc20LedgerConfig {
  tokenAddress: string;
  confirmations: number;
}

type Direction = 'in' | 'out';

function reasonOf(error: unknown): string {
  return String(serializeError(error).message);
}

export class Erc20TokenLedger implements ITokenLedger {
  private readonly token: Erc20Contract;
  private readonly custody: string;
  private readonly confirmations: number;

  constructor(token: Erc20Contract, custody: string, options: { confirmations: number }) {
    this.token = token;
    this.custody = custody;
    this.confirmations = options.confirmations;
  }

  static fromPrivateKey(privateKey: string, rpcUrl: string, config: Erc20LedgerConfig): Erc20TokenLedger {
    const wallet = new ethers.Wallet(privateKey, new ethers.JsonRpcProvider(rpcUrl));
    const contract = new ethers.Contract(config.tokenAddress, ERC20_ABI, wallet);

    return new Erc20TokenLedger(
      {
        balanceOf: (owner) => contract.getFunction('balanceOf')(owner),
        transfer: (to, amount) => contract.getFunction('transfer')(to, amount),
        transferFrom: (from, to, amount) => contract.getFunction('transferFrom')(from, to, amount),
      },
      wallet.address,
      { confirmations: config.confirmations },
    );
  }

  async transferInto(from: string, amount: bigint): Promise<boolean> {
    return this.send('in', from, amount, () => this.token.transferFrom(from, this.custody, amount));
  }

  async transferOut(to: string, amount: bigint): Promise<boolean> {
    return this.send('out', to, amount, () => this.token.transfer(to, amount));
  }

  async custodyBalance(): Promise<bigint> {
    const balance = await this.token.balanceOf(this.custody);
    if (typeof balance !== 'bigint') {
      throw new Error('balanceOf returned a non-integer value');
    }
    return balance;
  }

  private async send(
    direction: Direction,
    counterparty: string,
    amount: bigint,
    submit: () => Promise<SubmittedTransfer>,
  ): Promise<boolean> {
    let tx: SubmittedTransfer;
    try {
      tx = await submit();
    } catch (error) {
      tokenLogger.transferFailed(direction, counterparty, amount, reasonOf(error));
      return false;
    }
    tokenLogger.info({ txHash: tx.hash, direction, counterparty }, 'Token transfer sent');

    let receipt: TransferReceipt | null;
    try {
      receipt = await tx.wait(this.confirmations);
    } catch (error) {
      // ethers rejects wait() with CALL_EXCEPTION when the mined tx reverted
      if (isError(error, 'CALL_EXCEPTION')) {
        tokenLogger.transferFailed(direction, counterparty, amount, `transaction ${tx.hash} reverted`);
        return false;
      }
      throw this.unconfirmed(tx.hash, direction, counterparty, amount, error);
    }

    if (receipt === null) {
      throw this.unconfirmed(tx.hash, direction, counterparty, amount, undefined);
    }

    if (receipt.status !== 1) {
      tokenLogger.transferFailed(direction, counterparty, amount, `transaction ${tx.hash} reverted`);
      return false;
    }

    tokenLogger.info(
      { txHash: tx.hash, gasUsed: receipt.gasUsed.toString(), block: receipt.blockNumber },
      'Token transfer confirmed',
    );
    return true;
  }

  private unconfirmed(
    txHash: string,
    direction: Direction,
    counterparty: string,
    amount: bigint,
    cause: unknown,
  ): VestingError {
    const details = { txHash, direction, counterparty, amount: amount.toString() };
    tokenLogger.error(
      { ...details, error: cause === undefined ? undefined : serializeError(cause) },
      'Token transfer broadcast but not confirmed; reconcile against the chain',
    );
    return new VestingError(
      'TransferUnconfirmed',
      `Token transfer ${direction} ${txHash} was broadcast but not confirmed`,
      details,
      { cause },
    );
  }
}
