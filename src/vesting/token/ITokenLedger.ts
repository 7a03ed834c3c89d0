/**
 * Fungible token ledger consumed by the vesting service.
 *
 * A transfer resolves to false (or rejects) when it did not happen; the
 * service treats both as a hard failure of the whole operation.
 */
export interface ITokenLedger {
  /**
   * Move `amount` from `from` into the vesting custody account
   */
  transferInto(from: string, amount: bigint): Promise<boolean>;

  /**
   * Pay `amount` out of custody to `to`
   */
  transferOut(to: string, amount: bigint): Promise<boolean>;

  /**
   * Tokens currently held in custody
   */
  custodyBalance(): Promise<bigint>;
}
