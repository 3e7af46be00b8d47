export type TransferResult = { ok: true } | { ok: false; reason: string };

/**
 * External collaborator that moves assets and funds. The engine only decides
 * which transfer must happen; the adapter carries it out.
 */
export interface PaymentAdapter {
  /** Take `amount` of `asset` from `from` into the engine's custody. */
  custody(asset: string, from: string, amount: number): Promise<TransferResult>;
  /** Send `amount` of `asset` from custody to `to`. */
  release(asset: string, to: string, amount: number): Promise<TransferResult>;
  /** Collect a bid payment from `from` into custody. */
  pull(
    paymentAsset: string,
    from: string,
    amount: number,
  ): Promise<TransferResult>;
}
