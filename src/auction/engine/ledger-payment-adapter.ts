import type { PaymentAdapter, TransferResult } from './payment-adapter';

export const CUSTODY_ACCOUNT = '@custody';

/**
 * In-memory ledger of account balances per asset. Custody is a regular
 * account named CUSTODY_ACCOUNT.
 */
export class LedgerPaymentAdapter implements PaymentAdapter {
  private readonly balances = new Map<string, Map<string, number>>();

  balanceOf(asset: string, holder: string): number {
    return this.balances.get(asset)?.get(holder) ?? 0;
  }

  credit(asset: string, holder: string, amount: number): void {
    const accounts = this.balances.get(asset) ?? new Map<string, number>();
    accounts.set(holder, (accounts.get(holder) ?? 0) + amount);
    this.balances.set(asset, accounts);
  }

  async custody(
    asset: string,
    from: string,
    amount: number,
  ): Promise<TransferResult> {
    return this.move(asset, from, CUSTODY_ACCOUNT, amount);
  }

  async release(
    asset: string,
    to: string,
    amount: number,
  ): Promise<TransferResult> {
    return this.move(asset, CUSTODY_ACCOUNT, to, amount);
  }

  async pull(
    paymentAsset: string,
    from: string,
    amount: number,
  ): Promise<TransferResult> {
    return this.move(paymentAsset, from, CUSTODY_ACCOUNT, amount);
  }

  private move(
    asset: string,
    from: string,
    to: string,
    amount: number,
  ): TransferResult {
    const available = this.balanceOf(asset, from);
    if (available < amount) {
      return {
        ok: false,
        reason: `${from} holds ${available} ${asset}, needs ${amount}`,
      };
    }
    this.credit(asset, from, -amount);
    this.credit(asset, to, amount);
    return { ok: true };
  }
}
