import { EngineError } from './errors';
import type { PaymentAdapter, TransferResult } from './payment-adapter';

export type Transfer =
  | { kind: 'custody'; asset: string; party: string; amount: number }
  | { kind: 'pull'; asset: string; party: string; amount: number }
  | { kind: 'release'; asset: string; party: string; amount: number };

/**
 * Runs transfers in order. If one fails, the ones already applied are undone
 * in reverse and TransferFailed is thrown, so the caller can abort before
 * committing anything.
 *
 * `confirm` runs once every transfer has landed and re-validates whatever
 * may have changed while they were in flight. If it throws, the transfers are
 * undone and its error is rethrown.
 */
export async function settle(
  adapter: PaymentAdapter,
  transfers: Transfer[],
  confirm?: () => void,
): Promise<void> {
  const applied: Transfer[] = [];
  for (const transfer of transfers) {
    if (transfer.amount === 0) continue;
    const result = await execute(adapter, transfer);
    if (!result.ok) {
      await abort(
        adapter,
        applied,
        new EngineError(
          'TransferFailed',
          `${describe(transfer)} failed: ${result.reason}`,
        ),
      );
    }
    applied.push(transfer);
  }
  if (!confirm) return;
  try {
    confirm();
  } catch (err) {
    await abort(adapter, applied, err);
  }
}

async function abort(
  adapter: PaymentAdapter,
  applied: Transfer[],
  cause: unknown,
): Promise<never> {
  const compensationErrors = await compensate(adapter, applied);
  if (compensationErrors.length === 0) throw cause;
  const message = cause instanceof Error ? cause.message : String(cause);
  throw new EngineError(
    'TransferFailed',
    `${message}; compensation failed: ${compensationErrors.join('; ')}`,
  );
}

async function execute(
  adapter: PaymentAdapter,
  transfer: Transfer,
): Promise<TransferResult> {
  try {
    const { asset, party, amount } = transfer;
    switch (transfer.kind) {
      case 'custody':
        return await adapter.custody(asset, party, amount);
      case 'pull':
        return await adapter.pull(asset, party, amount);
      case 'release':
        return await adapter.release(asset, party, amount);
    }
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, reason };
  }
}

function describe(transfer: Transfer): string {
  return `${transfer.kind} of ${transfer.amount} ${transfer.asset} for ${transfer.party}`;
}

function inverse(transfer: Transfer): Transfer {
  return transfer.kind === 'release'
    ? { ...transfer, kind: 'custody' }
    : { ...transfer, kind: 'release' };
}

async function compensate(
  adapter: PaymentAdapter,
  applied: Transfer[],
): Promise<string[]> {
  const errors: string[] = [];
  for (const transfer of [...applied].reverse()) {
    const result = await execute(adapter, inverse(transfer));
    if (!result.ok) {
      errors.push(`undo ${describe(transfer)}: ${result.reason}`);
    }
  }
  return errors;
}
