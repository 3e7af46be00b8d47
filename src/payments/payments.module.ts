import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LedgerPaymentAdapter } from '../auction/engine';
import type { OpeningBalance } from '../config/configuration';
import { PAYMENT_ADAPTER } from './payments.constants';

export function createLedger(
  openingBalances: OpeningBalance[],
): LedgerPaymentAdapter {
  const ledger = new LedgerPaymentAdapter();
  for (const { asset, holder, amount } of openingBalances) {
    ledger.credit(asset, holder, amount);
  }
  return ledger;
}

@Global()
@Module({
  providers: [
    {
      provide: PAYMENT_ADAPTER,
      useFactory: (config: ConfigService) => {
        const balances =
          config.get<OpeningBalance[]>('ledger.openingBalances') ?? [];
        new Logger('PaymentsModule').log(
          `In-memory ledger seeded with ${balances.length} balance(s)`,
        );
        return createLedger(balances);
      },
      inject: [ConfigService],
    },
  ],
  exports: [PAYMENT_ADAPTER],
})
export class PaymentsModule {}
