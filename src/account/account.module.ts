import { Module } from '@nestjs/common';
import { AccountService } from './account.service';
import { SETTLEMENT_LEDGER } from './account.types';

@Module({
  providers: [
    AccountService,
    { provide: SETTLEMENT_LEDGER, useExisting: AccountService },
  ],
  exports: [AccountService, SETTLEMENT_LEDGER],
})
export class AccountModule {}
