import { Module } from '@nestjs/common';
import { AccountModule } from '../account/account.module';
import { AuctionModule } from '../auction/auction.module';
import { AuctionShell } from './auction-shell';

@Module({
  imports: [AccountModule, AuctionModule],
  providers: [AuctionShell],
  exports: [AuctionShell],
})
export class ShellModule {}
