import { Module } from '@nestjs/common';
import { AccountModule } from '../account/account.module';
import { AuctionRegistry } from './auction.registry';
import { AuctionService } from './auction.service';

@Module({
  imports: [AccountModule],
  providers: [AuctionService, AuctionRegistry],
  exports: [AuctionService],
})
export class AuctionModule {}
