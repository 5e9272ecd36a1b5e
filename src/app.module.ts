import { Module } from '@nestjs/common';
import { AccountModule } from './account/account.module';
import { AuctionModule } from './auction/auction.module';
import { ClockModule } from './clock/clock.module';
import { ConfigModule } from './config/config.module';
import { IdModule } from './ids/id.module';
import { ShellModule } from './shell/shell.module';

@Module({
  imports: [
    ConfigModule,
    ClockModule,
    IdModule,
    AccountModule,
    AuctionModule,
    ShellModule,
  ],
})
export class AppModule {}
