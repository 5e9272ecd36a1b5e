import { Global, Module } from '@nestjs/common';
import { ID_GENERATOR, SequentialIdGenerator } from './id-generator';

@Global()
@Module({
  providers: [{ provide: ID_GENERATOR, useClass: SequentialIdGenerator }],
  exports: [ID_GENERATOR],
})
export class IdModule {}
