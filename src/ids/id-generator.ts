import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export interface IdGenerator {
  next(): string;
}

export const ID_GENERATOR = Symbol('ID_GENERATOR');

/**
 * Counter-based ids (`ID1000`, `ID1001`, ...). One instance serves accounts
 * and auctions alike, so ids are unique across both within a process.
 */
@Injectable()
export class SequentialIdGenerator implements IdGenerator {
  private readonly prefix: string;
  private counter: number;

  constructor(config: ConfigService) {
    this.prefix = config.get<string>('ids.prefix') ?? 'ID';
    this.counter = config.get<number>('ids.start') ?? 1000;
  }

  next(): string {
    const id = `${this.prefix}${this.counter}`;
    this.counter += 1;
    return id;
  }
}
