import { ConfigService } from '@nestjs/config';
import { SequentialIdGenerator } from './id-generator';

describe('SequentialIdGenerator', () => {
  it('counts up from the configured start', () => {
    const ids = new SequentialIdGenerator(
      new ConfigService({ ids: { prefix: 'ID', start: 1000 } }),
    );
    expect([ids.next(), ids.next(), ids.next()]).toEqual([
      'ID1000',
      'ID1001',
      'ID1002',
    ]);
  });

  it('falls back to ID1000 when nothing is configured', () => {
    const ids = new SequentialIdGenerator(new ConfigService({}));
    expect(ids.next()).toBe('ID1000');
  });
});
