import { splitArgs } from './split-args';

describe('splitArgs', () => {
  it('splits on runs of whitespace', () => {
    expect(splitArgs('  bid   ID1003\t25 ')).toEqual(['bid', 'ID1003', '25']);
  });

  it('groups quoted words and keeps empty quotes', () => {
    expect(splitArgs('create "Old lamp" "" 10')).toEqual([
      'create',
      'Old lamp',
      '',
      '10',
    ]);
  });

  it('unescapes characters inside quotes', () => {
    expect(splitArgs('create "say \\"hi\\""')).toEqual(['create', 'say "hi"']);
  });

  it('rejects an unterminated quote', () => {
    expect(() => splitArgs('create "Lamp')).toThrow('Unterminated quote');
  });
});
