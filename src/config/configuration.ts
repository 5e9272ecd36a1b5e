const numberFromEnv = (
  raw: string | undefined,
  fallback: number,
  parse: (value: string) => number,
): number => {
  if (raw === undefined) return fallback;
  const value = parse(raw);
  return Number.isFinite(value) ? value : fallback;
};

export default () => ({
  accounts: {
    initialBalance: numberFromEnv(process.env.INITIAL_BALANCE, 1000, parseFloat),
  },
  ids: {
    prefix: process.env.ID_PREFIX ?? 'ID',
    start: numberFromEnv(process.env.ID_START, 1000, (value) =>
      parseInt(value, 10),
    ),
  },
});
