const splitList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);

const readFlag = (value: string | undefined, fallback: boolean): boolean =>
  value === undefined ? fallback : value.trim().toLowerCase() === 'true';

const readNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value !== undefined && value.trim() !== '' && Number.isFinite(parsed) ? parsed : fallback;
};

export default () => ({
  env: process.env.ENV || 'dev',
  port: readNumber(process.env.PORT, 3001),
  corsOrigins: splitList(process.env.BFF_CORS_ORIGINS || 'http://localhost:3000'),
  debug: {
    // JSON-lines event log; unset disables it
    logDir: process.env.BFF_DEBUG_LOG_DIR
  },
  staking: {
    // Initialize from the values below on boot when no saved ledger exists
    autoInitialize: readFlag(process.env.STAKING_AUTO_INITIALIZE, true),
    collectionAddress: process.env.STAKING_COLLECTION_ADDRESS || '0xa55e7',
    rewardTokenAddress: process.env.STAKING_REWARD_TOKEN_ADDRESS || '0x7043e',
    custodyAddress: process.env.STAKING_CUSTODY_ADDRESS || '0xc0ffee',
    // Amounts are integer strings in the reward token's smallest unit
    rewardPerBlock: process.env.STAKING_REWARD_PER_BLOCK || '100',
    earlyExitTax: process.env.STAKING_EARLY_EXIT_TAX || '0',
    carryAmount: process.env.STAKING_CARRY_AMOUNT || '0',
    stakeLimit: readNumber(process.env.STAKING_STAKE_LIMIT, 1000),
    durationHours: readNumber(process.env.STAKING_DURATION_HOURS, 24 * 30),
    unbondingHours: readNumber(process.env.STAKING_UNBONDING_HOURS, 24 * 7),
    // Unix seconds at block height 0
    genesisTime: readNumber(process.env.STAKING_GENESIS_TIME, 0),
    stateFile: process.env.STAKING_STATE_FILE,
    admins: splitList(process.env.STAKING_ADMINS),
    pausers: splitList(process.env.STAKING_PAUSERS),
    journalLimit: readNumber(process.env.STAKING_JOURNAL_LIMIT, 500)
  },
  custody: {
    mintEnabled: readFlag(process.env.CUSTODY_MINT_ENABLED, true)
  },
  session: {
    challengeTtlSeconds: readNumber(process.env.SESSION_CHALLENGE_TTL_SECONDS, 5 * 60),
    ttlSeconds: readNumber(process.env.SESSION_TTL_SECONDS, 60 * 60)
  }
});
