export * from './staking.js';
export * from './session.js';
