import { CustodyError } from '../src/modules/custody/custody.errors.js';
import { InMemoryAssetCustodian } from '../src/modules/custody/in-memory-asset.custodian.js';
import { InMemoryTokenLedger } from '../src/modules/custody/in-memory-token.ledger.js';
import { ASSET_RECEIVED } from '../src/modules/staking/staking.collaborators.js';

describe('InMemoryAssetCustodian', () => {
  let custodian: InMemoryAssetCustodian;

  beforeEach(() => {
    custodian = new InMemoryAssetCustodian();
    custodian.mint('0xa', 'asset-1');
  });

  it('moves an asset only from its current owner', () => {
    custodian.transfer('0xa', '0xb', 'asset-1');
    expect(custodian.ownerOf('asset-1')).toBe('0xb');
    expect(() => custodian.transfer('0xa', '0xc', 'asset-1')).toThrow(CustodyError);
    expect(custodian.ownerOf('missing')).toBeNull();
  });

  it('refuses to mint an existing asset', () => {
    expect(() => custodian.mint('0xb', 'asset-1')).toThrow('Asset asset-1 already exists');
  });

  it('asks a registered receiver to acknowledge and reverts when it does not', () => {
    const received: string[] = [];
    custodian.registerReceiver('0xb', {
      onAssetReceived: (from, assetId) => {
        received.push(`${from}:${assetId}`);
        return ASSET_RECEIVED;
      }
    });
    custodian.transfer('0xa', '0xb', 'asset-1');
    expect(received).toEqual(['0xa:asset-1']);

    custodian.registerReceiver('0xc', { onAssetReceived: () => 'rejected' });
    expect(() => custodian.transfer('0xb', '0xc', 'asset-1')).toThrow('Receiver 0xc rejected asset asset-1');
    expect(custodian.ownerOf('asset-1')).toBe('0xb');
  });

  it('rolls ownership back to a checkpoint', () => {
    const rollback = custodian.checkpoint();
    custodian.transfer('0xa', '0xb', 'asset-1');
    custodian.mint('0xb', 'asset-2');
    rollback();
    expect(custodian.ownerOf('asset-1')).toBe('0xa');
    expect(custodian.ownerOf('asset-2')).toBeNull();
  });
});

describe('InMemoryTokenLedger', () => {
  let ledger: InMemoryTokenLedger;

  beforeEach(() => {
    ledger = new InMemoryTokenLedger();
    ledger.mint('0xa', 100n);
  });

  it('transfers balances and rejects overdrafts', () => {
    ledger.transfer('0xa', '0xb', 40n);
    expect(ledger.balanceOf('0xa')).toBe(60n);
    expect(ledger.balanceOf('0xb')).toBe(40n);
    expect(() => ledger.transfer('0xb', '0xa', 41n)).toThrow('Insufficient balance: 0xb holds 40, needs 41');
  });

  it('ignores zero and self transfers and rejects negative amounts', () => {
    ledger.transfer('0xz', '0xa', 0n);
    ledger.transfer('0xa', '0xa', 500n);
    expect(ledger.balanceOf('0xa')).toBe(100n);
    expect(() => ledger.transfer('0xa', '0xb', -1n)).toThrow(CustodyError);
    expect(() => ledger.mint('0xa', 0n)).toThrow('Mint amount must be positive');
  });

  it('rolls balances back to a checkpoint', () => {
    const rollback = ledger.checkpoint();
    ledger.transfer('0xa', '0xb', 100n);
    rollback();
    expect(ledger.balanceOf('0xa')).toBe(100n);
    expect(ledger.balanceOf('0xb')).toBe(0n);
  });
});
