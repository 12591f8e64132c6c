import { describe, expect, it } from 'vitest';

import { codeOf } from '../testing/errors.js';
import { testKey } from '../testing/keys.js';
import { UINT256_MAX } from '../utils/math.js';
import { ShareLedger } from './ShareLedger.js';

const alice = testKey(10);
const bob = testKey(11);

describe('ShareLedger', () => {
  it('tracks balances and supply', () => {
    const ledger = new ShareLedger();
    ledger.mint(alice, 100n);
    ledger.transfer(alice, bob, 30n);
    ledger.burn(bob, 10n);

    expect(ledger.balanceOf(alice)).toBe(70n);
    expect(ledger.balanceOf(bob)).toBe(20n);
    expect(ledger.totalSupply).toBe(90n);
  });

  it('rejects burning more than the balance', () => {
    const ledger = new ShareLedger();
    ledger.mint(alice, 5n);
    expect(codeOf(() => ledger.burn(alice, 6n))).toBe('InsufficientShares');
    expect(ledger.totalSupply).toBe(5n);
  });

  it('spends finite allowances and keeps infinite ones', () => {
    const ledger = new ShareLedger();
    ledger.approve(alice, bob, 10n);
    ledger.spendAllowance(alice, bob, 4n);
    expect(ledger.allowance(alice, bob)).toBe(6n);
    expect(codeOf(() => ledger.spendAllowance(alice, bob, 7n))).toBe('InsufficientAllowance');

    ledger.approve(alice, bob, UINT256_MAX);
    ledger.spendAllowance(alice, bob, 1_000n);
    expect(ledger.allowance(alice, bob)).toBe(UINT256_MAX);
  });
});
