import type { PublicKey } from '@solana/web3.js';
import type { AssetToken } from '../vaults/AssetToken.js';

/** Incentive distributor attached to a market. Claiming credits reward tokens to `holder`. */
export interface RewardsController {
  readonly rewardToken: AssetToken;
  claim(holder: PublicKey): Promise<void>;
}
