import type { PublicKey } from '@solana/web3.js';
import type { RewardsController } from '../rewards/RewardsController.js';
import type { InMemoryAssetToken } from './InMemoryAssetToken.js';

export class InMemoryRewardsController implements RewardsController {
  readonly claims: string[] = [];

  constructor(
    readonly rewardToken: InMemoryAssetToken,
    public accrued = 0n
  ) {}

  async claim(holder: PublicKey): Promise<void> {
    this.claims.push(holder.toBase58());
    this.rewardToken.mintTo(holder, this.accrued);
    this.accrued = 0n;
  }
}
