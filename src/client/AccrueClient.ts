import type { ConfirmOptions, PublicKey } from '@solana/web3.js';
import * as anchor from '@coral-xyz/anchor';
import type { Idl } from '@coral-xyz/anchor';

import { AccrueReadonlyClient, type AccrueReadonlyClientConfig } from './AccrueReadonlyClient.js';

export type AccrueClientConfig = Omit<AccrueReadonlyClientConfig, 'program'> & {
  wallet: anchor.Wallet;
  confirmOptions?: ConfirmOptions;
  idl: Idl;
};

/** Signing client: markets it opens can send mint/redeem for the wallet. */
export class AccrueClient extends AccrueReadonlyClient {
  readonly wallet: anchor.Wallet;
  readonly provider: anchor.AnchorProvider;

  constructor(cfg: AccrueClientConfig) {
    const provider = new anchor.AnchorProvider(
      cfg.connection,
      cfg.wallet,
      cfg.confirmOptions ?? anchor.AnchorProvider.defaultOptions()
    );

    const program = new anchor.Program(cfg.idl, provider);

    super({
      ...cfg,
      program
    });

    this.wallet = cfg.wallet;
    this.provider = provider;
  }

  get publicKey(): PublicKey {
    return this.wallet.publicKey;
  }
}
