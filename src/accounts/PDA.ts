import { PublicKey } from '@solana/web3.js';
import { utf8Bytes } from '../utils/encoding.js';
import { Seeds } from './Seeds.js';

export type DerivedPda = { publicKey: PublicKey; bump: number };

function find(programId: PublicKey, seeds: Array<Buffer | Uint8Array>): DerivedPda {
  const [publicKey, bump] = PublicKey.findProgramAddressSync(seeds, programId);
  return { publicKey, bump };
}

export const PDA = {
  market(programId: PublicKey, assetMint: PublicKey): DerivedPda {
    return find(programId, [utf8Bytes(Seeds.Market), assetMint.toBuffer()]);
  },

  vault(programId: PublicKey, assetMint: PublicKey): DerivedPda {
    return find(programId, [utf8Bytes(Seeds.Vault), assetMint.toBuffer()]);
  }
} as const;
