export const Seeds = {
  Market: 'accrue:v1:market',
  Vault: 'accrue:v1:vault'
} as const;
