import { env } from './env.js';

export { env };
export type { AppEnvironment } from './env.js';

// Protection mode for packaging and loading when the caller does not choose one
export const assetProtection = () => env.ASSET_PROTECTION;
