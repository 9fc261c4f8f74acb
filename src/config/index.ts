/**
 * Configuration
 */

export type { NormalizedS3Config, PublicS3Config, S3ClientConfig } from './types.js';
export { withoutCredentials } from './types.js';

export {
  DEFAULT_ADDRESS_STYLE,
  DEFAULT_REGION,
  DEFAULT_SERVICE,
  DEFAULT_TIMEOUT,
  defaultEndpoint,
} from './defaults.js';

export { normalizeConfig, validateConfig } from './validation.js';

export { createConfigFromEnv, ENV_VARS, type Environment } from './env.js';

export { loadProfileConfig, type ProfileOptions } from './profile.js';

export { parseIni, type IniDocument, type IniSection } from './ini.js';

export {
  PROVIDERS,
  isProviderName,
  resolveProvider,
  type ProviderName,
  type ProviderProfile,
} from './providers.js';
