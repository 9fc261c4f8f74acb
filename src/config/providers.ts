/**
 * Per-provider protocol quirks, selected explicitly in configuration
 */

export interface ProviderProfile {
  name: string;
  /** Send list prefixes with a leading '/' */
  listPrefixLeadingSlash: boolean;
  /** Remove a leading '/' from keys returned by listings */
  stripLeadingSlashFromKeys: boolean;
}

export type ProviderName = 'aws' | 'minio' | 'ovh' | 'generic';

export const PROVIDERS: Readonly<Record<ProviderName, Readonly<ProviderProfile>>> = Object.freeze({
  aws: { name: 'aws', listPrefixLeadingSlash: false, stripLeadingSlashFromKeys: false },
  minio: { name: 'minio', listPrefixLeadingSlash: false, stripLeadingSlashFromKeys: false },
  // OVH expects '/prefix' and may echo keys back with the slash
  ovh: { name: 'ovh', listPrefixLeadingSlash: true, stripLeadingSlashFromKeys: true },
  generic: { name: 'generic', listPrefixLeadingSlash: false, stripLeadingSlashFromKeys: false },
});

export function isProviderName(value: string): value is ProviderName {
  return Object.prototype.hasOwnProperty.call(PROVIDERS, value);
}

export function resolveProvider(provider?: ProviderName | ProviderProfile): ProviderProfile {
  if (provider === undefined) {
    return { ...PROVIDERS.generic };
  }
  if (typeof provider === 'string') {
    return { ...PROVIDERS[provider] };
  }
  return { ...provider };
}
