import { isPatBased, isScmProviderType, type ScmProviderType } from '@regadmin/shared';
import { ConnectorConfigError } from './errors.js';
import type { Connector, ConnectorBuilder, ConnectorSettings } from './types.js';

/**
 * Check that the settings are complete enough to build a connector.
 * PAT-based providers carry no OAuth client, so only the type is checked.
 */
export function validateConnectorSettings(settings: ConnectorSettings): void {
  if (!isScmProviderType(settings.providerType)) {
    throw new ConnectorConfigError(`invalid SCM provider type: ${settings.providerType}`);
  }

  if (isPatBased(settings.providerType)) {
    return;
  }

  if (!settings.clientId) {
    throw new ConnectorConfigError('missing OAuth client ID');
  }
  if (!settings.clientSecret) {
    throw new ConnectorConfigError('missing OAuth client secret');
  }
  if (!settings.callbackUrl) {
    throw new ConnectorConfigError('missing OAuth redirect URL');
  }
}

/**
 * Maps provider types to connector builders.
 */
export class ConnectorRegistry {
  private readonly builders = new Map<ScmProviderType, ConnectorBuilder>();

  register(providerType: ScmProviderType, builder: ConnectorBuilder): this {
    this.builders.set(providerType, builder);
    return this;
  }

  has(providerType: ScmProviderType): boolean {
    return this.builders.has(providerType);
  }

  providerTypes(): ScmProviderType[] {
    return [...this.builders.keys()];
  }

  build(settings: ConnectorSettings): Connector {
    validateConnectorSettings(settings);

    const builder = this.builders.get(settings.providerType);
    if (!builder) {
      throw new ConnectorConfigError(`SCM provider not supported: ${settings.providerType}`);
    }

    return builder(settings);
  }
}
