import logger from '../../utils/logger';
import { LIBRARY_PROVIDER } from '../models/mediaItems';
import { MusicProvider } from './types';

/**
 * Keeps track of the configured provider instances for the lifetime of the service.
 */
export class ProviderRegistry {
  private readonly providers = new Map<string, MusicProvider>();

  register(provider: MusicProvider): void {
    if (provider.instanceId === LIBRARY_PROVIDER) {
      throw new Error(`[ProviderRegistry] "${LIBRARY_PROVIDER}" is reserved for the local library`);
    }
    if (this.providers.has(provider.instanceId)) {
      logger.warn(`[ProviderRegistry] Replacing provider instance ${provider.instanceId}`);
    }
    this.providers.set(provider.instanceId, provider);
    logger.info(`[ProviderRegistry] Registered ${provider.name} (${provider.domain}/${provider.instanceId})`);
  }

  async unregister(instanceId: string): Promise<void> {
    const provider = this.providers.get(instanceId);
    if (!provider) return;
    this.providers.delete(instanceId);
    await provider.close?.();
    logger.info(`[ProviderRegistry] Unregistered ${instanceId}`);
  }

  /**
   * Resolve a provider by instance id, falling back to the first available instance of a domain.
   * Unknown or unavailable handles resolve to `undefined`.
   */
  resolve(domainOrInstance: string | undefined): MusicProvider | undefined {
    if (!domainOrInstance) return undefined;
    const byInstance = this.providers.get(domainOrInstance);
    if (byInstance) return byInstance.available ? byInstance : undefined;
    for (const provider of this.providers.values()) {
      if (provider.domain === domainOrInstance && provider.available) return provider;
    }
    return undefined;
  }

  /** Every registered provider that is currently available. */
  activeProviders(): MusicProvider[] {
    return Array.from(this.providers.values()).filter((provider) => provider.available);
  }

  async closeAll(): Promise<void> {
    const closing = Array.from(this.providers.keys()).map((id) => this.unregister(id));
    await Promise.allSettled(closing);
  }
}
