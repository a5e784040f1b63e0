import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { DataSourceOptions } from 'typeorm';
import { StorageAdapter, WebmentionsConfig } from '../../core';

/**
 * Webmentions Module Configuration
 */
export interface WebmentionsModuleConfig
  extends Omit<WebmentionsConfig, 'storage'> {
  /**
   * Storage configuration
   */
  storage: {
    type: 'mock' | 'typeorm' | 'custom';
    options?: DataSourceOptions;
    adapter?: StorageAdapter;
  };

  /**
   * Endpoint advertised in the `Link` header of responses.
   * Defaults to `/webmentions` under `baseUrl`.
   */
  endpointUrl?: string;

  /**
   * Advertise the endpoint on every response of the module's controllers
   */
  advertiseEndpoint?: boolean;
}

/**
 * Async configuration factory
 */
export interface WebmentionsModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory: (
    ...args: never[]
  ) => Promise<WebmentionsModuleConfig> | WebmentionsModuleConfig;
}

/**
 * Default configuration values
 */
export const defaultWebmentionsModuleConfig = {
  advertiseEndpoint: true,
} satisfies Partial<WebmentionsModuleConfig>;

/**
 * The endpoint URL to advertise, or null when none can be derived
 */
export function resolveEndpointUrl(
  config: Pick<WebmentionsModuleConfig, 'endpointUrl' | 'baseUrl'>,
): string | null {
  if (config.endpointUrl) {
    return config.endpointUrl;
  }
  if (!config.baseUrl) {
    return null;
  }
  try {
    return new URL('/webmentions', config.baseUrl).toString();
  } catch {
    return null;
  }
}
