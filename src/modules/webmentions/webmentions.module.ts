import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import {
  ConfigurationError,
  HttpTransport,
  StorageAdapter,
  WebmentionsHandler,
  defaultWebmentionsConfig,
} from '../../core';
import { createFetchTransport } from '../../adapters/http';
import { MockStorageAdapter } from '../../adapters/storage/mock';
import {
  TypeORMStorageAdapter,
  createDataSource,
} from '../../adapters/storage/typeorm';
import {
  WebmentionsModuleAsyncConfig,
  WebmentionsModuleConfig,
  defaultWebmentionsModuleConfig,
} from './webmentions.config';
import {
  HTTP_TRANSPORT,
  STORAGE_ADAPTER,
  WEBMENTIONS_CONFIG,
  WEBMENTIONS_HANDLER,
} from './constants';
import { WebmentionController } from './controllers/webmention.controller';
import { HealthController } from './controllers/health.controller';
import { WebmentionLinkInterceptor } from './interceptors/webmention-link.interceptor';

/**
 * Webmentions Module - Main NestJS Module
 *
 * Provides dependency injection and configuration for the Webmention engine
 */
@Global()
@Module({})
export class WebmentionsModule {
  /**
   * Configure the module synchronously
   */
  static forRoot(config: WebmentionsModuleConfig): DynamicModule {
    return {
      module: WebmentionsModule,
      providers: [
        {
          provide: WEBMENTIONS_CONFIG,
          useValue: { ...defaultWebmentionsModuleConfig, ...config },
        },
        ...this.createProviders(),
      ],
      controllers: [WebmentionController, HealthController],
      exports: this.exportedTokens(),
    };
  }

  /**
   * Configure the module asynchronously
   */
  static forRootAsync(options: WebmentionsModuleAsyncConfig): DynamicModule {
    return {
      module: WebmentionsModule,
      imports: options.imports || [],
      providers: [
        {
          provide: WEBMENTIONS_CONFIG,
          useFactory: async (...args: never[]) => ({
            ...defaultWebmentionsModuleConfig,
            ...(await options.useFactory(...args)),
          }),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: [WebmentionController, HealthController],
      exports: this.exportedTokens(),
    };
  }

  /**
   * Create providers that depend on the configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: STORAGE_ADAPTER,
        useFactory: (config: WebmentionsModuleConfig) =>
          this.createStorage(config),
        inject: [WEBMENTIONS_CONFIG],
      },
      {
        provide: HTTP_TRANSPORT,
        useFactory: (config: WebmentionsModuleConfig): HttpTransport =>
          config.transport ??
          createFetchTransport(
            config.httpTimeoutMs ?? defaultWebmentionsConfig.httpTimeoutMs,
            config.userAgent ?? defaultWebmentionsConfig.userAgent,
          ),
        inject: [WEBMENTIONS_CONFIG],
      },
      {
        provide: WEBMENTIONS_HANDLER,
        useFactory: (
          config: WebmentionsModuleConfig,
          storage: StorageAdapter,
          transport: HttpTransport,
        ) => new WebmentionsHandler({ ...config, storage, transport }),
        inject: [WEBMENTIONS_CONFIG, STORAGE_ADAPTER, HTTP_TRANSPORT],
      },
      WebmentionLinkInterceptor,
    ];
  }

  private static async createStorage(
    config: WebmentionsModuleConfig,
  ): Promise<StorageAdapter> {
    switch (config.storage.type) {
      case 'mock':
        return new MockStorageAdapter();

      case 'typeorm': {
        const dataSource = createDataSource(config.storage.options);
        await dataSource.initialize();
        return new TypeORMStorageAdapter(dataSource);
      }

      case 'custom':
        if (!config.storage.adapter) {
          throw new ConfigurationError('Custom storage adapter not provided');
        }
        return config.storage.adapter;

      default:
        throw new ConfigurationError(
          `Unknown storage type: ${String(config.storage.type)}`,
        );
    }
  }

  private static exportedTokens() {
    return [
      WEBMENTIONS_CONFIG,
      STORAGE_ADAPTER,
      HTTP_TRANSPORT,
      WEBMENTIONS_HANDLER,
      WebmentionLinkInterceptor,
    ];
  }
}
