import { ConfigLoader, type ConfigLoaderOptions } from "./ConfigLoader.js";
import type { DefaultRegistry } from "./DefaultRegistry.js";
import type { ResourceReader } from "./resources.js";
import type { ConfigLogger } from "./types.js";

/**
 * Settings shared by every loader created from one scope
 */
export interface LoaderSettings {
  resources?: ResourceReader;
  format?: string;
  logger?: ConfigLogger;
  registry?: DefaultRegistry;
  autoUpdate?: boolean;
  backup?: boolean;
}

export interface LoaderScope {
  readonly settings: Readonly<LoaderSettings>;
  /** Load a config file; per-call options win over the scope's settings */
  load<T>(options: ConfigLoaderOptions<T>): Promise<ConfigLoader<T>>;
  /** A child scope with some settings replaced */
  with(overrides: LoaderSettings): LoaderScope;
}

/**
 * @example
 * const scope = createLoaderScope({ resources: moduleResources(import.meta.url), autoUpdate: true });
 * const server = await scope.load({ schema: ServerSchema, targetFile: "server.yml", resourcePath: "server.yml" });
 */
export function createLoaderScope(settings: LoaderSettings = {}): LoaderScope {
  const frozen = Object.freeze({ ...settings });
  return {
    settings: frozen,
    load<T>(options: ConfigLoaderOptions<T>): Promise<ConfigLoader<T>> {
      return ConfigLoader.load({ ...options, ...mergeSettings(frozen, options) });
    },
    with(overrides: LoaderSettings): LoaderScope {
      return createLoaderScope(mergeSettings(frozen, overrides));
    },
  };
}

function mergeSettings(base: LoaderSettings, overrides: LoaderSettings): LoaderSettings {
  return {
    resources: overrides.resources ?? base.resources,
    format: overrides.format ?? base.format,
    logger: overrides.logger ?? base.logger,
    registry: overrides.registry ?? base.registry,
    autoUpdate: overrides.autoUpdate ?? base.autoUpdate,
    backup: overrides.backup ?? base.backup,
  };
}
