// pattern: Imperative Shell

/**
 * Start every enabled external tool provider, collect what each one offers,
 * and expose those capabilities as ordinary tools. A provider that fails to
 * start or list its tools is closed and skipped; the rest are unaffected.
 */

import type { McpServerConfig } from '../config/schema.js';
import type { Logger } from '../logging/index.js';
import { errorMessage } from '../tool/result.js';
import type { Tool, ToolDefinition } from '../tool/types.js';
import { withTimeout } from './timeout.js';
import type { ToolProvider } from './tool-provider.js';

export type ToolProviderFactory = (name: string, config: McpServerConfig) => ToolProvider;

export type ConnectOptions = {
  factory: ToolProviderFactory;
  discoveryTimeoutMs: number;
  logger: Logger;
  /** Tool names already taken, e.g. by built-in tools. */
  reservedNames?: Iterable<string>;
  /** Entries rejected while reading the configuration, reported as failures. */
  invalid?: ReadonlyArray<ProviderFailure>;
};

export type ProviderFailure = {
  provider: string;
  error: string;
};

export type ConnectedProviders = {
  tools: Array<Tool>;
  providers: Array<ToolProvider>;
  failures: Array<ProviderFailure>;
  close(): Promise<void>;
};

type Discovery =
  | { ok: true; provider: ToolProvider; definitions: Array<ToolDefinition> }
  | { ok: false; failure: ProviderFailure };

export function providerTool(provider: ToolProvider, definition: ToolDefinition): Tool {
  return {
    definition,
    execute: (input) => provider.execute(definition.name, input),
  };
}

async function closeQuietly(provider: ToolProvider, logger: Logger): Promise<void> {
  try {
    await provider.close();
  } catch (error) {
    logger.warn({ provider: provider.name, err: error }, 'failed to close tool provider');
  }
}

async function discoverOne(
  name: string,
  config: McpServerConfig,
  options: ConnectOptions,
): Promise<Discovery> {
  let provider: ToolProvider;
  try {
    provider = options.factory(name, config);
  } catch (error) {
    options.logger.warn({ provider: name, err: error }, 'failed to create tool provider');
    return { ok: false, failure: { provider: name, error: errorMessage(error) } };
  }

  const timeoutMs = config.discovery_timeout_ms ?? options.discoveryTimeoutMs;
  try {
    const definitions = await withTimeout(provider.discover(), timeoutMs, name);
    return { ok: true, provider, definitions };
  } catch (error) {
    options.logger.warn({ provider: name, err: error }, 'tool provider discovery failed, skipping');
    await closeQuietly(provider, options.logger);
    return { ok: false, failure: { provider: name, error: errorMessage(error) } };
  }
}

export async function connectToolProviders(
  servers: Readonly<Record<string, McpServerConfig>>,
  options: ConnectOptions,
): Promise<ConnectedProviders> {
  const enabled = Object.entries(servers).filter(([name, config]) => {
    if (config.disabled) {
      options.logger.info({ provider: name }, 'tool provider disabled, skipping');
      return false;
    }
    return true;
  });

  const discoveries = await Promise.all(
    enabled.map(([name, config]) => discoverOne(name, config, options)),
  );

  const taken = new Set(options.reservedNames ?? []);
  const tools: Array<Tool> = [];
  const providers: Array<ToolProvider> = [];
  const failures: Array<ProviderFailure> = [...(options.invalid ?? [])];

  // configuration order, regardless of which provider answered first
  for (const discovery of discoveries) {
    if (!discovery.ok) {
      failures.push(discovery.failure);
      continue;
    }

    providers.push(discovery.provider);
    for (const definition of discovery.definitions) {
      if (taken.has(definition.name)) {
        options.logger.warn(
          { provider: discovery.provider.name, tool: definition.name },
          'tool name already in use, skipping',
        );
        continue;
      }
      taken.add(definition.name);
      tools.push(providerTool(discovery.provider, definition));
    }
  }

  options.logger.info(
    { providers: providers.length, tools: tools.length, failed: failures.length },
    'external tool providers ready',
  );

  let closing: Promise<void> | undefined;
  return {
    tools,
    providers,
    failures,
    close(): Promise<void> {
      closing ??= Promise.all(providers.map((p) => closeQuietly(p, options.logger))).then(() => undefined);
      return closing;
    },
  };
}
