import { ConfigError, ProviderConfig } from '@constify/shared';
import type { RewriteAdapter } from './adapter';
import { FakeRewriteAdapter } from './fake/adapter';
import { OpenAIRewriteAdapter } from './openai/adapter';

/**
 * Builds the adapter named by `provider.type`.
 */
export function createRewriteAdapter(
  config: ProviderConfig,
  env: NodeJS.ProcessEnv = process.env,
): RewriteAdapter {
  switch (config.type) {
    case 'openai':
      return new OpenAIRewriteAdapter(config, { env });
    case 'fake':
      return new FakeRewriteAdapter([], env);
    default: {
      const unknownType: never = config.type;
      throw new ConfigError(`Unknown provider type: ${String(unknownType)}`);
    }
  }
}
